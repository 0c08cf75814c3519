/**
 * otakeeper Agent — Configuration
 *
 * Central configuration loaded from environment variables with sensible defaults.
 */

import * as path from 'path';
import {
  DEFAULT_MAX_ENTRY_BYTES,
  EngineOptions,
  HealthStrategy,
  LogLevel,
  parseLogLevel,
} from '@otakeeper/engine';

export interface Config {
  /** Server port */
  port: number;
  /** Interface to bind */
  host: string;
  /** Node environment */
  env: string;
  /** Live path of the managed executable */
  binaryPath: string;
  /** Backup, recorded state, trusted key and history live here */
  metadataDir: string;
  /** systemd unit restarted around an update */
  serviceName: string;
  /** Defaults to <metadataDir>/ota.pub.pem */
  trustedKeyPath?: string;
  healthAttempts: number;
  healthIntervalMs: number;
  healthStrategy: HealthStrategy;
  /** Largest accepted upload, in bytes */
  maxUploadBytes: number;
  /** Largest uncompressed size of one package entry, in bytes */
  maxEntryBytes: number;
  /** CORS allowed origins (comma-separated) */
  corsOrigins: string[];
  /** Log level */
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 8682;
const DEFAULT_MAX_UPLOAD_BYTES = 64 * 1024 * 1024;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const binaryPath = env.OTA_BINARY_PATH || '/usr/bin/commd';

  return {
    port: parseInteger(env.OTA_PORT, DEFAULT_PORT),
    host: env.OTA_HOST || '0.0.0.0',
    env: env.NODE_ENV || 'production',
    binaryPath,
    metadataDir: env.OTA_METADATA_DIR || '/etc/otakeeper',
    serviceName: env.OTA_SERVICE_NAME || `${path.basename(binaryPath)}.service`,
    trustedKeyPath: env.OTA_TRUSTED_KEY_PATH || undefined,
    healthAttempts: parseInteger(env.OTA_HEALTH_ATTEMPTS, 10),
    healthIntervalMs: parseInteger(env.OTA_HEALTH_INTERVAL_MS, 1000),
    healthStrategy: env.OTA_HEALTH_STRATEGY === 'stay-active' ? 'stay-active' : 'first-active',
    maxUploadBytes: parseInteger(env.OTA_MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    maxEntryBytes: parseInteger(env.OTA_MAX_ENTRY_BYTES, DEFAULT_MAX_ENTRY_BYTES),
    corsOrigins: (env.OTA_CORS_ORIGINS || '*').split(',').map((s) => s.trim()),
    logLevel: parseLogLevel(env.OTA_LOG_LEVEL),
  };
}

/**
 * The engine and the reconciler are configured from the same values.
 */
export function engineOptions(config: Config): EngineOptions {
  return {
    binary_path: config.binaryPath,
    metadata_dir: config.metadataDir,
    service_name: config.serviceName,
    trusted_key_path: config.trustedKeyPath,
    health: {
      attempts: config.healthAttempts,
      interval_ms: config.healthIntervalMs,
      strategy: config.healthStrategy,
    },
    max_entry_bytes: config.maxEntryBytes,
    verbose: config.logLevel === 'debug',
  };
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}
