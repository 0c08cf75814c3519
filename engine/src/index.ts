/**
 * otakeeper Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The HTTP agent and the CLI import from here — never from internal modules.
 */

// Main engine class and startup repair
export { UpdateEngine, VERIFICATION_FAILED_MESSAGE } from "./engine";
export type { EngineDependencies } from "./engine";
export { reconcile } from "./reconciler";
export type {
  ReconcileAction,
  ReconcileResult,
  ReconcileDependencies,
} from "./reconciler";

// All types
export type {
  UpdateState,
  TerminalState,
  ErrorCategory,
  UpdateError,
  UpdateResult,
  CandidatePackage,
  PackageSpec,
  RecordedState,
  InstalledVersion,
  HealthStrategy,
  HealthPolicy,
  EngineOptions,
  EnginePaths,
  HistoryEntry,
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  StateChangeData,
} from "./types";
export { DEFAULT_HEALTH_POLICY } from "./types";

// Verification and packaging (exposed for the CLI and tests)
export {
  computeDigest,
  computeFileDigest,
  normalizeDigest,
  isDigest,
  digestsEqual,
  DIGEST_CHUNK_SIZE,
} from "./integrity";
export {
  parseTrustedKey,
  verifySignature,
  signMessage,
  publicKeyFromPrivate,
} from "./signature";
export type { TrustedKey } from "./signature";
export { readPackage, buildPackage, artifactNames, DEFAULT_MAX_ENTRY_BYTES } from "./package";
export type { ArtifactNames } from "./package";
export { UpdateRejection, PackageFormatError } from "./errors";
export { MetadataStore, resolvePaths } from "./metadata-store";
export type { TransitionRecord } from "./history-db";

// Service supervision
export { ServiceController } from "./service/service-controller";
export { SystemctlSupervisor } from "./service/supervisor";
export type { Supervisor } from "./service/supervisor";

// Utilities
export { createLogger, parseLogLevel } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";
