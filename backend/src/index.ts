/**
 * otakeeper Agent — Public API
 */

export { createApp } from './app';
export type { AppContext } from './app';
export { loadConfig, engineOptions, DEFAULT_PORT } from './config';
export type { Config } from './config';
export { toUploadResponse } from './routes/ota';
export type { UploadResponse } from './routes/ota';
export { AGENT_VERSION } from './routes/health';
