/**
 * otakeeper Engine — Core Type Definitions
 *
 * Shared by the engine, the HTTP agent and the packaging CLI.
 * The update lifecycle states and error categories here are the
 * vocabulary every caller reports in.
 */

// ─── Update Lifecycle ────────────────────────────────────────────

export type UpdateState =
  | "IDLE"
  | "VALIDATING"
  | "VERIFIED"
  | "BACKING_UP"
  | "INSTALLING"
  | "AWAITING_HEALTH"
  | "COMMITTED"
  | "ROLLED_BACK"
  | "REJECTED"
  | "FAILED";

/** States a transaction can finish in */
export type TerminalState = Extract<
  UpdateState,
  "COMMITTED" | "ROLLED_BACK" | "REJECTED" | "FAILED"
>;

export type ErrorCategory =
  | "CONFIGURATION_ERROR"
  | "PACKAGE_FORMAT_ERROR"
  | "INTEGRITY_ERROR"
  | "AUTHENTICITY_ERROR"
  | "INSTALL_FAILURE"
  | "BUSY_ERROR"
  | "INTERNAL_ERROR";

export interface UpdateError {
  category: ErrorCategory;
  message: string;
  /** State the transaction was in when it failed */
  state: UpdateState;
  details?: Record<string, unknown>;
}

export interface UpdateResult {
  transaction_id: string;
  final_state: TerminalState;
  /** Version label claimed by the package, once it has been read */
  version?: string;
  digest?: string;
  started_at: string;
  finished_at: string;
  error?: UpdateError;
}

// ─── Packages ────────────────────────────────────────────────────

/**
 * The four artifacts of an uploaded package, held in memory for the
 * duration of one transaction.
 */
export interface CandidatePackage {
  binary: Buffer;
  /** Normalized (trimmed, lowercase) claimed digest */
  claimed_digest: string;
  version: string;
  signature: Buffer;
}

export interface PackageSpec {
  artifact_name: string;
  binary: Buffer;
  version: string;
  /** Omitted for unsigned development packages */
  signature?: Buffer;
}

// ─── Persistent State ────────────────────────────────────────────

export interface RecordedState {
  version: string;
  digest: string;
  committed_at: string;
}

export interface InstalledVersion {
  version: string | null;
  digest: string | null;
}

// ─── Health Policy ───────────────────────────────────────────────

/**
 * first-active: healthy as soon as one poll reports active.
 * stay-active: healthy only if every poll reports active.
 */
export type HealthStrategy = "first-active" | "stay-active";

export interface HealthPolicy {
  attempts: number;
  interval_ms: number;
  strategy: HealthStrategy;
}

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  attempts: 10,
  interval_ms: 1000,
  strategy: "first-active",
};

// ─── Engine Options ──────────────────────────────────────────────

export interface EngineOptions {
  /** Live path of the managed executable */
  binary_path: string;
  /** Directory holding backup, recorded state, trusted key and history */
  metadata_dir: string;
  /** Unit name handed to the supervisor, e.g. "commd.service" */
  service_name: string;
  /** Base name of the package artifacts; defaults to basename(binary_path) */
  artifact_name?: string;
  /** Defaults to <metadata_dir>/ota.pub.pem */
  trusted_key_path?: string;
  health?: Partial<HealthPolicy>;
  /** Ceiling on the uncompressed size of each package entry */
  max_entry_bytes?: number;
  /** Enable verbose logging */
  verbose: boolean;
}

/** Every file the engine and reconciler touch, resolved from EngineOptions */
export interface EnginePaths {
  binary: string;
  staging: string;
  metadata_dir: string;
  backup: string;
  state: string;
  trusted_key: string;
  history: string;
}

// ─── History ─────────────────────────────────────────────────────

export interface HistoryEntry {
  transaction_id: string;
  final_state: TerminalState;
  version: string | null;
  category: ErrorCategory | null;
  started_at: string;
  finished_at: string;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "state_change" | "error";

export interface StateChangeData {
  transaction_id: string;
  state: UpdateState;
}

export interface EngineEvent {
  type: EngineEventType;
  timestamp: string;
  data: StateChangeData | UpdateError;
}

export type EngineEventHandler = (event: EngineEvent) => void;
