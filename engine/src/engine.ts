/**
 * otakeeper Engine — Update Engine
 *
 * Orchestrates one update transaction:
 *
 *   IDLE → VALIDATING → VERIFIED → BACKING_UP → INSTALLING →
 *   AWAITING_HEALTH → COMMITTED | ROLLED_BACK
 *
 * Everything up to VERIFIED is read-only with respect to the device: the
 * package is checked in memory against its claimed digest and the trusted
 * key before the live binary, its backup or the recorded state are touched.
 * A package that fails any check ends REJECTED with nothing changed.
 *
 * Past the gate the transaction always runs to a terminal state. Once the
 * live binary has been replaced, any failure restores the backup.
 *
 * Only one transaction runs at a time; a second caller is turned away
 * with BUSY_ERROR instead of waiting.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import {
  CandidatePackage,
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  EnginePaths,
  ErrorCategory,
  HealthPolicy,
  HistoryEntry,
  InstalledVersion,
  TerminalState,
  UpdateError,
  UpdateResult,
  UpdateState,
  DEFAULT_HEALTH_POLICY,
} from "./types";
import { UpdateRejection } from "./errors";
import { createLogger, Logger } from "./utils/logger";
import { computeDigest, digestsEqual, isDigest } from "./integrity";
import { parseTrustedKey, verifySignature } from "./signature";
import { DEFAULT_MAX_ENTRY_BYTES, readPackage } from "./package";
import { MetadataStore, resolvePaths } from "./metadata-store";
import { HistoryDB, TransitionRecord } from "./history-db";
import { ServiceController } from "./service/service-controller";
import { Supervisor, SystemctlSupervisor } from "./service/supervisor";

/**
 * Integrity and authenticity failures share one caller-visible message so
 * an unauthenticated uploader cannot tell which check it failed.
 */
export const VERIFICATION_FAILED_MESSAGE = "Package verification failed";

export interface EngineDependencies {
  supervisor?: Supervisor;
  logger?: Logger;
}

export class UpdateEngine {
  readonly paths: EnginePaths;
  readonly health: HealthPolicy;
  private readonly artifactName: string;
  private readonly maxEntryBytes: number;
  private readonly logger: Logger;
  private readonly store: MetadataStore;
  private readonly service: ServiceController;
  private readonly historyDb: HistoryDB;
  private eventHandlers: EngineEventHandler[] = [];
  private initialized = false;
  private inFlight: string | null = null;

  constructor(options: EngineOptions, deps: EngineDependencies = {}) {
    this.paths = resolvePaths(options);
    this.artifactName = options.artifact_name ?? path.basename(options.binary_path);
    this.health = { ...DEFAULT_HEALTH_POLICY, ...options.health };
    this.maxEntryBytes = options.max_entry_bytes ?? DEFAULT_MAX_ENTRY_BYTES;
    this.logger =
      deps.logger ?? createLogger({ level: options.verbose ? "debug" : "info" });
    this.store = new MetadataStore(this.paths, this.logger);
    this.service = new ServiceController(
      options.service_name,
      deps.supervisor ?? new SystemctlSupervisor(),
      this.logger,
    );
    this.historyDb = new HistoryDB(this.paths.history, this.logger);
  }

  /**
   * Initialize the engine (and the history database).
   * Must be called once before install/query operations.
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    await this.historyDb.init();
    this.initialized = true;
  }

  private ensureInit(): void {
    if (!this.initialized) {
      throw new Error("UpdateEngine not initialized. Call init() first.");
    }
  }

  close(): void {
    this.historyDb.close();
    this.initialized = false;
  }

  // ─── Event System ────────────────────────────────────────────

  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn(
          { error: err instanceof Error ? err.message : String(err) },
          "Engine event handler threw",
        );
      }
    }
  }

  // ─── Queries ─────────────────────────────────────────────────

  /**
   * The committed (version, digest) pair, or nulls if nothing was ever committed.
   */
  getInstalledVersion(): InstalledVersion {
    const recorded = this.store.readRecorded();
    return recorded
      ? { version: recorded.version, digest: recorded.digest }
      : { version: null, digest: null };
  }

  getHistory(limit: number = 20): HistoryEntry[] {
    this.ensureInit();
    return this.historyDb.getHistory(limit);
  }

  getTransactionLog(transactionId: string): TransitionRecord[] {
    this.ensureInit();
    return this.historyDb.getTransactionLog(transactionId);
  }

  isBusy(): boolean {
    return this.inFlight !== null;
  }

  // ─── Core: Install ───────────────────────────────────────────

  /**
   * Validate, install and health-check an uploaded package archive.
   * Never throws; every outcome is described by the returned result.
   */
  async install(archive: Buffer): Promise<UpdateResult> {
    this.ensureInit();
    const transactionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();

    // Checked and taken before the first await
    if (this.inFlight !== null) {
      this.logger.warn(
        { transaction: transactionId, running: this.inFlight },
        "Rejecting upload, another update is in progress",
      );
      return {
        transaction_id: transactionId,
        final_state: "REJECTED",
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        error: {
          category: "BUSY_ERROR",
          message: "Another update is in progress",
          state: "IDLE",
        },
      };
    }
    this.inFlight = transactionId;

    try {
      return await this.runTransaction(transactionId, startedAt, archive);
    } finally {
      this.inFlight = null;
    }
  }

  private async runTransaction(
    transactionId: string,
    startedAt: string,
    archive: Buffer,
  ): Promise<UpdateResult> {
    let version: string | undefined;
    let digest: string | undefined;
    let current: UpdateState = "IDLE";

    const transition = (state: UpdateState, details?: Record<string, unknown>) => {
      current = state;
      this.audit(() => this.historyDb.logStateTransition(transactionId, state, details));
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { transaction_id: transactionId, state },
      });
    };

    const finish = (final: TerminalState, error?: UpdateError): UpdateResult => {
      const finishedAt = new Date().toISOString();
      transition(final, error ? { category: error.category, message: error.message } : undefined);
      this.audit(() =>
        this.historyDb.recordTransaction({
          transaction_id: transactionId,
          final_state: final,
          version: version ?? null,
          category: error?.category ?? null,
          started_at: startedAt,
          finished_at: finishedAt,
        }),
      );
      if (error) {
        this.emit({ type: "error", timestamp: finishedAt, data: error });
      }
      return {
        transaction_id: transactionId,
        final_state: final,
        version,
        digest,
        started_at: startedAt,
        finished_at: finishedAt,
        error,
      };
    };

    const reject = (
      category: ErrorCategory,
      message: string,
      details?: Record<string, unknown>,
    ): UpdateResult => {
      this.logger.error(
        { transaction: transactionId, category, state: current, error: message, ...details },
        "Update rejected",
      );
      return finish("REJECTED", { category, message, state: current, details });
    };

    // ─── VALIDATING ───
    transition("VALIDATING");
    this.logger.info(
      { transaction: transactionId, bytes: archive.length },
      "Validating update package",
    );

    let keyPem: Buffer;
    try {
      keyPem = fs.readFileSync(this.paths.trusted_key);
    } catch {
      return reject("CONFIGURATION_ERROR", "Update certificate is not present", {
        path: this.paths.trusted_key,
      });
    }

    let candidate: CandidatePackage;
    try {
      candidate = await readPackage(archive, this.artifactName, this.maxEntryBytes);
    } catch (err: unknown) {
      if (err instanceof UpdateRejection) {
        return reject(err.category, err.message, err.details);
      }
      return reject("INTERNAL_ERROR", "Update failed", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    version = candidate.version;

    const actualDigest = computeDigest(candidate.binary);
    this.logger.info(
      { expected: candidate.claimed_digest, actual: actualDigest },
      "Comparing package digest",
    );

    if (!isDigest(candidate.claimed_digest) || !digestsEqual(candidate.claimed_digest, actualDigest)) {
      return reject("INTEGRITY_ERROR", VERIFICATION_FAILED_MESSAGE, {
        reason: "digest_mismatch",
      });
    }

    const trustedKey = parseTrustedKey(keyPem);
    if (!verifySignature(trustedKey, candidate.binary, candidate.signature, this.logger)) {
      return reject("AUTHENTICITY_ERROR", VERIFICATION_FAILED_MESSAGE, {
        reason: "signature_invalid",
      });
    }

    digest = actualDigest;
    transition("VERIFIED", { version, digest });

    // ─── Past the gate: the device is modified from here on ───
    let hadBackup = false;
    try {
      // ─── BACKING_UP ───
      transition("BACKING_UP");
      await this.service.stop();
      hadBackup = this.store.backupActive();

      // ─── INSTALLING ───
      transition("INSTALLING");
      this.store.installBinary(candidate.binary);

      // ─── AWAITING_HEALTH ───
      transition("AWAITING_HEALTH", { ...this.health });
      await this.service.start();
      const healthy = await this.service.probe(this.health);

      if (healthy) {
        // ─── COMMITTED ───
        this.store.writeRecorded({
          version,
          digest,
          committed_at: new Date().toISOString(),
        });
        this.logger.info({ transaction: transactionId, version, digest }, "Updated successfully");
        return finish("COMMITTED");
      }

      // ─── ROLLED_BACK ───
      await this.rollBack(hadBackup);
      this.logger.error(
        { transaction: transactionId, version },
        "Failed to start new binary, rollback done",
      );
      return finish("ROLLED_BACK", {
        category: "INSTALL_FAILURE",
        message: "Failed to start new binary, rollback done",
        state: "AWAITING_HEALTH",
        details: { backup_restored: hadBackup },
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const failedState = current;
      this.logger.error(
        { transaction: transactionId, state: failedState, error: message },
        "Update failed after verification",
      );

      // Decided by what is on disk: a failure after the rename leaves the
      // candidate live even though installBinary threw
      const replaced = this.liveBinaryIs(actualDigest);
      let restored = false;
      if (replaced) {
        try {
          await this.rollBack(hadBackup);
          restored = true;
        } catch (rollbackErr: unknown) {
          this.logger.error(
            {
              transaction: transactionId,
              error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
            },
            "Rollback failed; the startup reconciler will retry",
          );
        }
      } else {
        this.logger.info(
          { transaction: transactionId },
          "Live binary was not replaced, restarting it",
        );
        if (this.store.hasActive()) {
          await this.service.start();
        }
        restored = true;
      }

      return finish(restored ? "ROLLED_BACK" : "FAILED", {
        category: "INTERNAL_ERROR",
        message: `Update failed: ${message}`,
        state: failedState,
        details: { binary_replaced: replaced },
      });
    }
  }

  private liveBinaryIs(digest: string): boolean {
    try {
      const active = this.store.activeDigest();
      return active !== null && digestsEqual(active, digest);
    } catch (err: unknown) {
      this.logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "Could not read the live binary, assuming it was replaced",
      );
      return true;
    }
  }

  /**
   * History is an audit trail; failing to write it must not fail an update.
   */
  private audit(write: () => void): void {
    try {
      write();
    } catch (err: unknown) {
      this.logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "Could not write update history",
      );
    }
  }

  /**
   * Put the previous binary back and restart it. With no backup (a failed
   * first-ever install) the failed binary is removed and nothing restarts.
   * Whatever binary is left on disk is started again, even when the
   * restore itself fails.
   */
  private async rollBack(hadBackup: boolean): Promise<void> {
    try {
      await this.service.stop();
      if (!(hadBackup && this.store.restoreBackup())) {
        this.store.removeActive();
      }
    } finally {
      if (this.store.hasActive()) {
        await this.service.start();
      }
    }
  }
}

