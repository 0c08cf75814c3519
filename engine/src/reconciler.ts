/**
 * otakeeper Engine — Startup Reconciler
 *
 * Runs once at agent boot, before the upload endpoint is reachable, to
 * repair a device that lost power between installing a binary and
 * recording it as committed.
 *
 * The recorded digest is the source of truth: a live binary that does not
 * hash to it (or exists while nothing is recorded) is untrusted and is
 * replaced by the backup.
 */

import * as fs from "fs";
import { EngineOptions } from "./types";
import { computeFileDigest } from "./integrity";
import { MetadataStore, resolvePaths } from "./metadata-store";
import { ServiceController } from "./service/service-controller";
import { Supervisor, SystemctlSupervisor } from "./service/supervisor";
import { createLogger, Logger } from "./utils/logger";

export type ReconcileAction =
  /** Fresh device: metadata directory created, nothing else to do */
  | "INITIALIZED"
  /** Neither a live binary nor a backup exists */
  | "NOTHING_INSTALLED"
  /** Live binary matches the recorded digest */
  | "CONSISTENT"
  /** Live binary was untrusted and the backup was put back */
  | "RESTORED"
  /** Live binary was untrusted and there was no backup to restore */
  | "UNRECOVERABLE";

export interface ReconcileResult {
  action: ReconcileAction;
  expected_digest: string | null;
  actual_digest: string | null;
  residuals_removed: string[];
}

export interface ReconcileDependencies {
  supervisor?: Supervisor;
  logger?: Logger;
}

export async function reconcile(
  options: EngineOptions,
  deps: ReconcileDependencies = {},
): Promise<ReconcileResult> {
  const logger =
    deps.logger ??
    createLogger({ level: options.verbose ? "debug" : "info", name: "reconciler" });
  const paths = resolvePaths(options);
  const store = new MetadataStore(paths, logger);
  const service = new ServiceController(
    options.service_name,
    deps.supervisor ?? new SystemctlSupervisor(),
    logger,
  );

  logger.info({ binary: paths.binary }, "Validating installed binary");

  if (!fs.existsSync(paths.metadata_dir)) {
    logger.info(
      { path: paths.metadata_dir },
      "Metadata directory does not exist, creating an empty one",
    );
    fs.mkdirSync(paths.metadata_dir, { recursive: true });
    return result("INITIALIZED", null, null, []);
  }

  const residuals = store.cleanupResiduals();

  if (!store.hasActive() && !store.hasBackup()) {
    logger.info("No installed binary and no backup, nothing to reconcile");
    return result("NOTHING_INSTALLED", null, null, residuals);
  }

  const recorded = store.readRecorded();
  const expected = recorded?.digest ?? null;
  const actual = store.hasActive() ? await computeFileDigest(paths.binary) : null;

  if (expected !== null && actual !== null && expected === actual) {
    logger.info({ digest: actual }, "Installed binary matches the recorded digest");
    return result("CONSISTENT", expected, actual, residuals);
  }

  logger.warn(
    { expected, actual },
    "Installed binary does not match the recorded digest, restoring from backup",
  );

  await service.stop();
  const restored = store.restoreBackup();
  await service.start();

  if (!restored) {
    logger.error("No backup available; the installed binary is left untrusted");
    return result("UNRECOVERABLE", expected, actual, residuals);
  }

  return result("RESTORED", expected, actual, residuals);
}

function result(
  action: ReconcileAction,
  expected: string | null,
  actual: string | null,
  residuals: string[],
): ReconcileResult {
  return {
    action,
    expected_digest: expected,
    actual_digest: actual,
    residuals_removed: residuals,
  };
}
