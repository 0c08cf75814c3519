/**
 * otakeeper Engine — Persistent Update State
 *
 * Owns every file that survives a reboot: the live binary, its backup and
 * the recorded (version, digest) pair.
 *
 * Two rules keep the device recoverable after a power cut:
 *   - The live binary is only ever replaced by rename(2) from a staging
 *     file in the same directory, so it is either the old or the new
 *     binary, never a mix.
 *   - Version and digest live in one JSON file, also written by rename,
 *     so they cannot disagree with each other.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineOptions, EnginePaths, RecordedState } from "./types";
import { computeDigest, isDigest } from "./integrity";
import { Logger } from "./utils/logger";

/** Execute permission for owner, group and other */
const EXEC_BITS = 0o111;

export function resolvePaths(options: EngineOptions): EnginePaths {
  const artifact = options.artifact_name ?? path.basename(options.binary_path);
  const metadataDir = options.metadata_dir;

  return {
    binary: options.binary_path,
    staging: `${options.binary_path}.new`,
    metadata_dir: metadataDir,
    backup: path.join(metadataDir, `${artifact}.bak`),
    state: path.join(metadataDir, `${artifact}.state.json`),
    trusted_key: options.trusted_key_path ?? path.join(metadataDir, "ota.pub.pem"),
    history: path.join(metadataDir, "history.db"),
  };
}

export class MetadataStore {
  constructor(
    readonly paths: EnginePaths,
    private readonly logger: Logger,
  ) {}

  // ─── Recorded State ──────────────────────────────────────────

  /**
   * Read the committed (version, digest) pair.
   * A missing, unparseable or malformed file reads as null.
   */
  readRecorded(): RecordedState | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.paths.state, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isRecordedState(parsed)) return parsed;
    } catch {
      // fall through
    }

    this.logger.warn({ path: this.paths.state }, "Recorded state is malformed, ignoring");
    return null;
  }

  /**
   * Replace the recorded state. The pair lands together or not at all.
   */
  writeRecorded(state: RecordedState): void {
    fs.mkdirSync(this.paths.metadata_dir, { recursive: true });
    replaceFileAtomically(this.paths.state, JSON.stringify(state, null, 2) + "\n");
    this.logger.info(
      { version: state.version, digest: state.digest },
      "Recorded committed version",
    );
  }

  // ─── Binaries ────────────────────────────────────────────────

  hasActive(): boolean {
    return fs.existsSync(this.paths.binary);
  }

  /** Digest of the live binary, or null when there is none */
  activeDigest(): string | null {
    try {
      return computeDigest(fs.readFileSync(this.paths.binary));
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  hasBackup(): boolean {
    return fs.existsSync(this.paths.backup);
  }

  /**
   * Supersede the backup with a copy of the live binary.
   * With no live binary (first install) the backup is simply removed.
   */
  backupActive(): boolean {
    fs.mkdirSync(this.paths.metadata_dir, { recursive: true });
    fs.rmSync(this.paths.backup, { force: true });

    if (!this.hasActive()) {
      this.logger.info("No active binary to back up");
      return false;
    }

    fs.copyFileSync(this.paths.binary, this.paths.backup);
    fsyncPath(this.paths.backup);
    this.logger.info({ backup: this.paths.backup }, "Backed up active binary");
    return true;
  }

  /**
   * Atomically make `data` the live binary, with executable bits set.
   */
  installBinary(data: Buffer): void {
    fs.mkdirSync(path.dirname(this.paths.binary), { recursive: true });
    writeDurably(this.paths.staging, data);
    this.makeExecutable(this.paths.staging);
    fs.renameSync(this.paths.staging, this.paths.binary);
    fsyncPath(path.dirname(this.paths.binary));
    this.logger.info({ path: this.paths.binary, bytes: data.length }, "Installed binary");
  }

  /**
   * Atomically copy the backup over the live binary.
   * Returns false (and changes nothing) when there is no backup.
   */
  restoreBackup(): boolean {
    if (!this.hasBackup()) {
      this.logger.warn({ backup: this.paths.backup }, "Backup file is absent");
      return false;
    }

    fs.copyFileSync(this.paths.backup, this.paths.staging);
    fsyncPath(this.paths.staging);
    this.makeExecutable(this.paths.staging);
    fs.renameSync(this.paths.staging, this.paths.binary);
    fsyncPath(path.dirname(this.paths.binary));
    this.logger.info({ path: this.paths.binary }, "Backup restored");
    return true;
  }

  removeActive(): void {
    fs.rmSync(this.paths.binary, { force: true });
    this.logger.info({ path: this.paths.binary }, "Removed active binary");
  }

  /**
   * Delete staging files a crash may have left behind.
   */
  cleanupResiduals(): string[] {
    const removed: string[] = [];
    for (const leftover of [this.paths.staging, `${this.paths.state}.tmp`]) {
      if (fs.existsSync(leftover)) {
        fs.rmSync(leftover, { force: true });
        removed.push(leftover);
      }
    }
    if (removed.length > 0) {
      this.logger.warn({ removed }, "Removed leftovers of an interrupted update");
    }
    return removed;
  }

  private makeExecutable(filePath: string): void {
    const mode = fs.statSync(filePath).mode;
    fs.chmodSync(filePath, (mode & 0o7777) | EXEC_BITS);
  }
}

/**
 * Replace `target` through `<target>.tmp` and rename(2). A reader sees the
 * old content or the new, never a torn file.
 */
export function replaceFileAtomically(target: string, data: string | Buffer): void {
  const tmp = `${target}.tmp`;
  writeDurably(tmp, data);
  fs.renameSync(tmp, target);
  fsyncPath(path.dirname(target));
}

function writeDurably(filePath: string, data: string | Buffer): void {
  const fd = fs.openSync(filePath, "w", 0o644);
  try {
    fs.writeFileSync(fd, data);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Flush a file, or a directory entry list after a rename, to disk.
 */
function fsyncPath(target: string): void {
  const fd = fs.openSync(target, "r");
  try {
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

function isRecordedState(value: unknown): value is RecordedState {
  if (typeof value !== "object" || value === null) return false;
  return (
    "version" in value &&
    typeof value.version === "string" &&
    "digest" in value &&
    typeof value.digest === "string" &&
    isDigest(value.digest) &&
    "committed_at" in value &&
    typeof value.committed_at === "string"
  );
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
