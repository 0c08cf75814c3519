/**
 * otakeeper Engine — Update History
 *
 * Local SQLite database recording every update transaction and each state
 * transition it went through. It is an audit trail for operators only:
 * reconciliation never reads it, and losing it loses no update state.
 *
 * Uses sql.js (Emscripten-compiled SQLite) so the agent needs no native
 * module on the device. The database is written back to disk after every
 * change, through a temporary file and rename so a power cut cannot tear it.
 * A file that still fails to open is moved aside and history starts over.
 */

import initSqlJs, { Database as SqlJsDatabase, SqlValue } from "sql.js";
import * as path from "path";
import * as fs from "fs";
import {
  ErrorCategory,
  HistoryEntry,
  TerminalState,
  UpdateState,
} from "./types";
import { Logger } from "./utils/logger";
import { replaceFileAtomically } from "./metadata-store";

export interface TransitionRecord {
  state: UpdateState;
  entered_at: string;
  exited_at: string | null;
  details: Record<string, unknown> | null;
}

const TERMINAL_STATES: readonly TerminalState[] = [
  "COMMITTED",
  "ROLLED_BACK",
  "REJECTED",
  "FAILED",
];

const UPDATE_STATES: readonly UpdateState[] = [
  "IDLE",
  "VALIDATING",
  "VERIFIED",
  "BACKING_UP",
  "INSTALLING",
  "AWAITING_HEALTH",
  ...TERMINAL_STATES,
];

const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "CONFIGURATION_ERROR",
  "PACKAGE_FORMAT_ERROR",
  "INTEGRITY_ERROR",
  "AUTHENTICITY_ERROR",
  "INSTALL_FAILURE",
  "BUSY_ERROR",
  "INTERNAL_ERROR",
];

export class HistoryDB {
  private db: SqlJsDatabase | null = null;
  private dbPath: string;
  private logger: Logger;
  private initialized = false;

  constructor(dbPath: string, logger: Logger) {
    this.dbPath = dbPath;
    this.logger = logger;
  }

  /**
   * Initialize the database. Must be called before any operations.
   * sql.js requires async initialization.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });

    const SQL = await initSqlJs();

    if (fs.existsSync(this.dbPath)) {
      let existing: SqlJsDatabase | null = null;
      try {
        existing = new SQL.Database(fs.readFileSync(this.dbPath));
        checkIntegrity(existing);
        this.db = existing;
      } catch (err: unknown) {
        existing?.close();
        const asidePath = `${this.dbPath}.corrupt-${Date.now()}`;
        fs.renameSync(this.dbPath, asidePath);
        this.logger.warn(
          {
            path: this.dbPath,
            movedTo: asidePath,
            error: err instanceof Error ? err.message : String(err),
          },
          "History database is unreadable, starting a new one",
        );
        this.db = new SQL.Database();
      }
    } else {
      this.db = new SQL.Database();
    }

    this.initialized = true;
    this.initSchema();
    this.logger.debug({ path: this.dbPath }, "History database initialized");
  }

  private ensureInit(): SqlJsDatabase {
    if (!this.db || !this.initialized) {
      throw new Error("HistoryDB not initialized. Call init() first.");
    }
    return this.db;
  }

  private persist(): void {
    const db = this.ensureInit();
    replaceFileAtomically(this.dbPath, Buffer.from(db.export()));
  }

  private initSchema(): void {
    const db = this.ensureInit();
    db.run(`
      CREATE TABLE IF NOT EXISTS update_transactions (
        transaction_id  TEXT    PRIMARY KEY,
        version         TEXT,
        final_state     TEXT    NOT NULL,
        category        TEXT,
        started_at      TEXT    NOT NULL,
        finished_at     TEXT    NOT NULL
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS update_log (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        transaction_id  TEXT    NOT NULL,
        state           TEXT    NOT NULL,
        entered_at      TEXT    NOT NULL,
        exited_at       TEXT,
        details         TEXT
      )
    `);

    db.run(`
      CREATE INDEX IF NOT EXISTS idx_log_transaction
        ON update_log (transaction_id)
    `);

    this.persist();
  }

  // ─── Transition Log ─────────────────────────────────────────

  /**
   * Close the open state of a transaction and open `state`.
   */
  logStateTransition(
    transactionId: string,
    state: UpdateState,
    details?: Record<string, unknown>,
  ): void {
    const db = this.ensureInit();
    const now = new Date().toISOString();

    db.run(
      `UPDATE update_log
       SET exited_at = ?
       WHERE transaction_id = ? AND exited_at IS NULL`,
      [now, transactionId],
    );

    db.run(
      `INSERT INTO update_log (transaction_id, state, entered_at, details)
       VALUES (?, ?, ?, ?)`,
      [transactionId, state, now, details ? JSON.stringify(details) : null],
    );

    this.persist();
  }

  getTransactionLog(transactionId: string): TransitionRecord[] {
    const db = this.ensureInit();
    const results: TransitionRecord[] = [];

    const stmt = db.prepare(
      `SELECT state, entered_at, exited_at, details
       FROM update_log
       WHERE transaction_id = ?
       ORDER BY id ASC`,
    );
    stmt.bind([transactionId]);

    while (stmt.step()) {
      const row = stmt.getAsObject();
      const details = asText(row.details);
      results.push({
        state: asState(row.state, UPDATE_STATES, "IDLE"),
        entered_at: asText(row.entered_at) ?? "",
        exited_at: asText(row.exited_at),
        details: details ? parseDetails(details) : null,
      });
    }
    stmt.free();

    return results;
  }

  // ─── Transactions ───────────────────────────────────────────

  recordTransaction(entry: HistoryEntry): void {
    const db = this.ensureInit();
    db.run(
      `INSERT OR REPLACE INTO update_transactions
         (transaction_id, version, final_state, category, started_at, finished_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        entry.transaction_id,
        entry.version,
        entry.final_state,
        entry.category,
        entry.started_at,
        entry.finished_at,
      ],
    );

    db.run(
      `UPDATE update_log
       SET exited_at = ?
       WHERE transaction_id = ? AND exited_at IS NULL`,
      [entry.finished_at, entry.transaction_id],
    );

    this.persist();
  }

  /**
   * Most recent transactions first.
   */
  getHistory(limit: number = 20): HistoryEntry[] {
    const db = this.ensureInit();
    const results: HistoryEntry[] = [];

    const stmt = db.prepare(
      `SELECT transaction_id, version, final_state, category, started_at, finished_at
       FROM update_transactions
       ORDER BY finished_at DESC, rowid DESC
       LIMIT ?`,
    );
    stmt.bind([limit]);

    while (stmt.step()) {
      const row = stmt.getAsObject();
      const category = asText(row.category);
      results.push({
        transaction_id: asText(row.transaction_id) ?? "",
        version: asText(row.version),
        final_state: asState(row.final_state, TERMINAL_STATES, "FAILED"),
        category: category ? asState(category, ERROR_CATEGORIES, "INTERNAL_ERROR") : null,
        started_at: asText(row.started_at) ?? "",
        finished_at: asText(row.finished_at) ?? "",
      });
    }
    stmt.free();

    return results;
  }

  /**
   * Close the database connection and persist final state.
   */
  close(): void {
    if (this.db) {
      if (this.initialized) {
        this.persist();
      }
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
    this.logger.debug("History database closed");
  }
}

/**
 * @throws if SQLite cannot read the file or finds it damaged
 */
function checkIntegrity(db: SqlJsDatabase): void {
  const [result] = db.exec("PRAGMA quick_check");
  const verdict = result?.values[0]?.[0];
  if (verdict !== "ok") {
    throw new Error(`Integrity check failed: ${String(verdict)}`);
  }
}

function asText(value: SqlValue | undefined): string | null {
  return typeof value === "string" ? value : null;
}

function asState<T extends string>(
  value: SqlValue | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function parseDetails(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // stored by this class, so only a damaged file gets here
  }
  return null;
}
