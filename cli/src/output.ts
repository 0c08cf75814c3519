/**
 * otakeeper CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { ErrorCategory } from "@otakeeper/engine";

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  host: chalk.bold.white,
  version: chalk.cyan,
  digest: chalk.magenta,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Detect whether to use ASCII-only box drawing characters.
 * Unicode borders corrupt on terminals that do not advertise a TERM.
 */
export function shouldUseAsciiBorders(): boolean {
  return !process.env.TERM;
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const options: Table.TableConstructorOptions = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: {
      "padding-left": 1,
      "padding-right": 1,
      head: [],
      border: ascii ? [] : ["gray"],
      compact: false,
    },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  };

  const table = new Table(options);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Digests ────────────────────────────────────────────────

/**
 * First 12 hex characters, enough to tell builds apart in a table.
 */
export function shortDigest(digest: string | null | undefined): string {
  if (!digest) return colors.dim("-");
  return colors.digest(digest.slice(0, 12));
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  CONFIGURATION_ERROR: "Device has no trusted update key",
  PACKAGE_FORMAT_ERROR: "Malformed update package",
  INTEGRITY_ERROR: "Package verification failed",
  AUTHENTICITY_ERROR: "Package verification failed",
  INSTALL_FAILURE: "New binary did not start, previous one restored",
  BUSY_ERROR: "Another update is in progress",
  INTERNAL_ERROR: "Agent-side failure",
};

export function formatErrorCategory(category: string): string {
  const known = Object.entries(ERROR_LABELS).find(([key]) => key === category);
  return known ? known[1] : category;
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
