/**
 * ucrt-stage CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * Everything goes to stdout except errors; the build log captures both.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  step: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --verbose.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 *   ✔ Create library bin directory
 *   ✔ Extract Windows SDK ISO
 *   ✖ Extract UCRT redistributable installer
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
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

export function renderTable({ head, rows }: TableOptions): string {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: true,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function printTable(opts: TableOptions): void {
  console.log(renderTable(opts));
}

// ─── State / Error Labels ───────────────────────────────────

const STATE_COLORS: Record<string, chalk.Chalk> = {
  PENDING: chalk.gray,
  VALIDATING: chalk.cyan,
  RUNNING: chalk.yellow,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

const STATE_LABELS: Record<string, string> = {
  PENDING: "Starting",
  VALIDATING: "Validating",
  RUNNING: "Running",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function formatState(state: string): string {
  const colorFn = STATE_COLORS[state] || chalk.white;
  return colorFn(STATE_LABELS[state] || state);
}

const ERROR_LABELS: Record<string, string> = {
  VALIDATION_ERROR: "Invalid recipe",
  CONFIG_ERROR: "Invalid configuration",
  TOOL_ERROR: "External tool failed",
  LAUNCH_ERROR: "External tool could not be started",
  FILESYSTEM_ERROR: "File operation failed",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
