/**
 * ucrt-stage Engine — Core Type Definitions
 *
 * Shared by the steps, the pipeline driver and the CLI.
 */

// ─── Steps ───────────────────────────────────────────────────────

export type StepKind = "make-dir" | "extract-iso" | "msi-admin" | "copy";
export type Architecture = "x86" | "x64" | "arm64";

export interface MakeDirOptions {
  path: string;
}

export interface ExtractIsoOptions {
  iso: string;
  /** Defaults to the working directory */
  output_dir?: string;
}

export interface MsiAdminOptions {
  msi: string;
  target_dir: string;
  /** Optional msiexec verbose log file */
  log_file?: string;
}

export interface CopyFilesOptions {
  from: string;
  to: string;
  /** File extensions to copy, e.g. [".dll"] */
  extensions: string[];
}

export interface StepSpec {
  kind: StepKind;
  /** Human-readable label for output */
  name: string;
  make_dir?: MakeDirOptions;
  extract_iso?: ExtractIsoOptions;
  msi_admin?: MsiAdminOptions;
  copy?: CopyFilesOptions;
}

export interface ToolPaths {
  seven_zip: string;
  msiexec: string;
}

export interface StageRecipe {
  id: string;
  name: string;
  tools: ToolPaths;
  steps: StepSpec[];
  /** Where the manifest is written, relative paths resolve against PREFIX */
  manifest?: string;
}

// ─── Build Environment ───────────────────────────────────────────

export interface BuildEnvironment {
  BUILD_PREFIX: string;
  LIBRARY_BIN: string;
  PKG_VERSION: string;
  SRC_DIR: string;
  PREFIX: string;
  TEMP: string;
  ARCH: Architecture;
  CWD: string;
}

// ─── Execution ───────────────────────────────────────────────────

export type PipelineState =
  | "PENDING"
  | "VALIDATING"
  | "RUNNING"
  | "COMPLETED"
  | "FAILED";

export type ErrorCategory =
  | "VALIDATION_ERROR"
  | "CONFIG_ERROR"
  | "TOOL_ERROR"
  | "LAUNCH_ERROR"
  | "FILESYSTEM_ERROR";

export interface StepResult {
  success: boolean;
  exit_code: number;
  message: string;
  /** Category set when success is false */
  category?: ErrorCategory;
  /** Command line that ran (or would run), for tool steps */
  command?: string;
  stderr?: string;
  /** Files written by the step */
  files: string[];
  duration_ms: number;
}

export interface PipelineError {
  category: ErrorCategory;
  message: string;
  /** Index into recipe.steps; -1 when the failure precedes any step */
  step_index: number;
  step_name?: string;
  details?: Record<string, unknown>;
}

export interface StepRecord {
  index: number;
  name: string;
  kind: StepKind;
  result: StepResult;
}

export interface PipelineResult {
  run_id: string;
  recipe_id: string;
  final_state: PipelineState;
  exit_code: number;
  dry_run: boolean;
  started_at: string;
  finished_at: string;
  steps: StepRecord[];
  error?: PipelineError;
  manifest_path?: string;
}

export interface PipelineOptions {
  dry_run?: boolean;
  /** Write the staging manifest after a successful run (default true) */
  write_manifest?: boolean;
}

// ─── Events ──────────────────────────────────────────────────────

export type PipelineEventType =
  | "state_change"
  | "step_started"
  | "step_completed"
  | "step_failed";

export interface StepEventData {
  run_id: string;
  index: number;
  name: string;
  kind: StepKind;
  result?: StepResult;
}

export interface StateEventData {
  run_id: string;
  state: PipelineState;
  message?: string;
}

export type PipelineEvent =
  | { type: "state_change"; timestamp: string; data: StateEventData }
  | {
      type: "step_started" | "step_completed" | "step_failed";
      timestamp: string;
      data: StepEventData;
    };

export type PipelineEventHandler = (event: PipelineEvent) => void;
