/**
 * ucrt-stage Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Pipeline
export {
  StagePipeline,
  resolveStep,
  copyDestinations,
  manifestPathFor,
} from "./pipeline";
export type { StagePipelineOptions } from "./pipeline";

// All types
export type {
  StepKind,
  Architecture,
  MakeDirOptions,
  ExtractIsoOptions,
  MsiAdminOptions,
  CopyFilesOptions,
  StepSpec,
  ToolPaths,
  StageRecipe,
  BuildEnvironment,
  PipelineState,
  ErrorCategory,
  StepResult,
  PipelineError,
  StepRecord,
  PipelineResult,
  PipelineOptions,
  PipelineEventType,
  PipelineEvent,
  PipelineEventHandler,
  StepEventData,
  StateEventData,
} from "./types";

// Configuration
export {
  loadBuildEnvironment,
  loadRecipe,
  parseRecipe,
  ConfigError,
  DEFAULT_RECIPE_PATH,
  REQUIRED_ENV_VARS,
} from "./config";

// Steps
export { getStep, getSupportedKinds, BaseStep } from "./steps";
export type { StepContext, StepOutcome } from "./steps";

// Manifest
export {
  writeManifest,
  readManifest,
  hashDestination,
  stagedFileNames,
  verifyDestinations,
} from "./manifest";
export type {
  StageManifest,
  StagedDestination,
  StagedFile,
  DestinationComparison,
  DestinationMismatch,
} from "./manifest";

// Utilities
export { resolveVariables, validateVariables } from "./utils/variables";
export { isDirectory, listMatchingFiles, sha256File } from "./utils/files";
export { createLogger, isLogLevel, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";

// Windows tooling
export {
  SpawnProcessRunner,
  formatCommand,
  buildMsiAdminArgs,
  buildSevenZipArgs,
  lookupExitCode,
  SEVEN_ZIP_EXIT_CODES,
  MSIEXEC_EXIT_CODES,
  LAUNCH_FAILURE_EXIT_CODE,
} from "./windows";
export type {
  ProcessRunner,
  ProcessResult,
  RunOptions,
  ExitCodeInfo,
  ToolName,
  MsiAdminArgsOptions,
  SevenZipArgsOptions,
} from "./windows";
