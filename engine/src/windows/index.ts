/**
 * ucrt-stage Engine — Windows Tooling (Barrel Export)
 *
 * Usage:
 *   import { SpawnProcessRunner, buildMsiAdminArgs, ... } from "./windows";
 */

// Process execution
export {
  SpawnProcessRunner,
  formatCommand,
  LAUNCH_FAILURE_EXIT_CODE,
  type ProcessRunner,
  type ProcessResult,
  type RunOptions,
} from "./process";

// Tool argument builders
export { buildMsiAdminArgs, type MsiAdminArgsOptions } from "./msi";
export { buildSevenZipArgs, type SevenZipArgsOptions } from "./seven-zip";

// Exit codes
export {
  lookupExitCode,
  SEVEN_ZIP_EXIT_CODES,
  MSIEXEC_EXIT_CODES,
  type ExitCodeInfo,
  type ToolName,
} from "./exit-codes";
