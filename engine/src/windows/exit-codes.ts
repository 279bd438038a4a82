/**
 * ucrt-stage Engine — Tool Exit Codes
 *
 * Structured descriptions of the exit codes the staging tools return.
 * Used for log and CLI messages only: the pipeline treats any non-zero
 * code as a failure and surfaces the code unchanged.
 */

import { LAUNCH_FAILURE_EXIT_CODE } from "./process";

export type ToolName = "7z" | "msiexec";

export interface ExitCodeInfo {
  code: number;
  name: string;
  category: "success" | "warning" | "args" | "fatal" | "busy" | "unknown";
  message: string;
}

/**
 * 7-Zip exit codes, as listed in the 7-Zip command line help.
 */
export const SEVEN_ZIP_EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: { code: 0, name: "NO_ERROR", category: "success", message: "No error." },
  1: {
    code: 1,
    name: "WARNING",
    category: "warning",
    message: "Warning (non-fatal). Some files may be locked or skipped.",
  },
  2: {
    code: 2,
    name: "FATAL_ERROR",
    category: "fatal",
    message: "Fatal error. The archive may be missing or corrupt.",
  },
  7: {
    code: 7,
    name: "COMMAND_LINE_ERROR",
    category: "args",
    message: "Command line error.",
  },
  8: {
    code: 8,
    name: "NOT_ENOUGH_MEMORY",
    category: "fatal",
    message: "Not enough memory for operation.",
  },
  255: {
    code: 255,
    name: "USER_STOPPED",
    category: "fatal",
    message: "User stopped the process.",
  },
};

/**
 * Windows Installer exit codes relevant to administrative extraction.
 * See: https://learn.microsoft.com/en-us/windows/win32/msi/error-codes
 */
export const MSIEXEC_EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "ERROR_SUCCESS",
    category: "success",
    message: "Action completed successfully.",
  },
  1602: {
    code: 1602,
    name: "ERROR_INSTALL_USEREXIT",
    category: "fatal",
    message: "User cancelled the installation.",
  },
  1603: {
    code: 1603,
    name: "ERROR_INSTALL_FAILURE",
    category: "fatal",
    message: "Fatal error during installation. Check the msiexec log.",
  },
  1618: {
    code: 1618,
    name: "ERROR_INSTALL_ALREADY_RUNNING",
    category: "busy",
    message: "Another installation is already in progress.",
  },
  1619: {
    code: 1619,
    name: "ERROR_INSTALL_PACKAGE_OPEN_FAILED",
    category: "fatal",
    message: "Installation package could not be opened. It may be missing or corrupt.",
  },
  1620: {
    code: 1620,
    name: "ERROR_INSTALL_PACKAGE_INVALID",
    category: "fatal",
    message: "Installation package is invalid.",
  },
  1639: {
    code: 1639,
    name: "ERROR_INVALID_COMMAND_LINE",
    category: "args",
    message: "Invalid command line argument. Check TARGETDIR quoting.",
  },
  1641: {
    code: 1641,
    name: "ERROR_SUCCESS_REBOOT_INITIATED",
    category: "warning",
    message: "The installer has initiated a restart.",
  },
  3010: {
    code: 3010,
    name: "ERROR_SUCCESS_REBOOT_REQUIRED",
    category: "warning",
    message: "A restart is required to complete the install.",
  },
};

const TABLES: Record<ToolName, Record<number, ExitCodeInfo>> = {
  "7z": SEVEN_ZIP_EXIT_CODES,
  msiexec: MSIEXEC_EXIT_CODES,
};

/**
 * Look up a tool exit code. Returns a structured description.
 */
export function lookupExitCode(tool: ToolName, code: number): ExitCodeInfo {
  if (code === LAUNCH_FAILURE_EXIT_CODE) {
    return {
      code,
      name: "LAUNCH_FAILURE",
      category: "fatal",
      message: `${tool} could not be started. Check that it is on PATH and that its working directory exists.`,
    };
  }

  return (
    TABLES[tool][code] ?? {
      code,
      name: "UNKNOWN",
      category: "unknown" as const,
      message: `Unrecognised ${tool} exit code: ${code}`,
    }
  );
}
