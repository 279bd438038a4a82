/**
 * ucrt-stage Engine — External Process Runner
 *
 * Every external tool (7-Zip, msiexec) runs through a ProcessRunner so the
 * pipeline only ever sees an exit code. A non-zero exit resolves normally;
 * only the caller decides whether it is fatal.
 */

import { spawn } from "child_process";
import { Logger } from "../utils/logger";
import { isDirectory } from "../utils/files";

/**
 * Exit code reported when the tool could not be launched at all.
 * Matches what cmd.exe returns for an unknown command.
 */
export const LAUNCH_FAILURE_EXIT_CODE = 9009;

export interface RunOptions {
  /** Working directory for the child process */
  cwd?: string;
  logger?: Logger;
}

export interface ProcessResult {
  exitCode: number;
  stderr: string;
  durationMs: number;
  /** Set when the process never started (e.g. ENOENT) */
  launchError?: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;
}

/**
 * Quote an argument for display only. spawn() receives the raw array.
 */
function displayArg(arg: string): string {
  return /\s/.test(arg) ? `"${arg}"` : arg;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(displayArg).join(" ");
}

/**
 * Runs tools as child processes. stdout is inherited so the tool's own
 * output reaches the build log; stderr is captured for diagnostics and
 * forwarded as well.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<ProcessResult> {
    const { cwd, logger } = options;
    const startMs = Date.now();

    logger?.debug({ command: formatCommand(command, args), cwd }, "Spawning");

    // spawn() reports a missing cwd as ENOENT, the same as a missing tool
    if (cwd !== undefined && !isDirectory(cwd)) {
      logger?.error({ command, cwd }, "Working directory not found");
      return Promise.resolve({
        exitCode: LAUNCH_FAILURE_EXIT_CODE,
        stderr: "",
        durationMs: 0,
        launchError: `working directory not found: ${cwd}`,
      });
    }

    return new Promise<ProcessResult>((resolve) => {
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const child = spawn(command, args, {
        cwd,
        stdio: ["ignore", "inherit", "pipe"],
        windowsHide: true,
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk);
        process.stderr.write(chunk);
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        const stderr = Buffer.concat(stderrChunks).toString("utf-8").trim();
        // Killed by a signal: no exit code, report a generic failure
        const exitCode = code ?? 1;
        if (signal) {
          logger?.warn({ command, signal }, "Process terminated by signal");
        }
        resolve({ exitCode, stderr, durationMs: Date.now() - startMs });
      });

      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        logger?.error({ command, error: err.message }, "Failed to launch");
        resolve({
          exitCode: LAUNCH_FAILURE_EXIT_CODE,
          stderr: "",
          durationMs: Date.now() - startMs,
          launchError: err.message,
        });
      });
    });
  }
}
