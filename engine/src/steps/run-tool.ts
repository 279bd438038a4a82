/**
 * ucrt-stage Engine — Shared tool invocation for the 7-Zip and msiexec steps.
 */

import { formatCommand } from "../windows/process";
import { lookupExitCode, ToolName } from "../windows/exit-codes";
import { StepContext, StepOutcome, failed, succeeded } from "./base-step";

export interface ToolInvocation {
  tool: ToolName;
  /** Executable to launch (from recipe.tools) */
  command: string;
  args: string[];
  cwd?: string;
  /** Label for messages, e.g. "ISO extraction" */
  label: string;
}

export async function runTool(
  invocation: ToolInvocation,
  context: StepContext,
): Promise<StepOutcome> {
  const { tool, command, args, cwd, label } = invocation;
  const { runner, logger, dry_run } = context;
  const commandLine = formatCommand(command, args);

  logger.info({ command: commandLine, cwd }, label);

  if (dry_run) {
    return succeeded(`[DRY RUN] Would execute: ${commandLine}`, {
      command: commandLine,
    });
  }

  const result = await runner.run(command, args, { cwd, logger });
  const info = lookupExitCode(tool, result.exitCode);

  if (result.stderr) {
    logger.debug({ stderr: result.stderr }, `${tool} stderr output`);
  }

  if (result.launchError) {
    return failed(
      "LAUNCH_ERROR",
      result.exitCode,
      `Failed to launch ${command}: ${result.launchError}`,
      { command: commandLine },
    );
  }

  // Any non-zero status aborts, warnings and reboot notices included
  if (result.exitCode !== 0) {
    logger.error(
      {
        exitCode: result.exitCode,
        exitCodeName: info.name,
        category: info.category,
        durationMs: result.durationMs,
      },
      `${label} failed: ${info.message}`,
    );
    return failed(
      "TOOL_ERROR",
      result.exitCode,
      `${label} failed with exit code ${result.exitCode} [${info.name}]: ${info.message}`,
      { command: commandLine, stderr: result.stderr || undefined },
    );
  }

  logger.info({ durationMs: result.durationMs }, `${label} completed`);
  return succeeded(`${label} completed`, { command: commandLine });
}
