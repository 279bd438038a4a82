/**
 * ucrt-stage CLI -- Run Command
 *
 * Runs the stage recipe. The process exits with the exit code of the first
 * failing step, or 0 when every step succeeds.
 *
 * Usage:
 *   ucrt-stage run                    Run the bundled UCRT recipe
 *   ucrt-stage run --recipe <file>    Run a different recipe
 *   ucrt-stage run --dry-run          Preview without executing
 *
 * Output:
 *
 *   Staging Universal CRT redistributable 10.0.22621.0 (x64)
 *
 *     ✔ Create library bin directory
 *     ✔ Extract Windows SDK ISO
 *     ✔ Extract UCRT redistributable installer
 *     ✔ Copy UCRT DLLs into prefix
 *     ✔ Copy UCRT DLLs into library bin
 *
 *   ✔ Staged Universal CRT redistributable 10.0.22621.0 in 41.3s
 */

import { Command } from "commander";
import { StagePipeline, type PipelineEvent } from "@ucrt-stage/engine";
import { CommandDeps, defaultDeps } from "../config";
import { loadCommandContext } from "./context";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  formatState,
  printBlank,
  printDebug,
  printDetail,
  printDryRun,
  printError,
  printHeader,
  printStageError,
  printStageInfo,
  printStageSuccess,
  printSuccess,
  setDebugMode,
} from "../output";

export interface RunCommandOptions {
  recipe?: string;
  dryRun: boolean;
  verbose: boolean;
  /** commander maps --no-manifest to manifest: false */
  manifest: boolean;
}

/**
 * Run the pipeline and report progress. Resolves to the exit code.
 */
export async function executeRun(
  opts: RunCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  setDebugMode(opts.verbose);

  const ctx = loadCommandContext(opts, deps);
  if (!ctx) return 1;
  const { env, recipe, logger } = ctx;

  const title = `${colors.step(recipe.name)} ${colors.version(env.PKG_VERSION)} (${env.ARCH})`;
  if (opts.dryRun) {
    printDryRun(`Would stage ${title}`);
  } else {
    printHeader(`Staging ${title}`);
  }

  const pipeline = new StagePipeline({ env, runner: deps.runner, logger });
  const spinner = createSpinner("Starting...");

  pipeline.on((event: PipelineEvent) => {
    switch (event.type) {
      case "step_started":
        spinner.start(event.data.name);
        break;
      case "step_completed":
        spinner.stop();
        if (opts.dryRun && event.data.result) {
          printStageInfo(`${event.data.name}: ${event.data.result.message}`);
        } else {
          printStageSuccess(event.data.name);
          if (event.data.result) printDebug(event.data.result.message);
        }
        break;
      case "step_failed":
        spinner.stop();
        printStageError(event.data.name);
        break;
      case "state_change":
        printDebug(
          `${formatState(event.data.state)}${event.data.message ? `: ${event.data.message}` : ""}`,
        );
        break;
    }
  });

  const startTime = Date.now();
  const result = await pipeline
    .run(recipe, { dry_run: opts.dryRun, write_manifest: opts.manifest })
    .finally(() => spinner.stop());
  const elapsed = Date.now() - startTime;

  printBlank();
  if (result.final_state === "COMPLETED") {
    if (opts.dryRun) {
      printDryRun(`Dry run complete for ${title}`);
    } else {
      printSuccess(`Staged ${title} in ${formatDuration(elapsed)}`);
      if (result.manifest_path) {
        printDetail("Manifest", result.manifest_path);
      }
    }
    return 0;
  }

  printError(`Failed to stage ${title}`);
  if (result.error) {
    printDetail("Reason", formatErrorCategory(result.error.category));
    printDetail("Details", result.error.message);
    if (result.error.step_name) {
      printDetail("Step", result.error.step_name);
    }
  }
  printDetail("Exit code", String(result.exit_code));
  return result.exit_code;
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Stage the UCRT DLLs into the build prefixes")
    .option("-r, --recipe <file>", "Stage recipe (YAML); defaults to the bundled UCRT recipe")
    .option("--dry-run", "Show what would run without executing anything", false)
    .option("--verbose", "Show detailed output and engine logs", false)
    .option("--no-manifest", "Do not write the staging manifest")
    .action(async (opts: RunCommandOptions) => {
      process.exit(await executeRun(opts));
    });
}
