/**
 * ucrt-stage CLI -- Plan Command
 *
 * Resolves every recipe variable and shows the commands a run would
 * execute, without touching the filesystem.
 *
 * Usage:
 *   ucrt-stage plan
 *   ucrt-stage plan --recipe ./my-recipe.yaml
 */

import { Command } from "commander";
import { StagePipeline } from "@ucrt-stage/engine";
import { CommandDeps, defaultDeps } from "../config";
import { loadCommandContext } from "./context";
import {
  colors,
  formatErrorCategory,
  printBlank,
  printDetail,
  printError,
  printHeader,
  printTable,
  setDebugMode,
} from "../output";

export interface PlanCommandOptions {
  recipe?: string;
  verbose: boolean;
}

const DRY_RUN_PREFIX = "[DRY RUN] ";

export async function executePlan(
  opts: PlanCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  setDebugMode(opts.verbose);

  const ctx = loadCommandContext(opts, deps);
  if (!ctx) return 1;
  const { env, recipe, logger } = ctx;

  const pipeline = new StagePipeline({ env, runner: deps.runner, logger });
  const result = await pipeline.run(recipe, { dry_run: true, write_manifest: false });

  if (result.final_state !== "COMPLETED") {
    printError(`Recipe ${recipe.id} cannot be planned`);
    if (result.error) {
      printDetail("Reason", formatErrorCategory(result.error.category));
      printDetail("Details", result.error.message);
    }
    return result.exit_code;
  }

  printHeader(`Plan for ${recipe.name} ${colors.version(env.PKG_VERSION)} (${env.ARCH})`);
  printTable({
    head: ["#", "Step", "Kind", "Action"],
    rows: result.steps.map((s) => [
      String(s.index + 1),
      s.name,
      s.kind,
      s.result.message.startsWith(DRY_RUN_PREFIX)
        ? s.result.message.slice(DRY_RUN_PREFIX.length)
        : s.result.message,
    ]),
  });
  printBlank();
  console.log(colors.dim(`  ${result.steps.length} step(s). Run ${colors.bold("ucrt-stage run")} to execute.`));
  return 0;
}

export function registerPlanCommand(program: Command): void {
  program
    .command("plan")
    .description("Show the resolved steps of a recipe without running them")
    .option("-r, --recipe <file>", "Stage recipe (YAML); defaults to the bundled UCRT recipe")
    .option("--verbose", "Show detailed output and engine logs", false)
    .action(async (opts: PlanCommandOptions) => {
      process.exit(await executePlan(opts));
    });
}
