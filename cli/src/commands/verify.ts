/**
 * ucrt-stage CLI -- Verify Command
 *
 * Checks that every copy destination of the recipe holds the staged files
 * with identical contents. The staged files come from the manifest of the
 * last run, or from the copy sources when there is no manifest. Other files
 * already in a destination are not compared.
 *
 * Usage:
 *   ucrt-stage verify
 */

import { Command } from "commander";
import {
  copyDestinations,
  isDirectory,
  listMatchingFiles,
  manifestPathFor,
  readManifest,
  stagedFileNames,
  verifyDestinations,
  type BuildEnvironment,
  type StageRecipe,
} from "@ucrt-stage/engine";
import { CommandDeps, defaultDeps } from "../config";
import { loadCommandContext } from "./context";
import {
  printDebug,
  printDetail,
  printError,
  printStageError,
  printSuccess,
  setDebugMode,
} from "../output";

export interface VerifyCommandOptions {
  recipe?: string;
  verbose: boolean;
}

/**
 * Names of the files the recipe stages.
 *
 * @throws Error if neither a manifest nor the copy sources are available
 */
function stagedFiles(recipe: StageRecipe, env: BuildEnvironment): string[] {
  const manifestPath = manifestPathFor(recipe, env);
  const manifest = manifestPath ? readManifest(manifestPath) : null;
  if (manifest) {
    printDebug(`Staged files from ${manifestPath}`);
    return stagedFileNames(manifest);
  }

  const { sources, extensions } = copyDestinations(recipe, env);
  const names = new Set<string>();
  for (const source of sources.filter(isDirectory)) {
    printDebug(`Staged files from ${source}`);
    for (const name of listMatchingFiles(source, extensions)) names.add(name);
  }
  if (names.size === 0) {
    throw new Error(
      `Nothing to verify: no staging manifest${manifestPath ? ` at ${manifestPath}` : ""} ` +
        `and no files in ${sources.join(", ")}`,
    );
  }
  return [...names].sort();
}

export async function executeVerify(
  opts: VerifyCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  setDebugMode(opts.verbose);

  const ctx = loadCommandContext(opts, deps);
  if (!ctx) return 1;

  const { dirs } = copyDestinations(ctx.recipe, ctx.env);

  try {
    const comparison = await verifyDestinations(dirs, stagedFiles(ctx.recipe, ctx.env));

    if (comparison.consistent) {
      printSuccess(
        `${comparison.files.length} file(s) identical across ${dirs.length} destinations`,
      );
      return 0;
    }

    printError(`Destinations differ from ${comparison.reference}`);
    for (const m of comparison.mismatches) {
      printStageError(m.dir);
      if (m.missing.length > 0) printDetail("Missing", m.missing.join(", "));
      if (m.different.length > 0) printDetail("Different", m.different.join(", "));
    }
    return 1;
  } catch (err: unknown) {
    printError(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

export function registerVerifyCommand(program: Command): void {
  program
    .command("verify")
    .description("Check that all copy destinations hold identical staged files")
    .option("-r, --recipe <file>", "Stage recipe (YAML); defaults to the bundled UCRT recipe")
    .option("--verbose", "Show detailed output", false)
    .action(async (opts: VerifyCommandOptions) => {
      process.exit(await executeVerify(opts));
    });
}
