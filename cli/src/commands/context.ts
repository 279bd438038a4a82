/**
 * ucrt-stage CLI — Shared command setup
 *
 * Loads the build environment, the recipe and a logger, printing a
 * readable error instead of a stack trace when any of them is invalid.
 */

import {
  ConfigError,
  createLogger,
  loadBuildEnvironment,
  loadRecipe,
  REQUIRED_ENV_VARS,
  type BuildEnvironment,
  type Logger,
  type StageRecipe,
} from "@ucrt-stage/engine";
import { CommandDeps, resolveLogLevel, resolveRecipePath } from "../config";
import { printDetail, printError, printInfo } from "../output";

export interface CommandContext {
  env: BuildEnvironment;
  recipe: StageRecipe;
  logger: Logger;
}

export function loadCommandContext(
  opts: { recipe?: string; verbose?: boolean },
  deps: CommandDeps,
): CommandContext | null {
  try {
    const logger = createLogger({ level: resolveLogLevel(opts.verbose ?? false, deps.env) });
    const env = loadBuildEnvironment(deps.env, deps.cwd);
    const recipe = loadRecipe(resolveRecipePath(opts.recipe, deps.cwd));
    return { env, recipe, logger };
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      printError(err.summary);
      for (const issue of err.issues) {
        printDetail("Issue", issue);
      }
      if (err.issues.some((i) => REQUIRED_ENV_VARS.some((v) => i.startsWith(`${v}:`)))) {
        printInfo(`Required variables: ${REQUIRED_ENV_VARS.join(", ")}`);
      }
      return null;
    }
    if (err instanceof Error) {
      printError(err.message);
      return null;
    }
    throw err;
  }
}
