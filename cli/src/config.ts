/**
 * ucrt-stage CLI — Configuration
 *
 * Central location for CLI defaults and environment detection.
 * The build environment itself (PREFIX, LIBRARY_BIN, ...) is read by the
 * engine; this module only covers how the CLI runs.
 */

import * as path from "path";
import {
  DEFAULT_RECIPE_PATH,
  isLogLevel,
  type LogLevel,
  SpawnProcessRunner,
  type ProcessRunner,
} from "@ucrt-stage/engine";

/** Environment variable selecting the engine log level */
export const LOG_LEVEL_ENV = "UCRT_STAGE_LOG_LEVEL";

/**
 * Pick the engine log level: --verbose wins, then UCRT_STAGE_LOG_LEVEL,
 * then silent.
 *
 * @throws Error if UCRT_STAGE_LOG_LEVEL holds an unknown level
 */
export function resolveLogLevel(
  verbose: boolean,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (verbose) return "debug";

  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw) return "silent";
  if (!isLogLevel(raw)) {
    throw new Error(
      `${LOG_LEVEL_ENV}="${raw}" is not a log level. ` +
        `Use one of: silent, debug, info, warn, error`,
    );
  }
  return raw;
}

/**
 * Resolve --recipe against the current directory, or fall back to the
 * bundled UCRT recipe.
 */
export function resolveRecipePath(recipe: string | undefined, cwd = process.cwd()): string {
  return recipe ? path.resolve(cwd, recipe) : DEFAULT_RECIPE_PATH;
}

/**
 * Everything a command needs from its surroundings. Tests swap these out.
 */
export interface CommandDeps {
  env: NodeJS.ProcessEnv;
  cwd: string;
  runner: ProcessRunner;
}

export function defaultDeps(): CommandDeps {
  return {
    env: process.env,
    cwd: process.cwd(),
    runner: new SpawnProcessRunner(),
  };
}
