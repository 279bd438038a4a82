/**
 * ucrt-stage Engine — Configuration
 *
 * Two inputs drive a run:
 *   1. The build environment, supplied as environment variables by the
 *      build orchestrator (BUILD_PREFIX, LIBRARY_BIN, PKG_VERSION, SRC_DIR,
 *      PREFIX, plus optional TEMP and UCRT_ARCH).
 *   2. A stage recipe (YAML) listing the steps to run.
 *
 * Both are validated with zod before anything touches the filesystem.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { BuildEnvironment, StageRecipe } from "./types";

/** The bundled recipe that reproduces the UCRT packaging script */
export const DEFAULT_RECIPE_PATH = path.join(
  __dirname,
  "..",
  "recipes",
  "ucrt.yaml",
);

export const REQUIRED_ENV_VARS = [
  "BUILD_PREFIX",
  "LIBRARY_BIN",
  "PKG_VERSION",
  "SRC_DIR",
  "PREFIX",
] as const;

export class ConfigError extends Error {
  /** The message without the issue list */
  readonly summary: string;
  readonly issues: string[];

  constructor(summary: string, issues: string[] = []) {
    super(issues.length > 0 ? `${summary}: ${issues.join("; ")}` : summary);
    this.name = "ConfigError";
    this.summary = summary;
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

// ─── Build Environment ───────────────────────────────────────

const requiredVar = z
  .string({ required_error: "is not set" })
  .trim()
  .min(1, "is empty");

const BuildEnvSchema = z.object({
  BUILD_PREFIX: requiredVar,
  LIBRARY_BIN: requiredVar,
  PKG_VERSION: requiredVar,
  SRC_DIR: requiredVar,
  PREFIX: requiredVar,
  TEMP: z.string().trim().min(1).optional(),
  UCRT_ARCH: z.enum(["x86", "x64", "arm64"]).optional(),
});

/**
 * Read the build environment from process-style environment variables.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadBuildEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BuildEnvironment {
  const parsed = BuildEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid build environment",
      formatIssues(parsed.error),
    );
  }

  const vars = parsed.data;
  return {
    BUILD_PREFIX: vars.BUILD_PREFIX,
    LIBRARY_BIN: vars.LIBRARY_BIN,
    PKG_VERSION: vars.PKG_VERSION,
    SRC_DIR: vars.SRC_DIR,
    PREFIX: vars.PREFIX,
    TEMP: vars.TEMP ?? os.tmpdir(),
    ARCH: vars.UCRT_ARCH ?? "x64",
    CWD: cwd,
  };
}

// ─── Stage Recipe ────────────────────────────────────────────

const StepSchema = z
  .object({
    kind: z.enum(["make-dir", "extract-iso", "msi-admin", "copy"]),
    name: z.string().min(1),
    make_dir: z.object({ path: z.string().min(1) }).optional(),
    extract_iso: z
      .object({
        iso: z.string().min(1),
        output_dir: z.string().min(1).optional(),
      })
      .optional(),
    msi_admin: z
      .object({
        msi: z.string().min(1),
        target_dir: z.string().min(1),
        log_file: z.string().min(1).optional(),
      })
      .optional(),
    copy: z
      .object({
        from: z.string().min(1),
        to: z.string().min(1),
        extensions: z
          .array(z.string().regex(/^\.[A-Za-z0-9]+$/, "must look like .dll"))
          .min(1),
      })
      .optional(),
  })
  .strict();

const RecipeSchema = z
  .object({
    id: z
      .string()
      .min(1)
      .regex(/^[a-z0-9-]+$/),
    name: z.string().min(1),
    tools: z
      .object({
        seven_zip: z.string().min(1).default("7z"),
        msiexec: z.string().min(1).default("msiexec.exe"),
      })
      .default({}),
    steps: z.array(StepSchema).min(1),
    manifest: z.string().min(1).optional(),
  })
  .strict();

/**
 * Validate an already-parsed recipe object.
 *
 * @throws ConfigError on any schema violation
 */
export function parseRecipe(data: unknown, source?: string): StageRecipe {
  const parsed = RecipeSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      source ? `Invalid stage recipe ${source}` : "Invalid stage recipe",
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

/**
 * Load and validate a YAML stage recipe from disk.
 */
export function loadRecipe(recipePath: string = DEFAULT_RECIPE_PATH): StageRecipe {
  if (!fs.existsSync(recipePath)) {
    throw new ConfigError(`Recipe file not found: ${recipePath}`);
  }

  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(recipePath, "utf-8"));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Recipe ${recipePath} is not valid YAML`, [message]);
  }

  return parseRecipe(data, recipePath);
}
