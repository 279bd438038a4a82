/**
 * ucrt-stage Engine — Stage Pipeline
 *
 * Drives a stage recipe from start to finish:
 *
 *   PENDING → VALIDATING → RUNNING → COMPLETED
 *
 * Any failure transitions to FAILED. Steps run strictly one after another;
 * the first step that fails stops the run and its exit code becomes the
 * run's exit code. There are no retries and nothing is rolled back.
 *
 * The pipeline has NO UI logic. It communicates via return values and
 * event callbacks, so the CLI decides how to present progress.
 */

import * as crypto from "crypto";
import * as path from "path";
import {
  BuildEnvironment,
  PipelineError,
  PipelineEvent,
  PipelineEventHandler,
  PipelineOptions,
  PipelineResult,
  PipelineState,
  StageRecipe,
  StepRecord,
  StepSpec,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { resolveVariables } from "./utils/variables";
import { getStep } from "./steps";
import { StepContext } from "./steps/base-step";
import { ProcessRunner, SpawnProcessRunner } from "./windows/process";
import {
  hashDestination,
  writeManifest,
  StageManifest,
  StagedDestination,
} from "./manifest";

export interface StagePipelineOptions {
  env: BuildEnvironment;
  /** Defaults to spawning real processes */
  runner?: ProcessRunner;
  /** Defaults to a silent logger, or debug when verbose */
  logger?: Logger;
  verbose?: boolean;
  /** Dry-run every run unless overridden per run */
  dry_run?: boolean;
}

/** Exit code for failures that happen outside any tool (validation, manifest) */
const INTERNAL_FAILURE_EXIT_CODE = 1;

/**
 * Substitute build variables in a recipe path and normalize it, so recipes
 * may join segments with "/" on any platform.
 */
function resolvePath(value: string, env: BuildEnvironment): string {
  return path.normalize(resolveVariables(value, env));
}

/**
 * Substitute build variables in every path of a step spec.
 */
export function resolveStep(spec: StepSpec, env: BuildEnvironment): StepSpec {
  const r = (value: string) => resolvePath(value, env);
  const opt = (value: string | undefined) =>
    value === undefined ? undefined : r(value);

  return {
    kind: spec.kind,
    name: spec.name,
    make_dir: spec.make_dir && { path: r(spec.make_dir.path) },
    extract_iso: spec.extract_iso && {
      iso: r(spec.extract_iso.iso),
      output_dir: opt(spec.extract_iso.output_dir),
    },
    msi_admin: spec.msi_admin && {
      msi: r(spec.msi_admin.msi),
      target_dir: r(spec.msi_admin.target_dir),
      log_file: opt(spec.msi_admin.log_file),
    },
    copy: spec.copy && {
      from: r(spec.copy.from),
      to: r(spec.copy.to),
      extensions: [...spec.copy.extensions],
    },
  };
}

export class StagePipeline {
  private readonly env: BuildEnvironment;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly dryRunDefault: boolean;
  private eventHandlers: PipelineEventHandler[] = [];

  constructor(options: StagePipelineOptions) {
    this.env = options.env;
    this.runner = options.runner ?? new SpawnProcessRunner();
    this.logger =
      options.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent" });
    this.dryRunDefault = options.dry_run ?? false;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to drive its output.
   */
  on(handler: PipelineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: PipelineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // Handler errors are logged, never rethrown
        this.logger.warn(
          { event: event.type, error: err instanceof Error ? err.message : String(err) },
          "Pipeline event handler threw",
        );
      }
    }
  }

  private emitState(runId: string, state: PipelineState, message?: string): void {
    this.emit({
      type: "state_change",
      timestamp: new Date().toISOString(),
      data: { run_id: runId, state, message },
    });
  }

  // ─── Validation ──────────────────────────────────────────────

  /**
   * Resolve variables and check every step of a recipe.
   * Returns the resolved steps alongside any errors found.
   */
  prepare(recipe: StageRecipe): { steps: StepSpec[]; errors: string[] } {
    const errors: string[] = [];
    const steps: StepSpec[] = [];

    for (const spec of recipe.steps) {
      let resolved: StepSpec;
      try {
        resolved = resolveStep(spec, this.env);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        errors.push(`Step "${spec.name}": ${message}`);
        continue;
      }
      errors.push(...getStep(resolved.kind).validate(resolved));
      steps.push(resolved);
    }

    return { steps, errors };
  }

  validateRecipe(recipe: StageRecipe): string[] {
    return this.prepare(recipe).errors;
  }

  /**
   * Resolve the recipe's manifest path; relative paths land in PREFIX.
   */
  manifestPath(recipe: StageRecipe): string | undefined {
    return manifestPathFor(recipe, this.env);
  }

  // ─── Core: Run ───────────────────────────────────────────────

  async run(
    recipe: StageRecipe,
    options: PipelineOptions = {},
  ): Promise<PipelineResult> {
    const runId = crypto.randomUUID();
    const dryRun = options.dry_run ?? this.dryRunDefault;
    const startedAt = new Date().toISOString();
    const records: StepRecord[] = [];
    const logger = this.logger.child({ run: runId, recipe: recipe.id });

    const finish = (
      state: "COMPLETED" | "FAILED",
      exitCode: number,
      error?: PipelineError,
      manifestPath?: string,
    ): PipelineResult => {
      this.emitState(runId, state, error?.message);
      return {
        run_id: runId,
        recipe_id: recipe.id,
        final_state: state,
        exit_code: exitCode,
        dry_run: dryRun,
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        steps: records,
        error,
        manifest_path: manifestPath,
      };
    };

    // ─── PENDING ───
    this.emitState(runId, "PENDING");
    logger.info(
      { version: this.env.PKG_VERSION, arch: this.env.ARCH, dryRun },
      `Starting stage: ${recipe.name}`,
    );

    // ─── VALIDATING ───
    this.emitState(runId, "VALIDATING");
    const { steps, errors } = this.prepare(recipe);
    if (errors.length > 0) {
      logger.error({ errors }, "Recipe validation failed");
      return finish("FAILED", INTERNAL_FAILURE_EXIT_CODE, {
        category: "VALIDATION_ERROR",
        message: errors.join("; "),
        step_index: -1,
        details: { errors },
      });
    }

    // ─── RUNNING ───
    this.emitState(runId, "RUNNING");
    const context: StepContext = {
      env: this.env,
      tools: recipe.tools,
      runner: this.runner,
      logger,
      dry_run: dryRun,
    };

    for (const [index, spec] of steps.entries()) {
      const eventData = { run_id: runId, index, name: spec.name, kind: spec.kind };
      this.emit({
        type: "step_started",
        timestamp: new Date().toISOString(),
        data: eventData,
      });

      const result = await getStep(spec.kind).run(spec, context);
      records.push({ index, name: spec.name, kind: spec.kind, result });

      if (!result.success) {
        this.emit({
          type: "step_failed",
          timestamp: new Date().toISOString(),
          data: { ...eventData, result },
        });
        logger.error(
          { step: spec.name, exitCode: result.exit_code },
          "Step failed, stopping",
        );
        return finish("FAILED", result.exit_code, {
          category: result.category ?? "TOOL_ERROR",
          message: result.message,
          step_index: index,
          step_name: spec.name,
          details: result.command ? { command: result.command } : undefined,
        });
      }

      this.emit({
        type: "step_completed",
        timestamp: new Date().toISOString(),
        data: { ...eventData, result },
      });
    }

    // ─── Manifest ───
    let manifestPath: string | undefined;
    if (!dryRun && options.write_manifest !== false && recipe.manifest) {
      try {
        manifestPath = this.manifestPath(recipe);
        if (manifestPath) {
          writeManifest(manifestPath, await this.buildManifest(recipe, steps, records));
          logger.info({ manifest: manifestPath }, "Wrote staging manifest");
        }
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "Failed to write staging manifest");
        return finish("FAILED", INTERNAL_FAILURE_EXIT_CODE, {
          category: "FILESYSTEM_ERROR",
          message: `Failed to write staging manifest: ${message}`,
          step_index: -1,
          step_name: "manifest",
        });
      }
    }

    logger.info({ steps: records.length }, "Stage completed");
    return finish("COMPLETED", 0, undefined, manifestPath);
  }

  private async buildManifest(
    recipe: StageRecipe,
    steps: StepSpec[],
    records: StepRecord[],
  ): Promise<StageManifest> {
    // Files each copy step wrote, grouped by destination in recipe order
    const staged = new Map<string, string[]>();
    for (const record of records) {
      const copy = steps[record.index].copy;
      if (!copy) continue;
      const names = staged.get(copy.to) ?? [];
      names.push(...record.result.files.map((file) => path.basename(file)));
      staged.set(copy.to, names);
    }

    const destinations: StagedDestination[] = [];
    for (const [dir, names] of staged) {
      destinations.push(await hashDestination(dir, names));
    }

    return {
      recipe: recipe.id,
      version: this.env.PKG_VERSION,
      arch: this.env.ARCH,
      staged_at: new Date().toISOString(),
      destinations,
    };
  }
}

/**
 * Resolve a recipe's manifest path; relative paths land in PREFIX.
 */
export function manifestPathFor(
  recipe: StageRecipe,
  env: BuildEnvironment,
): string | undefined {
  if (!recipe.manifest) return undefined;
  const resolved = resolvePath(recipe.manifest, env);
  return path.isAbsolute(resolved) ? resolved : path.join(env.PREFIX, resolved);
}

/**
 * Source and destination directories of a recipe's copy steps, and the
 * extensions they copy, resolved against the build environment.
 */
export function copyDestinations(
  recipe: StageRecipe,
  env: BuildEnvironment,
): { dirs: string[]; sources: string[]; extensions: string[] } {
  const dirs: string[] = [];
  const sources: string[] = [];
  const extensions = new Set<string>();

  for (const spec of recipe.steps) {
    if (!spec.copy) continue;
    const from = resolvePath(spec.copy.from, env);
    const to = resolvePath(spec.copy.to, env);
    if (!dirs.includes(to)) dirs.push(to);
    if (!sources.includes(from)) sources.push(from);
    for (const ext of spec.copy.extensions) extensions.add(ext);
  }

  return { dirs, sources, extensions: [...extensions] };
}
