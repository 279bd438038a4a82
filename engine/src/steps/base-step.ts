/**
 * ucrt-stage Engine — Base Step
 *
 * Every step kind (make-dir, extract-iso, msi-admin, copy) extends this
 * class. Steps only perform their own action: variable resolution, ordering
 * and the stop-on-first-failure policy belong to the pipeline.
 */

import {
  BuildEnvironment,
  ErrorCategory,
  StepKind,
  StepResult,
  StepSpec,
  ToolPaths,
} from "../types";
import { Logger } from "../utils/logger";
import { ProcessRunner } from "../windows/process";

export interface StepContext {
  env: BuildEnvironment;
  tools: ToolPaths;
  runner: ProcessRunner;
  logger: Logger;
  /** If true, the step must NOT make changes */
  dry_run: boolean;
}

export type StepOutcome = Omit<StepResult, "duration_ms">;

export function succeeded(
  message: string,
  extra: Partial<StepOutcome> = {},
): StepOutcome {
  return { success: true, exit_code: 0, message, files: [], ...extra };
}

export function failed(
  category: ErrorCategory,
  exitCode: number,
  message: string,
  extra: Partial<StepOutcome> = {},
): StepOutcome {
  return {
    success: false,
    exit_code: exitCode,
    category,
    message,
    files: [],
    ...extra,
  };
}

export abstract class BaseStep<TOptions> {
  abstract readonly kind: StepKind;

  /** Name of the options block this kind reads, e.g. "copy" */
  protected abstract readonly optionsKey: string;

  /** Pick this kind's options out of a step spec */
  protected abstract select(spec: StepSpec): TOptions | undefined;

  protected abstract validateOptions(options: TOptions): string[];

  protected abstract execute(
    options: TOptions,
    spec: StepSpec,
    context: StepContext,
  ): Promise<StepOutcome>;

  /**
   * Check that the spec carries the options this kind needs.
   * Called for every step before the first one runs.
   */
  validate(spec: StepSpec): string[] {
    const options = this.select(spec);
    if (!options) {
      return [
        `Step "${spec.name}" of kind "${this.kind}" must have ${this.optionsKey} options`,
      ];
    }
    return this.validateOptions(options).map((e) => `Step "${spec.name}": ${e}`);
  }

  async run(spec: StepSpec, context: StepContext): Promise<StepResult> {
    const startMs = Date.now();
    const options = this.select(spec);

    const outcome = options
      ? await this.execute(options, spec, context)
      : failed(
          "VALIDATION_ERROR",
          1,
          `Step "${spec.name}" has no ${this.optionsKey} options`,
        );

    return { ...outcome, duration_ms: Date.now() - startMs };
  }
}
