/**
 * ucrt-stage Engine — Make Directory Step
 *
 * Creates the output directory (and any missing parents). An existing
 * directory is not an error.
 */

import * as fs from "fs";
import { MakeDirOptions, StepSpec } from "../types";
import {
  BaseStep,
  StepContext,
  StepOutcome,
  failed,
  succeeded,
} from "./base-step";

export class MakeDirStep extends BaseStep<MakeDirOptions> {
  readonly kind = "make-dir" as const;
  protected readonly optionsKey = "make_dir";

  protected select(spec: StepSpec): MakeDirOptions | undefined {
    return spec.make_dir;
  }

  protected validateOptions(options: MakeDirOptions): string[] {
    return options.path.trim() ? [] : ["make_dir.path must not be empty"];
  }

  protected async execute(
    options: MakeDirOptions,
    _spec: StepSpec,
    context: StepContext,
  ): Promise<StepOutcome> {
    const { logger, dry_run } = context;
    const dir = options.path;

    logger.info({ dir }, "Create directory");

    if (dry_run) {
      return succeeded(`[DRY RUN] Would create ${dir}`);
    }

    try {
      fs.mkdirSync(dir, { recursive: true });
      return succeeded(`Created ${dir}`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ dir, error: message }, "Directory creation failed");
      return failed("FILESYSTEM_ERROR", 1, `Could not create ${dir}: ${message}`);
    }
  }
}
