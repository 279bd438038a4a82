/**
 * ucrt-stage Engine — Copy Files Step
 *
 * Copies every file with a matching extension from one directory into
 * another. Existing destination files are overwritten, so a re-run over an
 * already staged prefix succeeds.
 *
 * Like a wildcard `copy`, the step fails when nothing matches or the
 * destination directory does not exist.
 */

import * as fs from "fs";
import * as path from "path";
import { CopyFilesOptions, StepSpec } from "../types";
import { isDirectory, listMatchingFiles } from "../utils/files";
import {
  BaseStep,
  StepContext,
  StepOutcome,
  failed,
  succeeded,
} from "./base-step";

const COPY_FAILURE_EXIT_CODE = 1;

export class CopyFilesStep extends BaseStep<CopyFilesOptions> {
  readonly kind = "copy" as const;
  protected readonly optionsKey = "copy";

  protected select(spec: StepSpec): CopyFilesOptions | undefined {
    return spec.copy;
  }

  protected validateOptions(options: CopyFilesOptions): string[] {
    const errors: string[] = [];

    if (options.extensions.length === 0) {
      errors.push("copy.extensions must list at least one extension");
    }
    for (const ext of options.extensions) {
      if (!/^\.[A-Za-z0-9]+$/.test(ext)) {
        errors.push(`copy.extensions entry "${ext}" must look like ".dll"`);
      }
    }
    if (path.resolve(options.from) === path.resolve(options.to)) {
      errors.push("copy.from and copy.to must be different directories");
    }

    return errors;
  }

  protected async execute(
    options: CopyFilesOptions,
    _spec: StepSpec,
    context: StepContext,
  ): Promise<StepOutcome> {
    const { logger, dry_run } = context;
    const { from, to, extensions } = options;
    const pattern = extensions.map((e) => `*${e}`).join(", ");

    logger.info({ from, to, extensions }, "Copy files");

    if (dry_run) {
      return succeeded(`[DRY RUN] Would copy ${pattern} from ${from} → ${to}`);
    }

    if (!isDirectory(from)) {
      return failed(
        "FILESYSTEM_ERROR",
        COPY_FAILURE_EXIT_CODE,
        `Source directory not found: ${from}`,
      );
    }
    if (!isDirectory(to)) {
      return failed(
        "FILESYSTEM_ERROR",
        COPY_FAILURE_EXIT_CODE,
        `Destination directory not found: ${to}`,
      );
    }

    const names = listMatchingFiles(from, extensions);
    if (names.length === 0) {
      return failed(
        "FILESYSTEM_ERROR",
        COPY_FAILURE_EXIT_CODE,
        `No files matching ${pattern} in ${from}`,
      );
    }

    const copied: string[] = [];
    for (const name of names) {
      const dest = path.join(to, name);
      try {
        fs.copyFileSync(path.join(from, name), dest);
        copied.push(dest);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ file: name, to, error: message }, "Copy failed");
        return failed(
          "FILESYSTEM_ERROR",
          COPY_FAILURE_EXIT_CODE,
          `Could not copy ${name} to ${to}: ${message}`,
          { files: copied },
        );
      }
    }

    logger.debug({ files: names }, "Copied files");
    return succeeded(`Copied ${copied.length} file(s) to ${to}`, {
      files: copied,
    });
  }
}
