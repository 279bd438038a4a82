/**
 * ucrt-stage Engine — ISO Extract Step
 *
 * Extracts the Windows SDK image with 7-Zip, overwriting anything already
 * in the output directory.
 */

import * as fs from "fs";
import { ExtractIsoOptions, StepSpec } from "../types";
import { buildSevenZipArgs } from "../windows/seven-zip";
import { BaseStep, StepContext, StepOutcome } from "./base-step";
import { runTool } from "./run-tool";

export class IsoExtractStep extends BaseStep<ExtractIsoOptions> {
  readonly kind = "extract-iso" as const;
  protected readonly optionsKey = "extract_iso";

  protected select(spec: StepSpec): ExtractIsoOptions | undefined {
    return spec.extract_iso;
  }

  protected validateOptions(options: ExtractIsoOptions): string[] {
    return options.iso.trim() ? [] : ["extract_iso.iso must not be empty"];
  }

  protected async execute(
    options: ExtractIsoOptions,
    _spec: StepSpec,
    context: StepContext,
  ): Promise<StepOutcome> {
    const cwd = context.env.CWD;

    // 7-Zip reports a missing archive itself (exit 2); only note it here
    if (!context.dry_run && !fs.existsSync(options.iso)) {
      context.logger.warn({ iso: options.iso }, "ISO image not found");
    }

    return runTool(
      {
        tool: "7z",
        command: context.tools.seven_zip,
        args: buildSevenZipArgs({
          isoPath: options.iso,
          outputDir: options.output_dir,
        }),
        cwd,
        label: "ISO extraction",
      },
      context,
    );
  }
}
