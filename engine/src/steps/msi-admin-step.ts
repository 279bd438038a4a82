/**
 * ucrt-stage Engine — MSI Administrative Extraction Step
 *
 * Unpacks the redistributable installer into a temporary TARGETDIR.
 * Nothing is registered with Windows Installer.
 */

import { MsiAdminOptions, StepSpec } from "../types";
import { buildMsiAdminArgs } from "../windows/msi";
import { BaseStep, StepContext, StepOutcome } from "./base-step";
import { runTool } from "./run-tool";

export class MsiAdminStep extends BaseStep<MsiAdminOptions> {
  readonly kind = "msi-admin" as const;
  protected readonly optionsKey = "msi_admin";

  protected select(spec: StepSpec): MsiAdminOptions | undefined {
    return spec.msi_admin;
  }

  protected validateOptions(options: MsiAdminOptions): string[] {
    const errors: string[] = [];

    if (!options.msi.toLowerCase().endsWith(".msi")) {
      errors.push(`msi_admin.msi must point at an .msi package: ${options.msi}`);
    }
    if (!options.target_dir.trim()) {
      errors.push("msi_admin.target_dir must not be empty");
    }

    return errors;
  }

  protected async execute(
    options: MsiAdminOptions,
    _spec: StepSpec,
    context: StepContext,
  ): Promise<StepOutcome> {
    return runTool(
      {
        tool: "msiexec",
        command: context.tools.msiexec,
        args: buildMsiAdminArgs({
          msiPath: options.msi,
          targetDir: options.target_dir,
          logFile: options.log_file,
        }),
        cwd: context.env.CWD,
        label: "MSI administrative extraction",
      },
      context,
    );
  }
}
