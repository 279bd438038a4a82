/**
 * ucrt-stage Engine — Step Registry
 *
 * Maps step kinds to their implementations.
 * This is the only place where step kinds are registered.
 */

import { StepKind } from "../types";
import { BaseStep } from "./base-step";
import { MakeDirStep } from "./make-dir-step";
import { IsoExtractStep } from "./iso-extract-step";
import { MsiAdminStep } from "./msi-admin-step";
import { CopyFilesStep } from "./copy-files-step";

export { BaseStep } from "./base-step";
export type { StepContext, StepOutcome } from "./base-step";

type AnyStep = MakeDirStep | IsoExtractStep | MsiAdminStep | CopyFilesStep;

const steps: Map<StepKind, AnyStep> = new Map();

// Register all built-in steps
steps.set("make-dir", new MakeDirStep());
steps.set("extract-iso", new IsoExtractStep());
steps.set("msi-admin", new MsiAdminStep());
steps.set("copy", new CopyFilesStep());

/**
 * Get the step implementation for a kind.
 *
 * @throws Error if no step is registered for the kind
 */
export function getStep(kind: StepKind): AnyStep {
  const step = steps.get(kind);
  if (!step) {
    throw new Error(
      `No step registered for kind "${kind}". ` +
        `Supported kinds: ${Array.from(steps.keys()).join(", ")}`,
    );
  }
  return step;
}

/**
 * Get all supported step kinds.
 */
export function getSupportedKinds(): StepKind[] {
  return Array.from(steps.keys());
}
