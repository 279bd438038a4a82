/**
 * ucrt-stage Engine — Recipe Variable Resolution
 *
 * Recipes reference the build environment as ${PREFIX}, ${SRC_DIR}, ...
 * instead of hardcoding paths. This module substitutes those references.
 */

import { BuildEnvironment } from "../types";

const VARIABLE_PATTERN = /\$\{([A-Z_]+)\}/g;

function toVariableMap(env: BuildEnvironment): Record<string, string> {
  return { ...env };
}

/**
 * Resolve all ${VARIABLE} references in a recipe string.
 *
 * @throws Error if an unknown variable is referenced
 *
 * @example
 * resolveVariables("${SRC_DIR}/winsdk.iso", env)
 * // → "C:\\bld\\ucrt_1700000000\\work/winsdk.iso"
 */
export function resolveVariables(input: string, env: BuildEnvironment): string {
  const variables = toVariableMap(env);

  return input.replace(VARIABLE_PATTERN, (_match, varName: string) => {
    const value = variables[varName];
    if (value === undefined) {
      throw new Error(
        `Unknown recipe variable: \${${varName}}. ` +
          `Supported variables: ${Object.keys(variables).join(", ")}`,
      );
    }
    return value;
  });
}

/**
 * Report unknown variables in a recipe string without resolving it.
 */
export function validateVariables(
  input: string,
  env: BuildEnvironment,
): string[] {
  const known = new Set(Object.keys(toVariableMap(env)));
  const errors: string[] = [];

  const pattern = new RegExp(VARIABLE_PATTERN.source, "g");
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(input)) !== null) {
    if (!known.has(match[1])) {
      errors.push(`Unknown variable: \${${match[1]}}`);
    }
  }

  return errors;
}
