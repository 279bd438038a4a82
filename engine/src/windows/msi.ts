/**
 * ucrt-stage Engine — msiexec Administrative Extraction
 *
 * An administrative install (/a) unpacks the files of an .msi into
 * TARGETDIR without registering anything on the machine, which is how the
 * UCRT redistributable DLLs are pulled out of the SDK installers.
 *
 * Resulting command shape:
 *   msiexec /a "path\to\package.msi" /qb TARGETDIR=C:\tmp\ucrt [/l*v log]
 */

export interface MsiAdminArgsOptions {
  /** Absolute path to the .msi file */
  msiPath: string;
  /** Extraction target directory */
  targetDir: string;
  /** Optional verbose msiexec log file */
  logFile?: string;
}

/**
 * Strip one layer of surrounding quotes. spawn() adds its own quoting when
 * an argument contains spaces, so a pre-quoted value would be escaped twice.
 */
function unquote(value: string): string {
  return value.replace(/^"(.*)"$/, "$1");
}

export function buildMsiAdminArgs(opts: MsiAdminArgsOptions): string[] {
  const args = [
    "/a",
    unquote(opts.msiPath),
    "/qb", // Basic UI: progress only, no prompts
    `TARGETDIR=${unquote(opts.targetDir)}`,
  ];

  if (opts.logFile) {
    args.push("/l*v", unquote(opts.logFile));
  }

  return args;
}
