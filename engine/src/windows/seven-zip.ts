/**
 * ucrt-stage Engine — 7-Zip ISO Extraction
 *
 * 7-Zip reads ISO 9660/UDF images directly, so the SDK image never has to
 * be mounted.
 *
 * Resulting command shape:
 *   7z x "path\to\image.iso" -aoa -y -o"output dir"
 */

export interface SevenZipArgsOptions {
  isoPath: string;
  /** Destination directory; 7-Zip extracts into its cwd when omitted */
  outputDir?: string;
}

export function buildSevenZipArgs(opts: SevenZipArgsOptions): string[] {
  const args = [
    "x", // Extract with full paths
    opts.isoPath,
    "-aoa", // Overwrite all existing files without prompt
    "-y", // Assume yes on all queries
  ];

  if (opts.outputDir) {
    // -o takes its value with no separating space
    args.push(`-o${opts.outputDir}`);
  }

  return args;
}
