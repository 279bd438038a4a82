/**
 * ucrt-stage Engine — Staging Manifest & Destination Verification
 *
 * After a successful run the pipeline records what it staged:
 *
 *   {
 *     "recipe": "ucrt",
 *     "version": "10.0.22621.0",
 *     "arch": "x64",
 *     "staged_at": "2026-01-01T00:00:00.000Z",
 *     "destinations": [
 *       { "dir": "C:\\prefix", "files": [{ "name": "ucrtbase.dll", "sha256": "…" }] }
 *     ]
 *   }
 *
 * Only files a copy step wrote are recorded. verifyDestinations() checks
 * that every destination holds each staged file with the same contents.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { Architecture } from "./types";
import { isDirectory, sha256File } from "./utils/files";

export interface StagedFile {
  name: string;
  sha256: string;
}

export interface StagedDestination {
  dir: string;
  files: StagedFile[];
}

const ManifestSchema = z.object({
  recipe: z.string(),
  version: z.string(),
  arch: z.enum(["x86", "x64", "arm64"]),
  staged_at: z.string(),
  destinations: z.array(
    z.object({
      dir: z.string(),
      files: z.array(z.object({ name: z.string(), sha256: z.string() })),
    }),
  ),
});

export interface StageManifest {
  recipe: string;
  version: string;
  arch: Architecture;
  staged_at: string;
  destinations: StagedDestination[];
}

export interface DestinationMismatch {
  dir: string;
  /** Staged files absent from this destination */
  missing: string[];
  /** Staged files whose contents differ from the reference copy */
  different: string[];
}

export interface DestinationComparison {
  consistent: boolean;
  /** First directory; hashes are compared against its copies */
  reference: string;
  files: string[];
  mismatches: DestinationMismatch[];
}

/**
 * Hash the named files in a directory. Other files in it are ignored.
 */
export async function hashDestination(
  dir: string,
  names: string[],
): Promise<StagedDestination> {
  const files: StagedFile[] = [];
  for (const name of [...new Set(names)].sort()) {
    files.push({ name, sha256: await sha256File(path.join(dir, name)) });
  }
  return { dir, files };
}

/**
 * Every file name the manifest records, across all destinations.
 */
export function stagedFileNames(manifest: StageManifest): string[] {
  const names = new Set<string>();
  for (const dest of manifest.destinations) {
    for (const file of dest.files) names.add(file.name);
  }
  return [...names].sort();
}

export function writeManifest(manifestPath: string, manifest: StageManifest): void {
  fs.mkdirSync(path.dirname(manifestPath), { recursive: true });
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
}

/**
 * Read a manifest written by writeManifest(). Returns null if the file
 * does not exist.
 *
 * @throws Error if the file is not a manifest
 */
export function readManifest(manifestPath: string): StageManifest | null {
  if (!fs.existsSync(manifestPath)) return null;
  const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed manifest ${manifestPath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Check that every destination holds each staged file with the same
 * contents. Files that were not staged are ignored.
 *
 * @throws Error if fewer than two directories are given or one is missing
 */
export async function verifyDestinations(
  dirs: string[],
  files: string[],
): Promise<DestinationComparison> {
  if (dirs.length < 2) {
    throw new Error("At least two destination directories are required");
  }
  for (const dir of dirs) {
    if (!isDirectory(dir)) {
      throw new Error(`Destination directory not found: ${dir}`);
    }
  }

  const names = [...new Set(files)].sort();
  const present = dirs.map((dir) =>
    names.filter((name) => fs.existsSync(path.join(dir, name))),
  );
  const hashed = await Promise.all(
    dirs.map((dir, i) => hashDestination(dir, present[i])),
  );

  // First copy of each file, in directory order, is the reference
  const refHashes = new Map<string, string>();
  for (const dest of hashed) {
    for (const f of dest.files) {
      if (!refHashes.has(f.name)) refHashes.set(f.name, f.sha256);
    }
  }

  const mismatches: DestinationMismatch[] = [];
  for (const [i, dest] of hashed.entries()) {
    const mismatch: DestinationMismatch = {
      dir: dest.dir,
      missing: names.filter((name) => !present[i].includes(name)),
      different: dest.files
        .filter((f) => refHashes.get(f.name) !== f.sha256)
        .map((f) => f.name),
    };
    if (mismatch.missing.length > 0 || mismatch.different.length > 0) {
      mismatches.push(mismatch);
    }
  }

  return {
    consistent: mismatches.length === 0,
    reference: dirs[0],
    files: names,
    mismatches,
  };
}
