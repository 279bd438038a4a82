/**
 * ucrt-stage Engine — File Matching & Hashing
 */

import * as fs from "fs";
import * as crypto from "crypto";

/**
 * List the regular files directly inside `dir` whose extension is one of
 * `extensions` (case-insensitive). Names are returned sorted.
 */
export function listMatchingFiles(dir: string, extensions: string[]): string[] {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => {
      const dot = name.lastIndexOf(".");
      return dot > 0 && wanted.has(name.slice(dot).toLowerCase());
    })
    .sort();
}

export function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

/**
 * SHA-256 of a staged file, as lowercase hex. The file is streamed.
 */
export function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    fs.createReadStream(filePath)
      .on("error", (err) => reject(new Error(`Cannot hash ${filePath}: ${err.message}`)))
      .on("data", (chunk) => hash.update(chunk))
      .on("end", () => resolve(hash.digest("hex")));
  });
}
