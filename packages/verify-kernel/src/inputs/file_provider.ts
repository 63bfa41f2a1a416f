// Verify Kernel - file provider seam
//
// The kernel never touches the filesystem. Callers inject a read-only,
// path-keyed source; the harness package provides the node:fs-backed one.

import path from "node:path";

import { FileNotFoundError } from "../errors/verify_errors";

/**
 * Read-only, path-keyed text source.
 *
 * Contract: reject with FileNotFoundError when `filePath` does not exist.
 */
export interface FileProvider {
  readFile(filePath: string): Promise<string>;
}

/**
 * Resolves a suite-relative reference against the suite's base directory.
 * Paths are POSIX-style so suites behave the same on every platform.
 */
export function resolveSuitePath(baseDir: string, ref: string): string {
  if (path.posix.isAbsolute(ref)) return path.posix.normalize(ref);
  return path.posix.join(baseDir, ref);
}

/**
 * In-memory provider keyed by normalized POSIX path.
 */
export function createMapFileProvider(files: Readonly<Record<string, string>>): FileProvider {
  const entries = new Map<string, string>();
  for (const [k, v] of Object.entries(files)) {
    entries.set(path.posix.normalize(k), v);
  }

  return {
    async readFile(filePath: string): Promise<string> {
      const content = entries.get(path.posix.normalize(filePath));
      if (content === undefined) {
        throw new FileNotFoundError(filePath);
      }
      return content;
    }
  };
}
