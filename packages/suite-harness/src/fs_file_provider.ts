import fs from "node:fs/promises"; // Harness-only file IO; the kernel stays IO-free.
import path from "node:path";

import { FileNotFoundError } from "@rulecheck/verify-kernel";
import type { FileProvider } from "@rulecheck/verify-kernel";

function errnoCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  const code: unknown = e.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * node:fs-backed provider rooted at `rootDir`. Relative references resolve against the root.
 */
export function createFsFileProvider(rootDir: string): FileProvider {
  const root = path.resolve(rootDir);

  return {
    async readFile(filePath: string): Promise<string> {
      const abs = path.resolve(root, filePath);
      try {
        return await fs.readFile(abs, "utf8");
      } catch (e) {
        const code = errnoCode(e);
        if (code === "ENOENT" || code === "ENOTDIR") {
          throw new FileNotFoundError(filePath, { cause: e }); // distinguishable not-found
        }
        throw e;
      }
    }
  };
}
