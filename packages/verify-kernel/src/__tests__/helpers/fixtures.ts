import fs from "node:fs"; // Test-only: read YAML fixtures from the package's fixtures/ dir
import path from "node:path";

import { createMapFileProvider } from "../../inputs/file_provider";
import type { FileProvider } from "../../inputs/file_provider";

const FIXTURES_DIR = path.resolve(__dirname, "../../../fixtures"); // anchored on this file, not cwd

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), "utf8");
}

/**
 * Map provider whose entries are fixture files: { "template.yaml": "template_deny_all.yaml" }.
 */
export function fixtureFiles(layout: Readonly<Record<string, string>>): FileProvider {
  const files: Record<string, string> = {};
  for (const [target, fixture] of Object.entries(layout)) {
    files[target] = readFixture(fixture);
  }
  return createMapFileProvider(files);
}

/**
 * Wraps a provider and records every path read.
 */
export function recordingFiles(inner: FileProvider): { files: FileProvider; reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    files: {
      readFile(filePath: string): Promise<string> {
        reads.push(filePath);
        return inner.readFile(filePath);
      }
    }
  };
}
