// @rulecheck/suite-harness
// Suite discovery + reading from disk, and batch execution through the kernel runner.
//
// File IO is allowed ONLY here; verify-kernel must remain IO-free.

import fs from "node:fs/promises";
import path from "node:path";

import { isSuiteDocument, parseSuiteDocument } from "@rulecheck/contracts";
import type { SuiteDocument } from "@rulecheck/contracts";
import { decodeYamlResource, describeError, ResourceDecodeError, Runner, silentLogger, toError } from "@rulecheck/verify-kernel";
import type { RuleClientFactory, RunFilter, SuiteResult, VerifyLogger } from "@rulecheck/verify-kernel";

import { createFsFileProvider } from "./fs_file_provider";

export interface LoadedSuite {
  readonly path: string; // Suite file path.
  readonly baseDir: string; // Directory the suite's references are relative to.
  readonly suite: SuiteDocument;
}

// A file that identifies as a suite but could not be parsed.
export interface SuiteReadFailure {
  readonly path: string;
  readonly error: Error;
}

export interface SuiteCatalog {
  readonly suites: ReadonlyArray<LoadedSuite>;
  readonly failures: ReadonlyArray<SuiteReadFailure>;
}

// Either the suite ran, or it could not be read. One bad file never sinks the batch.
export type SuiteRunOutcome =
  | { readonly path: string; readonly result: SuiteResult }
  | { readonly path: string; readonly error: Error };

export interface RunSuitesOptions {
  readonly newClient: RuleClientFactory;
  readonly filter?: RunFilter;
  readonly signal?: AbortSignal;
  readonly logger?: VerifyLogger;
}

const SUITE_EXTENSIONS = new Set([".yaml", ".yml"]);

function isSuiteCandidate(name: string): boolean {
  return SUITE_EXTENSIONS.has(path.extname(name).toLowerCase());
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)); // code-unit order, locale-independent
  for (const ent of entries) {
    if (ent.name === "node_modules" || ent.name.startsWith(".")) continue; // skip vendored/hidden dirs
    const full = path.join(dir, ent.name);
    if (ent.isDirectory()) await walk(full, out);
    else if (ent.isFile() && isSuiteCandidate(ent.name)) out.push(full);
  }
}

/**
 * YAML files under `target` (or `target` itself when it is a file).
 * Whether a file is a suite is decided by readSuiteFile.
 */
export async function discoverSuiteFiles(target: string): Promise<string[]> {
  const stat = await fs.stat(target);
  if (stat.isFile()) return [target];

  const out: string[] = [];
  await walk(target, out);
  return out;
}

/**
 * Reads one file; returns undefined when it is not a suite document. Files that
 * do not decode (malformed templates under test, multi-document manifests) are
 * not suites either. A file that claims to be a suite but has the wrong shape throws.
 */
export async function readSuiteFile(filePath: string): Promise<LoadedSuite | undefined> {
  const text = await fs.readFile(filePath, "utf8");

  let decoded: unknown;
  try {
    decoded = decodeYamlResource(text);
  } catch (e) {
    if (e instanceof ResourceDecodeError) return undefined;
    throw e;
  }
  if (!isSuiteDocument(decoded)) return undefined;

  return {
    path: filePath,
    baseDir: path.dirname(filePath),
    suite: parseSuiteDocument(decoded)
  };
}

type SuiteEntry =
  | { readonly status: "LOADED"; readonly loaded: LoadedSuite }
  | { readonly status: "FAILED"; readonly failure: SuiteReadFailure };

async function readSuiteEntries(target: string, logger: VerifyLogger): Promise<SuiteEntry[]> {
  const entries: SuiteEntry[] = [];
  for (const f of await discoverSuiteFiles(target)) {
    try {
      const loaded = await readSuiteFile(f);
      if (loaded) entries.push({ status: "LOADED", loaded });
    } catch (e) {
      const error = toError(e);
      logger.warn({ path: f, err: error }, `suite not readable: ${describeError(e)}`);
      entries.push({ status: "FAILED", failure: { path: f, error } });
    }
  }
  return entries;
}

/**
 * Suites under `target`, in discovery order. Unreadable suite files are
 * reported in `failures` instead of rejecting.
 */
export async function readSuites(target: string, logger: VerifyLogger = silentLogger()): Promise<SuiteCatalog> {
  const suites: LoadedSuite[] = [];
  const failures: SuiteReadFailure[] = [];
  for (const entry of await readSuiteEntries(target, logger)) {
    if (entry.status === "LOADED") suites.push(entry.loaded);
    else failures.push(entry.failure);
  }
  return { suites, failures };
}

/**
 * Runs every suite under `target`, each with a fresh runner whose file provider
 * is rooted at the suite's own directory. Outcomes follow discovery order.
 */
export async function runSuites(target: string, options: RunSuitesOptions): Promise<SuiteRunOutcome[]> {
  const logger = options.logger ?? silentLogger();
  const entries = await readSuiteEntries(target, logger);
  logger.info({ target, suites: entries.length }, "suite files discovered");

  const outcomes: SuiteRunOutcome[] = [];
  for (const entry of entries) {
    if (entry.status === "FAILED") {
      outcomes.push(entry.failure);
      continue;
    }
    const s = entry.loaded;
    const runner = new Runner({
      files: createFsFileProvider(s.baseDir),
      newClient: options.newClient,
      logger: logger.child({ suite: s.path })
    });
    const result = await runner.run(s.suite, { filter: options.filter, signal: options.signal });
    outcomes.push({ path: s.path, result });
  }
  return outcomes;
}
