// Verify Kernel - run filter
//
// Narrows which tests and cases execute. Never affects matching semantics.
//
// `run` is a regex over names. "test-part//case-part" selects cases inside
// matching tests; a single part matches either a test name or a case name.

import type { Case, Test } from "@rulecheck/contracts";

export interface FilterOptions {
  readonly run?: string;
  readonly tags?: ReadonlyArray<string>;
}

export interface RunFilter {
  matchesTest(test: Readonly<Test>): boolean;
  matchesCase(test: Readonly<Test>, c: Readonly<Case>): boolean;
}

export class FilterError extends Error {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`INVALID_FILTER: ${detail}`, options);
    this.name = "FilterError";
  }
}

const CASE_SEPARATOR = "//";

function compile(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (e) {
    throw new FilterError(`${JSON.stringify(pattern)}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

function hasTag(test: Readonly<Test>, tags: ReadonlySet<string>): boolean {
  if (tags.size === 0) return true;
  return (test.tags ?? []).some((t) => tags.has(t));
}

export function createFilter(options: FilterOptions = {}): RunFilter {
  const tags = new Set(options.tags ?? []);
  const run = options.run ?? "";

  if (run === "") {
    return {
      matchesTest: (test) => hasTag(test, tags),
      matchesCase: () => true
    };
  }

  const sep = run.indexOf(CASE_SEPARATOR);
  if (sep >= 0) {
    const testRe = compile(run.slice(0, sep));
    const caseRe = compile(run.slice(sep + CASE_SEPARATOR.length));
    return {
      matchesTest: (test) => hasTag(test, tags) && testRe.test(test.name ?? ""),
      matchesCase: (test, c) => testRe.test(test.name ?? "") && caseRe.test(c.name ?? "")
    };
  }

  const re = compile(run);
  return {
    matchesTest: (test) => hasTag(test, tags) && (re.test(test.name ?? "") || (test.cases ?? []).some((c) => re.test(c.name ?? ""))),
    matchesCase: (test, c) => re.test(test.name ?? "") || re.test(c.name ?? "")
  };
}

// Selects everything.
export const FILTER_ALL: RunFilter = createFilter();
