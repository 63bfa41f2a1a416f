// Verify Kernel - result tree
//
// Results mirror the config tree 1:1. Errors are data; runtimeMs is informational
// and never part of pass/fail.

export interface CaseResult {
  readonly name?: string;
  readonly error?: Error;
  readonly skipped?: boolean;
  readonly runtimeMs: number;
}

export interface TestResult {
  readonly name?: string;

  // Test-level stage failure (suite shape, client, template, constraint).
  readonly error?: Error;
  readonly skipped?: boolean;

  // Empty when the test-level stage failed.
  readonly caseResults: ReadonlyArray<CaseResult>;
  readonly runtimeMs: number;
}

export interface SuiteResult {
  readonly testResults: ReadonlyArray<TestResult>;

  // Set only when the run was cancelled; holds the abort reason.
  readonly error?: Error;
  readonly runtimeMs: number;
}

export interface FailureRecord {
  readonly test: string;
  readonly case?: string;
  readonly error: Error;
}

function label(name: string | undefined, index: number): string {
  return name && name.length > 0 ? name : `#${index}`;
}

/**
 * Flat list of every recorded error, in tree order.
 */
export function collectFailures(result: SuiteResult): FailureRecord[] {
  const out: FailureRecord[] = [];
  result.testResults.forEach((t, ti) => {
    const testName = label(t.name, ti);
    if (t.error) out.push({ test: testName, error: t.error });
    t.caseResults.forEach((c, ci) => {
      if (c.error) out.push({ test: testName, case: label(c.name, ci), error: c.error });
    });
  });
  return out;
}

export function suiteResultPassed(result: SuiteResult): boolean {
  return result.error === undefined && collectFailures(result).length === 0;
}
