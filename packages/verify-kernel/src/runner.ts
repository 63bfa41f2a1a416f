// Verify Kernel - suite runner
//
// Folds a Suite into a SuiteResult of the same shape:
// 1) Create one rule client for the whole run.
// 2) Per test: check shape, load template + constraint once.
// 3) Per case: load object, evaluate, match assertions.
//
// Nothing is thrown out of run(); every failure lands at the narrowest level.

import { performance } from "node:perf_hooks";

import type { Case, Suite, Test } from "@rulecheck/contracts";

import { matchAssertions } from "./assertions/assertion_matcher";
import type { RuleClient, RuleClientFactory } from "./client/rule_client";
import { describeError, isVerifyError, toError, VerifyError } from "./errors/verify_errors";
import { evaluateViolations, loadObject } from "./evaluator/violation_evaluator";
import { FILTER_ALL } from "./filter/run_filter";
import type { RunFilter } from "./filter/run_filter";
import { resolveSuitePath } from "./inputs/file_provider";
import type { FileProvider } from "./inputs/file_provider";
import { loadPolicy } from "./loader/policy_loader";
import type { LoadedPolicy } from "./loader/policy_loader";
import { silentLogger } from "./logger";
import type { VerifyLogger } from "./logger";
import type { CaseResult, SuiteResult, TestResult } from "./results/suite_results";

export interface RunnerOptions {
  // Read-only source for templates, constraints and objects.
  readonly files: FileProvider;

  // Called exactly once per run.
  readonly newClient: RuleClientFactory;

  readonly logger?: VerifyLogger;
}

export interface RunOptions {
  readonly filter?: RunFilter;

  // Directory suite references are relative to.
  readonly baseDir?: string;

  // Checked before each test and each case.
  readonly signal?: AbortSignal;
}

function elapsedSince(start: number): number {
  return performance.now() - start;
}

function named(name: string | undefined): { name?: string } {
  return name === undefined ? {} : { name };
}

function errorCode(err: Error): string {
  return isVerifyError(err) ? err.code : err.name;
}

export class Runner {
  private readonly files: FileProvider;
  private readonly newClient: RuleClientFactory;
  private readonly logger: VerifyLogger;

  constructor(options: RunnerOptions) {
    this.files = options.files;
    this.newClient = options.newClient;
    this.logger = options.logger ?? silentLogger();
  }

  async run(suite: Suite, options: RunOptions = {}): Promise<SuiteResult> {
    const start = performance.now();
    const filter = options.filter ?? FILTER_ALL;
    const baseDir = options.baseDir ?? "";
    const selected = suite.tests.filter((t) => filter.matchesTest(t));

    let client: RuleClient;
    try {
      client = await this.newClient();
    } catch (e) {
      const error = new VerifyError("CREATING_CLIENT", describeError(e), { cause: e });
      this.logger.error({ code: error.code, err: error }, "rule client creation failed");
      return {
        testResults: selected.map((t) => ({ ...named(t.name), error, caseResults: [], runtimeMs: 0 })),
        runtimeMs: elapsedSince(start)
      };
    }

    const testResults: TestResult[] = [];
    for (const test of selected) {
      if (options.signal?.aborted) {
        return { testResults, error: toError(options.signal.reason), runtimeMs: elapsedSince(start) };
      }
      testResults.push(await this.runTest(client, test, baseDir, filter, options.signal));
    }

    if (options.signal?.aborted) {
      return { testResults, error: toError(options.signal.reason), runtimeMs: elapsedSince(start) };
    }
    return { testResults, runtimeMs: elapsedSince(start) };
  }

  private async runTest(
    client: RuleClient,
    test: Readonly<Test>,
    baseDir: string,
    filter: RunFilter,
    signal: AbortSignal | undefined
  ): Promise<TestResult> {
    const start = performance.now();
    const log = this.logger.child({ test: test.name ?? test.template });

    if (test.skip) {
      log.debug("test skipped");
      return { ...named(test.name), skipped: true, caseResults: [], runtimeMs: elapsedSince(start) };
    }

    if (test.template === "" || test.constraint === "") {
      const error = new VerifyError(
        "INVALID_SUITE",
        test.template === "" ? "test has no template reference" : "test has no constraint reference"
      );
      log.warn({ code: error.code }, error.message);
      return { ...named(test.name), error, caseResults: [], runtimeMs: elapsedSince(start) };
    }

    let policy: LoadedPolicy;
    try {
      policy = await loadPolicy(
        this.files,
        client,
        resolveSuitePath(baseDir, test.template),
        resolveSuitePath(baseDir, test.constraint)
      );
    } catch (e) {
      const error = toError(e);
      log.warn({ code: errorCode(error) }, error.message);
      return { ...named(test.name), error, caseResults: [], runtimeMs: elapsedSince(start) };
    }
    log.debug({ kind: policy.template.kind }, "policy loaded");

    const caseResults: CaseResult[] = [];
    for (const c of test.cases ?? []) {
      if (!filter.matchesCase(test, c)) continue;
      if (signal?.aborted) break;
      caseResults.push(await this.runCase(client, policy, c, baseDir, log));
    }

    return { ...named(test.name), caseResults, runtimeMs: elapsedSince(start) };
  }

  private async runCase(
    client: RuleClient,
    policy: LoadedPolicy,
    c: Readonly<Case>,
    baseDir: string,
    log: VerifyLogger
  ): Promise<CaseResult> {
    const start = performance.now();
    const caseLog = log.child({ case: c.name ?? c.object });

    if (c.skip) {
      caseLog.debug("case skipped");
      return { ...named(c.name), skipped: true, runtimeMs: elapsedSince(start) };
    }

    try {
      const object = await loadObject(this.files, c.object, baseDir);
      const violations = await evaluateViolations(client, policy.constraint, object);
      caseLog.debug({ violations: violations.length }, "object reviewed");
      matchAssertions(violations, c.assertions);
    } catch (e) {
      const error = toError(e);
      caseLog.info({ code: errorCode(error) }, error.message);
      return { ...named(c.name), error, runtimeMs: elapsedSince(start) };
    }

    return { ...named(c.name), runtimeMs: elapsedSince(start) };
  }
}
