// Verify Kernel - Assertion matcher
//
// Each assertion filters the FULL violation list on its own and checks the count
// against its expectation. Assertions do not consume violations: two assertions
// with overlapping filters may both count the same violation.
//
// Fail-fast: the first unmet assertion fails the case.

import type { Assertion } from "@rulecheck/contracts";

import { describeError, VerifyError } from "../errors/verify_errors";

/**
 * Resolved count expectation. "Unspecified" never survives resolution:
 * it becomes AT_LEAST_ONE.
 */
export type ViolationExpectation =
  | { readonly kind: "AT_LEAST_ONE" }
  | { readonly kind: "NONE" }
  | { readonly kind: "EXACTLY"; readonly count: number };

// Stand-in for an empty assertion list: expect no violations at all.
export const IMPLICIT_ALLOW: Readonly<Assertion> = Object.freeze({ violations: "no" });

/**
 * Maps a count specifier onto an expectation.
 *
 * @param spec - "yes", "no", a non-negative integer, or undefined (=> "yes").
 */
export function resolveExpectation(spec: unknown): ViolationExpectation {
  if (spec === undefined) return { kind: "AT_LEAST_ONE" };

  if (typeof spec === "string") {
    if (spec === "yes") return { kind: "AT_LEAST_ONE" };
    if (spec === "no") return { kind: "NONE" };
    throw new VerifyError("INVALID_YAML", `violations must be "yes", "no" or a non-negative integer, got string ${JSON.stringify(spec)}`);
  }

  if (typeof spec === "number") {
    if (Number.isSafeInteger(spec) && spec >= 0) return { kind: "EXACTLY", count: spec };
    throw new VerifyError("INVALID_YAML", `violations count must be a non-negative integer, got ${spec}`);
  }

  throw new VerifyError("INVALID_YAML", `unrecognized violations specifier of type ${typeof spec}`);
}

export function expectationHolds(expectation: ViolationExpectation, count: number): boolean {
  switch (expectation.kind) {
    case "AT_LEAST_ONE":
      return count >= 1;
    case "NONE":
      return count === 0;
    case "EXACTLY":
      return count === expectation.count;
    default: {
      const _never: never = expectation;
      throw new Error(`UNREACHABLE_EXPECTATION: ${String(_never)}`);
    }
  }
}

export function describeExpectation(expectation: ViolationExpectation): string {
  switch (expectation.kind) {
    case "AT_LEAST_ONE":
      return "at least 1";
    case "NONE":
      return "0";
    case "EXACTLY":
      return String(expectation.count);
    default: {
      const _never: never = expectation;
      throw new Error(`UNREACHABLE_EXPECTATION: ${String(_never)}`);
    }
  }
}

/**
 * Violations an assertion considers: all of them, or those its message regex matches.
 * The pattern is case-sensitive and unanchored.
 */
export function selectCandidates(violations: ReadonlyArray<string>, message: string | undefined): ReadonlyArray<string> {
  if (message === undefined) return violations;

  let re: RegExp;
  try {
    re = new RegExp(message);
  } catch (e) {
    throw new VerifyError("INVALID_REGEX", `message ${JSON.stringify(message)}: ${describeError(e)}`, { cause: e });
  }
  return violations.filter((v) => re.test(v));
}

/**
 * Checks one assertion; throws VerifyError on failure.
 */
export function checkAssertion(violations: ReadonlyArray<string>, assertion: Readonly<Assertion>, index: number): void {
  const candidates = selectCandidates(violations, assertion.message);
  const expectation = resolveExpectation(assertion.violations);

  if (!expectationHolds(expectation, candidates.length)) {
    const filter = assertion.message === undefined ? "" : ` matching ${JSON.stringify(assertion.message)}`;
    throw new VerifyError(
      "NUM_VIOLATIONS",
      `assertion ${index}: expected ${describeExpectation(expectation)} violation(s)${filter}, got ${candidates.length}`
    );
  }
}

/**
 * Matches a case's observed violations against its assertions.
 * An empty (or absent) assertion list means "expect no violations".
 */
export function matchAssertions(violations: ReadonlyArray<string>, assertions: ReadonlyArray<Assertion> | undefined): void {
  const effective: ReadonlyArray<Assertion> = assertions && assertions.length > 0 ? assertions : [IMPLICIT_ALLOW];

  effective.forEach((a, i) => checkAssertion(violations, a, i));
}
