import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { expectationHolds, matchAssertions, resolveExpectation, selectCandidates } from "../assertions/assertion_matcher";
import { isVerifyError } from "../errors/verify_errors";
import type { VerifyErrorCode } from "../errors/verify_errors";

function codeOf(fn: () => unknown): VerifyErrorCode | "none" {
  try {
    fn();
  } catch (e) {
    if (isVerifyError(e)) return e.code;
    throw e;
  }
  return "none";
}

describe("resolveExpectation", () => {
  it("defaults an absent specifier to at least one", () => {
    assert.deepEqual(resolveExpectation(undefined), { kind: "AT_LEAST_ONE" });
  });

  it("maps yes and no", () => {
    assert.deepEqual(resolveExpectation("yes"), { kind: "AT_LEAST_ONE" });
    assert.deepEqual(resolveExpectation("no"), { kind: "NONE" });
  });

  it("maps non-negative integers to exact counts", () => {
    assert.deepEqual(resolveExpectation(0), { kind: "EXACTLY", count: 0 });
    assert.deepEqual(resolveExpectation(3), { kind: "EXACTLY", count: 3 });
  });

  it("rejects other strings, negatives, fractions and foreign types", () => {
    for (const bad of ["YES", "", "2", -1, 0.5, Number.NaN, true, null, { count: 1 }]) {
      assert.equal(codeOf(() => resolveExpectation(bad)), "INVALID_YAML", `specifier ${String(bad)}`);
    }
  });
});

describe("expectationHolds", () => {
  it("compares counts per expectation kind", () => {
    assert.equal(expectationHolds({ kind: "AT_LEAST_ONE" }, 0), false);
    assert.equal(expectationHolds({ kind: "AT_LEAST_ONE" }, 4), true);
    assert.equal(expectationHolds({ kind: "NONE" }, 0), true);
    assert.equal(expectationHolds({ kind: "NONE" }, 1), false);
    assert.equal(expectationHolds({ kind: "EXACTLY", count: 2 }, 2), true);
    assert.equal(expectationHolds({ kind: "EXACTLY", count: 2 }, 3), false);
  });
});

describe("selectCandidates", () => {
  const violations = ["label app is missing", "label team is missing", "image tag latest"];

  it("keeps everything without a filter", () => {
    assert.deepEqual(selectCandidates(violations, undefined), violations);
  });

  it("applies an unanchored, case-sensitive search", () => {
    assert.deepEqual(selectCandidates(violations, "label [a-z]+ is"), ["label app is missing", "label team is missing"]);
    assert.deepEqual(selectCandidates(violations, "LATEST"), []);
  });

  it("reports a malformed pattern as INVALID_REGEX even with nothing to filter", () => {
    assert.equal(codeOf(() => selectCandidates([], "(unclosed")), "INVALID_REGEX");
  });
});

describe("matchAssertions", () => {
  it("treats a missing list as an implicit allow", () => {
    assert.equal(codeOf(() => matchAssertions([], undefined)), "none");
    assert.equal(codeOf(() => matchAssertions(["x"], undefined)), "NUM_VIOLATIONS");
  });

  it("distinguishes an empty list from one assertion with an absent count", () => {
    assert.equal(codeOf(() => matchAssertions([], [])), "none");
    assert.equal(codeOf(() => matchAssertions([], [{}])), "NUM_VIOLATIONS");
  });

  it("names the expectation and the observed count", () => {
    assert.throws(
      () => matchAssertions(["a", "b"], [{ violations: 1, message: "a|b" }]),
      (e: unknown) => e instanceof Error && e.message === 'NUM_VIOLATIONS: assertion 0: expected 1 violation(s) matching "a|b", got 2'
    );
  });
});
