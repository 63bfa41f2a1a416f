import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { isSuiteDocument, parseSuiteDocument, SUITE_API_VERSION } from "../schema/suite_v1alpha1";

describe("isSuiteDocument", () => {
  it("recognizes suites in any version of the suite group", () => {
    assert.equal(isSuiteDocument({ kind: "Suite", apiVersion: SUITE_API_VERSION }), true);
    assert.equal(isSuiteDocument({ kind: "Suite", apiVersion: "test.gatekeeper.sh/v9" }), true);
  });

  it("ignores other documents", () => {
    assert.equal(isSuiteDocument({ kind: "ConstraintTemplate", apiVersion: "templates.gatekeeper.sh/v1" }), false);
    assert.equal(isSuiteDocument({ kind: "Suite", apiVersion: "example.com/v1" }), false);
    assert.equal(isSuiteDocument({ kind: "Suite" }), false);
    assert.equal(isSuiteDocument(["Suite"]), false);
    assert.equal(isSuiteDocument(null), false);
  });
});

describe("parseSuiteDocument", () => {
  it("fills defaults for omitted paths and tests", () => {
    const doc = parseSuiteDocument({
      kind: "Suite",
      apiVersion: SUITE_API_VERSION,
      tests: [{ name: "t", cases: [{ name: "c" }] }]
    });
    assert.equal(doc.tests[0].template, "");
    assert.equal(doc.tests[0].constraint, "");
    assert.equal(doc.tests[0].cases?.[0].object, "");

    assert.deepEqual(parseSuiteDocument({ kind: "Suite", apiVersion: SUITE_API_VERSION }).tests, []);
  });

  it("accepts numeric and string violation counts", () => {
    const doc = parseSuiteDocument({
      kind: "Suite",
      apiVersion: SUITE_API_VERSION,
      tests: [{ cases: [{ object: "o.yaml", assertions: [{ violations: 2 }, { violations: "yes", message: "^a" }] }] }]
    });
    assert.deepEqual(doc.tests[0].cases?.[0].assertions, [{ violations: 2 }, { violations: "yes", message: "^a" }]);
  });

  it("rejects unknown keys", () => {
    assert.throws(() =>
      parseSuiteDocument({
        kind: "Suite",
        apiVersion: SUITE_API_VERSION,
        tests: [{ cases: [{ object: "o.yaml", assertions: [{ violation: "yes" }] }] }]
      })
    );
  });

  it("rejects other suite versions", () => {
    assert.throws(() => parseSuiteDocument({ kind: "Suite", apiVersion: "test.gatekeeper.sh/v9" }));
  });
});
