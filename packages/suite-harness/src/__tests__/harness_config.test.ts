import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Test } from "@rulecheck/contracts";

import { filterFromConfig, loadHarnessConfig } from "../harness_config";

function test(name: string, tags?: string[]): Test {
  return { name, template: "t.yaml", constraint: "c.yaml", ...(tags ? { tags } : {}) };
}

describe("loadHarnessConfig", () => {
  it("defaults to warn with no filter", () => {
    assert.deepEqual(loadHarnessConfig({}), { logLevel: "warn", run: "", tags: [] });
  });

  it("treats blank values as unset", () => {
    assert.deepEqual(loadHarnessConfig({ RULECHECK_LOG_LEVEL: "  ", RULECHECK_RUN: "", RULECHECK_TAGS: " " }), {
      logLevel: "warn",
      run: "",
      tags: []
    });
  });

  it("normalizes level case and splits tags", () => {
    const cfg = loadHarnessConfig({ RULECHECK_LOG_LEVEL: " DEBUG ", RULECHECK_RUN: "^labels", RULECHECK_TAGS: "a, b,,c" });
    assert.deepEqual(cfg, { logLevel: "debug", run: "^labels", tags: ["a", "b", "c"] });
  });

  it("rejects an unknown level", () => {
    assert.throws(() => loadHarnessConfig({ RULECHECK_LOG_LEVEL: "loud" }));
  });
});

describe("filterFromConfig", () => {
  it("applies run and tags together", () => {
    const filter = filterFromConfig(loadHarnessConfig({ RULECHECK_RUN: "^labels", RULECHECK_TAGS: "smoke" }));
    assert.equal(filter.matchesTest(test("labels-required", ["smoke"])), true);
    assert.equal(filter.matchesTest(test("labels-required", ["slow"])), false);
    assert.equal(filter.matchesTest(test("replicas", ["smoke"])), false);
  });
});
