// In-process stand-in for a policy backend, used by kernel tests only.
//
// Understands a tiny rego-shaped subset:
//
//   package <name>
//   violation[{"msg": msg}] {
//     true | false          (guards; any `false` disables the rule)
//     msg := "<message>"
//   }
//
// Any other statement is a compile error.

import type { Constraint, ConstraintTemplate } from "@rulecheck/template-admission";

import type { RegisteredTemplate, RuleClient } from "../../client/rule_client";
import { RuleClientError } from "../../errors/verify_errors";

interface StubRule {
  readonly message: string;
  readonly fires: boolean;
}

const PACKAGE_RE = /^\s*package\s+[\w.]+\s*$/gm;
const RULE_RE = /violation\[\{"msg":\s*msg\}\]\s*\{([^}]*)\}/g;
const MSG_RE = /^msg := "([^"]*)"$/;

export function compileStubRego(source: string): StubRule[] {
  const rules: StubRule[] = [];

  for (const m of source.matchAll(RULE_RE)) {
    let message: string | undefined;
    let fires = true;
    for (const raw of m[1].split("\n")) {
      const stmt = raw.trim();
      if (stmt === "") continue;
      if (stmt === "true") continue;
      if (stmt === "false") {
        fires = false;
        continue;
      }
      const msg = MSG_RE.exec(stmt);
      if (msg) {
        message = msg[1];
        continue;
      }
      throw new RuleClientError("COMPILE", `unsafe or unknown statement: ${stmt}`);
    }
    if (message === undefined) {
      throw new RuleClientError("COMPILE", "rule does not assign msg");
    }
    rules.push({ message, fires });
  }

  const leftover = source.replace(RULE_RE, "").replace(PACKAGE_RE, "").trim();
  if (leftover !== "") {
    throw new RuleClientError("COMPILE", `unexpected input: ${leftover.split("\n")[0]}`);
  }
  return rules;
}

export class StubRuleClient implements RuleClient {
  // Compiled rules by governed constraint kind.
  private readonly templates = new Map<string, StubRule[]>();
  private readonly bound = new Set<string>();

  // Operation log, for asserting what the runner did.
  readonly calls: string[] = [];

  async addTemplate(template: ConstraintTemplate): Promise<RegisteredTemplate> {
    const kind = template.spec.crd.spec.names.kind;
    this.calls.push(`addTemplate:${kind}`);
    const rules = compileStubRego(template.spec.targets[0]?.rego ?? "");
    this.templates.set(kind, rules);
    return { name: template.metadata.name, kind };
  }

  async addConstraint(constraint: Constraint): Promise<void> {
    this.calls.push(`addConstraint:${constraint.kind}`);
    if (!this.templates.has(constraint.kind)) {
      throw new RuleClientError("KIND_MISMATCH", `no template registered for kind ${constraint.kind}`);
    }
    this.bound.add(`${constraint.kind}/${constraint.metadata.name}`);
  }

  async review(constraint: Constraint, _object: Readonly<Record<string, unknown>>): Promise<ReadonlyArray<string>> {
    this.calls.push(`review:${constraint.kind}`);
    const rules = this.templates.get(constraint.kind);
    if (!rules || !this.bound.has(`${constraint.kind}/${constraint.metadata.name}`)) {
      throw new RuleClientError("REVIEW", `constraint ${constraint.kind}/${constraint.metadata.name} is not bound`);
    }
    // Stub rules are unconditional; the object is not inspected.
    return rules.filter((r) => r.fires).map((r) => r.message);
  }
}

export function newStubClient(): StubRuleClient {
  return new StubRuleClient();
}
