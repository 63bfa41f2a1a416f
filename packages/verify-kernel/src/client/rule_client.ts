// Verify Kernel - Rule Client capability
//
// The kernel is agnostic to the policy-rule technology. A backend implements
// these three operations; the runner obtains one through an injected factory.

import type { Constraint, ConstraintTemplate } from "@rulecheck/template-admission";

/**
 * What a backend reports after compiling a template.
 */
export interface RegisteredTemplate {
  // metadata.name of the template.
  readonly name: string;

  // Constraint kind the template governs.
  readonly kind: string;
}

export interface RuleClient {
  /**
   * Compiles and registers a template. Rejects on compile/validation failure.
   */
  addTemplate(template: ConstraintTemplate): Promise<RegisteredTemplate>;

  /**
   * Binds a constraint to its previously registered template. Rejections should be
   * RuleClientError so "not a constraint" stays distinguishable from other failures.
   */
  addConstraint(constraint: Constraint): Promise<void>;

  /**
   * Evaluates a bound constraint against an object; returns violation messages in
   * the order the policy emitted them. Empty means compliant.
   */
  review(constraint: Constraint, object: Readonly<Record<string, unknown>>): Promise<ReadonlyArray<string>>;
}

/**
 * Zero-argument factory. One client per run; never shared across runs.
 */
export type RuleClientFactory = () => RuleClient | Promise<RuleClient>;
