// Verify Kernel - Template & Constraint loader
//
// Resolves a test's template and constraint through the file provider, admits them,
// and registers them with the rule client. Every failure is classified into the
// verify error taxonomy except not-found, which propagates unchanged.

import { admitConstraint, admitConstraintTemplate, templateKindOf } from "@rulecheck/template-admission";
import type { Constraint, ConstraintTemplate } from "@rulecheck/template-admission";

import type { RuleClient } from "../client/rule_client";
import { describeError, RuleClientError, VerifyError } from "../errors/verify_errors";
import type { FileProvider } from "../inputs/file_provider";
import { decodeYamlResource } from "../inputs/resource_decoder";

export interface LoadedTemplate {
  readonly template: ConstraintTemplate;

  // Constraint kind declared by the template; retained for binding checks.
  readonly kind: string;
}

export interface LoadedPolicy {
  readonly template: LoadedTemplate;
  readonly constraint: Constraint;
}

/**
 * Reads, admits and registers a ConstraintTemplate.
 */
export async function loadTemplate(files: FileProvider, client: RuleClient, filePath: string): Promise<LoadedTemplate> {
  const text = await files.readFile(filePath); // FileNotFoundError propagates as-is

  let decoded: unknown;
  try {
    decoded = decodeYamlResource(text);
  } catch (e) {
    throw new VerifyError("ADDING_TEMPLATE", `decoding ${filePath}: ${describeError(e)}`, { cause: e });
  }

  const admitted = admitConstraintTemplate(decoded);
  switch (admitted.status) {
    case "ADMITTED":
      break;
    case "NOT_A_TEMPLATE":
      throw new VerifyError("NOT_A_TEMPLATE", `${filePath} has kind ${admitted.kind ?? "<none>"} (${admitted.apiVersion ?? "<none>"})`);
    case "UNSUPPORTED_VERSION":
      throw new VerifyError("ADDING_TEMPLATE", `${filePath}: unsupported template version ${admitted.apiVersion}`);
    case "INVALID":
      throw new VerifyError("ADDING_TEMPLATE", `${filePath}: ${admitted.issues.join("; ")}`);
    default: {
      const _never: never = admitted;
      throw new Error(`UNREACHABLE_ADMISSION_STATUS: ${String(_never)}`);
    }
  }

  let kind: string;
  try {
    const registered = await client.addTemplate(admitted.template);
    kind = registered.kind;
  } catch (e) {
    throw new VerifyError("ADDING_TEMPLATE", `registering ${filePath}: ${describeError(e)}`, { cause: e });
  }

  if (kind !== templateKindOf(admitted.template)) {
    throw new VerifyError("ADDING_TEMPLATE", `${filePath}: client registered kind ${kind}, template declares ${templateKindOf(admitted.template)}`);
  }

  return { template: admitted.template, kind };
}

/**
 * Reads, admits and binds a constraint to an already loaded template.
 */
export async function loadConstraint(
  files: FileProvider,
  client: RuleClient,
  template: LoadedTemplate,
  filePath: string
): Promise<Constraint> {
  const text = await files.readFile(filePath); // FileNotFoundError propagates as-is

  let decoded: unknown;
  try {
    decoded = decodeYamlResource(text);
  } catch (e) {
    throw new VerifyError("ADDING_CONSTRAINT", `decoding ${filePath}: ${describeError(e)}`, { cause: e });
  }

  const admitted = admitConstraint(decoded);
  switch (admitted.status) {
    case "ADMITTED":
      break;
    case "NOT_A_CONSTRAINT":
      throw new VerifyError("NOT_A_CONSTRAINT", `${filePath} has kind ${admitted.kind ?? "<none>"} (${admitted.apiVersion ?? "<none>"})`);
    case "UNSUPPORTED_VERSION":
      throw new VerifyError("ADDING_CONSTRAINT", `${filePath}: unsupported constraint version ${admitted.apiVersion}`);
    case "INVALID":
      throw new VerifyError("ADDING_CONSTRAINT", `${filePath}: ${admitted.issues.join("; ")}`);
    default: {
      const _never: never = admitted;
      throw new Error(`UNREACHABLE_ADMISSION_STATUS: ${String(_never)}`);
    }
  }

  const constraint = admitted.constraint;
  if (constraint.kind !== template.kind) {
    throw new VerifyError("ADDING_CONSTRAINT", `${filePath}: kind ${constraint.kind} does not match template kind ${template.kind}`);
  }

  try {
    await client.addConstraint(constraint);
  } catch (e) {
    if (e instanceof RuleClientError && e.reason === "NOT_A_CONSTRAINT") {
      throw new VerifyError("NOT_A_CONSTRAINT", `${filePath}: ${e.message}`, { cause: e });
    }
    throw new VerifyError("ADDING_CONSTRAINT", `binding ${filePath}: ${describeError(e)}`, { cause: e });
  }

  return constraint;
}

/**
 * Template first, then constraint; the constraint is only read if the template loaded.
 */
export async function loadPolicy(
  files: FileProvider,
  client: RuleClient,
  templatePath: string,
  constraintPath: string
): Promise<LoadedPolicy> {
  const template = await loadTemplate(files, client, templatePath);
  const constraint = await loadConstraint(files, client, template, constraintPath);
  return { template, constraint };
}
