// Verify Kernel - Violation evaluator
//
// Runs a bound constraint against one sample object. It only reports what the
// policy emitted; deciding pass/fail is the assertion matcher's job.

import type { Constraint } from "@rulecheck/template-admission";

import type { RuleClient } from "../client/rule_client";
import { describeError, VerifyError } from "../errors/verify_errors";
import { resolveSuitePath } from "../inputs/file_provider";
import type { FileProvider } from "../inputs/file_provider";
import { decodeYamlObject } from "../inputs/resource_decoder";

/**
 * Reads and decodes a case's sample object.
 *
 * @param ref - Object reference as written in the suite (relative to baseDir).
 */
export async function loadObject(files: FileProvider, ref: string, baseDir = ""): Promise<Record<string, unknown>> {
  if (ref === "") {
    throw new VerifyError("INVALID_CASE", "case has no object reference");
  }

  const filePath = resolveSuitePath(baseDir, ref);
  const text = await files.readFile(filePath); // FileNotFoundError propagates as-is
  try {
    return decodeYamlObject(text);
  } catch (e) {
    throw new VerifyError("INVALID_YAML", `decoding object ${filePath}: ${describeError(e)}`, { cause: e });
  }
}

/**
 * Ordered violation messages for `object`. Review rejections propagate unchanged.
 */
export async function evaluateViolations(
  client: RuleClient,
  constraint: Constraint,
  object: Readonly<Record<string, unknown>>
): Promise<ReadonlyArray<string>> {
  const messages = await client.review(constraint, object);
  return Object.freeze([...messages]);
}
