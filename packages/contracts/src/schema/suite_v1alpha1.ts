import { z } from "zod"; // zod: runtime schema for suite documents (contracts SSOT)

export const SUITE_GROUP = "test.gatekeeper.sh"; // API group that identifies suite documents
export const SUITE_API_VERSION = `${SUITE_GROUP}/v1alpha1`; // The only suite version this engine reads
export const SUITE_KIND = "Suite"; // Discriminator kind

// Count specifier: "yes" | "no" | non-negative integer. Any number or string is accepted here;
// the kernel rejects malformed values per case (INVALID_YAML).
export const ViolationCountSpecZ = z.union([z.number(), z.string()]);

export const AssertionZ = z
  .object({
    violations: ViolationCountSpecZ.optional(), // absent => "at least one"
    message: z.string().optional() // regex filter over violation messages
  })
  .strict(); // unknown keys rejected (e.g. `violation:`)

export const CaseZ = z
  .object({
    name: z.string().optional(),
    object: z.string().default(""), // empty => INVALID_CASE at run time
    skip: z.boolean().optional(),
    assertions: z.array(AssertionZ).optional()
  })
  .strict();

export const TestZ = z
  .object({
    name: z.string().optional(),
    template: z.string().default(""), // empty => INVALID_SUITE at run time
    constraint: z.string().default(""), // empty => INVALID_SUITE at run time
    skip: z.boolean().optional(),
    tags: z.array(z.string().min(1)).optional(),
    cases: z.array(CaseZ).optional()
  })
  .strict();

export const SuiteDocumentZ = z
  .object({
    kind: z.literal(SUITE_KIND),
    apiVersion: z.literal(SUITE_API_VERSION),
    metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
    tests: z.array(TestZ).default([])
  })
  .strict();

export type Assertion = z.infer<typeof AssertionZ>;
export type Case = z.infer<typeof CaseZ>;
export type Test = z.infer<typeof TestZ>;
export type SuiteDocument = z.infer<typeof SuiteDocumentZ>;

/**
 * In-memory suite shape consumed by the runner. Only `tests` is required;
 * the document envelope matters when a suite is read from a file.
 */
export interface Suite {
  readonly tests: ReadonlyArray<Test>;
}

export function parseSuiteDocument(input: unknown): SuiteDocument {
  return SuiteDocumentZ.parse(input); // throws ZodError on any shape violation
}

/**
 * Shallow identification only: tells suite files apart from templates, constraints
 * and objects that live in the same directory. Shape is checked by parseSuiteDocument.
 */
export function isSuiteDocument(input: unknown): boolean {
  if (typeof input !== "object" || input === null || Array.isArray(input)) return false;
  const kind: unknown = Reflect.get(input, "kind");
  const apiVersion: unknown = Reflect.get(input, "apiVersion");
  if (kind !== SUITE_KIND || typeof apiVersion !== "string") return false;
  return apiVersion.split("/")[0] === SUITE_GROUP;
}
