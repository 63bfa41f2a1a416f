import { ConstraintTemplateZ, ConstraintZ, CONSTRAINTS_GROUP, SUPPORTED_VERSIONS, TEMPLATE_KIND, TEMPLATES_GROUP } from "./constraint_template_zod"; // structural schemas
import type { Constraint, ConstraintTemplate, SupportedVersion } from "./constraint_template_zod";

export type TemplateAdmissionResult =
  | { status: "ADMITTED"; template: ConstraintTemplate }
  | { status: "NOT_A_TEMPLATE"; kind?: string; apiVersion?: string }
  | { status: "UNSUPPORTED_VERSION"; apiVersion: string }
  | { status: "INVALID"; issues: string[] };

export type ConstraintAdmissionResult =
  | { status: "ADMITTED"; constraint: Constraint }
  | { status: "NOT_A_CONSTRAINT"; kind?: string; apiVersion?: string }
  | { status: "UNSUPPORTED_VERSION"; apiVersion: string }
  | { status: "INVALID"; issues: string[] };

/**
 * Splits "group/version" (or a core "version") into its parts.
 */
export function splitApiVersion(apiVersion: string): { group: string; version: string } {
  const idx = apiVersion.lastIndexOf("/");
  if (idx < 0) return { group: "", version: apiVersion }; // core group, e.g. "v1"
  return { group: apiVersion.slice(0, idx), version: apiVersion.slice(idx + 1) };
}

export function isSupportedVersion(version: string): version is SupportedVersion {
  return (SUPPORTED_VERSIONS as readonly string[]).includes(version);
}

/**
 * Kind of the constraints a template governs (spec.crd.spec.names.kind).
 */
export function templateKindOf(template: ConstraintTemplate): string {
  return template.spec.crd.spec.names.kind;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((i) => `${i.path.length ? i.path.join(".") : "<root>"}: ${i.message}`);
}

/**
 * Admits a decoded ConstraintTemplate document.
 *
 * Order matters for attribution: identity (group + kind) first, then version,
 * then shape, then the name/kind relation.
 */
export function admitConstraintTemplate(input: unknown): TemplateAdmissionResult {
  if (!isRecord(input)) {
    return { status: "INVALID", issues: ["<root>: expected a mapping"] };
  }

  const kind = optionalString(input.kind);
  const apiVersion = optionalString(input.apiVersion);
  const gv = splitApiVersion(apiVersion ?? "");
  if (kind !== TEMPLATE_KIND || gv.group !== TEMPLATES_GROUP) {
    return { status: "NOT_A_TEMPLATE", kind, apiVersion };
  }

  if (!isSupportedVersion(gv.version)) {
    return { status: "UNSUPPORTED_VERSION", apiVersion: apiVersion ?? "" };
  }

  const parsed = ConstraintTemplateZ.safeParse(input);
  if (!parsed.success) {
    return { status: "INVALID", issues: formatIssues(parsed.error.issues) };
  }

  // The generated constraint CRD is named after the lowercased kind.
  const template = parsed.data;
  const expectedName = templateKindOf(template).toLowerCase();
  if (template.metadata.name !== expectedName) {
    return {
      status: "INVALID",
      issues: [`metadata.name: must equal lowercase of spec.crd.spec.names.kind (${expectedName}), got ${template.metadata.name}`]
    };
  }

  return { status: "ADMITTED", template };
}

/**
 * Admits a decoded constraint document. Any kind is accepted as long as it
 * lives in the constraints group; matching it to a template is the loader's job.
 */
export function admitConstraint(input: unknown): ConstraintAdmissionResult {
  if (!isRecord(input)) {
    return { status: "INVALID", issues: ["<root>: expected a mapping"] };
  }

  const kind = optionalString(input.kind);
  const apiVersion = optionalString(input.apiVersion);
  const gv = splitApiVersion(apiVersion ?? "");
  if (!kind || gv.group !== CONSTRAINTS_GROUP) {
    return { status: "NOT_A_CONSTRAINT", kind, apiVersion };
  }

  if (!isSupportedVersion(gv.version)) {
    return { status: "UNSUPPORTED_VERSION", apiVersion: apiVersion ?? "" };
  }

  const parsed = ConstraintZ.safeParse(input);
  if (!parsed.success) {
    return { status: "INVALID", issues: formatIssues(parsed.error.issues) };
  }
  return { status: "ADMITTED", constraint: parsed.data };
}
