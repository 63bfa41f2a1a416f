// Verify Kernel - error taxonomy
//
// Every failure is attributed to the stage that detected it and recorded as data
// in the result tree. Codes are a closed set; messages follow "CODE: detail".

/**
 * Stage-attributed failure codes.
 */
export const VERIFY_ERROR_CODES = Object.freeze([
  "CREATING_CLIENT", // rule client factory failed; nothing can be evaluated
  "INVALID_SUITE", // test lacks a template or constraint reference
  "ADDING_TEMPLATE", // template undecodable, unsupported version, malformed, or failed to compile
  "NOT_A_TEMPLATE", // template file does not identify as a ConstraintTemplate
  "ADDING_CONSTRAINT", // constraint undecodable, malformed, or rejected by its template
  "NOT_A_CONSTRAINT", // constraint file does not identify as any constraint
  "INVALID_CASE", // case lacks an object reference
  "INVALID_REGEX", // assertion message filter does not compile
  "INVALID_YAML", // malformed count specifier, or undecodable object
  "NUM_VIOLATIONS" // observed violations do not satisfy an assertion
] as const);

export type VerifyErrorCode = (typeof VERIFY_ERROR_CODES)[number];

export class VerifyError extends Error {
  readonly code: VerifyErrorCode;

  constructor(code: VerifyErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = "VerifyError";
    this.code = code;
  }
}

/**
 * Code check. Without a code, matches any VerifyError.
 */
export function isVerifyError(err: unknown, code?: VerifyErrorCode): err is VerifyError {
  if (!(err instanceof VerifyError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Raised by a FileProvider for an absent path. Never wrapped by the kernel.
 */
export class FileNotFoundError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`FILE_NOT_FOUND: ${path}`, options);
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

export function isFileNotFound(err: unknown): err is FileNotFoundError {
  return err instanceof FileNotFoundError;
}

export type RuleClientRejection = "COMPILE" | "NOT_A_CONSTRAINT" | "KIND_MISMATCH" | "REVIEW";

/**
 * Thrown by RuleClient implementations so the loader can tell
 * "not shaped like any constraint" apart from other rejections.
 */
export class RuleClientError extends Error {
  readonly reason: RuleClientRejection;

  constructor(reason: RuleClientRejection, detail: string, options?: { cause?: unknown }) {
    super(`${reason}: ${detail}`, options);
    this.name = "RuleClientError";
    this.reason = reason;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes a thrown value into an Error for storage in results.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
