// Verify Kernel - YAML resource decoding
//
// Resources must be representable as JSON objects: parse errors, duplicate keys
// and collection-valued mapping keys are all decode failures.

import { isMap, isScalar, parseDocument, visit } from "yaml";

export class ResourceDecodeError extends Error {
  constructor(detail: string) {
    super(`RESOURCE_DECODE_FAILED: ${detail}`);
    this.name = "ResourceDecodeError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseResourceDocument(text: string) {
  const doc = parseDocument(text, { uniqueKeys: true, prettyErrors: false });
  if (doc.errors.length > 0) {
    throw new ResourceDecodeError(doc.errors.map((e) => e.message).join("; "));
  }

  let badKey: string | undefined;
  visit(doc, {
    Pair(_key, pair) {
      if (pair.key !== null && !isScalar(pair.key)) {
        badKey = String(pair.key);
        return visit.BREAK;
      }
      return undefined;
    }
  });
  if (badKey !== undefined) {
    throw new ResourceDecodeError(`mapping key must be a scalar, got ${badKey}`);
  }
  return doc;
}

/**
 * Decodes one YAML document into a plain JS value.
 */
export function decodeYamlResource(text: string): unknown {
  const value: unknown = parseResourceDocument(text).toJS();
  return value;
}

/**
 * Decodes a document that must be a mapping (a Kubernetes-style object).
 */
export function decodeYamlObject(text: string): Record<string, unknown> {
  const doc = parseResourceDocument(text);
  const value: unknown = doc.toJS();
  if (!isMap(doc.contents) || !isRecord(value)) {
    throw new ResourceDecodeError("document is not a mapping");
  }
  return value;
}
