// Request canonicalization for the response cache
import { createHash } from "crypto";
import type { CanonicalRequest } from "./canonical.js";

/**
 * JSON with object keys sorted at every level. `undefined` members are left out,
 * as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
}

/**
 * The parts of a request that decide its response. Metadata is request-scoped and the
 * stream flag only changes delivery, so neither takes part.
 */
export function canonicalizeRequest(req: CanonicalRequest): string {
  const { metadata: _metadata, stream: _stream, ...relevant } = req;
  return stableStringify(relevant);
}

/** `<namespace>:<sha256 hex>`; the namespace is hashed too so tenants never share a digest */
export function cacheKey(req: CanonicalRequest, namespace: string): string {
  const digest = createHash("sha256").update(namespace).update("\n").update(canonicalizeRequest(req)).digest("hex");
  return `${namespace}:${digest}`;
}
