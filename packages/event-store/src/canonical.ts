/**
 * @lanekeeper/event-store — Canonical JSON.
 *
 * RFC 8785 (JCS) serialization: sorted keys, no insignificant whitespace.
 * The same event always serializes to the same bytes, which makes
 * byte-level comparison and content hashing meaningful.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON for any JSON-compatible value.
 *
 * Properties whose value is undefined are dropped first, as JSON.stringify
 * would drop them.
 */
export function toCanonicalJson(value: unknown): string {
  const plain: unknown = JSON.parse(JSON.stringify(value));
  return canonicalize(plain);
}

/** SHA-256 (hex) of the canonical JSON form. */
export function canonicalHash(value: unknown): string {
  return createHash("sha256").update(toCanonicalJson(value)).digest("hex");
}
