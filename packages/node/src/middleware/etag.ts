/**
 * ETag utilities for account and report responses.
 *
 * ETags are derived from the canonical JSON of the returned entity, so
 * two reads of an unchanged account carry the same tag.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";
import { canonicalize } from "json-canonicalize";

/**
 * Compute an ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const hash = createHash("sha256").update(canonicalize(obj)).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

/**
 * Set ETag header on the response for the given entity.
 */
export function setETag(c: Context, entity: unknown): void {
  c.header("ETag", computeETag(entity));
}
