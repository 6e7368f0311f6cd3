/**
 * ChangeDetector - Content-based change classification
 *
 * Compares the fingerprint observed in this run with the one stored by the
 * previous run. Metadata (timestamps, permissions) never takes part.
 *
 * @module change_detector
 */

import { createHash } from "crypto";

/**
 * - `new`: no fingerprint stored for the path
 * - `changed`: stored fingerprint differs
 * - `unchanged`: stored fingerprint is identical
 */
export type ChangeKind = "new" | "changed" | "unchanged";

export function classifyChange(previous: string | undefined, current: string): ChangeKind {
  if (previous === undefined) return "new";
  return previous === current ? "unchanged" : "changed";
}

export function isChanged(kind: ChangeKind): boolean {
  return kind !== "unchanged";
}

/**
 * Hex MD5 of the full content. Identical bytes give identical fingerprints
 * regardless of path.
 */
export function computeFingerprint(data: Buffer | string): string {
  return createHash("md5").update(data).digest("hex");
}

/** Digest of zero-length content. */
export const EMPTY_FINGERPRINT = computeFingerprint("");
