import { createHash } from "crypto";

/**
 * Recursively sorts the keys of an object, including nested objects.
 * This is the core of canonical serialization.
 */
function sortKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  const sorted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (nested !== undefined) {
      sorted[key] = sortKeys(nested);
    }
  }
  return sorted;
}

/**
 * Canonically serializes a value: sorted keys, no whitespace, undefined
 * properties dropped.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * Canonical UTF-8 bytes of a value. These are the bytes that get signed.
 */
export function canonicalBytes(value: unknown): Uint8Array {
  return Buffer.from(canonicalize(value), 'utf8');
}

/**
 * SHA-256 hex digest of the canonical form of a value.
 */
export function calculateChecksum(value: unknown): string {
  return createHash("sha256").update(canonicalize(value), "utf8").digest("hex");
}

/**
 * SHA-256 hex digest of raw bytes.
 */
export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}
