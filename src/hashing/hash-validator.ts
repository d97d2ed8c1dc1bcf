/**
 * Incremental hash validation over a byte stream.
 *
 * A validator is fed every byte that crosses the wire (in order), learns the
 * digest the other side advertises from response headers or object metadata, and
 * compares the two exactly once in `finish()`.
 */

import type { HashMismatch } from "../error/index.js";
import type { ObjectMetadata } from "../types/common.js";

/**
 * Outcome of a finished validator.
 */
export interface HashValidationResult {
  /** True if any configured check computed a value different from the one received. */
  isMismatch: boolean;
  computed: string;
  received: string;
  /** Every failing check, in priority order. */
  mismatches: HashMismatch[];
}

/**
 * Pluggable hash validator. Single use: `update`, `processHeader`, and
 * `processMetadata` may be called any number of times, then `finish` once.
 */
export interface HashValidator {
  /** Name used in logs and hash headers (`crc32c`, `md5`, ...). */
  readonly name: string;
  update(data: Uint8Array): void;
  processHeader(name: string, value: string): void;
  processMetadata(metadata: ObjectMetadata): void;
  finish(): HashValidationResult;
}

/**
 * Validator used when verification is disabled or meaningless.
 */
export class NullHashValidator implements HashValidator {
  readonly name = "null";

  update(_data: Uint8Array): void {}

  processHeader(_name: string, _value: string): void {}

  processMetadata(_metadata: ObjectMetadata): void {}

  finish(): HashValidationResult {
    return { isMismatch: false, computed: "", received: "", mismatches: [] };
  }
}

/**
 * Split an `x-goog-hash` header (`crc32c=AAAAAA==,md5=1B2M2Y8AsgTpgAmY7PhCfg==`).
 */
export function parseGoogHashHeader(value: string): Record<string, string> {
  const hashes: Record<string, string> = {};
  for (const part of value.split(",")) {
    const trimmed = part.trim();
    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;
    hashes[trimmed.slice(0, separator).toLowerCase()] = trimmed.slice(separator + 1);
  }
  return hashes;
}

/**
 * Format digests the way `x-goog-hash` does.
 */
export function formatGoogHashHeader(hashes: Record<string, string>): string {
  return Object.entries(hashes)
    .filter(([, value]) => value !== "")
    .map(([key, value]) => `${key}=${value}`)
    .join(",");
}
