/**
 * Hash validation for uploads and downloads.
 */

import type { ChecksumOptions, ReadObjectRequest } from "../types/requests.js";
import { requiresRangeHeader } from "../types/requests.js";
import type { HashValidator } from "./hash-validator.js";
import { NullHashValidator } from "./hash-validator.js";
import {
  CompositeHashValidator,
  Crc32cHashValidator,
  Md5HashValidator,
  crc32cDigest,
  md5Digest,
} from "./validators.js";

export type { HashValidator, HashValidationResult } from "./hash-validator.js";
export { NullHashValidator, parseGoogHashHeader, formatGoogHashHeader } from "./hash-validator.js";
export type { Digest } from "./validators.js";
export {
  CompositeHashValidator,
  Crc32cHashValidator,
  DigestHashValidator,
  Md5HashValidator,
  crc32cDigest,
  md5Digest,
} from "./validators.js";

/**
 * Create the validator selected by the request's checksum switches.
 */
export function createHashValidator(options: ChecksumOptions): HashValidator {
  const validators: HashValidator[] = [];
  if (!options.disableCrc32cChecksum) {
    validators.push(new Crc32cHashValidator());
  }
  if (!options.disableMd5Hash) {
    validators.push(new Md5HashValidator());
  }

  if (validators.length === 0) {
    return new NullHashValidator();
  }
  if (validators.length === 1) {
    return validators[0];
  }
  return new CompositeHashValidator(validators);
}

/**
 * Validator for a download. Partial reads cannot be checked against
 * whole-object digests.
 */
export function createReadHashValidator(request: ReadObjectRequest): HashValidator {
  if (requiresRangeHeader(request)) {
    return new NullHashValidator();
  }
  return createHashValidator(request);
}

/**
 * Compute the base64 CRC32C of a buffer.
 */
export function computeCrc32c(data: Uint8Array): string {
  const digest = crc32cDigest();
  digest.update(data);
  return digest.digest();
}

/**
 * Compute the base64 MD5 of a buffer.
 */
export function computeMd5(data: Uint8Array): string {
  const digest = md5Digest();
  digest.update(data);
  return digest.digest();
}
