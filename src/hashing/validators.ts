/**
 * CRC32C, MD5, and composite hash validators.
 */

import { createHash } from "crypto";
import { Crc32c } from "@aws-crypto/crc32c";
import { UsageError } from "../error/index.js";
import type { ObjectMetadata } from "../types/common.js";
import {
  HashValidator,
  HashValidationResult,
  formatGoogHashHeader,
  parseGoogHashHeader,
} from "./hash-validator.js";

/**
 * Running digest behind a `DigestHashValidator`.
 */
export interface Digest {
  /** Key used in `x-goog-hash` headers. */
  readonly algorithm: "crc32c" | "md5";
  update(data: Uint8Array): void;
  /** Base64 digest, as GCS reports it. */
  digest(): string;
  /** Expected value carried by object metadata. */
  fromMetadata(metadata: ObjectMetadata): string | undefined;
}

/**
 * CRC32C (Castagnoli), encoded as the base64 of its big-endian 32-bit value.
 */
export function crc32cDigest(): Digest {
  const crc = new Crc32c();
  return {
    algorithm: "crc32c",
    update: (data) => {
      crc.update(data);
    },
    digest: () => {
      const encoded = Buffer.alloc(4);
      encoded.writeUInt32BE(crc.digest() >>> 0, 0);
      return encoded.toString("base64");
    },
    fromMetadata: (metadata) => metadata.crc32c,
  };
}

/**
 * MD5, base64 encoded.
 */
export function md5Digest(): Digest {
  const hash = createHash("md5");
  return {
    algorithm: "md5",
    update: (data) => {
      hash.update(data);
    },
    digest: () => hash.digest("base64"),
    fromMetadata: (metadata) => metadata.md5Hash,
  };
}

/**
 * Validator for a single digest. A missing received value is not a mismatch.
 */
export class DigestHashValidator implements HashValidator {
  readonly name: string;
  private received = "";
  private finished = false;

  constructor(private readonly digest: Digest) {
    this.name = digest.algorithm;
  }

  update(data: Uint8Array): void {
    this.ensureActive("update");
    this.digest.update(data);
  }

  processHeader(name: string, value: string): void {
    if (name.toLowerCase() !== "x-goog-hash") return;
    const advertised = parseGoogHashHeader(value)[this.digest.algorithm];
    if (advertised) {
      this.received = advertised;
    }
  }

  processMetadata(metadata: ObjectMetadata): void {
    const expected = this.digest.fromMetadata(metadata);
    if (expected) {
      this.received = expected;
    }
  }

  finish(): HashValidationResult {
    this.ensureActive("finish");
    this.finished = true;

    const computed = this.digest.digest();
    const isMismatch = this.received !== "" && this.received !== computed;
    return {
      isMismatch,
      computed,
      received: this.received,
      mismatches: isMismatch
        ? [{ algorithm: this.digest.algorithm, computed, received: this.received }]
        : [],
    };
  }

  private ensureActive(operation: string): void {
    if (this.finished) {
      throw new UsageError(
        `${this.name} hash validator used after finish() (${operation})`,
        "ValidatorFinished"
      );
    }
  }
}

/**
 * CRC32C validator.
 */
export class Crc32cHashValidator extends DigestHashValidator {
  constructor() {
    super(crc32cDigest());
  }
}

/**
 * MD5 validator.
 */
export class Md5HashValidator extends DigestHashValidator {
  constructor() {
    super(md5Digest());
  }
}

/**
 * Runs several validators over the same bytes.
 *
 * Checks are reported in the order given (CRC32C before MD5 by default): the
 * first mismatching pair becomes `computed`/`received`, every failure is listed
 * in `mismatches`.
 */
export class CompositeHashValidator implements HashValidator {
  readonly name: string;

  constructor(private readonly validators: HashValidator[]) {
    this.name = validators.map((v) => v.name).join("+");
  }

  update(data: Uint8Array): void {
    for (const validator of this.validators) {
      validator.update(data);
    }
  }

  processHeader(name: string, value: string): void {
    for (const validator of this.validators) {
      validator.processHeader(name, value);
    }
  }

  processMetadata(metadata: ObjectMetadata): void {
    for (const validator of this.validators) {
      validator.processMetadata(metadata);
    }
  }

  finish(): HashValidationResult {
    const results = this.validators.map((validator) => ({
      name: validator.name,
      result: validator.finish(),
    }));

    const mismatches = results.flatMap(({ result }) => result.mismatches);
    const first = results.find(({ result }) => result.isMismatch);
    if (first) {
      return {
        isMismatch: true,
        computed: first.result.computed,
        received: first.result.received,
        mismatches,
      };
    }

    return {
      isMismatch: false,
      computed: formatGoogHashHeader(
        Object.fromEntries(results.map(({ name, result }) => [name, result.computed]))
      ),
      received: formatGoogHashHeader(
        Object.fromEntries(results.map(({ name, result }) => [name, result.received]))
      ),
      mismatches,
    };
  }
}
