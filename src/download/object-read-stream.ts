/**
 * Buffered, hash-validated reader over an object read source.
 */

import {
  GcsError,
  HashMismatchError,
  UsageError,
  parseGcsError,
  toGcsError,
} from "../error/index.js";
import type { HashValidationResult, HashValidator } from "../hashing/index.js";
import { createHashValidator, createReadHashValidator } from "../hashing/index.js";
import { NoopLogger, type Logger } from "../observability/logging.js";
import { getRequestId } from "../transport/index.js";
import type { ReadObjectRequest } from "../types/requests.js";
import { ObjectReadErrorSource, ObjectReadSource } from "./object-read-source.js";

/**
 * Lifecycle of a read stream.
 */
export type ReadStreamState = "open" | "eof" | "error";

/**
 * Read stream options.
 */
export interface ObjectReadStreamOptions {
  /** Largest region requested from the source per refill (default: 64KB). */
  maxBufferSize?: number;
  /** Defaults to CRC32C plus MD5. */
  hashValidator?: HashValidator;
  logger?: Logger;
}

const DEFAULT_READ_BUFFER_SIZE = 64 * 1024;

/**
 * Reads an object region by region. Every byte delivered is fed to the hash
 * validator; reaching the end finishes it, and a mismatch is reported as a
 * `HashMismatchError` instead of end of stream.
 */
export class ObjectReadStream implements AsyncIterable<Buffer> {
  private readonly source: ObjectReadSource;
  private readonly maxBufferSize: number;
  private readonly validator: HashValidator;
  private readonly logger: Logger;

  private region: Buffer = Buffer.alloc(0);
  private position = 0;
  private refilling = false;
  private _state: ReadStreamState = "open";
  private _status?: GcsError;
  private _hashResult?: HashValidationResult;
  private readonly _headers: Record<string, string> = {};

  constructor(source: ObjectReadSource, options: ObjectReadStreamOptions = {}) {
    this.source = source;
    this.maxBufferSize = Math.max(1, options.maxBufferSize ?? DEFAULT_READ_BUFFER_SIZE);
    this.validator = options.hashValidator ?? createHashValidator({});
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Stream for a read that failed before it started. Reading it yields an
   * empty, validated object; `status` holds the error.
   */
  static fromError(
    request: ReadObjectRequest,
    error: GcsError,
    options: Omit<ObjectReadStreamOptions, "hashValidator"> = {}
  ): ObjectReadStream {
    const stream = new ObjectReadStream(new ObjectReadErrorSource(error), {
      ...options,
      hashValidator: createReadHashValidator(request),
    });
    stream._status = error;
    return stream;
  }

  get state(): ReadStreamState {
    return this._state;
  }

  /** Last error recorded by the stream, if any. */
  get status(): GcsError | undefined {
    return this._status;
  }

  /** Digest comparison, available at end of stream. */
  get hashResult(): HashValidationResult | undefined {
    return this._hashResult;
  }

  /** Response headers received so far. */
  get headers(): Readonly<Record<string, string>> {
    return this._headers;
  }

  isOpen(): boolean {
    return this.source.isOpen();
  }

  /**
   * Next byte without consuming it, or `null` at end of stream.
   */
  async peek(): Promise<number | null> {
    if (!(await this.fill())) {
      return null;
    }
    return this.region[this.position];
  }

  /**
   * Copy up to `target.length` bytes into `target`. Resolves with the number
   * of bytes copied, `0` at end of stream.
   */
  async read(target: Uint8Array): Promise<number> {
    if (target.length === 0 || !(await this.fill())) {
      return 0;
    }
    const count = Math.min(target.length, this.region.length - this.position);
    target.set(this.region.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  /**
   * Rest of the current region, or `null` at end of stream.
   */
  async readChunk(): Promise<Buffer | null> {
    if (!(await this.fill())) {
      return null;
    }
    const chunk = this.region.subarray(this.position);
    this.position = this.region.length;
    return chunk;
  }

  /**
   * Read everything that is left.
   */
  async readAll(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    let chunk = await this.readChunk();
    while (chunk !== null) {
      yield chunk;
      chunk = await this.readChunk();
    }
  }

  /**
   * Release the source. Unread bytes are discarded and no hash check is made.
   */
  async close(): Promise<void> {
    try {
      await this.source.close();
    } catch (error) {
      throw this.fail(error);
    }
    if (this._state === "open") {
      this._state = "eof";
      this.region = Buffer.alloc(0);
      this.position = 0;
    }
  }

  /**
   * Make sure unread bytes are available. Resolves to false at end of stream.
   */
  private async fill(): Promise<boolean> {
    if (this.position < this.region.length) {
      return true;
    }
    switch (this._state) {
      case "eof":
        return false;
      case "error":
        throw this._status ?? new UsageError("Read stream failed", "StreamClosed");
      case "open":
        break;
    }
    if (this.refilling) {
      throw new UsageError("Another read is in flight", "OperationInProgress");
    }

    this.refilling = true;
    try {
      const payload = await this.pull();
      if (payload.length > 0) {
        this.region = payload;
        this.position = 0;
        return true;
      }
      this.finishValidation();
      return false;
    } catch (error) {
      throw this.fail(error);
    } finally {
      this.refilling = false;
    }
  }

  private async pull(): Promise<Buffer> {
    // A source that never opened (missing or empty object) reads as empty.
    if (!this.source.isOpen()) {
      return Buffer.alloc(0);
    }

    const result = await this.source.read(this.maxBufferSize);
    for (const [name, value] of Object.entries(result.headers)) {
      this.validator.processHeader(name, value);
      this._headers[name] = value;
    }
    if (result.status >= 300) {
      throw parseGcsError(
        result.status,
        result.payload.toString("utf-8"),
        getRequestId({ headers: this._headers })
      );
    }

    if (result.payload.length > 0) {
      this.validator.update(result.payload);
    }
    return result.payload;
  }

  private finishValidation(): void {
    const result = this.validator.finish();
    this._hashResult = result;
    if (result.isMismatch) {
      this.logger.warn("Download hash mismatch", {
        computed: result.computed,
        received: result.received,
      });
      throw new HashMismatchError("Mismatched hashes in download", {
        computed: result.computed,
        received: result.received,
        mismatches: result.mismatches,
      });
    }
    this._state = "eof";
  }

  private fail(error: unknown): GcsError {
    const failure = toGcsError(error);
    this._status = failure;
    this._state = "error";
    return failure;
  }
}
