/**
 * Buffered writer on top of a resumable upload session.
 */

import { GcsError, HashMismatchError, UploadError, UsageError, toGcsError } from "../error/index.js";
import type { HashValidationResult, HashValidator } from "../hashing/index.js";
import { NullHashValidator, createHashValidator } from "../hashing/index.js";
import { NoopLogger, type Logger } from "../observability/logging.js";
import { UPLOAD_CHUNK_QUANTUM, roundUpToQuantum } from "../types/requests.js";
import type { ResumableUploadResponse, UploadSessionState } from "../types/responses.js";
import type { ResumableUploadSession } from "./resumable-upload-session.js";

/**
 * Lifecycle of a write stream. `flushing` is held while a call is in flight.
 */
export type WriteStreamState = "open" | "flushing" | "closed" | "failed";

/**
 * Write stream options.
 */
export interface ObjectWriteStreamOptions {
  /** Bytes buffered before a chunk is sent; rounded up to the upload quantum. */
  maxBufferSize?: number;
  /** Defaults to CRC32C plus MD5. */
  hashValidator?: HashValidator;
  logger?: Logger;
}

/**
 * Accumulates written bytes and sends them to the session in quantum-aligned
 * chunks. `close()` sends whatever remains as the final chunk and verifies the
 * object's digests against everything written.
 *
 * One caller at a time: each call must settle before the next one starts.
 */
export class ObjectWriteStream {
  private readonly session: ResumableUploadSession;
  private readonly maxBufferSize: number;
  private readonly validator: HashValidator;
  private readonly logger: Logger;

  private readonly pending: Buffer;
  private pendingLength = 0;
  // Leading pending bytes already fed to the validator; non-zero after a short commit.
  private hashedLength = 0;
  private _state: WriteStreamState = "open";
  private _lastResponse?: ResumableUploadResponse;
  private _hashResult?: HashValidationResult;
  private closeResponse?: ResumableUploadResponse;
  private failure?: GcsError;

  constructor(session: ResumableUploadSession, options: ObjectWriteStreamOptions = {}) {
    this.session = session;
    this.maxBufferSize = roundUpToQuantum(options.maxBufferSize ?? UPLOAD_CHUNK_QUANTUM);
    this.validator = options.hashValidator ?? createHashValidator({});
    this.logger = options.logger ?? new NoopLogger();
    this.pending = Buffer.alloc(this.maxBufferSize);
  }

  /**
   * Stream over a session whose object was already finalized, as found when
   * restoring a session after an earlier writer closed it. `close()` resolves
   * with `response` and nothing is sent.
   */
  static finalized(
    session: ResumableUploadSession,
    response: ResumableUploadResponse,
    options: Omit<ObjectWriteStreamOptions, "hashValidator"> = {}
  ): ObjectWriteStream {
    const stream = new ObjectWriteStream(session, { ...options, hashValidator: new NullHashValidator() });
    stream._lastResponse = response;
    stream._hashResult = stream.validator.finish();
    stream.closeResponse = response;
    stream._state = "closed";
    return stream;
  }

  get state(): WriteStreamState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === "open";
  }

  get sessionId(): string {
    return this.session.sessionId();
  }

  get nextExpectedByte(): number {
    return this.session.nextExpectedByte();
  }

  /** Bytes written but not yet handed to the session. */
  get pendingBytes(): number {
    return this.pendingLength;
  }

  /** Response of the most recent session call, if any. */
  get lastResponse(): ResumableUploadResponse | undefined {
    return this._lastResponse;
  }

  /** Digest comparison, available once the stream has been closed. */
  get hashResult(): HashValidationResult | undefined {
    return this._hashResult;
  }

  /** Capacity of the pending buffer. */
  get bufferSize(): number {
    return this.maxBufferSize;
  }

  /**
   * Append bytes. Every time the buffer fills up, exactly `bufferSize` bytes are
   * uploaded, so the chunks sent do not depend on how the data was split
   * across calls. Resolves with the number of bytes accepted.
   */
  async write(data: Uint8Array | string): Promise<number> {
    this.begin("write");
    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data;

    try {
      let offset = 0;
      while (offset < bytes.length) {
        const count = Math.min(bytes.length - offset, this.maxBufferSize - this.pendingLength);
        this.pending.set(bytes.subarray(offset, offset + count), this.pendingLength);
        this.pendingLength += count;
        offset += count;

        if (this.pendingLength === this.maxBufferSize) {
          await this.uploadPending(this.maxBufferSize);
        }
      }
    } catch (error) {
      throw this.fail(error);
    }

    this._state = "open";
    return bytes.length;
  }

  /**
   * Upload every complete quantum currently buffered. With less than one
   * quantum pending nothing is sent and the last response is returned.
   */
  async flush(): Promise<ResumableUploadResponse | undefined> {
    this.begin("flush");

    try {
      const count = Math.floor(this.pendingLength / UPLOAD_CHUNK_QUANTUM) * UPLOAD_CHUNK_QUANTUM;
      if (count > 0) {
        await this.uploadPending(count);
      }
    } catch (error) {
      throw this.fail(error);
    }

    this._state = "open";
    return this._lastResponse;
  }

  /**
   * Send the remaining bytes as the final chunk and verify the object's
   * digests. Calling it again returns the same response.
   */
  async close(): Promise<ResumableUploadResponse> {
    if (this._state === "closed") {
      if (this.closeResponse) {
        return this.closeResponse;
      }
      throw new UsageError("Write stream was suspended", "StreamClosed");
    }
    this.begin("close");

    let response: ResumableUploadResponse;
    let result: HashValidationResult;
    try {
      const remainder = Buffer.from(this.pending.subarray(0, this.pendingLength));
      const totalSize = this.session.nextExpectedByte() + remainder.length;

      this.hashPending(remainder.length);
      response = await this.session.uploadFinalChunk(remainder, totalSize);
      this._lastResponse = response;
      this.pendingLength = 0;
      this.hashedLength = 0;

      if (response.metadata) {
        this.validator.processMetadata(response.metadata);
      }
      result = this.validator.finish();
      this._hashResult = result;
    } catch (error) {
      throw this.fail(error);
    }

    if (result.isMismatch) {
      this.logger.warn("Upload hash mismatch", {
        session: this.session.sessionId(),
        computed: result.computed,
        received: result.received,
      });
      throw this.fail(
        new HashMismatchError("Mismatched hashes in upload", {
          computed: result.computed,
          received: result.received,
          mismatches: result.mismatches,
        })
      );
    }

    this.closeResponse = response;
    this._state = "closed";
    this.logger.debug("Upload stream closed", {
      session: this.session.sessionId(),
      done: response.done,
    });
    return response;
  }

  /**
   * Stop using the stream without finalizing the object. Buffered bytes are
   * dropped; the returned state says where a restored session resumes.
   */
  suspend(): UploadSessionState {
    if (this._state === "flushing") {
      throw new UsageError("Cannot suspend while an upload is in flight", "OperationInProgress");
    }
    if (this._state === "open") {
      this._state = "closed";
      this.pendingLength = 0;
      this.hashedLength = 0;
    }
    return {
      sessionId: this.session.sessionId(),
      nextExpectedByte: this.session.nextExpectedByte(),
    };
  }

  private begin(operation: string): void {
    switch (this._state) {
      case "failed":
        throw this.failure ?? new UsageError("Write stream failed", "StreamClosed");
      case "closed":
        throw new UsageError(`Cannot ${operation} a closed write stream`, "StreamClosed");
      case "flushing":
        throw new UsageError(
          `Cannot ${operation} while another operation is in flight`,
          "OperationInProgress"
        );
      case "open":
        this._state = "flushing";
    }
  }

  private async uploadPending(count: number): Promise<void> {
    const chunk = Buffer.from(this.pending.subarray(0, count));
    const begin = this.session.nextExpectedByte();

    this.hashPending(count);
    const response = await this.session.uploadChunk(chunk);
    this._lastResponse = response;

    const committed = this.session.nextExpectedByte() - begin;
    if (committed <= 0 || committed > count) {
      throw new UploadError(
        `Server committed ${committed} of ${count} bytes sent at offset ${begin}`,
        committed === 0 ? "ChunkFailed" : "InvalidResponse",
        { offset: begin }
      );
    }
    if (committed < count) {
      this.logger.warn("Server committed fewer bytes than were sent, re-sending the rest", {
        session: this.session.sessionId(),
        sent: count,
        committed,
      });
    }

    // Uncommitted bytes stay at the front of the buffer and go out with the next chunk.
    this.pending.copyWithin(0, committed, this.pendingLength);
    this.pendingLength -= committed;
    this.hashedLength -= committed;
  }

  private hashPending(count: number): void {
    if (count > this.hashedLength) {
      this.validator.update(this.pending.subarray(this.hashedLength, count));
      this.hashedLength = count;
    }
  }

  private fail(error: unknown): GcsError {
    const failure = toGcsError(error);
    this.failure = failure;
    this._state = "failed";
    return failure;
  }
}
