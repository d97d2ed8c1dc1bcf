/**
 * Scripted resumable upload session.
 */

import { GcsError, UsageError } from "../error/index.js";
import { computeCrc32c, computeMd5 } from "../hashing/index.js";
import { StorageClass, type ObjectMetadata } from "../types/common.js";
import { UPLOAD_CHUNK_QUANTUM } from "../types/requests.js";
import type { ResumableUploadResponse } from "../types/responses.js";
import { ResumableUploadSession, nextExpectedFromCommitted } from "../upload/resumable-upload-session.js";

/**
 * A call received by a `RecordingUploadSession`.
 */
export type RecordedCall =
  | { kind: "chunk"; offset: number; size: number }
  | { kind: "final"; offset: number; size: number; totalSize: number }
  | { kind: "reset" };

/**
 * Options for a `RecordingUploadSession`.
 */
export interface RecordingUploadSessionOptions {
  sessionUrl?: string;
  /** Commit point the session starts from. */
  nextExpectedByte?: number;
  bucket?: string;
  name?: string;
  /** Digests to report instead of those of the received bytes. */
  reportedHashes?: { crc32c?: string; md5Hash?: string };
  /** Finish without object metadata in the final response. */
  omitMetadata?: boolean;
}

/**
 * In-memory `ResumableUploadSession` that records every call and the bytes it
 * received. Failures and short commits can be scripted.
 */
export class RecordingUploadSession implements ResumableUploadSession {
  readonly calls: RecordedCall[] = [];
  private readonly chunks: Buffer[] = [];
  private readonly failures: GcsError[] = [];
  private readonly options: RecordingUploadSessionOptions;
  private url: string;
  private next: number;
  private done = false;
  private shortCommit = 0;

  constructor(options: RecordingUploadSessionOptions = {}) {
    this.options = options;
    this.url = options.sessionUrl ?? "https://storage.test/upload/session-1";
    this.next = options.nextExpectedByte ?? 0;
  }

  /**
   * Reject the next call with `error`. Queued errors are used in order.
   */
  failNext(error: GcsError): this {
    this.failures.push(error);
    return this;
  }

  /**
   * Commit `bytes` fewer bytes than sent on the next chunk. The rest is
   * dropped, as a server would.
   */
  commitShortNext(bytes: number): this {
    this.shortCommit = bytes;
    return this;
  }

  /** Every byte the session committed, in order. */
  received(): Buffer {
    return Buffer.concat(this.chunks);
  }

  /** Sizes of the non-final chunks. */
  chunkSizes(): number[] {
    return this.calls.flatMap((call) => (call.kind === "chunk" ? [call.size] : []));
  }

  async uploadChunk(buffer: Buffer): Promise<ResumableUploadResponse> {
    const offset = this.next;
    this.calls.push({ kind: "chunk", offset, size: buffer.length });
    this.takeFailure();
    if (buffer.length === 0 || buffer.length % UPLOAD_CHUNK_QUANTUM !== 0) {
      throw new UsageError(`Unaligned chunk of ${buffer.length} bytes`, "InvalidChunkSize");
    }

    const kept = Math.max(0, buffer.length - this.shortCommit);
    this.shortCommit = 0;
    this.chunks.push(Buffer.from(buffer.subarray(0, kept)));
    const committed = offset + kept;
    return this.update({
      uploadSessionUrl: "",
      lastCommittedByte: committed - 1,
      payload: "",
      done: false,
    });
  }

  async uploadFinalChunk(buffer: Buffer, totalSize: number): Promise<ResumableUploadResponse> {
    this.calls.push({ kind: "final", offset: this.next, size: buffer.length, totalSize });
    this.takeFailure();

    this.chunks.push(Buffer.from(buffer));
    const metadata = this.options.omitMetadata ? undefined : this.metadataFor(totalSize);
    return this.update({
      uploadSessionUrl: "",
      lastCommittedByte: totalSize > 0 ? totalSize - 1 : 0,
      payload: metadata ? JSON.stringify({ name: metadata.name, bucket: metadata.bucket }) : "",
      done: true,
      metadata,
    });
  }

  async resetSession(): Promise<ResumableUploadResponse> {
    this.calls.push({ kind: "reset" });
    this.takeFailure();
    return this.update({
      uploadSessionUrl: "",
      lastCommittedByte: this.next > 0 ? this.next - 1 : 0,
      payload: "",
      done: this.done,
    });
  }

  nextExpectedByte(): number {
    return this.next;
  }

  sessionId(): string {
    return this.url;
  }

  isDone(): boolean {
    return this.done;
  }

  private update(response: ResumableUploadResponse): ResumableUploadResponse {
    this.next = nextExpectedFromCommitted(response.lastCommittedByte);
    if (response.uploadSessionUrl !== "") {
      this.url = response.uploadSessionUrl;
    }
    this.done = response.done;
    return response;
  }

  private takeFailure(): void {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }

  private metadataFor(totalSize: number): ObjectMetadata {
    const data = this.received();
    return {
      name: this.options.name ?? "object",
      bucket: this.options.bucket ?? "bucket",
      generation: "1",
      metageneration: "1",
      contentType: "application/octet-stream",
      size: totalSize,
      crc32c: this.options.reportedHashes?.crc32c ?? computeCrc32c(data),
      md5Hash: this.options.reportedHashes?.md5Hash ?? computeMd5(data),
      etag: "etag-1",
      storageClass: StorageClass.Standard,
      metadata: {},
    };
  }
}
