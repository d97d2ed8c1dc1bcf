/**
 * Sources of object bytes for read streams.
 */

import { DownloadError, GcsError } from "../error/index.js";
import { HttpResponse, StreamingHttpResponse, collectBody } from "../transport/index.js";
import type { ReadSourceResult } from "../types/responses.js";

/**
 * Status reported while a source still has bytes to deliver.
 */
export const CONTINUE_STATUS = 100;

/**
 * Pull-based source of object bytes.
 */
export interface ObjectReadSource {
  /** False once drained or closed, and for sources that never opened. */
  isOpen(): boolean;

  /**
   * Read up to `maxBytes`. Resolves with status `100` while data flows and
   * with the final response status (and an empty payload) once drained.
   */
  read(maxBytes: number): Promise<ReadSourceResult>;

  /** Release the underlying response. */
  close(): Promise<HttpResponse>;
}

/**
 * Read source backed by a streaming HTTP response.
 *
 * The first result carries the response headers. Error responses (status
 * 300 and above) are delivered in one result holding the whole body.
 */
export class HttpObjectReadSource implements ObjectReadSource {
  private readonly iterator: AsyncIterator<Buffer>;
  private leftover: Buffer = Buffer.alloc(0);
  private headersDelivered = false;
  private open = true;

  constructor(private readonly response: StreamingHttpResponse) {
    this.iterator = response.stream[Symbol.asyncIterator]();
  }

  isOpen(): boolean {
    return this.open;
  }

  async read(maxBytes: number): Promise<ReadSourceResult> {
    if (!this.open) {
      return { status: this.response.status, headers: {}, payload: Buffer.alloc(0) };
    }

    if (this.response.status >= 300) {
      const body = await collectBody({ [Symbol.asyncIterator]: () => this.iterator });
      this.open = false;
      return { status: this.response.status, headers: this.takeHeaders(), payload: body };
    }

    while (this.leftover.length === 0) {
      const next = await this.nextChunk();
      if (next === undefined) {
        this.open = false;
        return {
          status: this.response.status,
          headers: this.takeHeaders(),
          payload: Buffer.alloc(0),
        };
      }
      this.leftover = next;
    }

    const payload = this.leftover.subarray(0, maxBytes);
    this.leftover = this.leftover.subarray(payload.length);
    return { status: CONTINUE_STATUS, headers: this.takeHeaders(), payload };
  }

  async close(): Promise<HttpResponse> {
    if (this.open) {
      this.open = false;
      this.leftover = Buffer.alloc(0);
      await this.iterator.return?.();
    }
    return { status: this.response.status, headers: this.response.headers, body: Buffer.alloc(0) };
  }

  private async nextChunk(): Promise<Buffer | undefined> {
    try {
      const next = await this.iterator.next();
      return next.done ? undefined : next.value;
    } catch (error) {
      this.open = false;
      if (error instanceof GcsError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new DownloadError(`Download interrupted: ${message}`, "StreamInterrupted");
    }
  }

  private takeHeaders(): Record<string, string> {
    if (this.headersDelivered) {
      return {};
    }
    this.headersDelivered = true;
    return this.response.headers;
  }
}

/**
 * Source of a read that never started; `read` rejects with the stored error.
 */
export class ObjectReadErrorSource implements ObjectReadSource {
  constructor(readonly error: GcsError) {}

  isOpen(): boolean {
    return false;
  }

  async read(): Promise<ReadSourceResult> {
    throw this.error;
  }

  async close(): Promise<HttpResponse> {
    return {
      status: this.error.statusCode ?? 0,
      headers: {},
      body: Buffer.from(this.error.message, "utf-8"),
    };
  }
}
