/**
 * Resumable upload session over the GCS JSON API.
 *
 * @see https://cloud.google.com/storage/docs/performing-resumable-uploads
 */

import { UsageError } from "../error/index.js";
import { GcpAuthProvider, authorizationHeaders } from "../credentials/index.js";
import { NoopLogger, type Logger } from "../observability/logging.js";
import type { HttpTransport } from "../transport/index.js";
import {
  QUERY_CONTENT_RANGE,
  UPLOAD_CHUNK_QUANTUM,
  contentRangeHeader,
} from "../types/requests.js";
import { ResumableUploadResponse, parseResumableUploadResponse } from "../types/responses.js";
import { ResumableUploadSession, nextExpectedFromCommitted } from "./resumable-upload-session.js";

/**
 * Options for an HTTP-backed session.
 */
export interface HttpResumableUploadSessionOptions {
  transport: HttpTransport;
  authProvider: GcpAuthProvider;
  /** Session URL returned by the initiating POST (or persisted earlier). */
  sessionUrl: string;
  /** Commit point already known to the caller. */
  nextExpectedByte?: number;
  timeout?: number;
  logger?: Logger;
}

/**
 * `ResumableUploadSession` that PUTs chunks to the session URL.
 */
export class HttpResumableUploadSession implements ResumableUploadSession {
  private readonly transport: HttpTransport;
  private readonly authProvider: GcpAuthProvider;
  private readonly timeout?: number;
  private readonly logger: Logger;
  private sessionUrl: string;
  private nextExpected: number;
  private done = false;

  constructor(options: HttpResumableUploadSessionOptions) {
    this.transport = options.transport;
    this.authProvider = options.authProvider;
    this.sessionUrl = options.sessionUrl;
    this.nextExpected = options.nextExpectedByte ?? 0;
    this.timeout = options.timeout;
    this.logger = options.logger ?? new NoopLogger();
  }

  async uploadChunk(buffer: Buffer): Promise<ResumableUploadResponse> {
    this.ensureNotDone();
    if (buffer.length === 0 || buffer.length % UPLOAD_CHUNK_QUANTUM !== 0) {
      throw new UsageError(
        `Chunk size ${buffer.length} is not a positive multiple of ${UPLOAD_CHUNK_QUANTUM}`,
        "InvalidChunkSize"
      );
    }

    const contentRange = contentRangeHeader({
      sessionUrl: this.sessionUrl,
      rangeBegin: this.nextExpected,
      payload: buffer,
    });
    return this.put(buffer, contentRange);
  }

  async uploadFinalChunk(buffer: Buffer, totalSize: number): Promise<ResumableUploadResponse> {
    this.ensureNotDone();
    const contentRange = contentRangeHeader({
      sessionUrl: this.sessionUrl,
      rangeBegin: this.nextExpected,
      payload: buffer,
      totalSize,
    });
    return this.put(buffer, contentRange);
  }

  async resetSession(): Promise<ResumableUploadResponse> {
    return this.put(Buffer.alloc(0), QUERY_CONTENT_RANGE);
  }

  nextExpectedByte(): number {
    return this.nextExpected;
  }

  sessionId(): string {
    return this.sessionUrl;
  }

  isDone(): boolean {
    return this.done;
  }

  private async put(body: Buffer, contentRange: string): Promise<ResumableUploadResponse> {
    const headers: Record<string, string> = {
      ...(await authorizationHeaders(this.authProvider)),
      "Content-Length": String(body.length),
      "Content-Range": contentRange,
    };

    this.logger.debug("Uploading to resumable session", {
      session: this.sessionUrl,
      contentRange,
    });

    const response = await this.transport.send({
      method: "PUT",
      url: this.sessionUrl,
      headers,
      body,
      timeout: this.timeout,
    });
    const result = parseResumableUploadResponse(response);

    this.nextExpected = nextExpectedFromCommitted(result.lastCommittedByte);
    if (result.uploadSessionUrl !== "") {
      this.sessionUrl = result.uploadSessionUrl;
    }
    this.done = result.done;

    this.logger.debug("Resumable session updated", {
      session: this.sessionUrl,
      status: response.status,
      nextExpectedByte: this.nextExpected,
      done: result.done,
    });
    return result;
  }

  private ensureNotDone(): void {
    if (this.done) {
      throw new UsageError("Resumable upload session is already finalized", "SessionClosed");
    }
  }
}
