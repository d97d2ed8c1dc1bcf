/**
 * Streaming Service
 *
 * Resumable uploads and streaming downloads over the GCS JSON API.
 */

import {
  GcsConfig,
  resolveEndpoint,
  encodeObjectName,
  validateBucketName,
  validateObjectName,
} from "../config/index.js";
import { UploadError, parseGcsError } from "../error/index.js";
import { GcpAuthProvider, authorizationHeaders } from "../credentials/index.js";
import { HttpTransport, collectBody, getHeader, getRequestId, isSuccess } from "../transport/index.js";
import { HashValidator, NullHashValidator, createHashValidator, createReadHashValidator } from "../hashing/index.js";
import { NoopLogger, type Logger } from "../observability/logging.js";
import { HttpResumableUploadSession, ObjectWriteStream } from "../upload/index.js";
import { HttpObjectReadSource, ObjectReadStream } from "../download/index.js";
import {
  ChecksumOptions,
  CreateResumableUploadRequest,
  ReadObjectRequest,
  WriteObjectRequest,
  rangeHeader,
  requiresRangeHeader,
} from "../types/requests.js";
import type { ObjectMetadata } from "../types/common.js";
import type { ResumableUploadResponse } from "../types/responses.js";

/**
 * Streaming service for GCS streaming operations.
 */
export class StreamingService {
  private config: GcsConfig;
  private transport: HttpTransport;
  private authProvider: GcpAuthProvider;
  private logger: Logger;

  constructor(config: GcsConfig, transport: HttpTransport, authProvider: GcpAuthProvider, logger?: Logger) {
    this.config = config;
    this.transport = transport;
    this.authProvider = authProvider;
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Create a resumable upload session.
   */
  async createResumableSession(request: CreateResumableUploadRequest): Promise<HttpResumableUploadSession> {
    validateBucketName(request.bucket);
    validateObjectName(request.name);

    const endpoint = resolveEndpoint(this.config);
    const params = new URLSearchParams({
      uploadType: "resumable",
      name: request.name,
    });
    if (request.ifGenerationMatch) {
      params.set("ifGenerationMatch", request.ifGenerationMatch);
    }
    if (request.ifGenerationNotMatch) {
      params.set("ifGenerationNotMatch", request.ifGenerationNotMatch);
    }
    if (request.ifMetagenerationMatch) {
      params.set("ifMetagenerationMatch", request.ifMetagenerationMatch);
    }
    if (request.predefinedAcl) {
      params.set("predefinedAcl", request.predefinedAcl);
    }

    const url = `${endpoint}/upload/storage/v1/b/${encodeURIComponent(request.bucket)}/o?${params.toString()}`;

    const body: Record<string, unknown> = {
      name: request.name,
    };
    if (request.contentType) {
      body.contentType = request.contentType;
    }
    if (request.metadata) {
      body.metadata = request.metadata;
    }
    if (request.crc32cChecksumValue) {
      body.crc32c = request.crc32cChecksumValue;
    }
    if (request.md5HashValue) {
      body.md5Hash = request.md5HashValue;
    }

    const headers: Record<string, string> = {
      ...(await authorizationHeaders(this.authProvider)),
      "Content-Type": "application/json; charset=UTF-8",
      "X-Upload-Content-Type": request.contentType ?? "application/octet-stream",
    };
    if (request.totalSize !== undefined) {
      headers["X-Upload-Content-Length"] = String(request.totalSize);
    }

    const response = await this.transport.send({
      method: "POST",
      url,
      headers,
      body: JSON.stringify(body),
      timeout: this.config.timeout,
    });

    if (!isSuccess(response)) {
      throw parseGcsError(response.status, response.body.toString(), getRequestId(response));
    }

    const sessionUrl = getHeader(response, "location");
    if (!sessionUrl) {
      throw new UploadError("No Location header in resumable upload response", "InitiationFailed", {
        requestId: getRequestId(response),
        statusCode: response.status,
      });
    }

    this.logger.info("Resumable upload session created", {
      bucket: request.bucket,
      object: request.name,
      session: sessionUrl,
    });

    return this.sessionFor(sessionUrl);
  }

  /**
   * Reattach to a session persisted earlier and recover its commit point.
   */
  async restoreResumableSession(sessionUrl: string): Promise<HttpResumableUploadSession> {
    const { session } = await this.restore(sessionUrl);
    return session;
  }

  /**
   * Open a write stream on a new session, or on `request.resumableSessionUrl`.
   */
  async writeObject(request: WriteObjectRequest): Promise<ObjectWriteStream> {
    let session: HttpResumableUploadSession;
    let hashValidator: HashValidator;

    if (request.resumableSessionUrl) {
      const restored = await this.restore(request.resumableSessionUrl);
      session = restored.session;
      if (session.isDone()) {
        return ObjectWriteStream.finalized(session, restored.response, { logger: this.logger });
      }
      // Bytes committed by an earlier writer were never seen by this one.
      hashValidator =
        session.nextExpectedByte() > 0
          ? new NullHashValidator()
          : createHashValidator(this.checksumOptions(request));
    } else {
      session = await this.createResumableSession(request);
      hashValidator = createHashValidator(this.checksumOptions(request));
    }

    return new ObjectWriteStream(session, {
      maxBufferSize: request.bufferSize ?? this.config.uploadBufferSize,
      hashValidator,
      logger: this.logger,
    });
  }

  private async restore(
    sessionUrl: string
  ): Promise<{ session: HttpResumableUploadSession; response: ResumableUploadResponse }> {
    const session = this.sessionFor(sessionUrl);
    const response = await session.resetSession();

    this.logger.info("Resumable upload session restored", {
      session: session.sessionId(),
      nextExpectedByte: session.nextExpectedByte(),
      done: session.isDone(),
    });
    return { session, response };
  }

  /**
   * Open a read stream over an object (or a range of it).
   */
  async readObject(request: ReadObjectRequest): Promise<ObjectReadStream> {
    validateBucketName(request.bucket);
    validateObjectName(request.object);

    const endpoint = resolveEndpoint(this.config);
    const encodedName = encodeObjectName(request.object);

    const params = new URLSearchParams({
      alt: "media",
    });
    if (request.generation) {
      params.set("generation", request.generation);
    }
    if (request.ifGenerationMatch) {
      params.set("ifGenerationMatch", request.ifGenerationMatch);
    }
    if (request.ifGenerationNotMatch) {
      params.set("ifGenerationNotMatch", request.ifGenerationNotMatch);
    }
    if (request.ifMetagenerationMatch) {
      params.set("ifMetagenerationMatch", request.ifMetagenerationMatch);
    }

    const url = `${endpoint}/storage/v1/b/${encodeURIComponent(request.bucket)}/o/${encodedName}?${params.toString()}`;

    const headers: Record<string, string> = {
      ...(await authorizationHeaders(this.authProvider)),
    };
    const range = rangeHeader(request);
    if (range) {
      headers.Range = range;
    }

    const response = await this.transport.sendStreaming({
      method: "GET",
      url,
      headers,
      timeout: this.config.timeout,
    });

    const options = {
      maxBufferSize: request.bufferSize ?? this.config.downloadBufferSize,
      logger: this.logger,
    };

    if (response.status >= 300) {
      const body = (await collectBody(response.stream)).toString();
      const error = parseGcsError(response.status, body, getRequestId(response));

      // An empty range of an existing object reads as an empty object.
      if (response.status === 416 && requiresRangeHeader(request)) {
        this.logger.debug("Range not satisfiable, returning an empty stream", {
          bucket: request.bucket,
          object: request.object,
          range,
        });
        return ObjectReadStream.fromError(request, error, options);
      }
      throw error;
    }

    return new ObjectReadStream(new HttpObjectReadSource(response), {
      ...options,
      hashValidator: createReadHashValidator({ ...request, ...this.checksumOptions(request) }),
    });
  }

  /**
   * Upload everything an async iterable yields and return the new object.
   */
  async uploadStream(
    request: WriteObjectRequest,
    source: AsyncIterable<Buffer | Uint8Array | string>
  ): Promise<ObjectMetadata> {
    const stream = await this.writeObject(request);
    for await (const chunk of source) {
      await stream.write(chunk);
    }

    const response = await stream.close();
    if (!response.metadata) {
      throw new UploadError("Upload completed without object metadata", "InvalidResponse", {
        payload: response.payload,
      });
    }
    return response.metadata;
  }

  /**
   * Download as an async stream of buffers.
   */
  async *downloadStream(request: ReadObjectRequest): AsyncGenerator<Buffer> {
    const stream = await this.readObject(request);
    try {
      yield* stream;
    } finally {
      if (stream.isOpen()) {
        await stream.close();
      }
    }
  }

  /**
   * Download an object (or range) into memory.
   */
  async downloadToBuffer(request: ReadObjectRequest): Promise<Buffer> {
    const stream = await this.readObject(request);
    return stream.readAll();
  }

  private sessionFor(sessionUrl: string): HttpResumableUploadSession {
    return new HttpResumableUploadSession({
      transport: this.transport,
      authProvider: this.authProvider,
      sessionUrl,
      timeout: this.config.timeout,
      logger: this.logger,
    });
  }

  private checksumOptions(request: ChecksumOptions): ChecksumOptions {
    return {
      disableCrc32cChecksum: request.disableCrc32cChecksum ?? !this.config.checksums.crc32c,
      disableMd5Hash: request.disableMd5Hash ?? !this.config.checksums.md5,
    };
  }
}
