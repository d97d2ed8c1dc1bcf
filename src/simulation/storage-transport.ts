/**
 * In-process GCS stand-in for tests: the resumable upload protocol and
 * media downloads, with fault injection.
 */

import { computeCrc32c, computeMd5, formatGoogHashHeader } from "../hashing/index.js";
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from "../transport/index.js";
import { getHeader } from "../transport/index.js";
import { RESUME_INCOMPLETE } from "../types/responses.js";

/**
 * Base URL the simulated server answers on.
 */
export const SIMULATED_ENDPOINT = "https://storage.test";

interface StoredObject {
  bucket: string;
  name: string;
  data: Buffer;
  generation: number;
  contentType: string;
  metadata: Record<string, string>;
  crc32c: string;
  md5Hash: string;
  created: Date;
}

interface UploadSessionRecord {
  id: string;
  bucket: string;
  name: string;
  contentType: string;
  metadata: Record<string, string>;
  expectedCrc32c?: string;
  expectedMd5?: string;
  committed: Buffer;
  object?: StoredObject;
}

interface InjectedFailure {
  status: number;
  message: string;
}

/**
 * Simulated storage transport options.
 */
export interface SimulatedStorageOptions {
  /** Size of the pieces a download body is streamed in. */
  downloadChunkSize?: number;
}

function jsonResponse(status: number, json: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json; charset=UTF-8", ...headers },
    body: Buffer.from(JSON.stringify(json), "utf-8"),
  };
}

function errorResponse(status: number, message: string, reason?: string): HttpResponse {
  return jsonResponse(status, {
    error: {
      code: status,
      message,
      errors: reason ? [{ domain: "global", reason, message }] : undefined,
    },
  });
}

function toBuffer(body: Buffer | string | undefined): Buffer {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  return typeof body === "string" ? Buffer.from(body, "utf-8") : body;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === "string")
  );
}

function stringField(json: Record<string, unknown>, key: string): string | undefined {
  const value = json[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * `HttpTransport` that behaves like the GCS upload and media endpoints.
 */
export class SimulatedStorageTransport implements HttpTransport {
  /** Every request received, in order. */
  readonly requests: HttpRequest[] = [];

  private readonly objects = new Map<string, StoredObject>();
  private readonly sessions = new Map<string, UploadSessionRecord>();
  private readonly failures: InjectedFailure[] = [];
  private readonly downloadChunkSize: number;
  private nextSessionId = 1;
  private nextGeneration = 1;
  private shortCommitBytes = 0;
  private reissueSessionUrl = false;

  constructor(options: SimulatedStorageOptions = {}) {
    this.downloadChunkSize = options.downloadChunkSize ?? 64 * 1024;
  }

  /**
   * Store an object directly.
   */
  putObject(bucket: string, name: string, data: Buffer | string, contentType = "application/octet-stream"): this {
    this.store(bucket, name, toBuffer(data), contentType, {});
    return this;
  }

  /**
   * Stored bytes of an object, if it exists.
   */
  getObject(bucket: string, name: string): Buffer | undefined {
    return this.objects.get(this.key(bucket, name))?.data;
  }

  /**
   * Flip a byte of a stored object while keeping its recorded digests.
   */
  corruptObject(bucket: string, name: string, offset = 0): this {
    const stored = this.objects.get(this.key(bucket, name));
    if (stored && offset < stored.data.length) {
      const data = Buffer.from(stored.data);
      data[offset] = data[offset] ^ 0xff;
      stored.data = data;
    }
    return this;
  }

  /**
   * Answer the next `count` requests with `status`.
   */
  failNext(count: number, status = 503, message = "Service temporarily unavailable"): this {
    for (let i = 0; i < count; i++) {
      this.failures.push({ status, message });
    }
    return this;
  }

  /**
   * Commit `bytes` fewer than received on the next data chunk.
   */
  commitShortNext(bytes: number): this {
    this.shortCommitBytes = bytes;
    return this;
  }

  /**
   * Hand out a new session URL (via `Location`) on the next chunk response.
   */
  reissueSessionUrlNext(): this {
    this.reissueSessionUrl = true;
    return this;
  }

  /**
   * Bytes committed so far by an upload session, by session URL.
   */
  committedBytes(sessionUrl: string): number | undefined {
    const id = new URL(sessionUrl).searchParams.get("upload_id");
    return id ? this.sessions.get(id)?.committed.length : undefined;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const failure = this.failures.shift();
    if (failure) {
      return errorResponse(failure.status, failure.message);
    }

    const url = new URL(request.url);
    if (request.method === "POST" && url.searchParams.get("uploadType") === "resumable") {
      return this.startSession(url, request);
    }
    if (request.method === "PUT" && url.searchParams.has("upload_id")) {
      return this.putChunk(url, request);
    }
    if (request.method === "GET" && url.searchParams.get("alt") === "media") {
      return this.download(url, request);
    }
    return errorResponse(400, `Unsupported request ${request.method} ${url.pathname}`, "invalid");
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.send(request);
    return {
      status: response.status,
      headers: response.headers,
      stream: this.chunked(response.body),
    };
  }

  private async *chunked(body: Buffer): AsyncGenerator<Buffer> {
    for (let offset = 0; offset < body.length; offset += this.downloadChunkSize) {
      yield body.subarray(offset, offset + this.downloadChunkSize);
    }
  }

  private startSession(url: URL, request: HttpRequest): HttpResponse {
    const bucket = this.bucketFromPath(url.pathname, "/upload/storage/v1/b/");
    const name = url.searchParams.get("name");
    if (!bucket || !name) {
      return errorResponse(400, "Missing bucket or object name", "required");
    }

    const ifGenerationMatch = url.searchParams.get("ifGenerationMatch");
    if (ifGenerationMatch !== null) {
      const existing = this.objects.get(this.key(bucket, name));
      const generation = existing ? String(existing.generation) : "0";
      if (generation !== ifGenerationMatch) {
        return errorResponse(412, "Precondition Failed", "conditionNotMet");
      }
    }

    let json: Record<string, unknown> = {};
    const body = toBuffer(request.body);
    if (body.length > 0) {
      const parsed: unknown = JSON.parse(body.toString("utf-8"));
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        json = Object.fromEntries(Object.entries(parsed));
      }
    }

    const id = `session-${this.nextSessionId++}`;
    this.sessions.set(id, {
      id,
      bucket,
      name,
      contentType: getHeader(request, "x-upload-content-type") ?? "application/octet-stream",
      metadata: isStringRecord(json.metadata) ? json.metadata : {},
      expectedCrc32c: stringField(json, "crc32c"),
      expectedMd5: stringField(json, "md5Hash"),
      committed: Buffer.alloc(0),
    });

    return {
      status: 200,
      headers: { location: this.sessionUrl(bucket, id) },
      body: Buffer.alloc(0),
    };
  }

  private putChunk(url: URL, request: HttpRequest): HttpResponse {
    const session = this.sessions.get(url.searchParams.get("upload_id") ?? "");
    if (!session) {
      return errorResponse(404, "No such upload session", "notFound");
    }
    if (session.object) {
      return jsonResponse(200, this.resource(session.object));
    }

    const contentRange = getHeader(request, "content-range") ?? "";
    const match = /^bytes (\*|(\d+)-(\d+))\/(\*|\d+)$/.exec(contentRange);
    if (!match) {
      return errorResponse(400, `Invalid Content-Range "${contentRange}"`, "invalid");
    }

    const body = toBuffer(request.body);
    const total = match[4] === "*" ? undefined : parseInt(match[4], 10);

    if (match[2] !== undefined) {
      const begin = parseInt(match[2], 10);
      const end = parseInt(match[3], 10);
      if (end - begin + 1 !== body.length) {
        return errorResponse(400, "Content-Range does not match the payload size", "invalid");
      }
      if (begin > session.committed.length) {
        return errorResponse(400, `Chunk starts at ${begin}, expected ${session.committed.length}`, "invalid");
      }

      // Bytes the server already has are skipped.
      let fresh = body.subarray(session.committed.length - begin);
      if (this.shortCommitBytes > 0 && total === undefined) {
        fresh = fresh.subarray(0, Math.max(0, fresh.length - this.shortCommitBytes));
        this.shortCommitBytes = 0;
      }
      session.committed = Buffer.concat([session.committed, fresh]);
    }

    if (total !== undefined) {
      if (session.committed.length !== total) {
        return errorResponse(
          400,
          `Upload declared ${total} bytes but ${session.committed.length} were received`,
          "invalid"
        );
      }
      return this.finalize(session);
    }

    const headers: Record<string, string> = {};
    if (session.committed.length > 0) {
      headers.range = `bytes=0-${session.committed.length - 1}`;
    }
    if (this.reissueSessionUrl) {
      this.reissueSessionUrl = false;
      const id = `${session.id}-r`;
      this.sessions.set(id, session);
      session.id = id;
      headers.location = this.sessionUrl(session.bucket, id);
    }
    return { status: RESUME_INCOMPLETE, headers, body: Buffer.alloc(0) };
  }

  private finalize(session: UploadSessionRecord): HttpResponse {
    const data = session.committed;
    const crc32c = computeCrc32c(data);
    const md5Hash = computeMd5(data);

    if (
      (session.expectedCrc32c !== undefined && session.expectedCrc32c !== crc32c) ||
      (session.expectedMd5 !== undefined && session.expectedMd5 !== md5Hash)
    ) {
      return errorResponse(400, "Provided checksum does not match the uploaded data", "invalid");
    }

    session.object = this.store(session.bucket, session.name, data, session.contentType, session.metadata);
    return jsonResponse(200, this.resource(session.object), {
      "x-goog-hash": formatGoogHashHeader({ crc32c, md5: md5Hash }),
    });
  }

  private download(url: URL, request: HttpRequest): HttpResponse {
    const prefix = "/storage/v1/b/";
    if (!url.pathname.startsWith(prefix)) {
      return errorResponse(400, "Invalid download path", "invalid");
    }
    const [bucket, , ...nameParts] = url.pathname.slice(prefix.length).split("/");
    const name = decodeURIComponent(nameParts.join("/"));
    const stored = this.objects.get(this.key(decodeURIComponent(bucket), name));
    if (!stored) {
      return errorResponse(404, `No such object: ${bucket}/${name}`, "notFound");
    }

    const generation = url.searchParams.get("generation") ?? url.searchParams.get("ifGenerationMatch");
    if (generation !== null && generation !== String(stored.generation)) {
      return url.searchParams.has("generation")
        ? errorResponse(404, `No such object: ${bucket}/${name}#${generation}`, "notFound")
        : errorResponse(412, "Precondition Failed", "conditionNotMet");
    }

    const headers: Record<string, string> = {
      "content-type": stored.contentType,
      "x-goog-generation": String(stored.generation),
      "x-goog-hash": formatGoogHashHeader({ crc32c: stored.crc32c, md5: stored.md5Hash }),
    };

    const range = getHeader(request, "range");
    if (range === undefined) {
      headers["content-length"] = String(stored.data.length);
      return { status: 200, headers, body: stored.data };
    }

    const match = /^bytes=(\d+)-(\d*)$/.exec(range);
    if (!match) {
      return errorResponse(400, `Invalid Range "${range}"`, "invalid");
    }
    const begin = parseInt(match[1], 10);
    const last = match[2] === "" ? stored.data.length - 1 : Math.min(parseInt(match[2], 10), stored.data.length - 1);
    if (begin >= stored.data.length || last < begin) {
      return errorResponse(416, "Requested range not satisfiable", "requestedRangeNotSatisfiable");
    }

    const body = stored.data.subarray(begin, last + 1);
    headers["content-length"] = String(body.length);
    headers["content-range"] = `bytes ${begin}-${last}/${stored.data.length}`;
    return { status: 206, headers, body };
  }

  private store(
    bucket: string,
    name: string,
    data: Buffer,
    contentType: string,
    metadata: Record<string, string>
  ): StoredObject {
    const stored: StoredObject = {
      bucket,
      name,
      data,
      generation: this.nextGeneration++,
      contentType,
      metadata,
      crc32c: computeCrc32c(data),
      md5Hash: computeMd5(data),
      created: new Date(),
    };
    this.objects.set(this.key(bucket, name), stored);
    return stored;
  }

  private resource(stored: StoredObject): Record<string, unknown> {
    return {
      kind: "storage#object",
      name: stored.name,
      bucket: stored.bucket,
      generation: String(stored.generation),
      metageneration: "1",
      contentType: stored.contentType,
      size: String(stored.data.length),
      md5Hash: stored.md5Hash,
      crc32c: stored.crc32c,
      etag: `etag-${stored.generation}`,
      timeCreated: stored.created.toISOString(),
      updated: stored.created.toISOString(),
      storageClass: "STANDARD",
      metadata: stored.metadata,
    };
  }

  private bucketFromPath(pathname: string, prefix: string): string | undefined {
    if (!pathname.startsWith(prefix)) {
      return undefined;
    }
    const [bucket, collection] = pathname.slice(prefix.length).split("/");
    return collection === "o" && bucket ? decodeURIComponent(bucket) : undefined;
  }

  private sessionUrl(bucket: string, id: string): string {
    return `${SIMULATED_ENDPOINT}/upload/storage/v1/b/${encodeURIComponent(bucket)}/o?uploadType=resumable&upload_id=${id}`;
  }

  private key(bucket: string, name: string): string {
    return `${bucket}/${name}`;
  }
}
