/**
 * HTTP Transport Layer
 *
 * The storage streams only need `send` (buffered) and `sendStreaming` (media
 * downloads); connection pooling and TLS belong to undici.
 */

import { request, errors } from "undici";
import type { Readable } from "node:stream";
import { NetworkError } from "../error/index.js";

/**
 * HTTP methods used by the storage protocols.
 */
export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer | string;
  timeout?: number;
}

/**
 * HTTP response: the normalized envelope of every buffered interaction.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * HTTP response whose body is consumed incrementally.
 */
export interface StreamingHttpResponse {
  status: number;
  headers: Record<string, string>;
  stream: AsyncIterable<Buffer>;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request and buffer the response body.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Send an HTTP request and expose the response body as a stream.
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;
}

/**
 * Check if response indicates success.
 */
export function isSuccess(response: { status: number }): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: { headers: Record<string, string> }, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Get request ID from response.
 */
export function getRequestId(response: { headers: Record<string, string> }): string | undefined {
  return getHeader(response, "x-guploader-uploadid") ?? getHeader(response, "x-goog-request-id");
}

/**
 * Collect a streamed body into a single buffer.
 */
export async function collectBody(stream: AsyncIterable<Buffer>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Flatten undici's header map; repeated headers (e.g. `x-goog-hash`) are joined with ",".
 */
export function normalizeHeaders(
  raw: Record<string, string | string[] | undefined>
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(",") : value;
  }
  return headers;
}

async function* readChunks(body: Readable): AsyncGenerator<Buffer> {
  try {
    for await (const chunk of body) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    }
  } finally {
    body.destroy();
  }
}

/**
 * Map a failure thrown by undici to a `NetworkError`.
 */
export function mapTransportError(error: unknown, timeout: number): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }
  if (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError
  ) {
    return new NetworkError(`Request timeout after ${timeout}ms`, "Timeout");
  }
  if (error instanceof Error) {
    if (error.message.includes("ENOTFOUND") || error.message.includes("EAI_AGAIN")) {
      return new NetworkError(`DNS resolution failed: ${error.message}`, "DnsResolutionFailed");
    }
    if (error.message.includes("ECONNREFUSED") || error.message.includes("ECONNRESET")) {
      return new NetworkError(`Connection failed: ${error.message}`, "ConnectionFailed");
    }
    if (error.message.includes("TLS") || error.message.includes("SSL") || error.message.includes("certificate")) {
      return new NetworkError(`TLS error: ${error.message}`, "TlsError");
    }
    return new NetworkError(error.message, "ConnectionFailed");
  }
  return new NetworkError(String(error), "ConnectionFailed");
}

/**
 * undici-based HTTP transport.
 */
export class UndiciTransport implements HttpTransport {
  private defaultTimeout: number;

  constructor(defaultTimeout: number = 30000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const response = await this.sendStreaming(req);
    const timeout = req.timeout ?? this.defaultTimeout;
    try {
      const body = await collectBody(response.stream);
      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      throw mapTransportError(error, timeout);
    }
  }

  async sendStreaming(req: HttpRequest): Promise<StreamingHttpResponse> {
    const timeout = req.timeout ?? this.defaultTimeout;

    try {
      const response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        stream: readChunks(response.body),
      };
    } catch (error) {
      throw mapTransportError(error, timeout);
    }
  }
}

/**
 * Create the default transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new UndiciTransport(timeout);
}
