/**
 * GCS Error Types
 *
 * Every fallible operation in this package rejects with a subclass of `GcsError`.
 * Data-integrity failures (`HashMismatchError`) are kept apart from transport and
 * protocol failures so callers can re-transfer instead of merely retrying a call.
 */

import { z } from "zod";

/**
 * Options shared by all GCS errors.
 */
export interface GcsErrorOptions {
  requestId?: string;
  retryable?: boolean;
  statusCode?: number;
  /** Response payload, kept for diagnostics. */
  payload?: string;
}

/**
 * Base GCS error class.
 */
export class GcsError extends Error {
  public readonly code: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;
  public readonly payload?: string;
  private readonly _statusCode?: number;

  constructor(message: string, code: string, options?: GcsErrorOptions) {
    super(message);
    this.name = "GcsError";
    this.code = code;
    this.requestId = options?.requestId;
    this.retryable = options?.retryable ?? false;
    this.payload = options?.payload;
    this._statusCode = options?.statusCode;
    Object.setPrototypeOf(this, GcsError.prototype);
  }

  /**
   * HTTP status code if applicable.
   */
  get statusCode(): number | undefined {
    return this._statusCode;
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends GcsError {
  constructor(
    message: string,
    code:
      | "InvalidBucketName"
      | "InvalidObjectName"
      | "InvalidCredentials"
      | "InvalidConfig" = "InvalidConfig"
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Authentication error.
 */
export class AuthenticationError extends GcsError {
  constructor(
    message: string,
    code: "TokenExpired" | "PermissionDenied" | "InvalidCredentials" = "InvalidCredentials",
    options?: Omit<GcsErrorOptions, "retryable">
  ) {
    super(message, `Authentication.${code}`, {
      ...options,
      retryable: code === "TokenExpired",
    });
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Object operation error.
 */
export class ObjectError extends GcsError {
  constructor(
    message: string,
    code: "NotFound" | "PreconditionFailed" | "TooLarge",
    options?: Omit<GcsErrorOptions, "retryable">
  ) {
    super(message, `Object.${code}`, options);
    this.name = "ObjectError";
    Object.setPrototypeOf(this, ObjectError.prototype);
  }
}

/**
 * Bucket operation error.
 */
export class BucketError extends GcsError {
  constructor(
    message: string,
    code: "NotFound" | "AccessDenied",
    options?: Omit<GcsErrorOptions, "retryable">
  ) {
    super(message, `Bucket.${code}`, options);
    this.name = "BucketError";
    Object.setPrototypeOf(this, BucketError.prototype);
  }
}

/**
 * Resumable upload protocol error.
 */
export class UploadError extends GcsError {
  public readonly offset?: number;

  constructor(
    message: string,
    code: "InitiationFailed" | "ChunkFailed" | "SessionExpired" | "InvalidResponse",
    options?: GcsErrorOptions & { offset?: number }
  ) {
    super(message, `Upload.${code}`, {
      ...options,
      retryable: options?.retryable ?? code === "ChunkFailed",
    });
    this.name = "UploadError";
    this.offset = options?.offset;
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * Download error.
 */
export class DownloadError extends GcsError {
  constructor(
    message: string,
    code: "RangeNotSatisfiable" | "StreamInterrupted",
    options?: GcsErrorOptions
  ) {
    super(message, `Download.${code}`, {
      ...options,
      retryable: options?.retryable ?? code === "StreamInterrupted",
    });
    this.name = "DownloadError";
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

/**
 * Network/transport error.
 */
export class NetworkError extends GcsError {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed" | "TlsError",
    options?: { retryable?: boolean }
  ) {
    super(message, `Network.${code}`, {
      retryable: options?.retryable ?? code !== "TlsError",
    });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Server-side error.
 */
export class ServerError extends GcsError {
  constructor(
    message: string,
    code: "InternalError" | "ServiceUnavailable" | "RateLimited",
    options?: Omit<GcsErrorOptions, "retryable">
  ) {
    super(message, `Server.${code}`, { ...options, retryable: true });
    this.name = "ServerError";
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

/**
 * One failing checksum of a hash validation.
 */
export interface HashMismatch {
  algorithm: string;
  computed: string;
  received: string;
}

/**
 * Data-integrity error: the bytes transferred do not match the digests advertised
 * by the other side. Never retryable at the call level.
 */
export class HashMismatchError extends GcsError {
  public readonly computed: string;
  public readonly received: string;
  public readonly mismatches: HashMismatch[];

  constructor(
    message: string,
    details: { computed: string; received: string; mismatches?: HashMismatch[] }
  ) {
    super(
      `${message}, computed=${details.computed}, received=${details.received}`,
      "DataIntegrity.HashMismatch"
    );
    this.name = "HashMismatchError";
    this.computed = details.computed;
    this.received = details.received;
    this.mismatches = details.mismatches ?? [];
    Object.setPrototypeOf(this, HashMismatchError.prototype);
  }
}

/**
 * Programmer error: an operation was invoked in a state that does not allow it.
 */
export class UsageError extends GcsError {
  constructor(
    message: string,
    code: "StreamClosed" | "OperationInProgress" | "InvalidChunkSize" | "ValidatorFinished" | "SessionClosed"
  ) {
    super(message, `Usage.${code}`);
    this.name = "UsageError";
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Whether an error reports corrupted data rather than a failed call.
 */
export function isDataIntegrityError(error: unknown): error is HashMismatchError {
  return error instanceof HashMismatchError;
}

/**
 * Normalize anything thrown by a collaborator into a `GcsError`.
 */
export function toGcsError(error: unknown): GcsError {
  if (error instanceof GcsError) {
    return error;
  }
  if (error instanceof Error) {
    return new GcsError(error.message, "Unknown");
  }
  return new GcsError(String(error), "Unknown");
}

const gcsErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z
      .array(
        z.object({
          domain: z.string().optional(),
          reason: z.string().optional(),
          message: z.string().optional(),
        })
      )
      .optional(),
  }),
});

/**
 * GCS error response from JSON.
 */
export type GcsErrorResponse = z.infer<typeof gcsErrorResponseSchema>["error"];

function parseErrorBody(body: string): GcsErrorResponse | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    // Body is not JSON, use status code to determine error type
    return undefined;
  }
  const parsed = gcsErrorResponseSchema.safeParse(json);
  return parsed.success ? parsed.data.error : undefined;
}

/**
 * Parse GCS error from HTTP response.
 */
export function parseGcsError(status: number, body: string, requestId?: string): GcsError {
  const errorResponse = parseErrorBody(body);
  const message = errorResponse?.message ?? (body ? `HTTP ${status}: ${body}` : `HTTP ${status}`);
  const reason = errorResponse?.errors?.[0]?.reason;
  const options = { requestId, statusCode: status, payload: body };

  switch (status) {
    case 400:
      return new GcsError(message, "InvalidArgument", options);

    case 401:
      return new AuthenticationError(message, "TokenExpired", options);

    case 403:
      if (reason === "forbidden") {
        return new AuthenticationError(message, "PermissionDenied", options);
      }
      return new BucketError(message, "AccessDenied", options);

    case 404:
      if (reason === "notFound" || reason === undefined) {
        return new ObjectError(message, "NotFound", options);
      }
      return new BucketError(message, "NotFound", options);

    case 408:
      return new NetworkError(message, "Timeout");

    case 410:
      return new UploadError(message, "SessionExpired", { ...options, retryable: false });

    case 412:
      return new ObjectError(message, "PreconditionFailed", options);

    case 413:
      return new ObjectError(message, "TooLarge", options);

    case 416:
      return new DownloadError(message, "RangeNotSatisfiable", options);

    case 429:
      return new ServerError(message, "RateLimited", options);

    case 503:
      return new ServerError(message, "ServiceUnavailable", options);

    default:
      if (status >= 500) {
        return new ServerError(message, "InternalError", options);
      }
      return new GcsError(message, `HTTP_${status}`, options);
  }
}
