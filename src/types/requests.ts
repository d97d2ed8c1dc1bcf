/**
 * Request types for GCS streaming operations.
 */

import { ConfigurationError } from "../error/index.js";
import { PredefinedAcl } from "./common.js";

/**
 * Upload chunks must be multiples of 256 KiB, except the final one.
 *
 * @see https://cloud.google.com/storage/docs/performing-resumable-uploads
 */
export const UPLOAD_CHUNK_QUANTUM = 256 * 1024;

/**
 * Round a buffer size up to the next multiple of the upload quantum
 * (never less than one quantum).
 */
export function roundUpToQuantum(size: number): number {
  if (size <= UPLOAD_CHUNK_QUANTUM) {
    return UPLOAD_CHUNK_QUANTUM;
  }
  return Math.ceil(size / UPLOAD_CHUNK_QUANTUM) * UPLOAD_CHUNK_QUANTUM;
}

/**
 * Checksum switches accepted by uploads and downloads.
 */
export interface ChecksumOptions {
  /** Skip CRC32C computation and verification. */
  disableCrc32cChecksum?: boolean;
  /** Skip MD5 computation and verification. */
  disableMd5Hash?: boolean;
}

/**
 * Request to start (or resume) a streaming upload.
 */
export interface WriteObjectRequest extends ChecksumOptions {
  /** Target bucket. */
  bucket: string;
  /** Object name (path). */
  name: string;
  /** Content type (MIME). */
  contentType?: string;
  /** Custom metadata. */
  metadata?: Record<string, string>;
  /** Total size if known in advance (sent as X-Upload-Content-Length). */
  totalSize?: number;
  /** CRC32C the server must verify on commit (base64). */
  crc32cChecksumValue?: string;
  /** MD5 the server must verify on commit (base64). */
  md5HashValue?: string;
  /** Predefined ACL. */
  predefinedAcl?: PredefinedAcl;
  /** Conditional: only if generation matches. */
  ifGenerationMatch?: string;
  /** Conditional: only if generation doesn't match. */
  ifGenerationNotMatch?: string;
  /** Conditional: only if metageneration matches. */
  ifMetagenerationMatch?: string;
  /** Resume a session persisted from an earlier attempt instead of creating one. */
  resumableSessionUrl?: string;
  /** Override the configured upload buffer size. */
  bufferSize?: number;
}

/**
 * Request to create a resumable upload session.
 */
export type CreateResumableUploadRequest = Omit<WriteObjectRequest, "resumableSessionUrl" | "bufferSize">;

/**
 * Byte range `[begin, end)` of an object.
 */
export interface ReadRange {
  begin: number;
  end: number;
}

/**
 * Request to read an object (`alt=media`).
 */
export interface ReadObjectRequest extends ChecksumOptions {
  /** Bucket name. */
  bucket: string;
  /** Object name (path). */
  object: string;
  /** Specific generation. */
  generation?: string;
  /** Conditional: only if generation matches. */
  ifGenerationMatch?: string;
  /** Conditional: only if generation doesn't match. */
  ifGenerationNotMatch?: string;
  /** Conditional: only if metageneration matches. */
  ifMetagenerationMatch?: string;
  /** Read only `[begin, end)`. */
  readRange?: ReadRange;
  /** Read from this offset to the end of the object. */
  readFromOffset?: number;
  /** Override the configured download buffer size. */
  bufferSize?: number;
}

/**
 * Whether a read asks for a subset of the object.
 */
export function requiresRangeHeader(request: ReadObjectRequest): boolean {
  return request.readRange !== undefined || (request.readFromOffset ?? 0) > 0;
}

/**
 * `Range` header for a partial read, or `undefined` for the full object.
 *
 * @throws {ConfigurationError} when the range selects no bytes.
 */
export function rangeHeader(request: ReadObjectRequest): string | undefined {
  if (request.readRange) {
    const begin = Math.max(request.readRange.begin, request.readFromOffset ?? 0);
    const { end } = request.readRange;
    if (begin < 0 || end <= begin) {
      throw new ConfigurationError(`Read range [${begin}, ${end}) is empty`, "InvalidConfig");
    }
    return `bytes=${begin}-${end - 1}`;
  }
  if (request.readFromOffset && request.readFromOffset > 0) {
    return `bytes=${request.readFromOffset}-`;
  }
  return undefined;
}

/**
 * One chunk sent to a resumable upload session.
 */
export interface UploadChunkRequest {
  /** Session URL the chunk is sent to. */
  sessionUrl: string;
  /** Offset of the first byte of `payload` in the object. */
  rangeBegin: number;
  payload: Buffer;
  /** Total object size; only present on the final chunk. */
  totalSize?: number;
}

/**
 * `Content-Range` header for an upload chunk.
 *
 * Non-final chunks leave the total open (`*`); the final chunk states it, and an
 * empty final chunk only states the total.
 */
export function contentRangeHeader(request: UploadChunkRequest): string {
  const total = request.totalSize === undefined ? "*" : String(request.totalSize);
  if (request.payload.length === 0) {
    return `bytes */${total}`;
  }
  const rangeEnd = request.rangeBegin + request.payload.length - 1;
  return `bytes ${request.rangeBegin}-${rangeEnd}/${total}`;
}

/**
 * `Content-Range` header of a status query: no data, unknown total.
 */
export const QUERY_CONTENT_RANGE = "bytes */*";
