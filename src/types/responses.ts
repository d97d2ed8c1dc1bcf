/**
 * Response types for GCS streaming operations.
 */

import { ObjectMetadata, isObjectMetadataJson, parseObjectMetadata } from "./common.js";
import { UploadError, parseGcsError } from "../error/index.js";
import { HttpResponse, getHeader, getRequestId } from "../transport/index.js";

/**
 * Status code GCS uses to report a resumable upload that is not finished yet.
 */
export const RESUME_INCOMPLETE = 308;

/**
 * Progress reported by a resumable upload session.
 */
export interface ResumableUploadResponse {
  /** New session URL, empty if the server did not reissue one. */
  uploadSessionUrl: string;
  /**
   * Last byte the server committed. `0` is overloaded: it also means nothing
   * has been committed yet.
   */
  lastCommittedByte: number;
  /** Raw response payload. */
  payload: string;
  /** Whether the upload has been finalized. */
  done: boolean;
  /** Object metadata, once the upload is finalized. */
  metadata?: ObjectMetadata;
}

/**
 * Session state needed to resume an upload later.
 */
export interface UploadSessionState {
  sessionId: string;
  nextExpectedByte: number;
}

/**
 * Headers, payload, and status of one read from an object read source.
 */
export interface ReadSourceResult {
  /** `100` while more data follows, the final HTTP status once drained. */
  status: number;
  headers: Record<string, string>;
  payload: Buffer;
}

/**
 * Parse `Range: bytes=0-N` into `N`.
 */
export function parseCommittedRange(range: string): number | undefined {
  const match = /^bytes=0-(\d+)$/.exec(range.trim());
  if (!match) {
    return undefined;
  }
  return parseInt(match[1], 10);
}

/**
 * Convert the response of a chunk upload or status query.
 */
export function parseResumableUploadResponse(response: HttpResponse): ResumableUploadResponse {
  const payload = response.body.toString("utf-8");

  if (response.status !== RESUME_INCOMPLETE && response.status >= 300) {
    throw parseGcsError(response.status, payload, getRequestId(response));
  }

  let lastCommittedByte = 0;
  const range = getHeader(response, "range");
  if (range !== undefined) {
    const parsed = parseCommittedRange(range);
    if (parsed === undefined) {
      throw new UploadError(`Cannot parse Range header "${range}"`, "InvalidResponse", {
        requestId: getRequestId(response),
        payload,
      });
    }
    lastCommittedByte = parsed;
  }

  const done = response.status !== RESUME_INCOMPLETE;
  let metadata: ObjectMetadata | undefined;
  if (done && payload.length > 0) {
    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      throw new UploadError("Upload completed with a non-JSON payload", "InvalidResponse", {
        requestId: getRequestId(response),
        payload,
      });
    }
    if (isObjectMetadataJson(json)) {
      metadata = parseObjectMetadata(json);
    }
  }

  return {
    uploadSessionUrl: getHeader(response, "location") ?? "",
    lastCommittedByte,
    payload,
    done,
    metadata,
  };
}
