/**
 * Resumable upload session: the server-side upload as seen by one writer.
 */

import type { ResumableUploadResponse } from "../types/responses.js";

/**
 * A resumable upload session.
 *
 * Every call is awaited before the next one is issued. On success the session
 * advances `nextExpectedByte()` from the server's commit point; on failure its
 * state is left unchanged.
 */
export interface ResumableUploadSession {
  /**
   * Upload a non-final chunk. Its length must be a positive multiple of
   * `UPLOAD_CHUNK_QUANTUM`.
   */
  uploadChunk(buffer: Buffer): Promise<ResumableUploadResponse>;

  /**
   * Upload the last (possibly empty) chunk and finalize the object.
   */
  uploadFinalChunk(buffer: Buffer, totalSize: number): Promise<ResumableUploadResponse>;

  /**
   * Ask the server how much it has committed, without sending data.
   */
  resetSession(): Promise<ResumableUploadResponse>;

  /** Offset of the next byte the server expects. */
  nextExpectedByte(): number;

  /** Session URL, used to resume the upload later. */
  sessionId(): string;

  /** Whether the object has been finalized. */
  isDone(): boolean;
}

/**
 * Offset the server expects next, given its last committed byte.
 *
 * `Range: bytes=0-0` and a missing header both decode to `0`, so a single
 * committed byte is indistinguishable from none.
 */
export function nextExpectedFromCommitted(lastCommittedByte: number): number {
  return lastCommittedByte === 0 ? 0 : lastCommittedByte + 1;
}
