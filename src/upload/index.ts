/**
 * Resumable uploads.
 */

export type { ResumableUploadSession } from "./resumable-upload-session.js";
export { nextExpectedFromCommitted } from "./resumable-upload-session.js";
export type { HttpResumableUploadSessionOptions } from "./http-resumable-upload-session.js";
export { HttpResumableUploadSession } from "./http-resumable-upload-session.js";
export type { ObjectWriteStreamOptions, WriteStreamState } from "./object-write-stream.js";
export { ObjectWriteStream } from "./object-write-stream.js";
