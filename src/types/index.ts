/**
 * Types module re-exports.
 */

export type { ObjectMetadata } from "./common.js";
export {
  StorageClass,
  PredefinedAcl,
  parseStorageClass,
  parseDate,
  parseObjectMetadata,
  isObjectMetadataJson,
} from "./common.js";

export type {
  ChecksumOptions,
  WriteObjectRequest,
  CreateResumableUploadRequest,
  ReadRange,
  ReadObjectRequest,
  UploadChunkRequest,
} from "./requests.js";
export {
  UPLOAD_CHUNK_QUANTUM,
  QUERY_CONTENT_RANGE,
  roundUpToQuantum,
  requiresRangeHeader,
  rangeHeader,
  contentRangeHeader,
} from "./requests.js";

export type { ResumableUploadResponse, UploadSessionState, ReadSourceResult } from "./responses.js";
export { RESUME_INCOMPLETE, parseCommittedRange, parseResumableUploadResponse } from "./responses.js";
