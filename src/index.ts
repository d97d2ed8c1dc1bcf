/**
 * Resumable, integrity-verified object streaming for Google Cloud Storage.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createClientFromEnv } from 'gcs-stream-io';
 *
 * const client = await createClientFromEnv();
 *
 * const writer = await client.streaming().writeObject({ bucket: 'my-bucket', name: 'hello.txt' });
 * await writer.write('Hello, GCS!');
 * const { metadata } = await writer.close();
 *
 * const reader = await client.streaming().readObject({ bucket: 'my-bucket', object: 'hello.txt' });
 * console.log((await reader.readAll()).toString(), metadata?.generation);
 * ```
 *
 * @module gcs-stream-io
 */

// Client
export type { GcsClient } from "./client/index.js";
export {
  GcsClientImpl,
  GcsClientBuilder,
  clientBuilder,
  createClient,
  createClientFromEnv,
} from "./client/index.js";

// Configuration
export type { GcsConfig, GcpCredentials, ChecksumConfig } from "./config/index.js";
export {
  GcsConfigBuilder,
  configBuilder,
  resolveEndpoint,
  validateBucketName,
  validateObjectName,
  encodeObjectName,
  DEFAULT_CONFIG,
} from "./config/index.js";

// Credentials
export type { GcpAuthProvider } from "./credentials/index.js";
export {
  createAuthProvider,
  authorizationHeaders,
  StaticTokenAuthProvider,
  AnonymousAuthProvider,
  CallbackAuthProvider,
} from "./credentials/index.js";

// Errors
export type { GcsErrorOptions, GcsErrorResponse, HashMismatch } from "./error/index.js";
export {
  GcsError,
  ConfigurationError,
  AuthenticationError,
  ObjectError,
  BucketError,
  UploadError,
  DownloadError,
  NetworkError,
  ServerError,
  HashMismatchError,
  UsageError,
  isDataIntegrityError,
  toGcsError,
  parseGcsError,
} from "./error/index.js";

// Hashing
export type { HashValidator, HashValidationResult, Digest } from "./hashing/index.js";
export {
  NullHashValidator,
  DigestHashValidator,
  Crc32cHashValidator,
  Md5HashValidator,
  CompositeHashValidator,
  createHashValidator,
  createReadHashValidator,
  computeCrc32c,
  computeMd5,
  parseGoogHashHeader,
} from "./hashing/index.js";

// Uploads
export type {
  ResumableUploadSession,
  HttpResumableUploadSessionOptions,
  ObjectWriteStreamOptions,
  WriteStreamState,
} from "./upload/index.js";
export { HttpResumableUploadSession, ObjectWriteStream } from "./upload/index.js";

// Downloads
export type { ObjectReadSource, ObjectReadStreamOptions, ReadStreamState } from "./download/index.js";
export { HttpObjectReadSource, ObjectReadErrorSource, ObjectReadStream } from "./download/index.js";

// Services
export { StreamingService } from "./services/index.js";

// Logging
export type { Logger, LogLevel, LogConfig } from "./observability/logging.js";
export { ConsoleLogger, NoopLogger, createLogger } from "./observability/logging.js";

// Transport
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from "./transport/index.js";
export {
  UndiciTransport,
  isSuccess,
  getHeader,
  getRequestId,
  createTransport,
} from "./transport/index.js";

// Types
export * from "./types/index.js";

// Simulation
export type { RecordedCall, SimulatedStorageOptions } from "./simulation/index.js";
export { SimulatedStorageTransport, RecordingUploadSession, SIMULATED_ENDPOINT } from "./simulation/index.js";
