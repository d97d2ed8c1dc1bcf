/**
 * GCS Configuration Module
 */

import { ConfigurationError } from "../error/index.js";
import { isLogLevel, type LogLevel } from "../observability/logging.js";
import { roundUpToQuantum } from "../types/requests.js";

/**
 * GCP credentials type.
 */
export type GcpCredentials =
  | { type: "access_token"; token: string }
  | { type: "token_callback"; fetchToken: () => Promise<string> }
  | { type: "anonymous" };

/**
 * Checksums computed and verified by default.
 */
export interface ChecksumConfig {
  crc32c: boolean;
  md5: boolean;
}

/**
 * GCS client configuration.
 */
export interface GcsConfig {
  /** GCP credentials. */
  credentials?: GcpCredentials;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Bytes buffered before a chunk is sent; always a multiple of 256 KiB. */
  uploadBufferSize: number;
  /** Largest region handed out by a read stream (default: 64KB). */
  downloadBufferSize: number;
  /** Custom API endpoint (for emulators). */
  apiEndpoint?: string;
  /** Checksums verified on uploads and full-object downloads. */
  checksums: ChecksumConfig;
  /** Minimum level logged by the default logger. */
  logLevel: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<GcsConfig, "credentials"> = {
  timeout: 30000,
  uploadBufferSize: 8 * 1024 * 1024, // 8MB
  downloadBufferSize: 64 * 1024, // 64KB
  checksums: { crc32c: true, md5: true },
  logLevel: "off",
};

/**
 * GCS configuration builder.
 */
export class GcsConfigBuilder {
  private config: Partial<GcsConfig> = {};

  /**
   * Set explicit credentials.
   */
  credentials(credentials: GcpCredentials): this {
    this.config.credentials = credentials;
    return this;
  }

  /**
   * Use explicit access token.
   */
  accessToken(token: string): this {
    this.config.credentials = { type: "access_token", token };
    return this;
  }

  /**
   * Use anonymous access.
   */
  anonymous(): this {
    this.config.credentials = { type: "anonymous" };
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Set upload buffer size, rounded up to the upload quantum.
   */
  uploadBufferSize(size: number): this {
    this.config.uploadBufferSize = roundUpToQuantum(size);
    return this;
  }

  /**
   * Set download buffer size.
   */
  downloadBufferSize(size: number): this {
    this.config.downloadBufferSize = size;
    return this;
  }

  /**
   * Set custom API endpoint (for emulators).
   */
  apiEndpoint(endpoint: string): this {
    this.config.apiEndpoint = endpoint;
    return this;
  }

  /**
   * Choose which checksums are verified by default.
   */
  checksums(checksums: Partial<ChecksumConfig>): this {
    this.config.checksums = { ...DEFAULT_CONFIG.checksums, ...this.config.checksums, ...checksums };
    return this;
  }

  /**
   * Set the default logger level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const token = env.GOOGLE_OAUTH_ACCESS_TOKEN;
    if (token) {
      this.config.credentials = { type: "access_token", token };
    }

    // Emulators accept anonymous requests
    const emulatorHost = env.STORAGE_EMULATOR_HOST;
    if (emulatorHost) {
      this.config.apiEndpoint = emulatorHost.startsWith("http")
        ? emulatorHost
        : `http://${emulatorHost}`;
      if (!this.config.credentials) {
        this.config.credentials = { type: "anonymous" };
      }
    }

    const bufferSize = env.GCS_UPLOAD_BUFFER_SIZE;
    if (bufferSize) {
      const parsed = Number(bufferSize);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(
          `GCS_UPLOAD_BUFFER_SIZE must be a positive integer, got "${bufferSize}"`,
          "InvalidConfig"
        );
      }
      this.uploadBufferSize(parsed);
    }

    const level = env.GCS_LOG_LEVEL;
    if (level) {
      if (!isLogLevel(level)) {
        throw new ConfigurationError(`Unknown GCS_LOG_LEVEL "${level}"`, "InvalidConfig");
      }
      this.config.logLevel = level;
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): GcsConfig {
    const merged: GcsConfig = { ...DEFAULT_CONFIG, ...this.config };

    if (merged.timeout <= 0) {
      throw new ConfigurationError("Timeout must be positive", "InvalidConfig");
    }

    if (!Number.isInteger(merged.downloadBufferSize) || merged.downloadBufferSize <= 0) {
      throw new ConfigurationError("Download buffer size must be a positive integer", "InvalidConfig");
    }

    if (merged.apiEndpoint) {
      try {
        new URL(merged.apiEndpoint);
      } catch {
        throw new ConfigurationError(
          `Invalid API endpoint URL: ${merged.apiEndpoint}`,
          "InvalidConfig"
        );
      }
    }

    return merged;
  }
}

/**
 * Create a new GCS config builder.
 */
export function configBuilder(): GcsConfigBuilder {
  return new GcsConfigBuilder();
}

/**
 * Resolve the GCS API endpoint.
 */
export function resolveEndpoint(config: Pick<GcsConfig, "apiEndpoint">): string {
  if (config.apiEndpoint) {
    return config.apiEndpoint.replace(/\/+$/, "");
  }
  return "https://storage.googleapis.com";
}

/**
 * Validate bucket name according to GCS requirements.
 */
export function validateBucketName(bucket: string): void {
  if (!bucket) {
    throw new ConfigurationError("Bucket name cannot be empty", "InvalidBucketName");
  }

  if (bucket.length < 3 || bucket.length > 222) {
    throw new ConfigurationError("Bucket name must be 3-222 characters", "InvalidBucketName");
  }

  // Must start and end with alphanumeric
  if (!/^[a-z0-9]/.test(bucket) || !/[a-z0-9]$/.test(bucket)) {
    throw new ConfigurationError(
      "Bucket name must start and end with alphanumeric character",
      "InvalidBucketName"
    );
  }

  if (!/^[a-z0-9._-]+$/.test(bucket)) {
    throw new ConfigurationError(
      "Bucket name can only contain lowercase letters, numbers, hyphens, underscores, and dots",
      "InvalidBucketName"
    );
  }

  if (bucket.includes("..")) {
    throw new ConfigurationError("Bucket name cannot have consecutive dots", "InvalidBucketName");
  }

  if (/^\d+\.\d+\.\d+\.\d+$/.test(bucket)) {
    throw new ConfigurationError("Bucket name cannot be an IP address", "InvalidBucketName");
  }
}

/**
 * Validate object name according to GCS requirements.
 */
export function validateObjectName(name: string): void {
  if (!name) {
    throw new ConfigurationError("Object name cannot be empty", "InvalidObjectName");
  }

  if (Buffer.byteLength(name, "utf8") > 1024) {
    throw new ConfigurationError("Object name cannot exceed 1024 bytes", "InvalidObjectName");
  }

  if (/[\r\n]/.test(name)) {
    throw new ConfigurationError(
      "Object name cannot contain carriage return or line feed",
      "InvalidObjectName"
    );
  }
}

/**
 * URL-encode an object name for use in GCS API paths.
 */
export function encodeObjectName(name: string): string {
  return encodeURIComponent(name);
}
