/**
 * GCS Client
 *
 * Entry point for streaming uploads and downloads.
 */

import {
  type ChecksumConfig,
  type GcsConfig,
  type GcpCredentials,
  configBuilder,
  GcsConfigBuilder,
} from "../config/index.js";
import { type GcpAuthProvider, createAuthProvider } from "../credentials/index.js";
import { ConfigurationError } from "../error/index.js";
import { createLogger, type Logger, type LogLevel } from "../observability/logging.js";
import { type HttpTransport, createTransport } from "../transport/index.js";
import { StreamingService } from "../services/index.js";

/**
 * GCS Client interface.
 */
export interface GcsClient {
  /** Streaming service for resumable uploads/downloads. */
  streaming(): StreamingService;

  /** Get the configuration. */
  config(): GcsConfig;

  /** Logger shared by the client's sessions and streams. */
  logger(): Logger;
}

/**
 * GCS Client implementation.
 */
export class GcsClientImpl implements GcsClient {
  private _config: GcsConfig;
  private _transport: HttpTransport;
  private _authProvider: GcpAuthProvider;
  private _logger: Logger;

  private _streamingService?: StreamingService;

  constructor(
    config: GcsConfig,
    transport: HttpTransport,
    authProvider: GcpAuthProvider,
    logger: Logger
  ) {
    this._config = config;
    this._transport = transport;
    this._authProvider = authProvider;
    this._logger = logger;
  }

  streaming(): StreamingService {
    if (!this._streamingService) {
      this._streamingService = new StreamingService(
        this._config,
        this._transport,
        this._authProvider,
        this._logger
      );
    }
    return this._streamingService;
  }

  config(): GcsConfig {
    return this._config;
  }

  logger(): Logger {
    return this._logger;
  }
}

/**
 * GCS Client builder.
 */
export class GcsClientBuilder {
  private _config?: GcsConfig;
  private _configBuilder: GcsConfigBuilder = configBuilder();
  private _transport?: HttpTransport;
  private _logger?: Logger;

  /**
   * Set the full configuration.
   */
  config(config: GcsConfig): this {
    this._config = config;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: GcpCredentials): this {
    this._configBuilder.credentials(credentials);
    return this;
  }

  /**
   * Use explicit access token.
   */
  accessToken(token: string): this {
    this._configBuilder.accessToken(token);
    return this;
  }

  /**
   * Send requests without credentials (emulators, public objects).
   */
  anonymous(): this {
    this._configBuilder.anonymous();
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this._configBuilder.timeout(ms);
    return this;
  }

  /**
   * Set upload buffer size.
   */
  uploadBufferSize(size: number): this {
    this._configBuilder.uploadBufferSize(size);
    return this;
  }

  /**
   * Set download buffer size.
   */
  downloadBufferSize(size: number): this {
    this._configBuilder.downloadBufferSize(size);
    return this;
  }

  /**
   * Set custom API endpoint (for emulators).
   */
  apiEndpoint(endpoint: string): this {
    this._configBuilder.apiEndpoint(endpoint);
    return this;
  }

  /**
   * Choose which checksums are verified by default.
   */
  checksums(checksums: Partial<ChecksumConfig>): this {
    this._configBuilder.checksums(checksums);
    return this;
  }

  /**
   * Set the level of the default logger.
   */
  logLevel(level: LogLevel): this {
    this._configBuilder.logLevel(level);
    return this;
  }

  /**
   * Use a custom logger instead of the console.
   */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Set a custom HTTP transport.
   */
  transport(transport: HttpTransport): this {
    this._transport = transport;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    this._configBuilder.fromEnv(env);
    return this;
  }

  /**
   * Build the GCS client.
   */
  async build(): Promise<GcsClient> {
    const config = this._config ?? this._configBuilder.build();

    if (!config.credentials) {
      throw new ConfigurationError(
        "Credentials must be provided (call credentials(), accessToken(), anonymous(), or fromEnv())",
        "InvalidCredentials"
      );
    }

    const transport = this._transport ?? createTransport(config.timeout);
    const authProvider = createAuthProvider(config.credentials);
    const logger = this._logger ?? createLogger(config.logLevel);

    return new GcsClientImpl(config, transport, authProvider, logger);
  }
}

/**
 * Create a new GCS client builder.
 */
export function clientBuilder(): GcsClientBuilder {
  return new GcsClientBuilder();
}

/**
 * Create a GCS client from environment variables.
 */
export async function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<GcsClient> {
  return clientBuilder().fromEnv(env).build();
}

/**
 * Create a GCS client with explicit configuration.
 */
export async function createClient(config: GcsConfig, transport?: HttpTransport): Promise<GcsClient> {
  const builder = clientBuilder().config(config);
  if (transport) {
    builder.transport(transport);
  }
  return builder.build();
}
