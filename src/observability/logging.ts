/**
 * Logging for the storage streams.
 */

/**
 * Log level enumeration.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "off";

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to include timestamps. */
  includeTimestamps: boolean;
  /** Whether to redact credentials and session URLs. */
  redactSensitive: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "info",
  includeTimestamps: true,
  redactSensitive: true,
};

/**
 * Logger interface.
 */
export interface Logger {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Upload session URLs embed an upload_id that grants write access to the session.
const SENSITIVE_KEYS = ["authorization", "token", "secret", "password", "upload_id"];

/**
 * Console logger with level filtering.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(this.redactIfNeeded(message));

    if (context) {
      parts.push(JSON.stringify(this.redactContext(context)));
    }

    const output = parts.join(" ");

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "debug":
      case "trace":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("trace", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log("error", message, context);
  }

  private shouldLog(level: LogLevel): boolean {
    if (level === "off") return false;
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private redactIfNeeded(text: string): string {
    if (!this.config.redactSensitive) return text;

    return text.replace(/(upload_id|authorization|token|bearer)[=:]["']?[^"'\s,}&]*/gi, "$1=[REDACTED]");
  }

  private redactContext(context: Record<string, unknown>): Record<string, unknown> {
    if (!this.config.redactSensitive) return context;

    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
        redacted[key] = "[REDACTED]";
      } else if (isRecord(value)) {
        redacted[key] = this.redactContext(value);
      } else if (typeof value === "string") {
        redacted[key] = this.redactIfNeeded(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  log(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Creates a logger for the given level; `off` yields a `NoopLogger`.
 */
export function createLogger(level: LogLevel = "info", config?: Partial<Omit<LogConfig, "level">>): Logger {
  if (level === "off") {
    return new NoopLogger();
  }
  return new ConsoleLogger({ ...config, level });
}
