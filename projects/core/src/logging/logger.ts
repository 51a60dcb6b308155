/**
 * Structured JSON logging.
 *
 * Every entry is written as one JSON line with a timestamp, level, message
 * and any attached data. Fields whose names look like secrets are redacted
 * before output, so subscription keys and tokens never reach the log.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Standard log entry format.
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  [key: string]: unknown;
}

/**
 * Destination for formatted entries. Defaults to the console.
 */
export type LogSink = (entry: Readonly<LogEntry>) => void;

export interface LoggerOptions {
  /** Minimum level to output. Default: "info" */
  readonly minLevel?: LogLevel;
  /** Service name included in every entry. */
  readonly service?: string;
  /** Include stack traces for logged errors. Default: true */
  readonly includeStackTrace?: boolean;
  /** Field name fragments whose values are replaced with "[REDACTED]". */
  readonly redactFields?: readonly string[];
  readonly sink?: LogSink;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_REDACT_FIELDS: readonly string[] = [
  "subscriptionkey",
  "subscription-key",
  "translatorkey",
  "speechkey",
  "apikey",
  "api_key",
  "accesstoken",
  "access_token",
  "authorization",
  "bearer",
  "secret",
  "password",
];

const MAX_REDACT_DEPTH = 10;

/**
 * Write an entry to the console as a single JSON line.
 */
export const consoleSink: LogSink = (entry) => {
  const json = JSON.stringify(entry);
  switch (entry.level) {
    case "error":
      console.error(json);
      break;
    case "warn":
      console.warn(json);
      break;
    default:
      console.log(json);
  }
};

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly service: string | undefined;
  private readonly includeStackTrace: boolean;
  private readonly redactFields: readonly string[];
  private readonly sink: LogSink;
  private readonly context: Readonly<Record<string, unknown>>;

  constructor(
    options?: Readonly<LoggerOptions>,
    context: Readonly<Record<string, unknown>> = {}
  ) {
    this.minLevel = options?.minLevel ?? "info";
    this.service = options?.service;
    this.includeStackTrace = options?.includeStackTrace ?? true;
    this.redactFields = (options?.redactFields ?? DEFAULT_REDACT_FIELDS).map(
      (field) => field.toLowerCase()
    );
    this.sink = options?.sink ?? consoleSink;
    this.context = context;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  /**
   * Log at error level. An Error argument is formatted under the `error` key.
   */
  error(
    message: string,
    errorOrData?: unknown,
    data?: Record<string, unknown>
  ): void {
    if (errorOrData instanceof Error) {
      this.log("error", message, { ...data, error: this.formatError(errorOrData) });
    } else if (isRecord(errorOrData)) {
      this.log("error", message, { ...errorOrData, ...data });
    } else if (errorOrData !== undefined) {
      this.log("error", message, {
        ...data,
        error: { name: "UnknownError", message: String(errorOrData) },
      });
    } else {
      this.log("error", message, data);
    }
  }

  /**
   * Create a child logger whose entries all carry the given context.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(
      {
        minLevel: this.minLevel,
        ...(this.service !== undefined ? { service: this.service } : {}),
        includeStackTrace: this.includeStackTrace,
        redactFields: this.redactFields,
        sink: this.sink,
      },
      { ...this.context, ...context }
    );
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (this.service !== undefined) {
      entry.service = this.service;
    }

    const merged = { ...this.context, ...data };
    const redacted = this.redact(merged, 0);
    if (isRecord(redacted)) {
      for (const [key, value] of Object.entries(redacted)) {
        if (value !== undefined) {
          entry[key] = value;
        }
      }
    }

    this.sink(entry);
  }

  private redact(value: unknown, depth: number): unknown {
    if (depth > MAX_REDACT_DEPTH) {
      return "[MAX_DEPTH]";
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.redact(item, depth + 1));
    }
    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value)) {
        const lowerKey = key.toLowerCase();
        result[key] = this.redactFields.some((field) => lowerKey.includes(field))
          ? "[REDACTED]"
          : this.redact(inner, depth + 1);
      }
      return result;
    }
    return value;
  }

  private formatError(error: Error): NonNullable<LogEntry["error"]> {
    const formatted: NonNullable<LogEntry["error"]> = {
      name: error.name,
      message: error.message,
    };
    if (this.includeStackTrace && error.stack !== undefined) {
      formatted.stack = error.stack;
    }
    if ("code" in error && typeof error.code === "string") {
      formatted.code = error.code;
    }
    return formatted;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createLogger(options?: Readonly<LoggerOptions>): Logger {
  return new Logger(options);
}

/**
 * Logger that discards everything. Useful as a default in tests.
 */
export function createSilentLogger(): Logger {
  return new Logger({ sink: () => undefined });
}
