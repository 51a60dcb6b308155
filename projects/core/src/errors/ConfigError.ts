/**
 * Error codes for configuration errors.
 * Using unique string codes for programmatic identification.
 */
export const ConfigErrorCode = {
  MISSING_VALUES: "CONFIG_001",
  INVALID_VALUES: "CONFIG_002",
} as const;

export type ConfigErrorCodeType =
  (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

/**
 * Base error class for configuration errors.
 * Configuration errors are fatal at startup and never retried.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCodeType;

  constructor(
    code: ConfigErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.code = code;
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when one or more required environment variables are absent or empty.
 */
export class MissingConfigError extends ConfigError {
  constructor(public readonly missingKeys: readonly string[]) {
    super(
      ConfigErrorCode.MISSING_VALUES,
      `Missing required environment variables: ${missingKeys.join(", ")}`,
      { missingKeys }
    );
    this.name = "MissingConfigError";
  }
}

/**
 * Error thrown when optional settings are present but unusable.
 */
export class InvalidConfigError extends ConfigError {
  constructor(
    public readonly invalidKeys: readonly string[],
    details: readonly string[]
  ) {
    super(
      ConfigErrorCode.INVALID_VALUES,
      `Invalid environment variables: ${details.join("; ")}`,
      { invalidKeys }
    );
    this.name = "InvalidConfigError";
  }
}
