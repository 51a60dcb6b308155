/**
 * Error codes for cloud service errors.
 * Using unique string codes for programmatic identification.
 */
export const ServiceErrorCode = {
  AUTH_FAILED: "SERVICE_001",
  UPSTREAM_FAILED: "SERVICE_002",
  RATE_LIMITED: "SERVICE_003",
  TIMEOUT: "SERVICE_004",
  UNAVAILABLE: "SERVICE_005",
  MALFORMED_RESPONSE: "SERVICE_006",
} as const;

export type ServiceErrorCodeType =
  (typeof ServiceErrorCode)[keyof typeof ServiceErrorCode];

/**
 * Cloud services the relay talks to.
 */
export type CloudService = "translator" | "speech";

/**
 * Base error class for failures talking to a cloud service.
 */
export class ServiceError extends Error {
  readonly code: ServiceErrorCodeType;

  constructor(
    code: ServiceErrorCodeType,
    public readonly service: CloudService,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.code = code;
    this.name = "ServiceError";
  }
}

/**
 * Error thrown when the upstream rejects our credentials, or a speech token
 * cannot be obtained. The operator has to fix the key or region.
 */
export class AuthError extends ServiceError {
  constructor(
    service: CloudService,
    reason: string,
    public readonly httpStatus: number | null = null
  ) {
    super(
      ServiceErrorCode.AUTH_FAILED,
      service,
      `${service} rejected the configured credentials: ${reason}`,
      { reason, httpStatus }
    );
    this.name = "AuthError";
  }
}

/**
 * Normalized description of a failing upstream response.
 */
export interface UpstreamFailure {
  /** HTTP status returned by the service, null when no response arrived. */
  readonly httpStatus: number | null;
  /** Provider-specific error code from the response body, if any. */
  readonly providerCode: string | null;
  readonly message: string;
  /** Raw Retry-After header value, passed through untouched. */
  readonly retryAfter?: string | undefined;
}

/**
 * Error thrown when a cloud service answers with a non-success status.
 * Retrying is left to the caller.
 */
export class UpstreamError extends ServiceError {
  readonly httpStatus: number | null;
  readonly providerCode: string | null;
  readonly retryAfter: string | undefined;

  constructor(
    service: CloudService,
    failure: Readonly<UpstreamFailure>,
    code: ServiceErrorCodeType = failure.httpStatus === 429
      ? ServiceErrorCode.RATE_LIMITED
      : ServiceErrorCode.UPSTREAM_FAILED
  ) {
    super(
      code,
      service,
      failure.httpStatus === null
        ? `${service} request failed: ${failure.message}`
        : `${service} returned ${failure.httpStatus}: ${failure.message}`,
      {
        httpStatus: failure.httpStatus,
        providerCode: failure.providerCode,
        retryAfter: failure.retryAfter,
      }
    );
    this.httpStatus = failure.httpStatus;
    this.providerCode = failure.providerCode;
    this.retryAfter = failure.retryAfter;
    this.name = "UpstreamError";
  }

  get isRateLimited(): boolean {
    return this.httpStatus === 429;
  }
}

/**
 * Error thrown when an upstream call exceeds its timeout.
 */
export class UpstreamTimeoutError extends UpstreamError {
  constructor(
    service: CloudService,
    operation: string,
    public readonly timeoutMs: number
  ) {
    super(
      service,
      {
        httpStatus: null,
        providerCode: null,
        message: `${operation} timed out after ${timeoutMs}ms`,
      },
      ServiceErrorCode.TIMEOUT
    );
    this.name = "UpstreamTimeoutError";
  }
}

/**
 * Error thrown when no response could be obtained at all.
 */
export class UpstreamUnavailableError extends UpstreamError {
  constructor(service: CloudService, operation: string, reason: string) {
    super(
      service,
      {
        httpStatus: null,
        providerCode: null,
        message: `${operation} could not reach the service: ${reason}`,
      },
      ServiceErrorCode.UNAVAILABLE
    );
    this.name = "UpstreamUnavailableError";
  }
}

/**
 * Error thrown when a success response does not have the expected shape.
 */
export class MalformedResponseError extends UpstreamError {
  constructor(service: CloudService, httpStatus: number, reason: string) {
    super(
      service,
      {
        httpStatus,
        providerCode: null,
        message: `unexpected response: ${reason}`,
      },
      ServiceErrorCode.MALFORMED_RESPONSE
    );
    this.name = "MalformedResponseError";
  }
}
