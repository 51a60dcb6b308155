/**
 * Maps failures onto the local error contract consumed by the front end.
 *
 * The response tells the caller which of three things to do: fix the input
 * (400), fix the server credentials (AuthError), or try again later (429,
 * 502, 504). Subscription keys are never part of an error message.
 */
import {
  AuthError,
  ServiceError,
  ServiceErrorCode,
  UpstreamError,
  type CloudService,
} from "../errors/ServiceError.js";
import { ValidationError, type ValidationIssue } from "../errors/ValidationError.js";

export type ErrorStatus = 400 | 404 | 429 | 500 | 502 | 504;

export type ErrorType =
  | "ValidationError"
  | "AuthError"
  | "UpstreamError"
  | "NotFound"
  | "InternalError";

export interface ErrorBody {
  readonly error: {
    readonly type: ErrorType;
    readonly code: string;
    readonly message: string;
    readonly service?: CloudService;
    readonly upstreamStatus?: number;
    readonly providerCode?: string;
    readonly retryAfter?: string;
    readonly issues?: readonly ValidationIssue[];
  };
}

export interface ErrorResponse {
  readonly status: ErrorStatus;
  readonly body: ErrorBody;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Local status for a failed upstream call. Upstream 400 means the request
 * content was rejected (e.g. an unsupported language), so it stays a 400.
 */
function upstreamStatus(error: UpstreamError): ErrorStatus {
  if (error.code === ServiceErrorCode.TIMEOUT) {
    return 504;
  }
  if (error.httpStatus === 400) {
    return 400;
  }
  if (error.httpStatus === 429) {
    return 429;
  }
  return 502;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: {
        error: {
          type: "ValidationError",
          code: error.code,
          message: error.message,
          issues: error.issues,
        },
      },
      headers: {},
    };
  }

  if (error instanceof AuthError) {
    return {
      status: 502,
      body: {
        error: {
          type: "AuthError",
          code: error.code,
          message: error.message,
          service: error.service,
          ...(error.httpStatus !== null ? { upstreamStatus: error.httpStatus } : {}),
        },
      },
      headers: {},
    };
  }

  if (error instanceof UpstreamError) {
    const headers: Record<string, string> = {};
    if (error.retryAfter !== undefined) {
      headers["Retry-After"] = error.retryAfter;
    }
    return {
      status: upstreamStatus(error),
      body: {
        error: {
          type: "UpstreamError",
          code: error.code,
          message: error.message,
          service: error.service,
          ...(error.httpStatus !== null ? { upstreamStatus: error.httpStatus } : {}),
          ...(error.providerCode !== null ? { providerCode: error.providerCode } : {}),
          ...(error.retryAfter !== undefined ? { retryAfter: error.retryAfter } : {}),
        },
      },
      headers,
    };
  }

  if (error instanceof ServiceError) {
    return {
      status: 502,
      body: {
        error: {
          type: "UpstreamError",
          code: error.code,
          message: error.message,
          service: error.service,
        },
      },
      headers: {},
    };
  }

  return {
    status: 500,
    body: {
      error: {
        type: "InternalError",
        code: "INTERNAL",
        message: "Internal server error",
      },
    },
    headers: {},
  };
}

export function notFoundBody(method: string, path: string): ErrorBody {
  return {
    error: {
      type: "NotFound",
      code: "NOT_FOUND",
      message: `No route for ${method} ${path}`,
    },
  };
}
