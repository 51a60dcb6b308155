/**
 * Shared plumbing for calls to the cloud services: bounded fetches and
 * normalization of failing responses.
 */
import {
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  type CloudService,
  type UpstreamFailure,
} from "../../errors/ServiceError.js";

/**
 * Longest error message kept from an upstream body.
 */
const MAX_ERROR_MESSAGE_LENGTH = 500;

export interface UpstreamRequestOptions {
  readonly service: CloudService;
  /** Short description used in error messages, e.g. "translate". */
  readonly operation: string;
  readonly timeoutMs: number;
}

/**
 * Fetch with an explicit timeout and read the response with `read`. The
 * timeout covers the whole exchange, body included. No retries: a failed
 * call is reported once.
 *
 * @throws {UpstreamTimeoutError} When the timeout elapses first
 * @throws {UpstreamUnavailableError} When no response was received
 */
export async function fetchUpstream<T>(
  url: string,
  init: RequestInit,
  options: Readonly<UpstreamRequestOptions>,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { service, operation, timeoutMs } = options;

  const timeoutController = new AbortController();
  const timeoutId = setTimeout(() => timeoutController.abort(), timeoutMs);
  const timeoutError = () => new UpstreamTimeoutError(service, operation, timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: timeoutController.signal });
    } catch (error) {
      if (timeoutController.signal.aborted) {
        throw timeoutError();
      }
      throw new UpstreamUnavailableError(service, operation, describeFetchError(error));
    }

    // The reader may turn a failed body read into its own error; the timeout wins
    return await Promise.race([
      read(response),
      rejectOnAbort(timeoutController.signal, timeoutError),
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function rejectOnAbort(signal: AbortSignal, toError: () => Error): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(toError());
      return;
    }
    signal.addEventListener("abort", () => reject(toError()), { once: true });
  });
}

/**
 * Normalize a non-success response into an UpstreamFailure.
 *
 * Both cloud services report errors as `{ error: { code, message } }` when
 * they send a body at all. Anything else falls back to the raw text or the
 * status text.
 */
export async function readUpstreamFailure(response: Response): Promise<UpstreamFailure> {
  const retryAfter = response.headers.get("retry-after") ?? undefined;
  const body = await safeReadText(response);

  let providerCode: string | null = null;
  let message: string | null = null;

  const parsed = safeParseJson(body);
  if (isRecord(parsed)) {
    const inner = isRecord(parsed["error"]) ? parsed["error"] : parsed;
    const code = inner["code"];
    if (typeof code === "string" || typeof code === "number") {
      providerCode = String(code);
    }
    const innerMessage = inner["message"];
    if (typeof innerMessage === "string" && innerMessage.trim() !== "") {
      message = innerMessage.trim();
    }
  }

  if (message === null) {
    const text = body.trim();
    message = text !== "" && parsed === null ? text : response.statusText || "no details provided";
  }

  return {
    httpStatus: response.status,
    providerCode,
    message: truncate(message, MAX_ERROR_MESSAGE_LENGTH),
    retryAfter,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function safeReadText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}

/**
 * Parse JSON, returning null for anything that is not valid JSON.
 */
function safeParseJson(text: string): unknown {
  if (text.trim() === "") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    // Node's fetch reports DNS and socket failures on `cause`
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
