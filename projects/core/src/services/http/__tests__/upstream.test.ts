import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { fetchUpstream, readUpstreamFailure } from "../upstream.js";
import {
  ServiceErrorCode,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from "../../../errors/ServiceError.js";
import {
  fetchCall,
  hangingFetch,
  jsonResponse,
  stalledBodyResponse,
  stubFetch,
  type FetchMock,
} from "../../../__tests__/testConfig.js";

const OPTIONS = { service: "translator", operation: "translate", timeoutMs: 1000 } as const;

describe("fetchUpstream()", () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const readStatus = (response: Response) => Promise.resolve(response.status);

  it("hands the response to the reader without interpreting the status", async () => {
    fetchMock.mockResolvedValue(new Response("nope", { status: 503 }));

    const status = await fetchUpstream(
      "https://upstream.test/x",
      { method: "POST" },
      OPTIONS,
      readStatus
    );

    expect(status).toBe(503);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchCall(fetchMock).init.method).toBe("POST");
    expect(fetchCall(fetchMock).init.signal).toBeInstanceOf(AbortSignal);
  });

  it("throws UpstreamTimeoutError when the timeout elapses", async () => {
    fetchMock.mockImplementation(hangingFetch);

    const promise = fetchUpstream(
      "https://upstream.test/x",
      {},
      { ...OPTIONS, timeoutMs: 20 },
      readStatus
    );

    await expect(promise).rejects.toBeInstanceOf(UpstreamTimeoutError);
    await expect(promise).rejects.toMatchObject({
      code: ServiceErrorCode.TIMEOUT,
      service: "translator",
      message: "translate timed out after 20ms",
    });
  });

  it("times out while the body is still arriving", async () => {
    fetchMock.mockResolvedValue(stalledBodyResponse('[{"translations":'));

    const promise = fetchUpstream(
      "https://upstream.test/x",
      {},
      { ...OPTIONS, timeoutMs: 20 },
      (response) => response.json()
    );

    await expect(promise).rejects.toBeInstanceOf(UpstreamTimeoutError);
    await expect(promise).rejects.toThrow("translate timed out after 20ms");
  });

  it("reports the timeout even when the reader handles the failed read", async () => {
    fetchMock.mockResolvedValue(stalledBodyResponse("partial"));

    const promise = fetchUpstream(
      "https://upstream.test/x",
      {},
      { ...OPTIONS, timeoutMs: 20 },
      (response) => response.text().catch(() => "fallback")
    );

    await expect(promise).rejects.toBeInstanceOf(UpstreamTimeoutError);
  });

  it("passes errors thrown by the reader through", async () => {
    fetchMock.mockResolvedValue(new Response("{}"));

    const promise = fetchUpstream("https://upstream.test/x", {}, OPTIONS, () =>
      Promise.reject(new Error("bad shape"))
    );

    await expect(promise).rejects.toThrow("bad shape");
  });

  it("throws UpstreamUnavailableError with the network cause", async () => {
    fetchMock.mockRejectedValue(
      new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND upstream.test") })
    );

    const promise = fetchUpstream("https://upstream.test/x", {}, OPTIONS, readStatus);

    await expect(promise).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(promise).rejects.toThrow(
      "translate could not reach the service: fetch failed (getaddrinfo ENOTFOUND upstream.test)"
    );
  });

  it("never retries", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(fetchUpstream("https://upstream.test/x", {}, OPTIONS, readStatus)).rejects.toThrow();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("readUpstreamFailure()", () => {
  it("reads code and message from an error envelope", async () => {
    const failure = await readUpstreamFailure(
      jsonResponse(
        { error: { code: 400036, message: "The target language is not valid." } },
        { status: 400 }
      )
    );

    expect(failure).toEqual({
      httpStatus: 400,
      providerCode: "400036",
      message: "The target language is not valid.",
      retryAfter: undefined,
    });
  });

  it("reads top-level code and message", async () => {
    const failure = await readUpstreamFailure(
      jsonResponse({ code: "Throttled", message: "Slow down" }, { status: 429, headers: { "Retry-After": "7" } })
    );

    expect(failure).toEqual({
      httpStatus: 429,
      providerCode: "Throttled",
      message: "Slow down",
      retryAfter: "7",
    });
  });

  it("falls back to a plain text body", async () => {
    const failure = await readUpstreamFailure(new Response("Service busy\n", { status: 503 }));
    expect(failure.message).toBe("Service busy");
    expect(failure.providerCode).toBeNull();
  });

  it("falls back to the status text for an empty body", async () => {
    const failure = await readUpstreamFailure(
      new Response(null, { status: 502, statusText: "Bad Gateway" })
    );
    expect(failure.message).toBe("Bad Gateway");
  });

  it("uses a placeholder when nothing describes the failure", async () => {
    const failure = await readUpstreamFailure(new Response(null, { status: 500 }));
    expect(failure.message).toBe("no details provided");
  });

  it("truncates long messages", async () => {
    const failure = await readUpstreamFailure(new Response("x".repeat(600), { status: 500 }));
    expect(failure.message).toBe(`${"x".repeat(500)}...`);
  });
});
