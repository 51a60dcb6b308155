import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  AzureTranslatorClient,
  createAzureTranslatorClient,
} from "../AzureTranslatorClient.js";
import {
  AuthError,
  MalformedResponseError,
  ServiceErrorCode,
  UpstreamError,
  UpstreamTimeoutError,
} from "../../../errors/ServiceError.js";
import {
  TEST_CREDENTIALS,
  fetchCall,
  hangingFetch,
  jsonResponse,
  stalledBodyResponse,
  stubFetch,
  type FetchMock,
} from "../../../__tests__/testConfig.js";

describe("AzureTranslatorClient", () => {
  let fetchMock: FetchMock;
  let client: AzureTranslatorClient;

  beforeEach(() => {
    fetchMock = stubFetch();
    client = createAzureTranslatorClient({ credentials: TEST_CREDENTIALS });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("buildUrl()", () => {
    it("sets api-version and target, omitting from for auto-detect", () => {
      const url = new URL(client.buildUrl({ sourceLanguage: "auto", targetLanguage: "en" }));

      expect(url.origin + url.pathname).toBe(
        "https://api.cognitive.microsofttranslator.com/translate"
      );
      expect(url.searchParams.get("api-version")).toBe("3.0");
      expect(url.searchParams.get("to")).toBe("en");
      expect(url.searchParams.has("from")).toBe(false);
    });

    it("sets from when the source language is given", () => {
      const url = new URL(client.buildUrl({ sourceLanguage: "es", targetLanguage: "en" }));
      expect(url.searchParams.get("from")).toBe("es");
    });

    it("uses a custom endpoint without doubling slashes", () => {
      const custom = new AzureTranslatorClient({
        credentials: TEST_CREDENTIALS,
        endpoint: "https://translator.example.test/",
      });
      expect(custom.buildUrl({ sourceLanguage: "auto", targetLanguage: "de" })).toBe(
        "https://translator.example.test/translate?api-version=3.0&to=de"
      );
    });
  });

  describe("translate()", () => {
    it("sends one request with credentials and a single-item body", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          {
            detectedLanguage: { language: "es", score: 1.0 },
            translations: [{ text: "Hello", to: "en" }],
          },
        ])
      );

      await client.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const { init, headers } = fetchCall(fetchMock);
      expect(init.method).toBe("POST");
      expect(init.body).toBe('[{"Text":"Hola"}]');
      expect(headers.get("Ocp-Apim-Subscription-Key")).toBe("test-translator-key");
      expect(headers.get("Ocp-Apim-Subscription-Region")).toBe("westeurope");
      expect(headers.get("Content-Type")).toBe("application/json");
    });

    it("returns the translation and detected language", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          {
            detectedLanguage: { language: "es", score: 1.0 },
            translations: [{ text: "Hello", to: "en" }],
          },
        ])
      );

      const result = await client.translate({
        sourceText: "Hola",
        targetLanguage: "en",
        sourceLanguage: "auto",
      });

      expect(result).toEqual({ translatedText: "Hello", detectedSourceLanguage: "es" });
    });

    it("omits detectedSourceLanguage when the service reports none", async () => {
      fetchMock.mockResolvedValue(jsonResponse([{ translations: [{ text: "Bonjour", to: "fr" }] }]));

      const result = await client.translate({
        sourceText: "Hello",
        targetLanguage: "fr",
        sourceLanguage: "en",
      });

      expect(result).toEqual({ translatedText: "Bonjour" });
      expect("detectedSourceLanguage" in result).toBe(false);
    });

    it.each([401, 403])("maps %i to AuthError", async (status) => {
      fetchMock.mockResolvedValue(
        jsonResponse(
          { error: { code: 401000, message: "The request is not authorized." } },
          { status }
        )
      );

      const promise = client.translate({
        sourceText: "Hola",
        targetLanguage: "en",
        sourceLanguage: "auto",
      });

      await expect(promise).rejects.toBeInstanceOf(AuthError);
      await expect(promise).rejects.toMatchObject({
        service: "translator",
        httpStatus: status,
        code: ServiceErrorCode.AUTH_FAILED,
        message: "translator rejected the configured credentials: The request is not authorized.",
      });
    });

    it("maps 429 to a rate-limited UpstreamError carrying Retry-After", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse(
          { error: { code: 429001, message: "Too many requests." } },
          { status: 429, headers: { "Retry-After": "12" } }
        )
      );

      try {
        await client.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" });
        expect.fail("expected translate to throw");
      } catch (error) {
        expect(error).toBeInstanceOf(UpstreamError);
        if (error instanceof UpstreamError) {
          expect(error.code).toBe(ServiceErrorCode.RATE_LIMITED);
          expect(error.isRateLimited).toBe(true);
          expect(error.retryAfter).toBe("12");
          expect(error.providerCode).toBe("429001");
        }
      }
    });

    it("maps other failures to UpstreamError with the provider message", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse(
          { error: { code: 400036, message: "The target language is not valid." } },
          { status: 400 }
        )
      );

      await expect(
        client.translate({ sourceText: "Hola", targetLanguage: "xx", sourceLanguage: "auto" })
      ).rejects.toThrow("translator returned 400: The target language is not valid.");
    });

    it("rejects a success response without translations", async () => {
      fetchMock.mockResolvedValue(jsonResponse([{ translations: [] }]));

      await expect(
        client.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" })
      ).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it("rejects a body that is not JSON", async () => {
      fetchMock.mockResolvedValue(new Response("<html>", { status: 200 }));

      await expect(
        client.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" })
      ).rejects.toThrow("unexpected response: body is not valid JSON");
    });

    it("times out instead of waiting forever", async () => {
      fetchMock.mockImplementation(hangingFetch);
      const slow = new AzureTranslatorClient({ credentials: TEST_CREDENTIALS, timeoutMs: 20 });

      await expect(
        slow.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" })
      ).rejects.toBeInstanceOf(UpstreamTimeoutError);
    });

    it("times out when the body stalls after the headers", async () => {
      fetchMock.mockResolvedValue(stalledBodyResponse('[{"translations":'));
      const slow = new AzureTranslatorClient({ credentials: TEST_CREDENTIALS, timeoutMs: 20 });

      await expect(
        slow.translate({ sourceText: "Hola", targetLanguage: "en", sourceLanguage: "auto" })
      ).rejects.toBeInstanceOf(UpstreamTimeoutError);
    });
  });
});
