/**
 * HTTP client for the cloud Translator REST API (v3.0).
 */
import type { Credentials } from "../../config/Credentials.js";
import {
  AuthError,
  MalformedResponseError,
  UpstreamError,
} from "../../errors/ServiceError.js";
import {
  AUTO_DETECT,
  type ITranslator,
  type TranslationRequest,
  type TranslationResult,
} from "../../interfaces/ITranslator.js";
import { fetchUpstream, isRecord, readUpstreamFailure } from "../http/upstream.js";

const DEFAULT_ENDPOINT = "https://api.cognitive.microsofttranslator.com";
const DEFAULT_TIMEOUT_MS = 15000;
const API_VERSION = "3.0";

export interface AzureTranslatorClientOptions {
  readonly credentials: Pick<Credentials, "translatorKey" | "translatorRegion">;
  /** Base URL of the Translator service. */
  readonly endpoint?: string;
  /** Request timeout in milliseconds. Default: 15000 */
  readonly timeoutMs?: number;
}

/**
 * Translator client. One request, one upstream call, no retries.
 *
 * The upstream contract takes a list of texts even for a single string, and
 * answers with one entry per input text.
 */
export class AzureTranslatorClient implements ITranslator {
  private readonly key: string;
  private readonly region: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(options: Readonly<AzureTranslatorClientOptions>) {
    this.key = options.credentials.translatorKey;
    this.region = options.credentials.translatorRegion;
    this.endpoint = (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Translate a single text.
   *
   * @throws {AuthError} If the service rejects the key or region (401/403)
   * @throws {UpstreamError} For any other non-success status, timeout or network failure
   */
  async translate(request: Readonly<TranslationRequest>): Promise<TranslationResult> {
    return fetchUpstream(
      this.buildUrl(request),
      {
        method: "POST",
        headers: {
          "Ocp-Apim-Subscription-Key": this.key,
          "Ocp-Apim-Subscription-Region": this.region,
          "Content-Type": "application/json",
        },
        body: JSON.stringify([{ Text: request.sourceText }]),
      },
      { service: "translator", operation: "translate", timeoutMs: this.timeoutMs },
      async (response) => {
        if (!response.ok) {
          const failure = await readUpstreamFailure(response);
          if (response.status === 401 || response.status === 403) {
            throw new AuthError("translator", failure.message, response.status);
          }
          throw new UpstreamError("translator", failure);
        }
        return this.parseResult(response.status, await this.readJson(response));
      }
    );
  }

  /**
   * Build the request URL with locale query parameters.
   */
  buildUrl(request: Readonly<Pick<TranslationRequest, "sourceLanguage" | "targetLanguage">>): string {
    const url = new URL(`${this.endpoint}/translate`);
    url.searchParams.set("api-version", API_VERSION);
    url.searchParams.set("to", request.targetLanguage);
    if (request.sourceLanguage !== AUTO_DETECT) {
      url.searchParams.set("from", request.sourceLanguage);
    }
    return url.toString();
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const data: unknown = await response.json();
      return data;
    } catch {
      throw new MalformedResponseError("translator", response.status, "body is not valid JSON");
    }
  }

  /**
   * Expected shape:
   * `[{ detectedLanguage?: { language, score }, translations: [{ text, to }] }]`
   */
  private parseResult(status: number, data: unknown): TranslationResult {
    const first: unknown = Array.isArray(data) ? data[0] : undefined;
    if (!isRecord(first)) {
      throw new MalformedResponseError("translator", status, "expected a non-empty result array");
    }

    const translations = first["translations"];
    const translation: unknown = Array.isArray(translations) ? translations[0] : undefined;
    const text = isRecord(translation) ? translation["text"] : undefined;
    if (typeof text !== "string" || text === "") {
      throw new MalformedResponseError("translator", status, "result has no translated text");
    }

    const detected = first["detectedLanguage"];
    const language = isRecord(detected) ? detected["language"] : undefined;

    return typeof language === "string" && language !== ""
      ? { translatedText: text, detectedSourceLanguage: language }
      : { translatedText: text };
  }
}

export function createAzureTranslatorClient(
  options: Readonly<AzureTranslatorClientOptions>
): AzureTranslatorClient {
  return new AzureTranslatorClient(options);
}
