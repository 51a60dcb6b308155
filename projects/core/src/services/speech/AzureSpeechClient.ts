/**
 * HTTP client for the cloud Speech REST APIs.
 *
 * Provides methods for:
 * - Bearer token acquisition (cached until expiry)
 * - Text-to-speech synthesis from SSML
 * - Speech-to-text recognition of short audio
 */
import type { Credentials } from "../../config/Credentials.js";
import {
  AuthError,
  MalformedResponseError,
  UpstreamError,
  UpstreamUnavailableError,
} from "../../errors/ServiceError.js";
import type {
  IASR,
  RecognitionFormat,
  RecognitionRequest,
  RecognitionResult,
  RecognitionStatus,
} from "../../interfaces/IASR.js";
import type { ISpeechAuth } from "../../interfaces/ISpeechAuth.js";
import type {
  ITTS,
  SynthesisFormat,
  SynthesisRequest,
  SynthesisResult,
} from "../../interfaces/ITTS.js";
import { fetchUpstream, isRecord, readUpstreamFailure } from "../http/upstream.js";
import { buildSsml } from "./ssml.js";
import { SpeechTokenCache } from "./SpeechTokenCache.js";

const DEFAULT_TIMEOUT_MS = 15000;
const USER_AGENT = "lingua-relay";

/**
 * Output format header value and MIME type per synthesis format.
 */
const OUTPUT_FORMATS: Readonly<
  Record<SynthesisFormat, { readonly header: string; readonly mimeType: string }>
> = {
  mp3: { header: "audio-24khz-48kbitrate-mono-mp3", mimeType: "audio/mpeg" },
  wav: { header: "riff-24khz-16bit-mono-pcm", mimeType: "audio/wav" },
  ogg: { header: "ogg-24khz-16bit-mono-opus", mimeType: "audio/ogg" },
};

/**
 * Content type announced to the recognizer per input format.
 */
const INPUT_CONTENT_TYPES: Readonly<Record<RecognitionFormat, string>> = {
  wav: "audio/wav; codecs=audio/pcm; samplerate=16000",
  ogg: "audio/ogg; codecs=opus",
};

const NO_SPEECH_STATUSES: readonly RecognitionStatus[] = [
  "NoMatch",
  "InitialSilenceTimeout",
  "BabbleTimeout",
];

/** Recognition offsets and durations are reported in 100 ns ticks. */
const TICKS_PER_MS = 10000;

export interface AzureSpeechClientOptions {
  readonly credentials: Pick<Credentials, "speechKey" | "speechRegion">;
  /** Request timeout in milliseconds. Default: 15000 */
  readonly timeoutMs?: number;
  /** Token reuse window in milliseconds. Default: 9 minutes */
  readonly tokenTtlMs?: number;
  /** Clock for token expiry. Default: Date.now */
  readonly now?: () => number;
}

export class AzureSpeechClient implements ITTS, IASR, ISpeechAuth {
  readonly region: string;
  private readonly key: string;
  private readonly timeoutMs: number;
  private readonly tokens: SpeechTokenCache;

  constructor(options: Readonly<AzureSpeechClientOptions>) {
    this.key = options.credentials.speechKey;
    this.region = options.credentials.speechRegion;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.tokens = new SpeechTokenCache({
      fetchToken: () => this.issueToken(),
      ...(options.tokenTtlMs !== undefined ? { ttlMs: options.tokenTtlMs } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
    });
  }

  get tokenEndpoint(): string {
    return `https://${this.region}.api.cognitive.microsoft.com/sts/v1.0/issueToken`;
  }

  get synthesisEndpoint(): string {
    return `https://${this.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
  }

  get recognitionEndpoint(): string {
    return `https://${this.region}.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1`;
  }

  /**
   * Return a bearer token, reusing the cached one until it expires.
   *
   * @throws {AuthError} If the token cannot be obtained
   */
  getToken(): Promise<string> {
    return this.tokens.getToken();
  }

  /**
   * Synthesize speech and return the raw audio bytes.
   *
   * @throws {AuthError} If token acquisition fails
   * @throws {UpstreamError} If the synthesis call fails
   */
  async synthesize(request: Readonly<SynthesisRequest>): Promise<SynthesisResult> {
    const token = await this.getToken();
    const output = OUTPUT_FORMATS[request.format];

    const ssml = buildSsml({
      text: request.text,
      voice: request.voice,
      language: request.language,
      ...(request.rate !== undefined ? { rate: request.rate } : {}),
    });

    return fetchUpstream(
      this.synthesisEndpoint,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/ssml+xml",
          "X-Microsoft-OutputFormat": output.header,
          "User-Agent": USER_AGENT,
        },
        body: ssml,
      },
      { service: "speech", operation: "synthesize", timeoutMs: this.timeoutMs },
      async (response) => {
        if (!response.ok) {
          throw await this.upstreamFailure(response);
        }

        const audio = new Uint8Array(await response.arrayBuffer());
        if (audio.byteLength === 0) {
          throw new MalformedResponseError("speech", response.status, "synthesis returned no audio");
        }

        return {
          audio,
          contentType: response.headers.get("content-type") || output.mimeType,
        };
      }
    );
  }

  /**
   * Transcribe a short audio clip.
   *
   * @throws {AuthError} If token acquisition fails
   * @throws {UpstreamError} If the recognition call fails
   */
  async recognize(request: Readonly<RecognitionRequest>): Promise<RecognitionResult> {
    const token = await this.getToken();

    const url = new URL(this.recognitionEndpoint);
    url.searchParams.set("language", request.language);
    url.searchParams.set("format", "detailed");

    return fetchUpstream(
      url.toString(),
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": INPUT_CONTENT_TYPES[request.format],
          Accept: "application/json",
        },
        body: request.audio,
      },
      { service: "speech", operation: "recognize", timeoutMs: this.timeoutMs },
      async (response) => {
        if (!response.ok) {
          throw await this.upstreamFailure(response);
        }

        let data: unknown;
        try {
          data = await response.json();
        } catch {
          throw new MalformedResponseError("speech", response.status, "body is not valid JSON");
        }

        return this.parseRecognition(response.status, data, request.language);
      }
    );
  }

  /**
   * Request a fresh token from the token endpoint, bypassing the cache.
   * Every failure except a timeout is reported as an AuthError: a wrong key
   * is rejected with 401 and a wrong region fails to resolve at all.
   */
  private async issueToken(): Promise<string> {
    try {
      return await fetchUpstream(
        this.tokenEndpoint,
        {
          method: "POST",
          headers: { "Ocp-Apim-Subscription-Key": this.key },
        },
        { service: "speech", operation: "issue token", timeoutMs: this.timeoutMs },
        async (response) => {
          if (!response.ok) {
            const failure = await readUpstreamFailure(response);
            throw new AuthError("speech", failure.message, response.status);
          }

          const token = (await response.text()).trim();
          if (token === "") {
            throw new AuthError("speech", "token endpoint returned an empty token", response.status);
          }
          return token;
        }
      );
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw new AuthError(
          "speech",
          `token endpoint for region "${this.region}" unreachable: ${error.message}`
        );
      }
      throw error;
    }
  }

  private async upstreamFailure(response: Response): Promise<UpstreamError> {
    // A rejected bearer token should not be reused
    if (response.status === 401) {
      this.tokens.invalidate();
    }
    return new UpstreamError("speech", await readUpstreamFailure(response));
  }

  /**
   * Expected shape (detailed format):
   * `{ RecognitionStatus, DisplayText, Offset, Duration, NBest: [{ Confidence, Display }] }`
   */
  private parseRecognition(status: number, data: unknown, language: string): RecognitionResult {
    if (!isRecord(data)) {
      throw new MalformedResponseError("speech", status, "expected a JSON object");
    }

    const recognitionStatus = data["RecognitionStatus"];

    if (isNoSpeechStatus(recognitionStatus)) {
      return { text: "", status: recognitionStatus, language };
    }

    if (recognitionStatus !== "Success") {
      throw new MalformedResponseError(
        "speech",
        status,
        `recognition status ${String(recognitionStatus)}`
      );
    }

    const nBest = data["NBest"];
    const best: unknown = Array.isArray(nBest) ? nBest[0] : undefined;
    const displayText = data["DisplayText"];
    const bestDisplay = isRecord(best) ? best["Display"] : undefined;
    const text =
      typeof displayText === "string"
        ? displayText
        : typeof bestDisplay === "string"
          ? bestDisplay
          : undefined;

    if (text === undefined) {
      throw new MalformedResponseError("speech", status, "recognition result has no text");
    }

    const result: {
      text: string;
      status: RecognitionStatus;
      language: string;
      confidence?: number;
      offsetMs?: number;
      durationMs?: number;
    } = { text, status: "Success", language };

    const confidence = isRecord(best) ? best["Confidence"] : undefined;
    if (typeof confidence === "number") {
      result.confidence = confidence;
    }
    const offset = data["Offset"];
    if (typeof offset === "number") {
      result.offsetMs = offset / TICKS_PER_MS;
    }
    const duration = data["Duration"];
    if (typeof duration === "number") {
      result.durationMs = duration / TICKS_PER_MS;
    }

    return result;
  }
}

function isNoSpeechStatus(value: unknown): value is RecognitionStatus {
  return NO_SPEECH_STATUSES.some((status) => status === value);
}

export function createAzureSpeechClient(
  options: Readonly<AzureSpeechClientOptions>
): AzureSpeechClient {
  return new AzureSpeechClient(options);
}
