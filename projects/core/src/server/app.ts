/**
 * Local HTTP surface: the JSON API used by the front end plus the static
 * page and assets.
 *
 * Every API request is validated before any upstream call, dispatched to
 * exactly one client method, and answered with either the result or the
 * error contract from errorResponse.ts. Nothing is cached.
 */
import { isAbsolute, join, relative } from "node:path";

import { serveStatic } from "@hono/node-server/serve-static";
import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";

import { ServiceError } from "../errors/ServiceError.js";
import { ValidationError } from "../errors/ValidationError.js";
import type { IASR } from "../interfaces/IASR.js";
import type { ISpeechAuth } from "../interfaces/ISpeechAuth.js";
import type { ITranslator } from "../interfaces/ITranslator.js";
import type { ITTS } from "../interfaces/ITTS.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { resolveVoice } from "../services/speech/voices.js";
import { notFoundBody, toErrorResponse } from "./errorResponse.js";
import {
  inferAudioFormat,
  MAX_AUDIO_BYTES,
  parsePayload,
  recognizeParamsSchema,
  synthesizeRequestSchema,
  translateRequestSchema,
} from "./schemas.js";

export interface AppDependencies {
  readonly translator: ITranslator;
  readonly tts: ITTS;
  readonly asr: IASR;
  readonly speechAuth: ISpeechAuth;
  readonly logger?: Logger;
  /** Directory holding index.html and assets. Static routes are skipped when absent. */
  readonly staticDir?: string;
  /** CORS origins. Default: ["*"] */
  readonly allowedOrigins?: readonly string[];
}

const NO_STORE = "no-store";

/**
 * Read a JSON body, reporting malformed JSON as a validation failure.
 */
async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw ValidationError.forField("", "body must be valid JSON");
  }
}

interface AudioUpload {
  readonly audio: Uint8Array;
  readonly language: string | undefined;
  readonly format: string | undefined;
}

const audioTooLarge = () =>
  ValidationError.forField("audio", `must be at most ${MAX_AUDIO_BYTES} bytes`);

/**
 * bodyLimit aborts a chunked upload mid-read with an error of this name.
 */
function isBodyLimitError(error: unknown): boolean {
  return error instanceof Error && error.name === "BodyLimitError";
}

/**
 * Accept either a multipart form with an `audio` file or a raw audio body
 * with `language`/`format` in the query string.
 */
async function readAudioUpload(c: Context): Promise<AudioUpload> {
  const contentType = c.req.header("content-type");

  if (contentType?.toLowerCase().startsWith("multipart/form-data")) {
    let form: FormData;
    try {
      form = await c.req.formData();
    } catch (error) {
      if (isBodyLimitError(error)) {
        throw audioTooLarge();
      }
      throw ValidationError.forField("", "body must be valid multipart/form-data");
    }
    const file = form.get("audio");
    if (file === null || typeof file === "string") {
      throw ValidationError.forField("audio", "must be an uploaded audio file");
    }
    const language = form.get("language");
    const format = form.get("format");
    return {
      audio: new Uint8Array(await file.arrayBuffer()),
      language: typeof language === "string" && language !== "" ? language : undefined,
      format: typeof format === "string" && format !== "" ? format : inferAudioFormat(file.type),
    };
  }

  let body: ArrayBuffer;
  try {
    body = await c.req.arrayBuffer();
  } catch (error) {
    if (isBodyLimitError(error)) {
      throw audioTooLarge();
    }
    throw error;
  }
  return {
    audio: new Uint8Array(body),
    language: c.req.query("language") || undefined,
    format: c.req.query("format") || inferAudioFormat(contentType),
  };
}

/**
 * serveStatic resolves its root against the working directory.
 */
function toServeRoot(dir: string): string {
  return isAbsolute(dir) ? relative(process.cwd(), dir) || "." : dir;
}

export function createApp(deps: Readonly<AppDependencies>): Hono {
  const { translator, tts, asr, speechAuth } = deps;
  const logger = (deps.logger ?? createSilentLogger()).child({ component: "router" });
  const allowedOrigins = deps.allowedOrigins ?? ["*"];

  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: allowedOrigins.includes("*") ? "*" : [...allowedOrigins],
      allowMethods: ["GET", "POST", "OPTIONS"],
    })
  );

  app.use("*", async (c, next) => {
    const start = performance.now();
    await next();
    const status = c.res.status;
    const data = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - start),
    };
    if (status >= 500) {
      logger.error("Request failed", data);
    } else if (status >= 400) {
      logger.warn("Request failed", data);
    } else {
      logger.info("Request completed", data);
    }
  });

  app.onError((error, c) => {
    const response = toErrorResponse(error);
    if (response.body.error.type === "InternalError") {
      logger.error("Unhandled error", error, { path: c.req.path });
    } else if (error instanceof ServiceError) {
      logger.warn("Upstream call failed", {
        path: c.req.path,
        service: error.service,
        code: error.code,
        reason: error.message,
      });
    }
    return c.json(response.body, response.status, { ...response.headers });
  });

  app.notFound((c) => c.json(notFoundBody(c.req.method, c.req.path), 404));

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/api/translate", async (c) => {
    const body = parsePayload(translateRequestSchema, await readJsonBody(c));
    const result = await translator.translate(body);
    return c.json(result);
  });

  app.post("/api/speech/synthesize", async (c) => {
    const body = parsePayload(synthesizeRequestSchema, await readJsonBody(c));
    const { voice, language } = resolveVoice(body.voice, body.language);

    const result = await tts.synthesize({
      text: body.text,
      voice,
      language,
      format: body.format,
      ...(body.rate !== undefined ? { rate: body.rate } : {}),
    });

    return new Response(result.audio, {
      status: 200,
      headers: {
        "Content-Type": result.contentType,
        "Cache-Control": NO_STORE,
      },
    });
  });

  app.post(
    "/api/speech/recognize",
    bodyLimit({
      maxSize: MAX_AUDIO_BYTES,
      onError: (c) => {
        const response = toErrorResponse(audioTooLarge());
        return c.json(response.body, response.status);
      },
    }),
    async (c) => {
      const upload = await readAudioUpload(c);
      if (upload.audio.byteLength === 0) {
        throw ValidationError.forField("audio", "must not be empty");
      }

      const params = parsePayload(recognizeParamsSchema, {
        language: upload.language,
        format: upload.format,
      });

      const result = await asr.recognize({
        audio: upload.audio,
        format: params.format,
        language: params.language,
      });
      return c.json(result);
    }
  );

  // Lets the page use the browser speech SDK without ever seeing the key
  app.get("/speech/config", (c) => c.json({ region: speechAuth.region }));

  app.post("/speech/token", async (c) => {
    const token = await speechAuth.getToken();
    c.header("Cache-Control", NO_STORE);
    return c.text(token);
  });

  if (deps.staticDir !== undefined) {
    const root = toServeRoot(deps.staticDir);
    app.get("/", serveStatic({ path: join(root, "index.html") }));
    app.get(
      "/static/*",
      serveStatic({
        root,
        rewriteRequestPath: (path) => path.replace(/^\/static/, ""),
      })
    );
  }

  return app;
}
