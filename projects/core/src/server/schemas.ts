/**
 * Request payload schemas for the local API.
 */
import { z } from "zod";

import { ValidationError } from "../errors/ValidationError.js";
import { RECOGNITION_FORMATS } from "../interfaces/IASR.js";
import { AUTO_DETECT } from "../interfaces/ITranslator.js";
import { SYNTHESIS_FORMATS } from "../interfaces/ITTS.js";

/** Upstream limit for a single translate request. */
export const MAX_TRANSLATION_CHARS = 50000;
export const MAX_SYNTHESIS_CHARS = 5000;
/** Short-audio recognition accepts at most 60 seconds, far below this. */
export const MAX_AUDIO_BYTES = 10 * 1024 * 1024;
export const DEFAULT_RECOGNITION_LANGUAGE = "en-US";

const LOCALE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

export const localeCode = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .trim()
  .regex(LOCALE_PATTERN, 'must be a locale code such as "es" or "en-US"');

export const translateRequestSchema = z.object({
  sourceText: z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .trim()
    .min(1, "must not be empty")
    .max(MAX_TRANSLATION_CHARS, `must be at most ${MAX_TRANSLATION_CHARS} characters`),
  targetLanguage: localeCode,
  sourceLanguage: z.union([z.literal(AUTO_DETECT), localeCode]).default(AUTO_DETECT),
});

export const synthesizeRequestSchema = z.object({
  text: z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .trim()
    .min(1, "must not be empty")
    .max(MAX_SYNTHESIS_CHARS, `must be at most ${MAX_SYNTHESIS_CHARS} characters`),
  voice: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9:_-]+$/, "must be a voice name such as \"en-US-JennyNeural\"")
    .optional(),
  language: localeCode.optional(),
  format: z.enum(SYNTHESIS_FORMATS).default("mp3"),
  rate: z.number().min(0.5).max(2).optional(),
});

export const recognizeParamsSchema = z.object({
  language: localeCode.default(DEFAULT_RECOGNITION_LANGUAGE),
  format: z.enum(RECOGNITION_FORMATS, {
    required_error: "is required (wav or ogg)",
    invalid_type_error: "must be wav or ogg",
  }),
});

export type TranslateRequestBody = z.infer<typeof translateRequestSchema>;
export type SynthesizeRequestBody = z.infer<typeof synthesizeRequestSchema>;
export type RecognizeParams = z.infer<typeof recognizeParamsSchema>;

/**
 * Validate a payload, converting schema issues into a ValidationError.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Guess the recognition format from a MIME type.
 */
export function inferAudioFormat(contentType: string | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const type = contentType.toLowerCase();
  if (type.includes("wav") || type.includes("wave")) {
    return "wav";
  }
  if (type.includes("ogg") || type.includes("opus")) {
    return "ogg";
  }
  return undefined;
}
