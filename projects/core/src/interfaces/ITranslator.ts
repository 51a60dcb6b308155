/**
 * Source language value asking the service to detect the language itself.
 */
export const AUTO_DETECT = "auto";

export interface TranslationRequest {
  readonly sourceText: string;
  readonly targetLanguage: string;
  /** Locale code, or "auto" to let the service detect it. */
  readonly sourceLanguage: string;
}

export interface TranslationResult {
  readonly translatedText: string;
  /** Present only when the service detected the source language. */
  readonly detectedSourceLanguage?: string;
}

export interface ITranslator {
  /** Single upstream call; never returns a result for a failed call. */
  translate(request: Readonly<TranslationRequest>): Promise<TranslationResult>;
}
