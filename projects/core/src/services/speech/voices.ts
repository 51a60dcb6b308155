/**
 * Default neural voices and voice/locale resolution.
 */
import { ValidationError } from "../../errors/ValidationError.js";

/**
 * Voice used when a request names a locale but no voice.
 */
const DEFAULT_VOICES: Readonly<Record<string, string>> = {
  "en-US": "en-US-JennyNeural",
  "en-GB": "en-GB-SoniaNeural",
  "es-ES": "es-ES-ElviraNeural",
  "es-MX": "es-MX-DaliaNeural",
  "fr-FR": "fr-FR-DeniseNeural",
  "de-DE": "de-DE-KatjaNeural",
  "it-IT": "it-IT-ElsaNeural",
  "pt-BR": "pt-BR-FranciscaNeural",
  "ja-JP": "ja-JP-NanamiNeural",
  "ko-KR": "ko-KR-SunHiNeural",
  "zh-CN": "zh-CN-XiaoxiaoNeural",
  "hi-IN": "hi-IN-SwaraNeural",
};

/**
 * Locale assumed for a bare language code, e.g. "es" speaks as "es-ES".
 */
const PRIMARY_LOCALES: Readonly<Record<string, string>> = {
  en: "en-US",
  es: "es-ES",
  fr: "fr-FR",
  de: "de-DE",
  it: "it-IT",
  pt: "pt-BR",
  ja: "ja-JP",
  ko: "ko-KR",
  zh: "zh-CN",
  hi: "hi-IN",
};

/**
 * Voice names start with their locale, e.g. "zh-CN-XiaoxiaoNeural".
 */
const VOICE_LOCALE_PATTERN = /^([a-z]{2,3}-[A-Z]{2})-/;

export interface ResolvedVoice {
  readonly voice: string;
  readonly language: string;
}

export function getSupportedDefaultLocales(): readonly string[] {
  return Object.keys(DEFAULT_VOICES);
}

/**
 * Map a bare language code to its primary locale; locales pass through.
 */
export function normalizeLocale(language: string): string {
  return PRIMARY_LOCALES[language.toLowerCase()] ?? language;
}

/**
 * Pick the voice and locale for a synthesis request.
 *
 * An explicit voice wins; its locale comes from the request or, failing
 * that, from the voice name. Without a voice the locale's default is used.
 *
 * @throws {ValidationError} If neither yields a usable voice and locale
 */
export function resolveVoice(voice?: string, language?: string): ResolvedVoice {
  if (voice !== undefined) {
    const locale = language !== undefined ? normalizeLocale(language) : VOICE_LOCALE_PATTERN.exec(voice)?.[1];
    if (locale === undefined) {
      throw ValidationError.forField(
        "language",
        `cannot infer a locale from voice "${voice}"; provide language`
      );
    }
    return { voice, language: locale };
  }

  if (language === undefined) {
    throw ValidationError.forField("voice", "provide a voice or a language");
  }

  const locale = normalizeLocale(language);
  const defaultVoice = DEFAULT_VOICES[locale];
  if (defaultVoice === undefined) {
    throw ValidationError.forField(
      "language",
      `no default voice for "${language}"; provide a voice (defaults exist for ${getSupportedDefaultLocales().join(", ")})`
    );
  }
  return { voice: defaultVoice, language: locale };
}
