import { describe, it, expect } from "vitest";

import { getSupportedDefaultLocales, normalizeLocale, resolveVoice } from "../voices.js";
import { ValidationError } from "../../../errors/ValidationError.js";

describe("normalizeLocale()", () => {
  it("maps a bare language to its primary locale", () => {
    expect(normalizeLocale("es")).toBe("es-ES");
    expect(normalizeLocale("EN")).toBe("en-US");
  });

  it("passes full locales through", () => {
    expect(normalizeLocale("es-MX")).toBe("es-MX");
  });
});

describe("resolveVoice()", () => {
  it("uses the default voice for a language", () => {
    expect(resolveVoice(undefined, "ko")).toEqual({ voice: "ko-KR-SunHiNeural", language: "ko-KR" });
    expect(resolveVoice(undefined, "zh-CN")).toEqual({
      voice: "zh-CN-XiaoxiaoNeural",
      language: "zh-CN",
    });
  });

  it("keeps an explicit voice and infers its locale from the name", () => {
    expect(resolveVoice("en-GB-RyanNeural")).toEqual({
      voice: "en-GB-RyanNeural",
      language: "en-GB",
    });
  });

  it("prefers an explicit language over the voice name", () => {
    expect(resolveVoice("en-US-JennyMultilingualNeural", "fr")).toEqual({
      voice: "en-US-JennyMultilingualNeural",
      language: "fr-FR",
    });
  });

  it("requires a voice or a language", () => {
    try {
      resolveVoice();
      expect.fail("expected resolveVoice to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([{ field: "voice", message: "provide a voice or a language" }]);
      }
    }
  });

  it("rejects a voice whose locale cannot be inferred", () => {
    expect(() => resolveVoice("CustomVoice")).toThrow(ValidationError);
  });

  it("rejects a language without a default voice", () => {
    expect(() => resolveVoice(undefined, "sw-KE")).toThrow(/no default voice for "sw-KE"/);
  });

  it("has a default for every primary locale", () => {
    for (const language of ["en", "es", "fr", "de", "it", "pt", "ja", "ko", "zh", "hi"]) {
      expect(getSupportedDefaultLocales()).toContain(normalizeLocale(language));
    }
  });
});
