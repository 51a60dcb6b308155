import { describe, it, expect } from "vitest";

import {
  CREDENTIAL_ENV_KEYS,
  findMissingCredentialKeys,
  loadCredentials,
} from "../Credentials.js";
import { ConfigErrorCode, MissingConfigError } from "../../errors/ConfigError.js";
import { TEST_ENV } from "../../__tests__/testConfig.js";

describe("loadCredentials()", () => {
  it("reads all four credentials", () => {
    const credentials = loadCredentials(TEST_ENV);

    expect(credentials).toEqual({
      translatorKey: "test-translator-key",
      translatorRegion: "westeurope",
      speechKey: "test-speech-key",
      speechRegion: "eastus",
    });
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadCredentials(TEST_ENV))).toBe(true);
  });

  it("trims surrounding whitespace", () => {
    const credentials = loadCredentials({ ...TEST_ENV, SPEECH_REGION: "  eastus \n" });
    expect(credentials.speechRegion).toBe("eastus");
  });

  it("names every missing variable in one error", () => {
    const env = { TRANSLATOR_KEY: "test-translator-key", SPEECH_REGION: "eastus" };

    expect(() => loadCredentials(env)).toThrow(MissingConfigError);
    try {
      loadCredentials(env);
    } catch (error) {
      expect(error).toBeInstanceOf(MissingConfigError);
      if (error instanceof MissingConfigError) {
        expect(error.missingKeys).toEqual(["TRANSLATOR_REGION", "SPEECH_KEY"]);
        expect(error.code).toBe(ConfigErrorCode.MISSING_VALUES);
        expect(error.message).toBe(
          "Missing required environment variables: TRANSLATOR_REGION, SPEECH_KEY"
        );
      }
    }
  });

  it("treats empty and whitespace-only values as missing", () => {
    expect(() => loadCredentials({ ...TEST_ENV, SPEECH_KEY: "", TRANSLATOR_KEY: "   " })).toThrow(
      "Missing required environment variables: TRANSLATOR_KEY, SPEECH_KEY"
    );
  });

  it("never puts a key value into the error message", () => {
    try {
      loadCredentials({ ...TEST_ENV, SPEECH_REGION: undefined });
    } catch (error) {
      expect(error).toBeInstanceOf(MissingConfigError);
      if (error instanceof Error) {
        expect(error.message).not.toContain("test-translator-key");
        expect(error.message).not.toContain("test-speech-key");
      }
    }
  });
});

describe("findMissingCredentialKeys()", () => {
  it("returns nothing for a complete environment", () => {
    expect(findMissingCredentialKeys(TEST_ENV)).toEqual([]);
  });

  it("lists all keys for an empty environment in reporting order", () => {
    expect(findMissingCredentialKeys({})).toEqual(Object.values(CREDENTIAL_ENV_KEYS));
    expect(findMissingCredentialKeys({})).toEqual([
      "TRANSLATOR_KEY",
      "TRANSLATOR_REGION",
      "SPEECH_KEY",
      "SPEECH_REGION",
    ]);
  });
});
