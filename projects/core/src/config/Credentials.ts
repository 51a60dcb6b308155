import { MissingConfigError } from "../errors/ConfigError.js";

/**
 * Subscription keys and regions for the two cloud services.
 * Loaded once at startup and never mutated.
 */
export interface Credentials {
  readonly translatorKey: string;
  readonly translatorRegion: string;
  readonly speechKey: string;
  readonly speechRegion: string;
}

/**
 * Environment variable backing each credential field, in reporting order.
 */
export const CREDENTIAL_ENV_KEYS = {
  translatorKey: "TRANSLATOR_KEY",
  translatorRegion: "TRANSLATOR_REGION",
  speechKey: "SPEECH_KEY",
  speechRegion: "SPEECH_REGION",
} as const satisfies Record<keyof Credentials, string>;

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Names of the required variables that are absent, empty or whitespace-only.
 */
export function findMissingCredentialKeys(env: Environment): string[] {
  return Object.values(CREDENTIAL_ENV_KEYS).filter(
    (name) => (env[name] ?? "").trim() === ""
  );
}

/**
 * Read the four required credentials from the environment.
 *
 * @throws {MissingConfigError} Naming every missing variable, not just the first
 */
export function loadCredentials(env: Environment): Credentials {
  const missing = findMissingCredentialKeys(env);
  if (missing.length > 0) {
    throw new MissingConfigError(missing);
  }

  const read = (name: string): string => (env[name] ?? "").trim();

  return Object.freeze({
    translatorKey: read(CREDENTIAL_ENV_KEYS.translatorKey),
    translatorRegion: read(CREDENTIAL_ENV_KEYS.translatorRegion),
    speechKey: read(CREDENTIAL_ENV_KEYS.speechKey),
    speechRegion: read(CREDENTIAL_ENV_KEYS.speechRegion),
  });
}
