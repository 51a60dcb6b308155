import { z } from "zod";

import { InvalidConfigError } from "../errors/ConfigError.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import {
  loadCredentials,
  type Credentials,
  type Environment,
} from "./Credentials.js";

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_TRANSLATOR_ENDPOINT =
  "https://api.cognitive.microsofttranslator.com";
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 15000;
/** Speech tokens live 10 minutes upstream; refresh a minute early. */
export const DEFAULT_SPEECH_TOKEN_TTL_MS = 9 * 60 * 1000;
export const DEFAULT_STATIC_DIR = "projects/core/public";

/**
 * Settings that have defaults and may be overridden from the environment.
 */
export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly translatorEndpoint: string;
  readonly upstreamTimeoutMs: number;
  readonly speechTokenTtlMs: number;
  /** Kill whatever holds the port before binding. */
  readonly reclaimPort: boolean;
  readonly logLevel: LogLevel;
  readonly staticDir: string;
  readonly allowedOrigins: readonly string[];
}

export interface AppConfig {
  readonly credentials: Credentials;
  readonly server: ServerConfig;
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ["true", "false", "1", "0", "yes", "no"].includes(value), {
    message: "expected true or false",
  })
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  HOST: z.string().trim().min(1).default(DEFAULT_HOST),
  TRANSLATOR_ENDPOINT: z
    .string()
    .trim()
    .url()
    .transform((url) => url.replace(/\/+$/, ""))
    .default(DEFAULT_TRANSLATOR_ENDPOINT),
  UPSTREAM_TIMEOUT_MS: positiveInt.default(DEFAULT_UPSTREAM_TIMEOUT_MS),
  SPEECH_TOKEN_TTL_MS: positiveInt.default(DEFAULT_SPEECH_TOKEN_TTL_MS),
  RECLAIM_PORT: booleanFlag.optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  STATIC_DIR: z.string().trim().min(1).default(DEFAULT_STATIC_DIR),
  ALLOWED_ORIGINS: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    )
    .default("*"),
  CI: z.string().optional(),
});

/**
 * Drop empty strings so blank variables fall back to their defaults.
 */
function withoutBlankValues(env: Environment): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Read optional server settings from the environment.
 *
 * @throws {InvalidConfigError} Naming every variable that failed validation
 */
export function loadServerConfig(env: Environment): ServerConfig {
  const parsed = serverEnvSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues.map(
      (issue) => `${String(issue.path[0])}: ${issue.message}`
    );
    throw new InvalidConfigError(keys, details);
  }

  const data = parsed.data;
  const allowedOrigins = data.ALLOWED_ORIGINS.length > 0 ? data.ALLOWED_ORIGINS : ["*"];

  return Object.freeze({
    port: data.PORT,
    host: data.HOST,
    translatorEndpoint: data.TRANSLATOR_ENDPOINT,
    upstreamTimeoutMs: data.UPSTREAM_TIMEOUT_MS,
    speechTokenTtlMs: data.SPEECH_TOKEN_TTL_MS,
    // Reclamation is destructive, so it is off by default on CI machines.
    reclaimPort: data.RECLAIM_PORT ?? data.CI === undefined,
    logLevel: data.LOG_LEVEL,
    staticDir: data.STATIC_DIR,
    allowedOrigins: Object.freeze(allowedOrigins),
  });
}

/**
 * Build the complete application configuration.
 * Credentials are checked first so a fresh checkout reports every missing key.
 *
 * @throws {MissingConfigError | InvalidConfigError}
 */
export function loadConfig(env: Environment): AppConfig {
  const credentials = loadCredentials(env);
  const server = loadServerConfig(env);
  return Object.freeze({ credentials, server });
}
