/**
 * Wires configuration, clients, router and lifecycle together.
 */
import type { Hono } from "hono";

import type { AppConfig } from "./config/ServerConfig.js";
import { ServerLifecycle, type ListenFunction } from "./lifecycle/ServerLifecycle.js";
import { PortReclaimer } from "./lifecycle/PortReclaimer.js";
import type { Logger } from "./logging/logger.js";
import { createApp } from "./server/app.js";
import { AzureSpeechClient } from "./services/speech/AzureSpeechClient.js";
import { AzureTranslatorClient } from "./services/translation/AzureTranslatorClient.js";

export interface Relay {
  readonly app: Hono;
  readonly translator: AzureTranslatorClient;
  readonly speech: AzureSpeechClient;
  readonly lifecycle: ServerLifecycle;
}

export interface CreateRelayOptions {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly reclaimer?: PortReclaimer;
  readonly listen?: ListenFunction;
}

export function createRelay(options: Readonly<CreateRelayOptions>): Relay {
  const { config, logger } = options;
  const { credentials, server } = config;

  const translator = new AzureTranslatorClient({
    credentials,
    endpoint: server.translatorEndpoint,
    timeoutMs: server.upstreamTimeoutMs,
  });

  const speech = new AzureSpeechClient({
    credentials,
    timeoutMs: server.upstreamTimeoutMs,
    tokenTtlMs: server.speechTokenTtlMs,
  });

  const app = createApp({
    translator,
    tts: speech,
    asr: speech,
    speechAuth: speech,
    logger,
    staticDir: server.staticDir,
    allowedOrigins: server.allowedOrigins,
  });

  const lifecycle = new ServerLifecycle({
    fetch: app.fetch,
    port: server.port,
    host: server.host,
    reclaimPort: server.reclaimPort,
    logger,
    ...(options.reclaimer !== undefined ? { reclaimer: options.reclaimer } : {}),
    ...(options.listen !== undefined ? { listen: options.listen } : {}),
  });

  return { app, translator, speech, lifecycle };
}
