/**
 * Public exports of the relay core.
 */

// Configuration
export {
  loadCredentials,
  findMissingCredentialKeys,
  CREDENTIAL_ENV_KEYS,
  type Credentials,
  type Environment,
} from "./config/Credentials.js";
export {
  loadConfig,
  loadServerConfig,
  DEFAULT_PORT,
  type AppConfig,
  type ServerConfig,
} from "./config/ServerConfig.js";

// Errors
export * from "./errors/ConfigError.js";
export * from "./errors/LifecycleError.js";
export * from "./errors/ServiceError.js";
export * from "./errors/ValidationError.js";

// Interfaces
export * from "./interfaces/IASR.js";
export * from "./interfaces/ISpeechAuth.js";
export * from "./interfaces/ITranslator.js";
export * from "./interfaces/ITTS.js";

// Logging
export {
  Logger,
  createLogger,
  createSilentLogger,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
} from "./logging/logger.js";

// Services
export {
  AzureTranslatorClient,
  createAzureTranslatorClient,
  type AzureTranslatorClientOptions,
} from "./services/translation/AzureTranslatorClient.js";
export {
  AzureSpeechClient,
  createAzureSpeechClient,
  type AzureSpeechClientOptions,
} from "./services/speech/AzureSpeechClient.js";
export {
  SpeechTokenCache,
  createSpeechTokenCache,
  type SpeechTokenCacheOptions,
} from "./services/speech/SpeechTokenCache.js";

// Server
export { createApp, type AppDependencies } from "./server/app.js";
export { toErrorResponse, type ErrorBody, type ErrorResponse } from "./server/errorResponse.js";

// Lifecycle
export {
  PortReclaimer,
  createPortReclaimer,
  systemPortProbe,
  type PortProbe,
  type PortCheckOutcome,
} from "./lifecycle/PortReclaimer.js";
export {
  ServerLifecycle,
  createServerLifecycle,
  nodeListen,
  type ServerHandle,
  type ServerState,
  type ListenFunction,
} from "./lifecycle/ServerLifecycle.js";

export { createRelay, type Relay, type CreateRelayOptions } from "./relay.js";
