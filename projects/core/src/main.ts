/**
 * Entry point: load configuration, start the relay, stop it on exit.
 */
import { config as loadDotenv } from "dotenv";

import { loadConfig, type AppConfig } from "./config/ServerConfig.js";
import { ConfigError } from "./errors/ConfigError.js";
import { createLogger } from "./logging/logger.js";
import { createRelay } from "./relay.js";

const SERVICE_NAME = "lingua-relay";

async function main(): Promise<void> {
  loadDotenv();

  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      // Fatal before any port is bound
      createLogger({ service: SERVICE_NAME }).error("Invalid configuration", error);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createLogger({ service: SERVICE_NAME, minLevel: config.server.logLevel });
  const { lifecycle } = createRelay({ config, logger });

  lifecycle.registerExitHandlers();

  try {
    await lifecycle.start();
  } catch (error) {
    logger.error("Failed to start server", error);
    await lifecycle.stop();
    process.exit(1);
  }
}

void main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
