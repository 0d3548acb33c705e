// =============================================================================
// @dailysync/server — Entry point
// =============================================================================
// Loads config, wires the production dependencies, ensures the Neo4j schema
// and starts listening.
// =============================================================================

import {
  createDriver,
  createLogger,
  ensureContentSchema,
  errorMessage,
  loadConfig,
} from "@dailysync/shared";
import { createApp, createDependencies } from "./server.js";
import { registerContentTools } from "./tools/content.js";

const config = loadConfig();
const logger = createLogger({ level: config.LOG_LEVEL });
const driver = createDriver(config);

const instance = createApp(createDependencies(config, driver, logger));
const { httpServer, shutdown } = instance;

instance.addToolRegistrar(registerContentTools);

// Idempotent: constraints and indexes are created IF NOT EXISTS
ensureContentSchema(driver, logger).catch((err: unknown) => {
  logger.error("Content schema setup failed (non-fatal)", {
    error: errorMessage(err),
  });
});

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Content server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    provider: config.GENERATION_PROVIDER,
    sources: config.SOURCES.map((s) => s.name),
  });
});

// Signal handlers registered here (not in createApp) so tests that create
// several apps do not accumulate them.
function handleShutdown() {
  shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);
