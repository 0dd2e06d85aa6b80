/**
 * Fiscal API Guard - Server Entry Point
 *
 * Loads configuration, builds the guard context and serves the guarded
 * Express app until SIGINT or SIGTERM.
 *
 * Initialization order:
 * 1. Configuration (environment variables, .env)
 * 2. Logger
 * 3. Guard context (store, audit, secrets, rotation, auth, limits)
 * 4. HTTP server
 */

import "dotenv/config";
import { loadGuardConfig } from "./config/guard-config.js";
import { getComponentLogger, initializeLogger } from "./logging/index.js";
import { createGuardContext } from "./pipeline/guard-context.js";
import { createHttpApp, loadHttpConfig, startHttpServer } from "./http/server.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const config = loadGuardConfig();
  initializeLogger(config.logging);
  const logger = getComponentLogger("main");

  logger.info(
    {
      store: config.store.redisUrl ? "redis" : "memory",
      secretsBackend: config.secrets.backend,
      rateLimiting: config.rateLimit.enabled,
      rotation: config.rotation.enabled,
      audit: config.audit.enabled,
      dataPath: config.dataPath,
    },
    "Configuration loaded"
  );

  const context = await createGuardContext(config);
  const httpConfig = loadHttpConfig();
  const app = createHttpApp({ context, version: VERSION, trustProxy: httpConfig.trustProxy });
  const server = await startHttpServer(app, httpConfig);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    server
      .close()
      .then(() => context.close())
      .then(() => {
        logger.info("Shutdown complete");
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, "Error during shutdown");
        process.exitCode = 1;
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  logger.info({ version: VERSION }, "Fiscal API Guard is running");
}

main().catch((error: unknown) => {
  console.error("Failed to start Fiscal API Guard:", error);
  process.exit(1);
});
