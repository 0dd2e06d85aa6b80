/**
 * Dependency Initialization for CLI
 *
 * Builds the same guard context the HTTP server uses, minus the background
 * rotation scheduler: a CLI run is one-shot and must exit when done.
 */

import type { Logger } from "pino";
import { loadGuardConfig } from "../../config/guard-config.js";
import type { Env } from "../../config/env.js";
import { getComponentLogger, initializeLogger } from "../../logging/index.js";
import { createGuardContext } from "../../pipeline/guard-context.js";
import type { GuardContext } from "../../pipeline/guard-context.js";

/**
 * All dependencies required by CLI commands
 */
export interface CliDependencies {
  context: GuardContext;
  logger: Logger;
}

/**
 * Initialize the guard context for a command
 *
 * Logs default to `warn` so command output stays readable; `LOG_LEVEL`
 * still overrides.
 *
 * @throws {ConfigError} If an environment variable does not parse
 * @throws {StoreUnavailableError} If Redis is configured but unreachable
 */
export async function initializeDependencies(env: Env = process.env): Promise<CliDependencies> {
  const config = loadGuardConfig(env);
  initializeLogger({
    level: env["LOG_LEVEL"] === undefined ? "warn" : config.logging.level,
    format: env["LOG_FORMAT"] === undefined ? "pretty" : config.logging.format,
  });

  const logger = getComponentLogger("cli");
  const context = await createGuardContext(
    { ...config, rotation: { ...config.rotation, enabled: false } },
    { env }
  );
  logger.debug({ store: context.store.kind }, "CLI dependencies initialized");

  return { context, logger };
}

/**
 * Run `command` with freshly built dependencies and always close them
 */
export async function withDependencies<T>(
  command: (deps: CliDependencies) => Promise<T>,
  init: () => Promise<CliDependencies> = initializeDependencies
): Promise<T> {
  const deps = await init();
  try {
    return await command(deps);
  } finally {
    await deps.context.close();
  }
}
