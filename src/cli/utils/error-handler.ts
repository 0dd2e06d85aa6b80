/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps guard errors to readable messages with next steps and sets the
 * process exit code.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import { ConfigError, GuardError } from "../../errors.js";
import { SecretNotFoundError, SecretsBackendError } from "../../secrets/errors.js";
import { StoreUnavailableError } from "../../store/errors.js";

/**
 * Print a formatted error and set exit code 1
 *
 * Stops the spinner first, if one is running. The process is left to exit
 * on its own so open connections can close.
 */
export function handleCommandError(error: unknown, spinner?: Ora): void {
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }
  process.exitCode = 1;

  console.error();

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.issues) {
      const field = issue.path.join(".");
      console.error(`  • ${field ? `${field}: ` : ""}${issue.message}`);
    }
    console.error("\nRun " + chalk.gray("fguard <command> --help") + " for usage.");
    return;
  }

  if (error instanceof ConfigError) {
    console.error(chalk.red("✗ Configuration Error"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(`  • Fix ${chalk.cyan(error.variable)} in the environment or .env file`);
    return;
  }

  if (error instanceof StoreUnavailableError) {
    console.error(chalk.red("✗ Shared Store Unavailable"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error(
      "  • Check that Redis is running and " + chalk.cyan("REDIS_URL") + " is correct"
    );
    console.error("  • Or unset " + chalk.cyan("REDIS_URL") + " to use the in-process store");
    return;
  }

  if (error instanceof SecretNotFoundError || error instanceof SecretsBackendError) {
    console.error(chalk.red("✗ Secrets Backend Error"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Next steps:"));
    console.error("  • Verify " + chalk.cyan("SECRETS_BACKEND") + " and its connection settings");
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    return;
  }

  if (error instanceof GuardError) {
    console.error(chalk.red(`✗ ${error.message}`));
    console.error(chalk.gray(`  code: ${error.code}`));
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    return;
  }

  console.error(chalk.red("✗ Unexpected Error"));
  console.error(`\n${error instanceof Error ? error.message : String(error)}`);
  console.error(
    "\nEnable verbose logging: " + chalk.gray("LOG_LEVEL=debug fguard <command>")
  );
}
