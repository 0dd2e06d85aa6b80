/**
 * Progress Indicators for CLI
 *
 * Spinners for operations that touch the secrets backend or shared store.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";

/**
 * Start a spinner, or a silent one when output is JSON
 */
export function createSpinner(text: string, silent: boolean = false): Ora {
  return ora({ text, color: "cyan", isSilent: silent }).start();
}

export function completeSpinner(spinner: Ora, success: boolean, text: string): void {
  if (success) {
    spinner.succeed(chalk.green(text));
  } else {
    spinner.fail(chalk.red(text));
  }
}
