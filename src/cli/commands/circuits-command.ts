/**
 * Circuits Command - Show circuit breaker state per downstream service
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { JsonOption } from "../utils/validation.js";
import { createCircuitTable, formatJson } from "../output/formatters.js";

export async function circuitsStatusCommand(
  options: JsonOption,
  deps: CliDependencies
): Promise<void> {
  const statuses = await deps.context.circuits.getAllStatus();

  if (options.json) {
    console.log(formatJson(statuses));
    return;
  }

  console.log(chalk.bold("\nCircuit Breakers\n"));
  console.log(createCircuitTable(statuses));
  if (deps.context.store.kind === "memory") {
    console.log(
      "\n" + chalk.gray("In-process store: state shown is this process only, not the server's.")
    );
  }
}
