/**
 * Rotation Commands - Inspect and run secret rotation
 *
 * - status: Schedule of every managed secret
 * - run: Rotate one secret, or every secret that is due
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { JsonOption, RotationRunOptions } from "../utils/validation.js";
import { completeSpinner, createSpinner } from "../output/progress.js";
import {
  createRotationResultTable,
  createRotationStatusTable,
  formatJson,
} from "../output/formatters.js";
import type { RotationResult } from "../../rotation/types.js";

export async function rotationStatusCommand(
  options: JsonOption,
  deps: CliDependencies
): Promise<void> {
  const statuses = deps.context.rotation.getRotationStatus();

  if (options.json) {
    console.log(formatJson(statuses));
    return;
  }

  console.log(chalk.bold("\nSecret Rotation Schedule\n"));
  console.log(createRotationStatusTable(statuses));
  const due = statuses.filter((status) => status.dueForRotation).length;
  if (due > 0) {
    console.log(
      "\n" + chalk.yellow(`${due} secret(s) due. Run `) + chalk.gray("fguard rotation run")
    );
  }
}

/**
 * Rotate `secretName`, or every due secret when it is omitted
 *
 * A failed rotation sets exit code 1 after the results are printed.
 */
export async function rotationRunCommand(
  secretName: string | undefined,
  options: RotationRunOptions,
  deps: CliDependencies
): Promise<void> {
  const { rotation } = deps.context;
  const target = secretName ?? "due secrets";
  const spinner = createSpinner(`Rotating ${chalk.cyan(target)}...`, options.json === true);

  let results: RotationResult[];
  try {
    results =
      secretName === undefined
        ? await rotation.rotateDueSecrets()
        : [await rotation.rotate(secretName, options.force === true)];
  } catch (error) {
    completeSpinner(spinner, false, `Rotation of ${target} failed`);
    throw error;
  }

  const failed = results.filter(
    (result) => result.outcome === "failed" || result.outcome === "unknown_secret"
  );
  completeSpinner(
    spinner,
    failed.length === 0,
    failed.length === 0 ? `Rotation of ${target} finished` : `${failed.length} rotation(s) failed`
  );

  if (options.json) {
    console.log(formatJson(results));
  } else {
    console.log(createRotationResultTable(results));
  }

  if (failed.length > 0) {
    process.exitCode = 1;
  }
}
