/**
 * IP Commands - Inspect and manage the IP block list
 *
 * - status: Counters, violations and block state for one IP
 * - block: Block an IP for a duration
 * - unblock: Lift a block and clear recorded violations
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { IpBlockOptions, JsonOption } from "../utils/validation.js";
import { formatIpStatus, formatJson, formatTimestamp } from "../output/formatters.js";

export async function ipStatusCommand(
  ip: string,
  options: JsonOption,
  deps: CliDependencies
): Promise<void> {
  const status = await deps.context.rateLimiter.getIpStatus(ip);
  console.log(options.json ? formatJson(status) : formatIpStatus(status));
}

export async function ipBlockCommand(
  ip: string,
  options: IpBlockOptions,
  deps: CliDependencies
): Promise<void> {
  const info = await deps.context.rateLimiter.block(ip, options.duration, options.reason);
  console.log(
    chalk.green("✓ ") +
      `Blocked ${chalk.cyan(ip)} until ${formatTimestamp(info.expiresAt)} (${info.reason})`
  );
}

export async function ipUnblockCommand(ip: string, deps: CliDependencies): Promise<void> {
  const wasBlocked = await deps.context.rateLimiter.unblock(ip);
  if (wasBlocked) {
    console.log(chalk.green("✓ ") + `Unblocked ${chalk.cyan(ip)}`);
  } else {
    console.log(chalk.yellow(`${ip} was not blocked`) + chalk.gray(" (violations cleared)"));
  }
}
