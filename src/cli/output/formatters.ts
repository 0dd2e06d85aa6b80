/**
 * Output Formatters for CLI
 *
 * Tables for terminal output and plain JSON for `--json`.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { AuditEvent } from "../../logging/audit-types.js";
import type { IpStatus } from "../../ratelimit/types.js";
import type { CircuitState, CircuitStatus } from "../../resilience/types.js";
import type { RotationResult, RotationStatus } from "../../rotation/types.js";

/**
 * Format an ISO timestamp for display
 *
 * Empty and unparseable values are shown as-is, or as "never".
 */
export function formatTimestamp(isoDate: string | undefined): string {
  if (!isoDate) return "never";
  const date = new Date(isoDate);
  if (isNaN(date.getTime())) return isoDate;
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function colorCircuitState(state: CircuitState): string {
  switch (state) {
    case "closed":
      return chalk.green(state);
    case "half_open":
      return chalk.yellow(state);
    case "open":
      return chalk.red(state);
  }
}

function colorRotationOutcome(outcome: RotationResult["outcome"]): string {
  switch (outcome) {
    case "rotated":
      return chalk.green(outcome);
    case "not_due":
      return chalk.gray(outcome);
    case "failed":
    case "unknown_secret":
      return chalk.red(outcome);
  }
}

/**
 * Rotation schedules, soonest first
 */
export function createRotationStatusTable(statuses: readonly RotationStatus[]): string {
  if (statuses.length === 0) {
    return chalk.yellow("No secrets are scheduled for rotation.");
  }

  const table = new Table({
    head: ["Secret", "Type", "Every", "Last Rotated", "Next Rotation", "Due", "Count"].map((h) =>
      chalk.cyan(h)
    ),
  });

  const sorted = [...statuses].sort((a, b) => a.daysUntilRotation - b.daysUntilRotation);
  for (const status of sorted) {
    table.push([
      status.secretName,
      status.secretType,
      `${status.rotationDays}d`,
      formatTimestamp(status.lastRotated),
      formatTimestamp(status.nextRotation),
      status.dueForRotation ? chalk.red("yes") : chalk.green(`in ${status.daysUntilRotation}d`),
      String(status.rotationCount),
    ]);
  }

  return table.toString();
}

export function createRotationResultTable(results: readonly RotationResult[]): string {
  if (results.length === 0) {
    return chalk.gray("No secrets were due for rotation.");
  }

  const table = new Table({
    head: ["Secret", "Outcome", "Next Rotation", "Error"].map((h) => chalk.cyan(h)),
  });
  for (const result of results) {
    table.push([
      result.secretName,
      colorRotationOutcome(result.outcome),
      formatTimestamp(result.schedule?.nextRotation),
      result.error ?? "",
    ]);
  }
  return table.toString();
}

/**
 * Block state, violations and per-endpoint counters for one IP
 */
export function formatIpStatus(status: IpStatus): string {
  if (!status.available) {
    return chalk.yellow(`Rate limit state for ${status.ip} is unavailable (store unreachable).`);
  }

  const lines: string[] = [
    chalk.bold(`IP ${status.ip}`),
    `  Blocked:    ${status.blocked ? chalk.red("yes") : chalk.green("no")}`,
    `  Violations: ${status.violations}`,
  ];
  if (status.blockInfo) {
    lines.push(`  Reason:     ${status.blockInfo.reason}`);
    lines.push(`  Expires:    ${formatTimestamp(status.blockInfo.expiresAt)}`);
  }

  const endpoints = Object.entries(status.endpoints);
  if (endpoints.length > 0) {
    const table = new Table({
      head: ["Endpoint", "Requests", "Window Resets In"].map((h) => chalk.cyan(h)),
    });
    for (const [endpoint, usage] of endpoints) {
      table.push([endpoint, String(usage.count), `${usage.ttlSeconds}s`]);
    }
    lines.push("", table.toString());
  }

  return lines.join("\n");
}

export function createCircuitTable(statuses: Readonly<Record<string, CircuitStatus>>): string {
  const entries = Object.values(statuses);
  if (entries.length === 0) {
    return chalk.yellow("No circuit breakers registered.");
  }

  const table = new Table({
    head: ["Service", "State", "Failures", "Recovery", "Last Failure", "Shared"].map((h) =>
      chalk.cyan(h)
    ),
  });
  for (const status of entries) {
    table.push([
      status.serviceName,
      colorCircuitState(status.state),
      `${status.failureCount}/${status.failureThreshold}`,
      `${status.recoveryTimeoutSeconds}s`,
      formatTimestamp(status.lastFailureAt),
      status.storeBacked ? "yes" : "no",
    ]);
  }
  return table.toString();
}

export function createAuditTable(events: readonly AuditEvent[]): string {
  if (events.length === 0) {
    return chalk.yellow("No audit events recorded.");
  }

  const table = new Table({
    head: ["Time", "Event", "Status", "Subject", "Source IP", "Description"].map((h) =>
      chalk.cyan(h)
    ),
    colWidths: [21, 24, 9, 24, 17, 50],
    wordWrap: true,
  });
  for (const event of events) {
    table.push([
      formatTimestamp(event.timestamp),
      event.eventType,
      event.status === "success" ? chalk.green(event.status) : chalk.red(event.status),
      event.subjectId ?? "",
      event.sourceIp ?? "",
      event.description ?? "",
    ]);
  }
  return table.toString();
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
