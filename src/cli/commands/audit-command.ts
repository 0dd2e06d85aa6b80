/**
 * Audit Command - Show recent security events
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { AuditRecentOptions } from "../utils/validation.js";
import { createAuditTable, formatJson } from "../output/formatters.js";
import type { AuditEvent } from "../../logging/audit-types.js";

/**
 * Newest events first, filtered by subject and/or event type
 */
export function selectAuditEvents(
  options: AuditRecentOptions,
  deps: CliDependencies
): AuditEvent[] {
  const { audit } = deps.context;
  const { limit, type, user } = options;

  if (user !== undefined) {
    const events = audit.getUserEvents(user, type === undefined ? limit : Number.MAX_SAFE_INTEGER);
    return (type === undefined ? events : events.filter((e) => e.eventType === type)).slice(
      0,
      limit
    );
  }
  if (type !== undefined) {
    return audit.getEventsByType(type, limit);
  }
  return audit.getRecentEvents(limit);
}

export async function auditRecentCommand(
  options: AuditRecentOptions,
  deps: CliDependencies
): Promise<void> {
  if (!deps.context.audit.isEnabled()) {
    console.log(chalk.yellow("Audit logging is disabled (AUDIT_LOG_ENABLED=false)."));
    return;
  }

  const events = selectAuditEvents(options, deps);
  if (options.json) {
    console.log(formatJson(events));
    return;
  }

  console.log(chalk.bold(`\nRecent Audit Events (${events.length})\n`));
  console.log(createAuditTable(events));
}
