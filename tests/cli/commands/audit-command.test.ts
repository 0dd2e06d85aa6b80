/**
 * Tests for Audit Command
 */

import chalk from "chalk";
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import {
  auditRecentCommand,
  selectAuditEvents,
} from "../../../src/cli/commands/audit-command.js";
import { AuditEvents } from "../../../src/logging/audit-events.js";
import type { AuditEvent } from "../../../src/logging/audit-types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { createTestContext, type TestContext } from "../../helpers/test-context.js";

describe("audit recent", () => {
  let ctx: TestContext;
  let output: string[];

  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
    chalk.level = 0;
  });

  afterAll(() => {
    resetLogger();
  });

  beforeEach(async () => {
    ctx = await createTestContext();
    output = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    });

    ctx.audit.emit(AuditEvents.tokenRevoked("u1", "jti-1", "logout"));
    ctx.audit.emit(AuditEvents.ipBlocked("203.0.113.9", 60, "test"));
    ctx.audit.emit(AuditEvents.tokenRevoked("u2", "jti-2", "logout"));
    ctx.audit.emit(AuditEvents.sessionEnded("u1", "abcd1234", "logout"));
  });

  afterEach(async () => {
    await ctx.dispose();
  });

  function summary(events: AuditEvent[]): string[] {
    return events.map((event) => `${event.eventType}:${event.subjectId ?? "-"}`);
  }

  it("should return the newest events first", () => {
    expect(summary(selectAuditEvents({ limit: 2 }, ctx.deps))).toEqual([
      "session.ended:u1",
      "token.revoked:u2",
    ]);
  });

  it("should filter by event type", () => {
    expect(summary(selectAuditEvents({ limit: 20, type: "token.revoked" }, ctx.deps))).toEqual([
      "token.revoked:u2",
      "token.revoked:u1",
    ]);
  });

  it("should filter by subject", () => {
    expect(summary(selectAuditEvents({ limit: 20, user: "u1" }, ctx.deps))).toEqual([
      "session.ended:u1",
      "token.revoked:u1",
    ]);
  });

  it("should apply the limit after combining subject and type", () => {
    expect(
      summary(selectAuditEvents({ limit: 1, user: "u1", type: "token.revoked" }, ctx.deps))
    ).toEqual(["token.revoked:u1"]);
  });

  it("should print events as JSON", async () => {
    await auditRecentCommand({ limit: 1, json: true }, ctx.deps);

    const events: AuditEvent[] = JSON.parse(output[0] ?? "[]");
    expect(summary(events)).toEqual(["session.ended:u1"]);
  });

  it("should print a heading with the event count", async () => {
    await auditRecentCommand({ limit: 3 }, ctx.deps);

    expect(output[0]).toBe("\nRecent Audit Events (3)\n");
  });

  it("should say so when audit logging is disabled", async () => {
    ctx.audit.setEnabled(false);
    await auditRecentCommand({ limit: 20 }, ctx.deps);

    expect(output).toEqual(["Audit logging is disabled (AUDIT_LOG_ENABLED=false)."]);
  });
});
