#!/usr/bin/env node
/**
 * Fiscal API Guard - Admin CLI Entry Point
 *
 * Operational commands against the shared store, token and rotation files
 * and audit log the server uses:
 * - rotation status / run: Secret rotation schedule
 * - ip status / block / unblock: IP block list
 * - tokens cleanup / revoke-user: Token metadata
 * - audit recent: Security events
 * - circuits status: Circuit breaker state
 */

import "dotenv/config";
import { Command } from "commander";
import { withDependencies } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { rotationRunCommand, rotationStatusCommand } from "./commands/rotation-command.js";
import { ipBlockCommand, ipStatusCommand, ipUnblockCommand } from "./commands/ip-command.js";
import { tokensCleanupCommand, tokensRevokeUserCommand } from "./commands/tokens-command.js";
import { auditRecentCommand } from "./commands/audit-command.js";
import { circuitsStatusCommand } from "./commands/circuits-command.js";
import {
  AuditRecentOptionsSchema,
  IpArgumentSchema,
  IpBlockOptionsSchema,
  JsonOptionSchema,
  RotationRunOptionsSchema,
} from "./utils/validation.js";

const program = new Command();

program
  .name("fguard")
  .description("Fiscal API Guard - administration of secrets, IP blocks, tokens and circuits")
  .version("0.1.0");

// Rotation commands
const rotation = program.command("rotation").description("Secret rotation");

rotation
  .command("status")
  .description("Show the rotation schedule of every managed secret")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = JsonOptionSchema.parse(options);
      await withDependencies((deps) => rotationStatusCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

rotation
  .command("run")
  .description("Rotate one secret, or every secret that is due")
  .argument("[name]", "Secret name (JWT_SECRET_KEY, API_KEY, DATABASE_PASSWORD)")
  .option("-f, --force", "Rotate even if not due")
  .option("--json", "Output as JSON")
  .action(async (name: string | undefined, options: Record<string, unknown>) => {
    try {
      const validatedOptions = RotationRunOptionsSchema.parse(options);
      await withDependencies((deps) => rotationRunCommand(name, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// IP commands
const ip = program.command("ip").description("IP block list");

ip.command("status")
  .description("Show counters, violations and block state for an IP")
  .argument("<ip>", "IP address")
  .option("--json", "Output as JSON")
  .action(async (address: string, options: Record<string, unknown>) => {
    try {
      const validatedIp = IpArgumentSchema.parse(address);
      const validatedOptions = JsonOptionSchema.parse(options);
      await withDependencies((deps) => ipStatusCommand(validatedIp, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

ip.command("block")
  .description("Block an IP")
  .argument("<ip>", "IP address")
  .option("-d, --duration <seconds>", "Block duration in seconds", "3600")
  .option("-r, --reason <reason>", "Reason recorded in the audit log")
  .action(async (address: string, options: Record<string, unknown>) => {
    try {
      const validatedIp = IpArgumentSchema.parse(address);
      const validatedOptions = IpBlockOptionsSchema.parse(options);
      await withDependencies((deps) => ipBlockCommand(validatedIp, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

ip.command("unblock")
  .description("Lift a block and clear recorded violations")
  .argument("<ip>", "IP address")
  .action(async (address: string) => {
    try {
      const validatedIp = IpArgumentSchema.parse(address);
      await withDependencies((deps) => ipUnblockCommand(validatedIp, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Token commands
const tokens = program.command("tokens").description("Token metadata");

tokens
  .command("cleanup")
  .description("Remove metadata of expired tokens")
  .action(async () => {
    try {
      await withDependencies((deps) => tokensCleanupCommand(deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

tokens
  .command("revoke-user")
  .description("Revoke every token of a subject and end their sessions")
  .argument("<subject>", "Subject (user) id")
  .action(async (subject: string) => {
    try {
      await withDependencies((deps) => tokensRevokeUserCommand(subject, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Audit command
program
  .command("audit")
  .description("Security audit log")
  .command("recent")
  .description("Show the most recent audit events")
  .option("-l, --limit <number>", "Maximum events to show (1-1000)", "20")
  .option("-t, --type <eventType>", "Only events of this type (e.g. ip.blocked)")
  .option("-u, --user <subject>", "Only events concerning this subject")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = AuditRecentOptionsSchema.parse(options);
      await withDependencies((deps) => auditRecentCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Circuits command
program
  .command("circuits")
  .description("Circuit breakers")
  .command("status")
  .description("Show state of every registered circuit breaker")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = JsonOptionSchema.parse(options);
      await withDependencies((deps) => circuitsStatusCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync();
