/**
 * Token Commands - Token metadata maintenance
 *
 * - cleanup: Drop metadata for expired tokens
 * - revoke-user: Revoke every active token of a subject and end their sessions
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import { completeSpinner, createSpinner } from "../output/progress.js";

export async function tokensCleanupCommand(deps: CliDependencies): Promise<void> {
  const spinner = createSpinner("Removing expired token metadata...");
  try {
    const removed = await deps.context.tokens.cleanupExpired();
    completeSpinner(spinner, true, `Removed ${removed} expired token record(s)`);
  } catch (error) {
    completeSpinner(spinner, false, "Token cleanup failed");
    throw error;
  }
}

export async function tokensRevokeUserCommand(
  subjectId: string,
  deps: CliDependencies
): Promise<void> {
  const spinner = createSpinner(`Revoking tokens of ${chalk.cyan(subjectId)}...`);
  try {
    const revoked = await deps.context.tokens.revokeAll(subjectId, "admin_revoke");
    const ended = await deps.context.sessions.terminateAll(subjectId, "admin_revoke");
    completeSpinner(
      spinner,
      true,
      `Revoked ${revoked} token(s) and ended ${ended} session(s) for ${subjectId}`
    );
  } catch (error) {
    completeSpinner(spinner, false, `Revoking tokens of ${subjectId} failed`);
    throw error;
  }
}
