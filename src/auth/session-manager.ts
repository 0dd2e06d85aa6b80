/**
 * Session Manager
 *
 * Tracks browser sessions per subject with a CSRF token each. A subject
 * holds at most `maxConcurrentSessions` valid sessions; creating one more
 * evicts the oldest by creation time. Expired and terminated sessions are
 * pruned lazily whenever the session table is touched.
 *
 * Changes are made on a copy of the table that replaces the cached one only
 * once the store has saved it; audit events follow the save.
 *
 * @module auth/session-manager
 */

import crypto from "node:crypto";
import type { Logger } from "pino";
import type { RequestOrigin, Session, SessionConfig, SessionStore } from "./types.js";
import { CsrfMismatchError, SessionExpiredError, SessionNotFoundError } from "./errors.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger } from "../logging/audit-types.js";
import { Mutex } from "../utils/mutex.js";

const MINUTE_MS = 60 * 1000;

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  timeoutMinutes: 30,
  maxConcurrentSessions: 5,
};

/** Leading characters of a session id that are safe to log */
function idPrefix(sessionId: string): string {
  return sessionId.substring(0, 8);
}

function isLive(session: Session, now: number): boolean {
  return session.active && Date.parse(session.expiresAt) > now;
}

export class SessionManager {
  private sessions: Map<string, Session> | null = null;
  private readonly mutex = new Mutex();
  private _logger: Logger | null = null;

  constructor(
    private readonly store: SessionStore,
    private readonly audit: AuditLogger,
    private readonly config: SessionConfig = DEFAULT_SESSION_CONFIG
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:session-manager");
    }
    return this._logger;
  }

  /**
   * Start a session, evicting the subject's oldest sessions over the cap
   */
  async create(subjectId: string, origin?: RequestOrigin): Promise<Session> {
    return this.mutex.runExclusive(async () => {
      const sessions = await this.draft();
      const now = Date.now();
      this.prune(sessions, now);

      const owned = [...sessions.values()]
        .filter((session) => session.subjectId === subjectId && isLive(session, now))
        .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));

      const evictions = owned.length - this.config.maxConcurrentSessions + 1;
      const evicted = owned.slice(0, Math.max(0, evictions));
      for (const oldest of evicted) {
        sessions.delete(oldest.sessionId);
      }

      const nowIso = new Date(now).toISOString();
      const session: Session = {
        sessionId: crypto.randomBytes(32).toString("base64url"),
        subjectId,
        createdAt: nowIso,
        lastActivity: nowIso,
        expiresAt: new Date(now + this.config.timeoutMinutes * MINUTE_MS).toISOString(),
        csrfToken: crypto.randomBytes(32).toString("base64url"),
        active: true,
      };
      if (origin?.sourceIp !== undefined) session.sourceIp = origin.sourceIp;
      if (origin?.userAgent !== undefined) session.userAgent = origin.userAgent;

      sessions.set(session.sessionId, session);
      await this.commit(sessions);

      for (const oldest of evicted) {
        this.audit.emit(AuditEvents.sessionEnded(subjectId, idPrefix(oldest.sessionId), "evicted"));
        this.logger.info(
          { subjectId, sessionId: idPrefix(oldest.sessionId) },
          "Evicted oldest session over concurrency cap"
        );
      }
      this.audit.emit(AuditEvents.sessionStarted(subjectId, idPrefix(session.sessionId), origin));
      return { ...session };
    });
  }

  /**
   * Check a session and record activity
   *
   * @throws {SessionNotFoundError} Unknown or terminated session
   * @throws {SessionExpiredError} Session past its expiry
   */
  async validate(sessionId: string): Promise<Session> {
    return this.mutex.runExclusive(async () => {
      const sessions = await this.draft();
      const session = await this.requireLive(sessions, sessionId);
      session.lastActivity = new Date().toISOString();
      await this.commit(sessions);
      return { ...session };
    });
  }

  /**
   * Extend a live session by one timeout from now
   *
   * `expiresAt` never moves backward.
   */
  async refresh(sessionId: string): Promise<Session> {
    return this.mutex.runExclusive(async () => {
      const sessions = await this.draft();
      const session = await this.requireLive(sessions, sessionId);
      const now = Date.now();
      const extended = now + this.config.timeoutMinutes * MINUTE_MS;
      session.lastActivity = new Date(now).toISOString();
      session.expiresAt = new Date(Math.max(Date.parse(session.expiresAt), extended)).toISOString();
      await this.commit(sessions);
      return { ...session };
    });
  }

  /**
   * End one session
   *
   * @returns false when the session was unknown or already inactive
   */
  async terminate(sessionId: string, reason: string = "logout"): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const sessions = await this.draft();
      const session = sessions.get(sessionId);
      if (!session?.active) {
        return false;
      }

      session.active = false;
      await this.commit(sessions);
      this.audit.emit(AuditEvents.sessionEnded(session.subjectId, idPrefix(sessionId), reason));
      return true;
    });
  }

  /**
   * End every active session of a subject
   *
   * @returns Number of sessions ended
   */
  async terminateAll(subjectId: string, reason: string = "terminate_all"): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const sessions = await this.draft();
      const ended: string[] = [];
      for (const session of sessions.values()) {
        if (session.subjectId === subjectId && session.active) {
          session.active = false;
          ended.push(session.sessionId);
        }
      }

      if (ended.length > 0) {
        await this.commit(sessions);
      }
      for (const sessionId of ended) {
        this.audit.emit(AuditEvents.sessionEnded(subjectId, idPrefix(sessionId), reason));
      }
      this.logger.info({ subjectId, ended: ended.length }, "Terminated all sessions for subject");
      return ended.length;
    });
  }

  /**
   * Exact, constant-time comparison against the session's CSRF token
   *
   * False for unknown, terminated or expired sessions.
   */
  async validateCsrf(sessionId: string, csrfToken: string): Promise<boolean> {
    const sessions = await this.loadSessions();
    const session = sessions.get(sessionId);
    if (!session || !isLive(session, Date.now())) {
      return false;
    }

    const expected = Buffer.from(session.csrfToken, "utf8");
    const actual = Buffer.from(csrfToken, "utf8");
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }

  /**
   * @throws {CsrfMismatchError} When `validateCsrf` fails
   */
  async assertCsrf(sessionId: string, csrfToken: string | undefined): Promise<void> {
    if (csrfToken === undefined || !(await this.validateCsrf(sessionId, csrfToken))) {
      this.logger.warn({ sessionId: idPrefix(sessionId) }, "CSRF token mismatch");
      throw new CsrfMismatchError();
    }
  }

  /**
   * Live sessions of a subject, oldest first
   */
  async getUserSessions(subjectId: string): Promise<Session[]> {
    const sessions = await this.loadSessions();
    const now = Date.now();
    return [...sessions.values()]
      .filter((session) => session.subjectId === subjectId && isLive(session, now))
      .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt))
      .map((session) => ({ ...session }));
  }

  async getSession(sessionId: string): Promise<Session | undefined> {
    const session = (await this.loadSessions()).get(sessionId);
    return session ? { ...session } : undefined;
  }

  private async loadSessions(): Promise<Map<string, Session>> {
    if (this.sessions === null) {
      this.sessions = await this.store.load();
    }
    return this.sessions;
  }

  /**
   * Working copy of the session table
   */
  private async draft(): Promise<Map<string, Session>> {
    const sessions = await this.loadSessions();
    return new Map(
      [...sessions].map(([id, session]): [string, Session] => [id, { ...session }])
    );
  }

  /**
   * Persist a working copy, then make it the cached table
   */
  private async commit(sessions: Map<string, Session>): Promise<void> {
    await this.store.save(sessions);
    this.sessions = sessions;
  }

  /**
   * Look up a live session in a working copy, pruning everything else that
   * is dead. An expired session is removed and the copy committed.
   */
  private async requireLive(sessions: Map<string, Session>, sessionId: string): Promise<Session> {
    const now = Date.now();
    const session = sessions.get(sessionId);

    if (!session || !session.active) {
      this.prune(sessions, now);
      throw new SessionNotFoundError(idPrefix(sessionId));
    }
    if (Date.parse(session.expiresAt) <= now) {
      sessions.delete(sessionId);
      this.prune(sessions, now);
      await this.commit(sessions);
      this.audit.emit(AuditEvents.sessionEnded(session.subjectId, idPrefix(sessionId), "expired"));
      throw new SessionExpiredError(session.expiresAt);
    }

    this.prune(sessions, now);
    return session;
  }

  /**
   * Remove terminated and expired sessions from the table
   */
  private prune(sessions: Map<string, Session>, now: number): number {
    let removed = 0;
    for (const [id, session] of sessions) {
      if (!isLive(session, now)) {
        sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug({ removed }, "Pruned dead sessions");
    }
    return removed;
  }
}
