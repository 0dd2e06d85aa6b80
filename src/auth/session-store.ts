/**
 * Session Store Implementation
 *
 * File-based session storage keyed by session id with atomic writes.
 *
 * **File Location:** `{DATA_PATH}/sessions.json`
 *
 * @module auth/session-store
 */

import { join } from "node:path";
import type { Logger } from "pino";
import type { Session, SessionStore, SessionStoreFile } from "./types.js";
import { SessionStorageError } from "./errors.js";
import { SessionStoreFileSchema } from "./validation.js";
import { getComponentLogger } from "../logging/index.js";
import { readJsonFile, writeJsonFileAtomic } from "../utils/json-file.js";

export class FileSessionStore implements SessionStore {
  private readonly filePath: string;
  private _logger: Logger | null = null;

  constructor(dataPath: string) {
    this.filePath = join(dataPath, "sessions.json");
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:session-store");
    }
    return this._logger;
  }

  getStoragePath(): string {
    return this.filePath;
  }

  /**
   * Load sessions that are still active and unexpired
   *
   * @throws {SessionStorageError} If the file cannot be read or parsed
   */
  async load(): Promise<Map<string, Session>> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      this.logger.error({ err: error, filePath: this.filePath }, "Failed to read session store");
      throw new SessionStorageError(
        "read",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    if (raw === undefined) {
      return new Map();
    }

    const parsed = SessionStoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error(
        { filePath: this.filePath, issues: parsed.error.issues.length },
        "Session store file has invalid format"
      );
      throw new SessionStorageError(
        "read",
        `Invalid session store format: ${parsed.error.message}`
      );
    }

    const now = Date.now();
    const sessions = new Map<string, Session>();
    let dropped = 0;
    for (const [id, session] of Object.entries(parsed.data.sessions)) {
      if (session.active && Date.parse(session.expiresAt) > now) {
        sessions.set(id, session);
      } else {
        dropped++;
      }
    }

    this.logger.info({ sessionCount: sessions.size, dropped }, "Session store loaded");
    return sessions;
  }

  /**
   * @throws {SessionStorageError} If the file cannot be written
   */
  async save(sessions: Map<string, Session>): Promise<void> {
    const file: SessionStoreFile = {
      version: "1.0",
      sessions: Object.fromEntries(sessions),
    };

    try {
      await writeJsonFileAtomic(this.filePath, file);
      this.logger.debug({ sessionCount: sessions.size }, "Session store saved");
    } catch (error) {
      this.logger.error({ err: error, filePath: this.filePath }, "Failed to save session store");
      throw new SessionStorageError(
        "write",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }
  }
}
