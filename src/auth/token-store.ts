/**
 * Token Metadata Store Implementation
 *
 * File-based storage for token metadata keyed by jti, with an in-memory
 * cache and atomic writes.
 *
 * **File Location:** `{DATA_PATH}/tokens.json`
 *
 * @module auth/token-store
 */

import { join } from "node:path";
import type { Logger } from "pino";
import type { TokenMetadata, TokenMetadataFile, TokenMetadataStore } from "./types.js";
import { TokenStorageError } from "./errors.js";
import { TokenMetadataFileSchema } from "./validation.js";
import { getComponentLogger } from "../logging/index.js";
import { readJsonFile, writeJsonFileAtomic } from "../utils/json-file.js";

export class FileTokenMetadataStore implements TokenMetadataStore {
  private readonly filePath: string;
  private _logger: Logger | null = null;

  /**
   * Populated on first `load()`, replaced on every successful save
   */
  private tokenCache: Map<string, TokenMetadata> | null = null;

  constructor(dataPath: string) {
    this.filePath = join(dataPath, "tokens.json");
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:token-store");
    }
    return this._logger;
  }

  getStoragePath(): string {
    return this.filePath;
  }

  /**
   * Load all metadata records
   *
   * A missing file is an empty store.
   *
   * @throws {TokenStorageError} If the file cannot be read or parsed
   */
  async load(): Promise<Map<string, TokenMetadata>> {
    if (this.tokenCache !== null) {
      return new Map(this.tokenCache);
    }

    const startTime = performance.now();

    try {
      const raw = await readJsonFile(this.filePath);
      if (raw === undefined) {
        this.logger.info({ filePath: this.filePath }, "Token store not found - starting empty");
        this.tokenCache = new Map();
        return new Map();
      }

      const validated = TokenMetadataFileSchema.parse(raw);
      this.tokenCache = new Map(Object.entries(validated.tokens));

      this.logger.info(
        {
          metric: "token_store.load_ms",
          value: Math.round(performance.now() - startTime),
          tokenCount: this.tokenCache.size,
        },
        "Token store loaded"
      );
      return new Map(this.tokenCache);
    } catch (error) {
      this.logger.error(
        {
          metric: "token_store.load_ms",
          value: Math.round(performance.now() - startTime),
          filePath: this.filePath,
          err: error,
        },
        "Failed to load token store"
      );

      const message =
        error instanceof SyntaxError
          ? `Invalid JSON in token store: ${error.message}`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new TokenStorageError("read", message, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Replace the stored records
   *
   * @throws {TokenStorageError} If the file cannot be written
   */
  async save(tokens: Map<string, TokenMetadata>): Promise<void> {
    const startTime = performance.now();

    try {
      const file: TokenMetadataFile = {
        version: "1.0",
        tokens: Object.fromEntries(tokens),
      };
      await writeJsonFileAtomic(this.filePath, file);
      this.tokenCache = new Map(tokens);

      this.logger.debug(
        {
          metric: "token_store.save_ms",
          value: Math.round(performance.now() - startTime),
          tokenCount: tokens.size,
        },
        "Token store saved"
      );
    } catch (error) {
      this.logger.error(
        {
          metric: "token_store.save_ms",
          value: Math.round(performance.now() - startTime),
          filePath: this.filePath,
          err: error,
        },
        "Failed to save token store"
      );

      throw new TokenStorageError(
        "write",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
        true
      );
    }
  }

  /**
   * Force the next `load()` to read from disk
   */
  invalidateCache(): void {
    this.tokenCache = null;
  }
}
