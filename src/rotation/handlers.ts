/**
 * Built-in Rotation Handlers
 *
 * Each handler reads the current value and writes the new one through the
 * secrets manager, so the secret cache is invalidated as part of `apply`.
 *
 * @module rotation/handlers
 */

import crypto from "node:crypto";
import type { SecretReader, SecretWriter } from "../secrets/types.js";
import { SECRET_NAMES } from "../secrets/types.js";
import type { CandidateValidation, RotationHandler, SecretType } from "./types.js";

const PASSWORD_ALPHABET =
  "abcdefghijklmnopqrstuvwxyz" + "ABCDEFGHIJKLMNOPQRSTUVWXYZ" + "0123456789" + "!@#$%^&*_-=+";

const PASSWORD_LENGTH = 32;
const PASSWORD_MIN_LENGTH = 12;
const JWT_SECRET_BYTES = 64;
const JWT_SECRET_MIN_LENGTH = 32;

/**
 * Shared plumbing: backup reads the current value, apply writes the new one
 */
abstract class SecretsManagerHandler implements RotationHandler {
  constructor(
    public readonly secretName: string,
    public readonly secretType: SecretType,
    protected readonly reader: SecretReader,
    protected readonly writer: SecretWriter
  ) {}

  abstract generate(): string;
  abstract validate(candidate: string): CandidateValidation;

  async apply(candidate: string): Promise<void> {
    await this.writer.putSecret(this.secretName, candidate);
  }

  async backupCurrent(): Promise<string | undefined> {
    return this.reader.get(this.secretName);
  }
}

/**
 * Database password: 32 characters from a mixed alphabet
 */
export class DatabasePasswordHandler extends SecretsManagerHandler {
  constructor(reader: SecretReader, writer: SecretWriter) {
    super(SECRET_NAMES.DATABASE_PASSWORD, "database_password", reader, writer);
  }

  generate(): string {
    // Redraw until every required character class is present
    for (;;) {
      let password = "";
      for (let i = 0; i < PASSWORD_LENGTH; i++) {
        password += PASSWORD_ALPHABET.charAt(crypto.randomInt(PASSWORD_ALPHABET.length));
      }
      if (this.validate(password).valid) {
        return password;
      }
    }
  }

  validate(candidate: string): CandidateValidation {
    if (candidate.length < PASSWORD_MIN_LENGTH) {
      return { valid: false, reason: `must be at least ${PASSWORD_MIN_LENGTH} characters` };
    }
    if (!/[A-Z]/.test(candidate) || !/[a-z]/.test(candidate) || !/[0-9]/.test(candidate)) {
      return { valid: false, reason: "must contain uppercase, lowercase and digits" };
    }
    return { valid: true };
  }
}

/**
 * API key: `<prefix>_<8 hex time hash>_<64 hex random>`
 */
export class ApiKeyHandler extends SecretsManagerHandler {
  constructor(
    reader: SecretReader,
    writer: SecretWriter,
    private readonly prefix: string = "fapi"
  ) {
    super(SECRET_NAMES.API_KEY, "api_key", reader, writer);
  }

  generate(): string {
    const timeHash = crypto
      .createHash("sha256")
      .update(new Date().toISOString())
      .digest("hex")
      .slice(0, 8);
    return `${this.prefix}_${timeHash}_${crypto.randomBytes(32).toString("hex")}`;
  }

  validate(candidate: string): CandidateValidation {
    if (!candidate.startsWith(`${this.prefix}_`)) {
      return { valid: false, reason: `must start with '${this.prefix}_'` };
    }
    if (candidate.split("_").length < 3) {
      return { valid: false, reason: "must have prefix, hash and key parts" };
    }
    return { valid: true };
  }
}

/**
 * Access-token signing secret: 64 random bytes, base64url
 */
export class JwtSecretHandler extends SecretsManagerHandler {
  constructor(reader: SecretReader, writer: SecretWriter) {
    super(SECRET_NAMES.JWT_SECRET_KEY, "jwt_secret", reader, writer);
  }

  generate(): string {
    return crypto.randomBytes(JWT_SECRET_BYTES).toString("base64url");
  }

  validate(candidate: string): CandidateValidation {
    if (candidate.length < JWT_SECRET_MIN_LENGTH) {
      return { valid: false, reason: `must be at least ${JWT_SECRET_MIN_LENGTH} characters` };
    }
    return { valid: true };
  }
}

/**
 * The three handlers registered by default
 */
export function createDefaultHandlers(
  reader: SecretReader,
  writer: SecretWriter,
  apiKeyPrefix?: string
): RotationHandler[] {
  return [
    new DatabasePasswordHandler(reader, writer),
    new ApiKeyHandler(reader, writer, apiKeyPrefix),
    new JwtSecretHandler(reader, writer),
  ];
}
