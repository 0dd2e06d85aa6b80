/**
 * Guard Configuration
 *
 * Builds the typed configuration for every component from environment
 * variables. Unset variables take their defaults; a value that does not
 * parse stops startup with a ConfigError naming the variable.
 *
 * @module config/guard-config
 */

import path from "node:path";
import type { Env } from "./env.js";
import {
  readBoolean,
  readEnum,
  readInteger,
  readNumber,
  readOptionalString,
  readString,
} from "./env.js";
import type { AdmissionConfig } from "../admission/types.js";
import type { SessionConfig, TokenConfig } from "../auth/types.js";
import type { AuditConfig } from "../logging/audit-types.js";
import type { LogLevel } from "../logging/types.js";
import type { RateLimitConfig } from "../ratelimit/types.js";
import type { CircuitBreakerOptions } from "../resilience/types.js";
import { DEFAULT_CIRCUIT_PRESETS } from "../resilience/circuit-breaker-manager.js";
import type { RotationConfig } from "../rotation/types.js";
import type { SecretsConfig } from "../secrets/types.js";
import type { StoreConfig } from "../store/types.js";

const MIB = 1024 * 1024;

const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export interface LoggingSettings {
  level: LogLevel;
  format: "json" | "pretty";
}

export interface GuardConfig {
  logging: LoggingSettings;
  store: StoreConfig;
  secrets: SecretsConfig;
  jwt: TokenConfig;
  session: SessionConfig;
  rateLimit: RateLimitConfig;
  admission: AdmissionConfig;
  rotation: RotationConfig;
  audit: AuditConfig;
  circuits: Record<string, CircuitBreakerOptions>;
  /** Root directory of the token, session and rotation JSON stores */
  dataPath: string;
}

/**
 * Parse the full configuration
 *
 * @throws {ConfigError} For the first variable that does not parse
 */
export function loadGuardConfig(env: Env = process.env): GuardConfig {
  const dataPath = readString(env, "DATA_PATH", "./data");

  return {
    logging: {
      level: readEnum(env, "LOG_LEVEL", LOG_LEVELS, "info"),
      format: readEnum(env, "LOG_FORMAT", ["json", "pretty"] as const, "json"),
    },

    store: {
      redisUrl: readOptionalString(env, "REDIS_URL"),
      keyPrefix: readString(env, "STORE_KEY_PREFIX", ""),
      connectTimeoutMs: readInteger(env, "REDIS_CONNECT_TIMEOUT_MS", 5000),
    },

    secrets: {
      backend: readEnum(
        env,
        "SECRETS_BACKEND",
        ["environment", "aws", "vault"] as const,
        "environment"
      ),
      envPrefix: readString(env, "SECRETS_ENV_PREFIX", "FISCAL_"),
      cacheTtlSeconds: readInteger(env, "SECRETS_CACHE_TTL_SECONDS", 3600, { min: 0 }),
      pathPrefix: readString(env, "SECRETS_PATH_PREFIX", "fiscal"),
      vault: {
        address: readString(env, "VAULT_ADDR", "http://127.0.0.1:8200"),
        token: readOptionalString(env, "VAULT_TOKEN"),
        mount: readString(env, "VAULT_MOUNT", "secret"),
        timeoutMs: readInteger(env, "VAULT_TIMEOUT_MS", 5000),
      },
      aws: { region: readOptionalString(env, "AWS_REGION") },
    },

    jwt: {
      algorithm: readEnum(env, "JWT_ALGORITHM", ["HS256", "HS384", "HS512"] as const, "HS256"),
      accessExpirationHours: readInteger(env, "JWT_EXPIRATION_HOURS", 24),
      refreshExpirationDays: readInteger(env, "JWT_REFRESH_EXPIRATION_DAYS", 7),
      defaultRoles: ["user"],
    },

    session: {
      timeoutMinutes: readInteger(env, "SESSION_TIMEOUT_MINUTES", 30),
      maxConcurrentSessions: readInteger(env, "MAX_CONCURRENT_SESSIONS", 5),
    },

    rateLimit: {
      enabled: readBoolean(env, "RATE_LIMIT_ENABLED", true),
      ipLimit: readInteger(env, "RATE_LIMIT_IP_LIMIT", 100),
      ipWindowSeconds: readInteger(env, "RATE_LIMIT_IP_WINDOW_SECONDS", 60),
      userLimit: readInteger(env, "RATE_LIMIT_USER_LIMIT", 1000),
      userWindowSeconds: readInteger(env, "RATE_LIMIT_USER_WINDOW_SECONDS", 3600),
      violationThreshold: readInteger(env, "RATE_LIMIT_VIOLATION_THRESHOLD", 5),
      violationWindowSeconds: readInteger(env, "RATE_LIMIT_VIOLATION_WINDOW_SECONDS", 300),
      blockDurationSeconds: readInteger(env, "RATE_LIMIT_BLOCK_DURATION_SECONDS", 3600),
      statusEndpoints: ["simulate", "scenarios", "health"],
    },

    admission: {
      maxConcurrentRequests: readInteger(env, "MAX_CONCURRENT_REQUESTS", 1000),
      queueSize: readInteger(env, "REQUEST_QUEUE_SIZE", 5000),
      queueMaxWaitSeconds: readInteger(env, "REQUEST_QUEUE_MAX_WAIT_SECONDS", 30),
      queuedRetryAfterSeconds: 5,
      maxJsonPayloadBytes: readInteger(env, "MAX_JSON_PAYLOAD_BYTES", 5 * MIB),
      maxFormPayloadBytes: readInteger(env, "MAX_FORM_PAYLOAD_BYTES", 10 * MIB),
      maxRequestBytes: readInteger(env, "MAX_REQUEST_BYTES", 10 * MIB),
      maxHeaderValueLength: readInteger(env, "MAX_HEADER_VALUE_LENGTH", 8000),
      cpuOverloadThreshold: readNumber(env, "CPU_OVERLOAD_THRESHOLD", 0.85, { min: 0 }),
    },

    rotation: {
      enabled: readBoolean(env, "SECRET_ROTATION_ENABLED", true),
      checkIntervalHours: readInteger(env, "SECRET_ROTATION_CHECK_INTERVAL_HOURS", 24),
      intervalDays: {
        database_password: readInteger(env, "SECRET_ROTATION_DB_PASSWORD_DAYS", 90),
        api_key: readInteger(env, "SECRET_ROTATION_API_KEYS_DAYS", 180),
        jwt_secret: readInteger(env, "SECRET_ROTATION_JWT_SECRET_DAYS", 365),
      },
    },

    audit: {
      enabled: readBoolean(env, "AUDIT_LOG_ENABLED", true),
      logPath: readString(env, "AUDIT_LOG_PATH", path.join(dataPath, "audit", "audit.json")),
      maxEvents: readInteger(env, "AUDIT_MAX_EVENTS", 1000),
    },

    circuits: { ...DEFAULT_CIRCUIT_PRESETS },
    dataPath,
  };
}
