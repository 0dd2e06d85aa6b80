/**
 * Configuration Module Exports
 *
 * @module config
 */

export { loadGuardConfig } from "./guard-config.js";
export type { GuardConfig, LoggingSettings } from "./guard-config.js";
export {
  readString,
  readOptionalString,
  readBoolean,
  readInteger,
  readNumber,
  readEnum,
} from "./env.js";
export type { Env } from "./env.js";
