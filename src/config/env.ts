/**
 * Environment Variable Parsers
 *
 * Each reader returns the default for an unset or empty variable and throws
 * ConfigError naming the variable for a value that does not parse.
 *
 * @module config/env
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";

export type Env = Readonly<Record<string, string | undefined>>;

function raw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

export function readString(env: Env, name: string, defaultValue: string): string {
  return raw(env, name) ?? defaultValue;
}

export function readOptionalString(env: Env, name: string): string | undefined {
  return raw(env, name);
}

/**
 * Accepts true/false, 1/0 and yes/no in any case
 */
export function readBoolean(env: Env, name: string, defaultValue: boolean): boolean {
  const value = raw(env, name)?.toLowerCase();
  if (value === undefined) {
    return defaultValue;
  }
  if (value === "true" || value === "1" || value === "yes") {
    return true;
  }
  if (value === "false" || value === "0" || value === "no") {
    return false;
  }
  throw new ConfigError(name, `expected a boolean, got "${value}"`);
}

export function readInteger(
  env: Env,
  name: string,
  defaultValue: number,
  bounds: { min?: number; max?: number } = { min: 1 }
): number {
  const value = raw(env, name);
  if (value === undefined) {
    return defaultValue;
  }

  let schema = z.coerce.number().int();
  if (bounds.min !== undefined) schema = schema.min(bounds.min);
  if (bounds.max !== undefined) schema = schema.max(bounds.max);

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(name, describeIssue(parsed.error, value));
  }
  return parsed.data;
}

export function readNumber(
  env: Env,
  name: string,
  defaultValue: number,
  bounds: { min?: number; max?: number } = {}
): number {
  const value = raw(env, name);
  if (value === undefined) {
    return defaultValue;
  }

  let schema = z.coerce.number().finite();
  if (bounds.min !== undefined) schema = schema.min(bounds.min);
  if (bounds.max !== undefined) schema = schema.max(bounds.max);

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(name, describeIssue(parsed.error, value));
  }
  return parsed.data;
}

export function readEnum<const T extends readonly [string, ...string[]]>(
  env: Env,
  name: string,
  values: T,
  defaultValue: T[number]
): T[number] {
  const value = raw(env, name);
  if (value === undefined) {
    return defaultValue;
  }

  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(name, `expected one of ${values.join(", ")}, got "${value}"`);
  }
  return match;
}

function describeIssue(error: z.ZodError, value: string): string {
  const issue = error.issues[0];
  return issue ? `${issue.message} (got "${value}")` : `invalid value "${value}"`;
}
