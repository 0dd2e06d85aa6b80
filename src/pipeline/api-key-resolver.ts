/**
 * API Key Resolver
 *
 * Default PrincipalResolver backed by the `API_KEYS` secret, a flat map of
 * client name to key. A matching key authenticates as `apikey:<client>`
 * with the configured roles. Deployments with a user store supply their
 * own resolver instead.
 *
 * @module pipeline/api-key-resolver
 */

import crypto from "node:crypto";
import type { Principal, PrincipalResolver } from "./types.js";

export interface ApiKeySource {
  getApiKeys(): Promise<Record<string, string>>;
}

function sameKey(expected: string, actual: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(actual, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export class SecretsApiKeyResolver implements PrincipalResolver {
  constructor(
    private readonly source: ApiKeySource,
    private readonly roles: readonly string[] = ["user"]
  ) {}

  async resolveApiKey(apiKey: string): Promise<Principal | undefined> {
    const keys = await this.source.getApiKeys();
    for (const [client, key] of Object.entries(keys)) {
      if (key !== "" && sameKey(key, apiKey)) {
        return { subjectId: `apikey:${client}`, roles: [...this.roles], authMethod: "api_key" };
      }
    }
    return undefined;
  }
}
