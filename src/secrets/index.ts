/**
 * Secrets Module
 *
 * @module secrets
 */

export type {
  SecretsBackend,
  SecretsBackendType,
  SecretsConfig,
  SecretReader,
  SecretWriter,
} from "./types.js";
export { SECRET_NAMES } from "./types.js";
export { SecretNotFoundError, SecretsBackendError } from "./errors.js";
export { EnvironmentSecretsBackend } from "./backends/environment-backend.js";
export { AwsSecretsBackend } from "./backends/aws-backend.js";
export { VaultSecretsBackend } from "./backends/vault-backend.js";
export type { VaultBackendOptions } from "./backends/vault-backend.js";
export {
  SecretsManager,
  createSecretsBackend,
  createSecretsManager,
} from "./secrets-manager.js";
export type { SecretsManagerOptions } from "./secrets-manager.js";
