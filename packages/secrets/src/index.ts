export {
  type AwsSecretsManagerVaultDeps,
  type AwsSecretsManagerVaultOptions,
  AwsSecretsManagerVault,
  type SecretsManagerReader,
} from "./adapters/aws/aws-secrets-manager-vault"
export { EnvSecretVault, type EnvSecretVaultOptions } from "./adapters/env/env-secret-vault"
export {
  JsonFileSecretVault,
  type JsonFileSecretVaultOptions,
} from "./adapters/fs/json-file-secret-vault"
export {
  type GcpSecretManagerDeps,
  GcpSecretManagerVault,
  type GcpSecretManagerVaultOptions,
  type SecretManagerReader,
} from "./adapters/gcp/gcp-secret-manager-vault"
export {
  MemorySecretVault,
  type MemorySecretVaultOptions,
} from "./adapters/memory/memory-secret-vault"
export { SecretProviderError, type SecretProviderOperation } from "./core/secret-provider-error"
export type {
  GetSecretOptions,
  ReadableSecretVault,
  SecretKey,
  SecretValue,
} from "./ports/secret-vault"
