export interface SecretValue {
  value: string
  version?: string
  updatedAt?: Date
}

export type SecretKey = string

export type GetSecretOptions = {
  /** Aborts an in-flight provider call where the backend supports it. */
  signal?: AbortSignal
}

/**
 * Read-only access to a secret provider.
 *
 * `get` resolves to `null` when the secret does not exist and rejects when
 * the provider itself fails.
 */
export interface ReadableSecretVault {
  /** Provider label used in logs and error context, e.g. "aws-secrets-manager" */
  readonly name: string

  get(key: SecretKey, options?: GetSecretOptions): Promise<SecretValue | null>
  exists(key: SecretKey, options?: GetSecretOptions): Promise<boolean>
}
