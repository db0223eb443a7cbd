import {
  GetSecretValueCommand,
  type GetSecretValueCommandOutput,
} from "@aws-sdk/client-secrets-manager"
import { SecretProviderError } from "../../core/secret-provider-error"
import { isRecord } from "../../core/utils/is-record"
import type { GetSecretOptions, ReadableSecretVault, SecretValue } from "../../ports/secret-vault"

/**
 * The slice of `SecretsManagerClient` this vault uses. A real client
 * satisfies it.
 */
export interface SecretsManagerReader {
  send(
    command: GetSecretValueCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<GetSecretValueCommandOutput>
}

export interface AwsSecretsManagerVaultOptions {
  /**
   * Path prefix for secret ids. Normalized to start and end with "/".
   *
   * @example "my-app/production" reads DATABASE_URL from "/my-app/production/DATABASE_URL"
   */
  prefix?: string
}

export type AwsSecretsManagerVaultDeps = {
  client: SecretsManagerReader
}

export class AwsSecretsManagerVault implements ReadableSecretVault {
  readonly name = "aws-secrets-manager"
  private readonly prefix: string

  constructor(
    private readonly deps: AwsSecretsManagerVaultDeps,
    options: AwsSecretsManagerVaultOptions = {},
  ) {
    this.prefix = this.normalizePrefix(options.prefix ?? "")
  }

  async get(key: string, options?: GetSecretOptions): Promise<SecretValue | null> {
    const secretId = this.resolveId(key)

    try {
      const response = await this.deps.client.send(
        new GetSecretValueCommand({ SecretId: secretId }),
        options?.signal ? { abortSignal: options.signal } : {},
      )

      if (response.SecretString === undefined) {
        throw new Error(`Secret ${secretId} has no string value`)
      }

      return {
        value: response.SecretString,
        ...(response.VersionId && { version: response.VersionId }),
        ...(response.CreatedDate && { updatedAt: response.CreatedDate }),
      }
    } catch (error: unknown) {
      if (this.isNotFound(error)) return null

      throw new SecretProviderError(this.name, "get", secretId, error)
    }
  }

  async exists(key: string, options?: GetSecretOptions): Promise<boolean> {
    return (await this.get(key, options)) !== null
  }

  private resolveId(key: string): string {
    return `${this.prefix}${key.startsWith("/") ? key.slice(1) : key}`
  }

  private normalizePrefix(prefix: string): string {
    if (!prefix) return ""
    const withLeading = prefix.startsWith("/") ? prefix : `/${prefix}`

    return withLeading.endsWith("/") ? withLeading : `${withLeading}/`
  }

  private isNotFound(error: unknown): boolean {
    return isRecord(error) && error.name === "ResourceNotFoundException"
  }
}
