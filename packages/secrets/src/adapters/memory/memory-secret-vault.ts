import type { GetSecretOptions, ReadableSecretVault, SecretValue } from "../../ports/secret-vault"

export type MemorySecretVaultOptions = {
  entries?: Record<string, string>
}

/**
 * In-memory secret vault for tests and local development.
 */
export class MemorySecretVault implements ReadableSecretVault {
  readonly name = "memory"
  private readonly secrets: Map<string, string>

  constructor(options: MemorySecretVaultOptions = {}) {
    this.secrets = new Map(Object.entries(options.entries ?? {}))
  }

  async get(key: string, _options?: GetSecretOptions): Promise<SecretValue | null> {
    const value = this.secrets.get(key)

    return value === undefined ? null : { value }
  }

  async exists(key: string, _options?: GetSecretOptions): Promise<boolean> {
    return this.secrets.has(key)
  }

  set(key: string, value: string): void {
    this.secrets.set(key, value)
  }

  delete(key: string): void {
    this.secrets.delete(key)
  }
}
