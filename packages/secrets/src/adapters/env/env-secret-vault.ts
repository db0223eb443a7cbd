import type { GetSecretOptions, ReadableSecretVault, SecretValue } from "../../ports/secret-vault"

export type EnvSecretVaultOptions = {
  /** Prepended to every secret name: `CI_SECRET_` turns API_TOKEN into CI_SECRET_API_TOKEN. */
  prefix?: string

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Secrets a CI runner or process manager exports as environment variables.
 * The environment is read on every call. Only own string entries count, so
 * names such as `constructor` never resolve through the prototype.
 */
export class EnvSecretVault implements ReadableSecretVault {
  readonly name: string
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSecretVaultOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix === "" ? "env" : `env:${this.prefix}*`
  }

  async get(key: string, _options?: GetSecretOptions): Promise<SecretValue | null> {
    const value = this.lookup(key)

    return value === undefined ? null : { value }
  }

  async exists(key: string, _options?: GetSecretOptions): Promise<boolean> {
    return this.lookup(key) !== undefined
  }

  private lookup(key: string): string | undefined {
    const variable = this.prefix + key

    if (!Object.hasOwn(this.env, variable)) return undefined

    const value = this.env[variable]

    return typeof value === "string" ? value : undefined
  }
}
