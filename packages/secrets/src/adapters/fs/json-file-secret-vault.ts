import { readFile } from "node:fs/promises"
import { z } from "zod"
import { SecretProviderError } from "../../core/secret-provider-error"
import type { GetSecretOptions, ReadableSecretVault, SecretValue } from "../../ports/secret-vault"

const secretEntrySchema = z.union([
  z.string(),
  z.object({
    value: z.string(),
    version: z.string().optional(),
  }),
])

const secretsFileSchema = z.record(z.string(), secretEntrySchema)

type SecretsFile = z.infer<typeof secretsFileSchema>

export interface JsonFileSecretVaultOptions {
  /**
   * Path to the secrets file. The file maps keys to either a string or
   * `{ "value": string, "version"?: string }`.
   */
  path: string
}

/**
 * Read-only JSON file secret vault for development and CI, where a job step
 * writes fetched secrets to a file outside the repository.
 *
 * The file is read on every call.
 */
export class JsonFileSecretVault implements ReadableSecretVault {
  readonly name: string
  private readonly path: string

  constructor(options: JsonFileSecretVaultOptions) {
    this.path = options.path
    this.name = `json-file:${options.path}`
  }

  async get(key: string, options?: GetSecretOptions): Promise<SecretValue | null> {
    const secrets = await this.load(key, options)
    const entry = secrets[key]

    if (entry === undefined) return null
    if (typeof entry === "string") return { value: entry }

    return {
      value: entry.value,
      ...(entry.version !== undefined && { version: entry.version }),
    }
  }

  async exists(key: string, options?: GetSecretOptions): Promise<boolean> {
    const secrets = await this.load(key, options)

    return secrets[key] !== undefined
  }

  private async load(key: string, options?: GetSecretOptions): Promise<SecretsFile> {
    let content: string

    try {
      content = await readFile(this.path, {
        encoding: "utf-8",
        ...(options?.signal && { signal: options.signal }),
      })
    } catch (err) {
      throw new SecretProviderError(this.name, "load", key, err)
    }

    let raw: unknown

    try {
      raw = JSON.parse(content)
    } catch (err) {
      throw new SecretProviderError(this.name, "load", key, err)
    }

    const result = secretsFileSchema.safeParse(raw)

    if (!result.success) {
      throw new SecretProviderError(
        this.name,
        "load",
        key,
        new Error(z.prettifyError(result.error)),
      )
    }

    return result.data
  }
}
