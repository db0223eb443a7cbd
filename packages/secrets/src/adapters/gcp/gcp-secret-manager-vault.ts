import type { protos } from "@google-cloud/secret-manager"
import { SecretProviderError } from "../../core/secret-provider-error"
import { isRecord } from "../../core/utils/is-record"
import type { GetSecretOptions, ReadableSecretVault, SecretValue } from "../../ports/secret-vault"

type AccessSecretVersionResponse =
  protos.google.cloud.secretmanager.v1.IAccessSecretVersionResponse

/**
 * The slice of `SecretManagerServiceClient` this vault uses. A real client
 * satisfies it.
 */
export interface SecretManagerReader {
  accessSecretVersion(request: {
    name: string
  }): Promise<[AccessSecretVersionResponse, ...unknown[]]>
}

export interface GcpSecretManagerVaultOptions {
  projectId: string

  /** Prepended to every key, e.g. "my-app-" reads secret "my-app-DATABASE_URL". */
  prefix?: string
}

export type GcpSecretManagerDeps = {
  client: SecretManagerReader
}

const GRPC_NOT_FOUND = 5

export class GcpSecretManagerVault implements ReadableSecretVault {
  readonly name: string
  private readonly projectId: string
  private readonly prefix: string

  constructor(
    private readonly deps: GcpSecretManagerDeps,
    options: GcpSecretManagerVaultOptions,
  ) {
    this.projectId = options.projectId
    this.prefix = options.prefix ?? ""
    this.name = `gcp-secret-manager:${options.projectId}`
  }

  // The gax client takes no AbortSignal; callers bound the wait instead.
  async get(key: string, _options?: GetSecretOptions): Promise<SecretValue | null> {
    const name = `projects/${this.projectId}/secrets/${this.prefix}${key}/versions/latest`

    try {
      const [response] = await this.deps.client.accessSecretVersion({ name })
      const version = response.name ? this.extractVersionId(response.name) : null

      return {
        value: this.decode(response.payload?.data),
        ...(version && { version }),
      }
    } catch (error) {
      if (this.isNotFound(error)) return null

      throw new SecretProviderError(this.name, "get", name, error)
    }
  }

  async exists(key: string, options?: GetSecretOptions): Promise<boolean> {
    return (await this.get(key, options)) !== null
  }

  private decode(data: Uint8Array | string | null | undefined): string {
    if (data === null || data === undefined) return ""
    if (typeof data === "string") return data

    return Buffer.from(data).toString("utf8")
  }

  private extractVersionId(name: string): string | null {
    const match = name.match(/\/versions\/(\d+)$/)

    return match?.[1] ?? null
  }

  private isNotFound(error: unknown): boolean {
    return isRecord(error) && error.code === GRPC_NOT_FOUND
  }
}
