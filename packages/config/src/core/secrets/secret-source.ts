import { createNullLogger, type Logger } from "@envlayer/logger"
import type { ReadableSecretVault, SecretValue } from "@envlayer/secrets"
import { type SecretFailureReason, SecretResolutionFailedError } from "../errors"
import { SECRETS_LAYER_ID } from "../merge/merge-layers"
import { defineEntry } from "../utils/define-entry"

export const DEFAULT_SECRET_TIMEOUT_MS = 10_000

// Largest delay setTimeout honours; anything above fires immediately.
const MAX_TIMEOUT_MS = 2_147_483_647

export type SecretSourceDeps = {
  /** Absent when no provider is configured. */
  vault?: ReadableSecretVault
  logger?: Logger
}

export type SecretSourceOptions = {
  /**
   * Upper bound for the whole fetch, across all names.
   *
   * @default 10_000
   * @throws {RangeError} unless a finite number in (0, 2^31 - 1]
   */
  timeoutMs?: number
}

/**
 * Fetches secret-bound variables from the injected provider.
 *
 * All names are requested concurrently and the call fails as a whole: the
 * error names the first failing variable in sorted order. No retries.
 */
export class SecretSource {
  readonly id = SECRETS_LAYER_ID
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(
    private readonly deps: SecretSourceDeps,
    options: SecretSourceOptions = {},
  ) {
    this.timeoutMs = validateTimeout(options.timeoutMs ?? DEFAULT_SECRET_TIMEOUT_MS)
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "secret-source" })
  }

  async resolve(names: Iterable<string>, signal?: AbortSignal): Promise<Record<string, string>> {
    const sorted = [...new Set(names)].sort()
    const [first] = sorted

    if (first === undefined) return {}

    const vault = this.deps.vault

    if (!vault) throw new SecretResolutionFailedError(first, "no_provider")

    if (signal?.aborted) {
      throw new SecretResolutionFailedError(first, "aborted", { provider: vault.name })
    }

    const startedAt = Date.now()
    const pending = new Set(sorted)
    const controller = new AbortController()
    const onAbort = () => controller.abort()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    signal?.addEventListener("abort", onAbort, { once: true })

    this.logger.debug("Fetching secrets", { provider: vault.name, count: sorted.length })

    try {
      // Registered before any fetch so the snapshot precedes their settling.
      const stopped = new Promise<{ pending: string[] }>((resolve) => {
        controller.signal.addEventListener(
          "abort",
          () => resolve({ pending: sorted.filter((n) => pending.has(n)) }),
          { once: true },
        )
      })

      const fetches = Promise.allSettled(
        sorted.map(async (name) => {
          try {
            return await vault.get(name, { signal: controller.signal })
          } finally {
            pending.delete(name)
          }
        }),
      )

      const outcome = await Promise.race([fetches, stopped])

      if ("pending" in outcome) {
        const reason: SecretFailureReason = signal?.aborted ? "aborted" : "timeout"
        const name = outcome.pending[0] ?? first

        this.logger.warn("Secret fetch stopped", { provider: vault.name, variable: name, reason })

        throw new SecretResolutionFailedError(name, reason, { provider: vault.name })
      }

      const values = this.collect(vault, sorted, outcome)

      this.logger.debug("Fetched secrets", {
        provider: vault.name,
        count: sorted.length,
        durationMs: Date.now() - startedAt,
      })

      return values
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener("abort", onAbort)
    }
  }

  private collect(
    vault: ReadableSecretVault,
    names: readonly string[],
    results: PromiseSettledResult<SecretValue | null>[],
  ): Record<string, string> {
    const values: Record<string, string> = {}

    for (const [index, result] of results.entries()) {
      const name = names[index]
      if (name === undefined) continue

      if (result.status === "rejected") {
        throw new SecretResolutionFailedError(name, "provider_error", {
          provider: vault.name,
          cause: result.reason,
        })
      }

      if (result.value === null) {
        throw new SecretResolutionFailedError(name, "not_found", { provider: vault.name })
      }

      defineEntry(values, name, result.value.value)
    }

    return values
  }
}

function validateTimeout(timeoutMs: number): number {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(
      `timeoutMs must be a finite number in (0, ${MAX_TIMEOUT_MS}] (got ${timeoutMs})`,
    )
  }

  return timeoutMs
}
