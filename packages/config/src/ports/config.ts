/**
 * Immutable result of a resolution.
 *
 * @example
 * ```typescript
 * const config = await resolveConfiguration({ baseDir: ".", environment: "dev" })
 *
 * config.get("TZ")      // "America/New_York"
 * config.explain("TZ")  // "dev.local"
 * ```
 */
export interface IResolvedConfiguration {
  /** Frozen name → value mapping */
  readonly value: Readonly<Record<string, string>>

  /** Frozen name → source id mapping, with the same keys as `value` */
  readonly provenance: Readonly<Record<string, string>>

  get(name: string): string | undefined
  has(name: string): boolean

  /** Variable names, sorted. */
  keys(): string[]

  /**
   * Explains which source provided the final value for a variable.
   *
   * @returns The source id, or undefined when the variable is not set.
   */
  explain(name: string): string | undefined

  /**
   * Returns the ids of all sources that provided at least one final value.
   */
  sourcesUsed(): string[]
}
