/**
 * Where a source sits in the precedence order and what it is for.
 *
 * - `entry`: the plain `.env` file
 * - `common`: settings shared by every environment and project
 * - `shared`: the project's committed defaults (the only required file)
 * - `environment`: settings for the selected environment
 * - `variant`: settings for one production variant
 */
export type SourceRole = "entry" | "common" | "shared" | "environment" | "variant"

/**
 * One file in the located sequence. Descriptors are plain values; nothing is
 * read until a {@link ConfigSource} loads them.
 */
export type SourceDescriptor = Readonly<{
  /** Provenance id, e.g. "shared", "dev.local", "production.backend" */
  id: string
  role: SourceRole

  /** Position in the sequence. Later ranks override earlier ones. */
  rank: number

  /** Absolute path */
  file: string
  fileName: string

  optional: boolean

  /** Uncommitted overrides (`*.local`) */
  local: boolean

  /** Only uncommitted files may legitimately hold secret material. */
  mayContainSecrets: boolean

  /** Committed template documenting the keys of a local file. */
  exampleFile?: string
}>

/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw variables.
 * It does not merge or validate values.
 */
export interface ConfigSource {
  /**
   * Provenance id recorded for every variable this source sets.
   * Example: "shared", "dev.local", "secrets"
   */
  readonly id: string

  /**
   * Load variables as a fresh name → value mapping.
   */
  load(): Promise<Record<string, string>>
}
