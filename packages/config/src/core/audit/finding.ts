export type FindingKind =
  | "possible-secret"
  | "unconventional-name"
  | "missing-example-key"
  | "undocumented-local-key"
  | "malformed-example"

/**
 * A flagged, non-fatal observation about a source file.
 */
export type Finding = Readonly<{
  kind: FindingKind

  /** Source id */
  source: string
  file: string

  /** Absent for findings about a whole file */
  variable?: string
  message: string
}>
