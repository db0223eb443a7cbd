import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of one JSON object per line.
   */
  prettify?: boolean

  /**
   * Output stream. Commands that print results on stdout log to "stderr".
   *
   * @default "stdout"
   */
  stream?: "stdout" | "stderr"
}
