import { errorChain } from "./utils/error-chain"
import { isAppError } from "./utils/is-app-error"

/**
 * Render an error and its causes as human-readable lines:
 *
 * ```text
 * malformed_line: Malformed line 3 in /app/.env.shared
 *   file: /app/.env.shared
 *   line: 3
 * caused by: ...
 * ```
 */
export function formatError(err: unknown): string {
  const lines: string[] = []

  errorChain(err).forEach((entry, index) => {
    const prefix = index === 0 ? "" : "caused by: "

    if (isAppError(entry)) {
      lines.push(`${prefix}${entry.code}: ${entry.message}`)

      for (const [key, value] of Object.entries(entry.context)) {
        lines.push(`  ${key}: ${formatValue(value)}`)
      }
    } else if (entry instanceof Error) {
      lines.push(`${prefix}${entry.name}: ${entry.message}`)
    } else {
      lines.push(`${prefix}${formatValue(entry)}`)
    }
  })

  return lines.join("\n")
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value
  if (value === undefined) return "undefined"

  try {
    return JSON.stringify(value)
  } catch {
    return String(value)
  }
}
