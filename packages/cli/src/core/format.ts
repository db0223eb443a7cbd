import type { Finding, ResolvedConfiguration } from "@envlayer/config"
import { UnrepresentableValueError } from "./unrepresentable-value-error"

const BARE_VALUE = /^[A-Za-z0-9_./:@+,=?%-]*$/
const LINE_BREAK = /[\r\n]/
// dotenv expands these two escapes inside double quotes
const EXPANDED_ESCAPE = /\\[nr]/

/**
 * Renders a configuration as a variable file that parses back to the same
 * values.
 *
 * @throws {UnrepresentableValueError} when a value fits no quoting form
 */
export function formatDotenv(config: ResolvedConfiguration): string {
  return config
    .keys()
    .map((name) => `${name}=${quote(name, config.get(name) ?? "")}`)
    .join("\n")
}

export function formatJson(config: ResolvedConfiguration): string {
  const sorted = Object.fromEntries(config.keys().map((name) => [name, config.get(name) ?? ""]))

  return JSON.stringify(sorted, null, 2)
}

/**
 * Single and back quotes are literal. Double quotes are the only form that
 * carries a line break, as an escape.
 */
function quote(name: string, value: string): string {
  if (BARE_VALUE.test(value)) return value

  if (!LINE_BREAK.test(value)) {
    if (!value.includes("'")) return `'${value}'`
    if (!value.includes("`")) return `\`${value}\``
  } else if (!value.includes('"') && !EXPANDED_ESCAPE.test(value)) {
    return `"${value.replaceAll("\n", "\\n").replaceAll("\r", "\\r")}"`
  }

  throw new UnrepresentableValueError(name)
}

export function formatFinding(finding: Finding): string {
  return `${finding.kind}: ${finding.message}`
}
