import { parse } from "dotenv"
import { MalformedLineError } from "../errors"
import { defineEntry } from "../utils/define-entry"

const ASSIGNMENT = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=(.*)$/
const INLINE_COMMENT = /\s+#/
const QUOTES = ["'", '"', "`"]
const BOM = "\uFEFF"

/**
 * Parses the contents of a variable file into a fresh name → value mapping.
 *
 * Each non-blank, non-comment line must be a `NAME=VALUE` assignment,
 * optionally prefixed with `export`. Quoted values are read with dotenv's
 * rules (quotes stripped, `\n` expanded inside double quotes). Unquoted values
 * are trimmed and lose a trailing comment only when whitespace precedes the
 * `#`, so `abc#def` and `#fff` are kept whole. No `$VAR` interpolation.
 * Quoted values spanning several lines are not supported. The last
 * assignment of a name wins.
 *
 * @param file - Path reported in errors.
 * @throws {MalformedLineError} for the first line that is not an assignment
 */
export function parseEnvFile(content: string, file: string): Record<string, string> {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content
  const values: Record<string, string> = {}
  const lines = text.split(/\r?\n/)

  for (const [index, line] of lines.entries()) {
    const trimmed = line.trim()

    if (trimmed === "" || trimmed.startsWith("#")) continue

    const match = ASSIGNMENT.exec(line)
    const name = match?.[1]

    if (match === null || name === undefined) {
      throw new MalformedLineError(file, index + 1)
    }

    defineEntry(values, name, parseValue(name, match[2] ?? ""))
  }

  return values
}

function parseValue(name: string, raw: string): string {
  const value = raw.trim()

  if (isQuoted(value)) {
    return parse(`${name}=${value}`)[name] ?? ""
  }

  const comment = INLINE_COMMENT.exec(value)

  return comment === null ? value : value.slice(0, comment.index)
}

function isQuoted(value: string): boolean {
  const open = value.charAt(0)

  return QUOTES.includes(open) && value.indexOf(open, 1) > 0
}
