import fs from "node:fs/promises"
import { z } from "zod"
import type { Environment } from "../environment/environment"
import { type BindingIssue, InvalidSecretBindingsError } from "../errors"

export const bindingScopes = [
  "all",
  "dev",
  "test",
  "ci",
  "production",
  "production.backend",
  "production.frontend",
] as const

export type BindingScope = (typeof bindingScopes)[number]

/**
 * Names that must come from the secret provider, per scope. The active set
 * for an environment is the union of `all`, the environment's name and, for
 * production, the variant scope.
 *
 * @example
 * ```json
 * { "all": ["SESSION_SECRET"], "production.backend": ["DATABASE_PASSWORD"] }
 * ```
 */
export type SecretBindings = Partial<Record<BindingScope, readonly string[]>>

const variableName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, "Invalid variable name")

const names = z.array(variableName).optional()

const secretBindingsSchema = z.strictObject({
  all: names,
  dev: names,
  test: names,
  ci: names,
  production: names,
  "production.backend": names,
  "production.frontend": names,
})

export function bindingsFor(
  bindings: SecretBindings | undefined,
  environment: Environment,
): ReadonlySet<string> {
  const scopes: BindingScope[] = ["all", environment.name]

  if (environment.name === "production") {
    scopes.push(
      environment.variant === "backend" ? "production.backend" : "production.frontend",
    )
  }

  return new Set(scopes.flatMap((scope) => bindings?.[scope] ?? []))
}

/**
 * Validates an untrusted bindings object.
 *
 * @param file - Reported in errors.
 * @throws {InvalidSecretBindingsError}
 */
export function parseSecretBindings(raw: unknown, file: string): SecretBindings {
  const result = secretBindingsSchema.safeParse(raw)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    throw new InvalidSecretBindingsError(file, issues, result.error)
  }

  const bindings: SecretBindings = {}

  for (const scope of bindingScopes) {
    const list = result.data[scope]
    if (list) bindings[scope] = list
  }

  return bindings
}

/**
 * Reads a JSON bindings manifest.
 *
 * @throws {InvalidSecretBindingsError} when the file is unreadable, not JSON, or invalid
 */
export async function loadSecretBindings(file: string): Promise<SecretBindings> {
  let content: string

  try {
    content = await fs.readFile(file, "utf-8")
  } catch (err) {
    throw new InvalidSecretBindingsError(file, [issue(`Cannot read ${file}`)], err)
  }

  let raw: unknown

  try {
    raw = JSON.parse(content)
  } catch (err) {
    throw new InvalidSecretBindingsError(file, [issue(`${file} is not valid JSON`)], err)
  }

  return parseSecretBindings(raw, file)
}

function issue(message: string): BindingIssue {
  return { path: "", message }
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}
