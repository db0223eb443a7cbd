import { logLevelNames } from "@envlayer/logger"
import type { Options } from "yargs"
import { z } from "zod"
import { UsageError } from "./usage-error"

export const secretsKinds = ["none", "env", "file", "aws", "gcp"] as const
export type SecretsKind = (typeof secretsKinds)[number]

export const outputFormats = ["dotenv", "json"] as const
export type OutputFormat = (typeof outputFormats)[number]

/**
 * Options shared by every command. Each can also come from an `ENVLAYER_*`
 * environment variable, e.g. `ENVLAYER_SECRETS_FILE`.
 */
export const globalOptions = {
  dir: { type: "string", describe: "Directory holding the variable files" },
  env: {
    type: "string",
    demandOption: true,
    describe: "Environment: dev, test, ci or production",
  },
  variant: { type: "string", describe: "Production variant: backend or frontend" },
  bindings: { type: "string", describe: "JSON manifest of secret-bound names" },
  secrets: {
    choices: secretsKinds,
    default: "none",
    describe: "Secret provider",
  },
  "secrets-file": { type: "string", describe: "JSON secrets file for --secrets file" },
  "secrets-prefix": { type: "string", describe: "Prefix prepended to secret names" },
  "gcp-project": { type: "string", describe: "Project id for --secrets gcp" },
  timeout: { type: "number", describe: "Secret provider timeout in ms" },
  "log-level": { choices: logLevelNames, default: "warn", describe: "Log level" },
  pretty: { type: "boolean", default: false, describe: "Human-readable logs" },
} satisfies Record<string, Options>

const globalArgsSchema = z.object({
  dir: z.string().optional(),
  env: z.string(),
  variant: z.string().optional(),
  bindings: z.string().optional(),
  secrets: z.enum(secretsKinds),
  secretsFile: z.string().optional(),
  secretsPrefix: z.string().optional(),
  gcpProject: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  logLevel: z.enum(logLevelNames),
  pretty: z.boolean(),
})

export type GlobalArgs = z.infer<typeof globalArgsSchema>

/**
 * Narrows parsed yargs arguments with a schema. Unknown keys are dropped.
 *
 * @throws {UsageError}
 */
export function parseArgs<T>(schema: z.ZodType<T>, raw: unknown): T {
  const result = schema.safeParse(raw)

  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue?.path.map(String).join(".") || "arguments"

    throw new UsageError(`Invalid ${where}: ${issue?.message ?? "invalid value"}`, result.error)
  }

  return result.data
}

export function readGlobalArgs(raw: unknown): GlobalArgs {
  return parseArgs(globalArgsSchema, raw)
}
