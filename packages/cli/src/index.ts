export { runCli } from "./cli"
export { type GlobalArgs, type OutputFormat, type SecretsKind, secretsKinds } from "./core/cli-args"
export type { CliDeps, Output } from "./core/context"
export { createVault } from "./core/create-vault"
export { formatDotenv, formatJson } from "./core/format"
export { UsageError } from "./core/usage-error"
