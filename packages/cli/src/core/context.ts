import path from "node:path"
import {
  loadSecretBindings,
  type ResolvedConfiguration,
  resolveConfiguration,
} from "@envlayer/config"
import { createPinoLogger, type Logger } from "@envlayer/logger"
import type { ReadableSecretVault } from "@envlayer/secrets"
import type { GlobalArgs } from "./cli-args"
import { createVault } from "./create-vault"

export type Output = {
  write(chunk: string): unknown
}

export type CliDeps = {
  stdout: Output
  stderr: Output

  /** Replaces the logger built from --log-level and --pretty */
  logger?: Logger

  /** Replaces the provider built from --secrets */
  vault?: ReadableSecretVault

  /** @default process.cwd() */
  cwd?: string
}

export type CommandContext = CliDeps & {
  print(line: string): void
}

export function createContext(deps: CliDeps): CommandContext {
  return {
    ...deps,
    print: (line) => {
      deps.stdout.write(`${line}\n`)
    },
  }
}

/**
 * Resolves the configuration described by the global options.
 */
export async function resolveFromArgs(
  ctx: CommandContext,
  args: GlobalArgs,
): Promise<ResolvedConfiguration> {
  const cwd = ctx.cwd ?? process.cwd()
  const logger =
    ctx.logger ??
    createPinoLogger({ level: args.logLevel, prettify: args.pretty, stream: "stderr" })
  const vault = ctx.vault ?? createVault(args, cwd)
  const bindings = args.bindings
    ? await loadSecretBindings(path.resolve(cwd, args.bindings))
    : undefined

  return resolveConfiguration(
    {
      baseDir: path.resolve(cwd, args.dir ?? "."),
      environment: args.env,
      ...(args.variant !== undefined && { variant: args.variant }),
      ...(bindings && { bindings }),
      ...(args.timeout !== undefined && { timeoutMs: args.timeout }),
    },
    { logger: logger.child({ service: "envlayer" }), ...(vault && { vault }) },
  )
}
