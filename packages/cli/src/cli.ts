import { formatError } from "@envlayer/errors"
import yargs from "yargs"
import { explainCommand } from "./commands/explain"
import { resolveCommand } from "./commands/resolve"
import { sourcesCommand } from "./commands/sources"
import { globalOptions } from "./core/cli-args"
import { type CliDeps, createContext } from "./core/context"
import { UsageError } from "./core/usage-error"

/**
 * Runs one CLI invocation.
 *
 * @returns The process exit code: 0 on success, 1 on any failure.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const ctx = createContext(deps)

  try {
    await yargs([...argv])
      .scriptName("envlayer")
      .usage("$0 <command> --env <name> [options]")
      .env("ENVLAYER")
      .options(globalOptions)
      .command(resolveCommand(ctx))
      .command(explainCommand(ctx))
      .command(sourcesCommand(ctx))
      .demandCommand(1, "Choose a command: resolve, explain or sources")
      .strict()
      .help()
      .version(false)
      .exitProcess(false)
      .fail((message, err) => {
        throw err ?? new UsageError(message)
      })
      .parseAsync()

    return 0
  } catch (err) {
    deps.stderr.write(`${formatError(err)}\n`)

    return 1
  }
}
