import type { CommandModule } from "yargs"
import { z } from "zod"
import { outputFormats, parseArgs, readGlobalArgs } from "../core/cli-args"
import { type CommandContext, resolveFromArgs } from "../core/context"
import { formatDotenv, formatJson } from "../core/format"

const resolveArgsSchema = z.object({ format: z.enum(outputFormats) })

export function resolveCommand(ctx: CommandContext): CommandModule {
  return {
    command: "resolve",
    describe: "Print the resolved variables",
    builder: {
      format: { choices: outputFormats, default: "dotenv", describe: "Output format" },
    },
    handler: async (raw) => {
      const args = readGlobalArgs(raw)
      const { format } = parseArgs(resolveArgsSchema, raw)
      const config = await resolveFromArgs(ctx, args)

      ctx.print(format === "json" ? formatJson(config) : formatDotenv(config))
    },
  }
}
