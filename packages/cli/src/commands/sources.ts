import type { CommandModule } from "yargs"
import { readGlobalArgs } from "../core/cli-args"
import { type CommandContext, resolveFromArgs } from "../core/context"

export function sourcesCommand(ctx: CommandContext): CommandModule {
  return {
    command: "sources",
    describe: "List the located sources with their status",
    builder: {},
    handler: async (raw) => {
      const config = await resolveFromArgs(ctx, readGlobalArgs(raw))

      for (const source of config.report?.sources ?? []) {
        ctx.print([source.rank, source.id, source.status, source.keys, source.file].join("\t"))
      }
    },
  }
}
