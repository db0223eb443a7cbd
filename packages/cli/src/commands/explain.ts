import type { CommandModule } from "yargs"
import { z } from "zod"
import { parseArgs, readGlobalArgs } from "../core/cli-args"
import { type CommandContext, resolveFromArgs } from "../core/context"
import { formatFinding } from "../core/format"

const explainArgsSchema = z.object({ name: z.array(z.string()).default([]) })

export function explainCommand(ctx: CommandContext): CommandModule {
  return {
    command: "explain [name..]",
    describe: "Print which source set each variable (values are not shown)",
    builder: {},
    handler: async (raw) => {
      const args = readGlobalArgs(raw)
      const { name: requested } = parseArgs(explainArgsSchema, raw)
      const config = await resolveFromArgs(ctx, args)
      const names = requested.length > 0 ? requested : config.keys()

      for (const name of names) {
        ctx.print(`${name}\t${config.explain(name) ?? "(unset)"}`)
      }

      const findings = config.report?.findings ?? []

      if (findings.length > 0) {
        ctx.print("")
        for (const finding of findings) ctx.print(formatFinding(finding))
      }
    },
  }
}
