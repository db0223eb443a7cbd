#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers"
import { runCli } from "./cli"

process.exitCode = await runCli(hideBin(process.argv), {
  stdout: process.stdout,
  stderr: process.stderr,
})
