import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(lines: string[], index: number): Record<string, unknown> {
  const line = lines[index]
  if (line === undefined) throw new Error(`no log line at ${index}`)

  return JSON.parse(line)
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { service: "envlayer" },
    )

    logger.info("Resolved configuration", { environment: "dev", count: 4 })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines, 0)

    expect(payload).toMatchObject({
      msg: "Resolved configuration",
      service: "envlayer",
      environment: "dev",
      count: 4,
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { environment: "ci" })
    const child = base.child({ source: "ci.local" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines, 0)).toMatchObject({
      msg: "logged",
      environment: "ci",
      source: "ci.local",
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("Resolution failed", {
      err: new Error("outer", { cause: new Error("inner") }),
    })

    const payload = parseLine(lines, 0)

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { message: "inner" },
    })
  })
})
