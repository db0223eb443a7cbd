import { BaseError } from "../base-error"
import { formatError } from "../format-error"

describe("formatError", () => {
  it("prints code, message and context lines", () => {
    const err = new BaseError("Malformed line 3 in /app/.env.shared", {
      code: "malformed_line",
      context: { file: "/app/.env.shared", line: 3 },
    })

    expect(formatError(err)).toBe(
      [
        "malformed_line: Malformed line 3 in /app/.env.shared",
        "  file: /app/.env.shared",
        "  line: 3",
      ].join("\n"),
    )
  })

  it("prints every cause after the error", () => {
    const root = new Error("connect ETIMEDOUT")
    const err = new BaseError("Could not fetch secret API_TOKEN", {
      code: "secret_resolution_failed",
      context: { name: "API_TOKEN" },
      cause: root,
    })

    expect(formatError(err)).toBe(
      [
        "secret_resolution_failed: Could not fetch secret API_TOKEN",
        "  name: API_TOKEN",
        "caused by: Error: connect ETIMEDOUT",
      ].join("\n"),
    )
  })

  it("prints non-Error values", () => {
    expect(formatError("boom")).toBe("boom")
    expect(formatError({ status: 1 })).toBe('{"status":1}')
  })
})
