import { parseEnvFile, ResolvedConfiguration } from "@envlayer/config"
import { formatDotenv, formatFinding, formatJson } from "../format"
import { UnrepresentableValueError } from "../unrepresentable-value-error"

function config(value: Record<string, string>): ResolvedConfiguration {
  const provenance = Object.fromEntries(Object.keys(value).map((k) => [k, "shared"]))

  return new ResolvedConfiguration({ value, provenance })
}

describe("formatDotenv", () => {
  it("writes bare values unquoted", () => {
    expect(formatDotenv(config({ URL: "https://api.test/v1?x=1", EMPTY: "" }))).toBe(
      "EMPTY=\nURL=https://api.test/v1?x=1",
    )
  })

  it("single-quotes values with spaces or #", () => {
    expect(formatDotenv(config({ A: "hello world", B: "#ff0000" }))).toBe(
      "A='hello world'\nB='#ff0000'",
    )
  })

  it("double-quotes values with newlines", () => {
    expect(formatDotenv(config({ KEY: "line1\nline2" }))).toBe('KEY="line1\\nline2"')
  })

  it("back-quotes values with a single quote", () => {
    expect(formatDotenv(config({ PATH_HINT: "it's C:\\new" }))).toBe("PATH_HINT=`it's C:\\new`")
  })

  it("parses back to the same values", () => {
    const value = {
      A: "hello world",
      B: "#ff0000",
      C: "it's",
      D: "a=b",
      E: "multi\nline",
      F: "it's C:\\new",
      G: `it's "q"`,
      H: "pa#ss",
      I: "  padded  ",
      J: "C:\\tmp\\new",
      K: "ends with\\\nbreak",
    }

    expect(parseEnvFile(formatDotenv(config(value)), "roundtrip")).toEqual(value)
  })

  it.each([
    ["a single quote and a back quote", "it's `x`"],
    ["a line break and a double quote", 'say\n"hi"'],
    ["a line break and a literal \\n", "C:\\new\nline"],
  ])("refuses a value with %s", (_case, value) => {
    expect(() => formatDotenv(config({ TRICKY: value }))).toThrow(UnrepresentableValueError)
  })
})

describe("formatJson", () => {
  it("writes sorted keys", () => {
    expect(formatJson(config({ B: "2", A: "1" }))).toBe('{\n  "A": "1",\n  "B": "2"\n}')
  })
})

describe("formatFinding", () => {
  it("prefixes the message with the kind", () => {
    expect(
      formatFinding({
        kind: "unconventional-name",
        source: "shared",
        file: "/srv/app/.env.shared",
        variable: "logLevel",
        message: "logLevel is not UPPER_SNAKE_CASE",
      }),
    ).toBe("unconventional-name: logLevel is not UPPER_SNAKE_CASE")
  })
})
