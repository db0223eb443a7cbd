import { MalformedLineError } from "../../errors"
import { parseEnvFile } from "../parse-env-file"

const FILE = "/srv/app/.env.shared"

describe("parseEnvFile", () => {
  it("parses simple assignments", () => {
    expect(parseEnvFile("PORT=3000\nHOST=localhost\n", FILE)).toEqual({
      PORT: "3000",
      HOST: "localhost",
    })
  })

  it("skips blank lines and comments", () => {
    const content = ["# header", "", "   ", "  # indented comment", "TZ=UTC"].join("\n")

    expect(parseEnvFile(content, FILE)).toEqual({ TZ: "UTC" })
  })

  it("accepts CRLF line endings and a leading BOM", () => {
    expect(parseEnvFile("\uFEFFA=1\r\nB=2\r\n", FILE)).toEqual({ A: "1", B: "2" })
  })

  it("accepts an export prefix and whitespace around =", () => {
    expect(parseEnvFile("export API_URL = https://api.test\n", FILE)).toEqual({
      API_URL: "https://api.test",
    })
  })

  it("strips quotes and keeps inner spaces", () => {
    const content = [`SINGLE='single quoted'`, `DOUBLE="double quoted"`, "UNQUOTED=  no quotes  "].join(
      "\n",
    )

    expect(parseEnvFile(content, FILE)).toEqual({
      SINGLE: "single quoted",
      DOUBLE: "double quoted",
      UNQUOTED: "no quotes",
    })
  })

  it("keeps # inside quotes and drops a trailing comment", () => {
    const content = `COLOR="#ff0000"\nLEVEL=info # default level`

    expect(parseEnvFile(content, FILE)).toEqual({ COLOR: "#ff0000", LEVEL: "info" })
  })

  it("keeps # that is not preceded by whitespace", () => {
    expect(parseEnvFile("PASSWORD=abc#def\nCOLOR=#fff\n", FILE)).toEqual({
      PASSWORD: "abc#def",
      COLOR: "#fff",
    })
  })

  it("drops a comment after whitespace but keeps a leading #", () => {
    expect(parseEnvFile("TAG= #main\nNOTE=a#b  # trailing\n", FILE)).toEqual({
      TAG: "#main",
      NOTE: "a#b",
    })
  })

  it("keeps backslashes literal inside single and back quotes", () => {
    const content = ["SINGLE='C:\\new'", "BACK=`it's C:\\new`", 'DOUBLE="a\\nb"'].join("\n")

    expect(parseEnvFile(content, FILE)).toEqual({
      SINGLE: "C:\\new",
      BACK: "it's C:\\new",
      DOUBLE: "a\nb",
    })
  })

  it("treats an unterminated quote as part of the value", () => {
    expect(parseEnvFile(`NAME="abc`, FILE)).toEqual({ NAME: '"abc' })
  })

  it("keeps __proto__ as an ordinary variable", () => {
    const values = parseEnvFile("__proto__=x\nA=1\n", FILE)

    expect(Object.keys(values)).toEqual(["__proto__", "A"])
    expect(Object.hasOwn(values, "__proto__")).toBe(true)
    expect(Object.getOwnPropertyDescriptor(values, "__proto__")?.value).toBe("x")
    expect(Object.getPrototypeOf(values)).toBe(Object.prototype)
  })

  it("does not interpolate references", () => {
    expect(parseEnvFile("A=1\nB=${A}\n", FILE)).toEqual({ A: "1", B: "${A}" })
  })

  it("treats an empty assignment as an empty string", () => {
    expect(parseEnvFile("EMPTY=\n", FILE)).toEqual({ EMPTY: "" })
  })

  it("keeps everything after the first =", () => {
    expect(parseEnvFile("DATABASE_URL=postgres://u@h/db?sslmode=require", FILE)).toEqual({
      DATABASE_URL: "postgres://u@h/db?sslmode=require",
    })
  })

  it("lets the last duplicate win", () => {
    expect(parseEnvFile("TZ=UTC\nTZ=Europe/Paris\n", FILE)).toEqual({ TZ: "Europe/Paris" })
  })

  it("accepts dots and dashes after the first character", () => {
    expect(parseEnvFile("app.log-level=debug", FILE)).toEqual({ "app.log-level": "debug" })
  })

  it("returns an empty mapping for empty content", () => {
    expect(parseEnvFile("", FILE)).toEqual({})
  })

  describe("malformed lines", () => {
    it("rejects a line without an assignment with file and line number", () => {
      const content = "# comment\nTZ=UTC\nNOT_AN_ASSIGNMENT\n"

      expect(() => parseEnvFile(content, FILE)).toThrow(MalformedLineError)

      try {
        parseEnvFile(content, FILE)
        expect.unreachable()
      } catch (err) {
        expect(err).toMatchObject({
          code: "malformed_line",
          context: { file: FILE, line: 3 },
        })
      }
    })

    it.each([["=value"], ["1ABC=x"], ["MY VAR=x"], ["[section]"]])(
      "rejects %j",
      (line) => {
        expect(() => parseEnvFile(line, FILE)).toThrow(MalformedLineError)
      },
    )
  })
})
