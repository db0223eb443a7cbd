import { ResolvedConfiguration } from "../resolved-configuration"

describe("ResolvedConfiguration", () => {
  const config = new ResolvedConfiguration({
    value: { TZ: "America/New_York", PORT: "3000", API_TOKEN: "test-token" },
    provenance: { TZ: "dev.local", PORT: "shared", API_TOKEN: "secrets" },
    sourceOrder: ["entry", "shared", "dev.local", "secrets"],
  })

  describe("get / has", () => {
    it("returns values by name", () => {
      expect(config.get("TZ")).toBe("America/New_York")
      expect(config.has("PORT")).toBe(true)
    })

    it("returns undefined for unknown names", () => {
      expect(config.get("MISSING")).toBeUndefined()
      expect(config.has("MISSING")).toBe(false)
    })

    it("does not expose prototype properties", () => {
      expect(config.get("toString")).toBeUndefined()
      expect(config.has("constructor")).toBe(false)
    })
  })

  describe("keys", () => {
    it("returns sorted names", () => {
      expect(config.keys()).toEqual(["API_TOKEN", "PORT", "TZ"])
    })
  })

  describe("explain", () => {
    it("returns the source id that set the value", () => {
      expect(config.explain("TZ")).toBe("dev.local")
      expect(config.explain("API_TOKEN")).toBe("secrets")
    })

    it("returns undefined for unknown names", () => {
      expect(config.explain("MISSING")).toBeUndefined()
    })
  })

  describe("sourcesUsed", () => {
    it("returns contributing sources in merge order", () => {
      expect(config.sourcesUsed()).toEqual(["shared", "dev.local", "secrets"])
    })

    it("appends sources missing from the order", () => {
      const unordered = new ResolvedConfiguration({
        value: { A: "1", B: "2" },
        provenance: { A: "x", B: "y" },
        sourceOrder: ["y"],
      })

      expect(unordered.sourcesUsed()).toEqual(["y", "x"])
    })
  })

  describe("immutability", () => {
    it("freezes value and provenance", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
      expect(Object.isFrozen(config.provenance)).toBe(true)
    })

    it("copies its inputs", () => {
      const value = { A: "1" }
      const copy = new ResolvedConfiguration({ value, provenance: { A: "shared" } })

      value.A = "2"

      expect(copy.get("A")).toBe("1")
    })
  })

  it("attaches a report without changing values", () => {
    const report = {
      environment: "dev",
      baseDir: "/srv/app",
      sources: [],
      secrets: [],
      findings: [],
    }

    const withReport = config.withReport(report)

    expect(withReport.report).toBe(report)
    expect(withReport.value).toEqual(config.value)
    expect(withReport.sourcesUsed()).toEqual(config.sourcesUsed())
    expect(config.report).toBeUndefined()
  })

  it("serializes values and provenance", () => {
    expect(JSON.parse(JSON.stringify(config))).toEqual({
      value: { TZ: "America/New_York", PORT: "3000", API_TOKEN: "test-token" },
      provenance: { TZ: "dev.local", PORT: "shared", API_TOKEN: "secrets" },
    })
  })
})
