import type { ReadableSecretVault } from "../secret-vault"

export function describeReadableSecretVaultContract(
  name: string,
  factory: () => Promise<{
    vault: ReadableSecretVault
    seed: (key: string, value: string) => Promise<void>
    cleanup?: () => Promise<void>
  }>,
) {
  describe(`ReadableSecretVault contract: ${name}`, () => {
    let vault: ReadableSecretVault
    let seed: (key: string, value: string) => Promise<void>
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      const result = await factory()
      vault = result.vault
      seed = result.seed
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
    })

    it("has a name", () => {
      expect(typeof vault.name).toBe("string")
      expect(vault.name.length).toBeGreaterThan(0)
    })

    describe("get()", () => {
      it("returns the value of an existing secret", async () => {
        await seed("DATABASE_PASSWORD", "test-password")

        const result = await vault.get("DATABASE_PASSWORD")

        expect(result?.value).toBe("test-password")
      })

      it("returns null for a missing secret", async () => {
        expect(await vault.get("DOES_NOT_EXIST")).toBeNull()
      })

      it("keeps values with special characters intact", async () => {
        const value = 'pass=word with spaces & "quotes" # not a comment'
        await seed("SPECIAL", value)

        const result = await vault.get("SPECIAL")

        expect(result?.value).toBe(value)
      })

      it("keeps unicode values intact", async () => {
        const value = "mot de passe é ✓"
        await seed("UNICODE", value)

        const result = await vault.get("UNICODE")

        expect(result?.value).toBe(value)
      })
    })

    describe("exists()", () => {
      it("returns true for an existing secret", async () => {
        await seed("API_TOKEN", "test-token")

        expect(await vault.exists("API_TOKEN")).toBe(true)
      })

      it("returns false for a missing secret", async () => {
        expect(await vault.exists("DOES_NOT_EXIST")).toBe(false)
      })
    })
  })
}
