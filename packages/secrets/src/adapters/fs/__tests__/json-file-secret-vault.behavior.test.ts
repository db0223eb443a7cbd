import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SecretProviderError } from "../../../core/secret-provider-error"
import { JsonFileSecretVault } from "../json-file-secret-vault"

describe("JsonFileSecretVault behavior", () => {
  let dir: string
  let file: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "json-secrets-"))
    file = path.join(dir, "secrets.json")
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("names itself after the file", () => {
    expect(new JsonFileSecretVault({ path: file }).name).toBe(`json-file:${file}`)
  })

  it("reads object entries with a version", async () => {
    await fs.writeFile(
      file,
      JSON.stringify({ API_TOKEN: { value: "test-token", version: "3" } }),
    )

    const vault = new JsonFileSecretVault({ path: file })

    expect(await vault.get("API_TOKEN")).toEqual({ value: "test-token", version: "3" })
  })

  it("picks up changes between calls", async () => {
    const vault = new JsonFileSecretVault({ path: file })

    await fs.writeFile(file, JSON.stringify({ API_TOKEN: "first" }))
    expect((await vault.get("API_TOKEN"))?.value).toBe("first")

    await fs.writeFile(file, JSON.stringify({ API_TOKEN: "second" }))
    expect((await vault.get("API_TOKEN"))?.value).toBe("second")
  })

  it("fails with a provider error when the file is missing", async () => {
    const vault = new JsonFileSecretVault({ path: file })

    await expect(vault.get("API_TOKEN")).rejects.toBeInstanceOf(SecretProviderError)
  })

  it("fails with a provider error on invalid JSON", async () => {
    await fs.writeFile(file, "{ not json")

    const vault = new JsonFileSecretVault({ path: file })

    await expect(vault.get("API_TOKEN")).rejects.toMatchObject({
      code: "secret_provider_error",
      context: { provider: `json-file:${file}`, operation: "load", key: "API_TOKEN" },
    })
  })

  it("fails with a provider error when an entry has the wrong shape", async () => {
    await fs.writeFile(file, JSON.stringify({ API_TOKEN: 42 }))

    const vault = new JsonFileSecretVault({ path: file })

    await expect(vault.exists("API_TOKEN")).rejects.toBeInstanceOf(SecretProviderError)
  })
})
