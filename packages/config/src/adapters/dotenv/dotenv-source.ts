import fs from "node:fs/promises"
import path from "node:path"
import { MissingRequiredSourceError, SourceUnreadableError } from "../../core/errors"
import { parseEnvFile } from "../../core/parse/parse-env-file"
import type { ConfigSource, SourceDescriptor } from "../../ports/source"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the variable file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.shared", "/srv/app/.env.dev.local"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws {@link MissingRequiredSourceError} if file not found.
   * - `false`: Returns an empty mapping if file not found.
   */
  required: boolean

  /**
   * Provenance id.
   *
   * @default `dotenv:${file}`
   */
  id?: string

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly id: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.id = opts.id ?? `dotenv:${opts.file}`
  }

  static fromDescriptor(descriptor: SourceDescriptor): DotenvSource {
    return new DotenvSource({
      id: descriptor.id,
      file: descriptor.file,
      required: !descriptor.optional,
    })
  }

  get file(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  /**
   * @returns The parsed mapping, or null when an optional file is absent.
   */
  async read(): Promise<Record<string, string> | null> {
    const filePath = this.file
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (isNotFound(err)) {
        if (this.opts.required) throw new MissingRequiredSourceError(this.id, filePath)

        return null
      }

      throw new SourceUnreadableError(this.id, filePath, err)
    }

    return parseEnvFile(content, filePath)
  }

  async load(): Promise<Record<string, string>> {
    return (await this.read()) ?? {}
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
