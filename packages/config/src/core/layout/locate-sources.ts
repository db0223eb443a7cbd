import path from "node:path"
import type { SourceDescriptor } from "../../ports/source"
import type { Environment } from "../environment/environment"
import { SOURCE_ROLES } from "./source-roles"

export type SourceLayout = {
  /**
   * File name for a source id, relative to the base directory.
   *
   * @default id === "entry" ? ".env" : `.env.${id}`
   */
  fileName?: (id: string) => string
}

export const defaultFileName = (id: string): string => (id === "entry" ? ".env" : `.env.${id}`)

export const EXAMPLE_SUFFIX = "-example"

/**
 * Lazy, restartable sequence of the sources for one environment. Every
 * iteration yields equal descriptors in the same order.
 */
export class SourceSequence implements Iterable<SourceDescriptor> {
  constructor(
    readonly baseDir: string,
    readonly environment: Environment,
    private readonly layout: SourceLayout = {},
  ) {}

  *[Symbol.iterator](): Iterator<SourceDescriptor> {
    const fileName = this.layout.fileName ?? defaultFileName
    let rank = 0

    for (const entry of SOURCE_ROLES) {
      if (!entry.appliesTo(this.environment)) continue

      const id = entry.id(this.environment)
      const name = fileName(id)
      const file = path.resolve(this.baseDir, name)

      yield Object.freeze({
        id,
        role: entry.role,
        rank: rank++,
        file,
        fileName: name,
        optional: entry.optional,
        local: entry.local,
        mayContainSecrets: entry.local,
        ...(entry.local && { exampleFile: `${file}${EXAMPLE_SUFFIX}` }),
      })
    }
  }

  toArray(): SourceDescriptor[] {
    return [...this]
  }
}

/**
 * Expands an environment into its ordered source files under `baseDir`.
 * Nothing is read from disk.
 */
export function locateSources(
  baseDir: string,
  environment: Environment,
  layout?: SourceLayout,
): SourceSequence {
  return new SourceSequence(path.resolve(baseDir), environment, layout)
}
