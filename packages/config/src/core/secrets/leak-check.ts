import type { SourceDescriptor } from "../../ports/source"
import { SecretLeakDetectedError } from "../errors"

export type LoadedSource = Readonly<{
  descriptor: Pick<SourceDescriptor, "id" | "file">
  values: Readonly<Record<string, string>>
}>

/**
 * Fails when a secret-bound name is assigned in any on-disk source, whichever
 * source would win the merge. Sources are checked in the given order.
 *
 * @throws {SecretLeakDetectedError} for the first offending assignment
 */
export function assertNoSecretLeaks(
  sources: Iterable<LoadedSource>,
  bound: ReadonlySet<string>,
): void {
  if (bound.size === 0) return

  for (const { descriptor, values } of sources) {
    for (const name of Object.keys(values)) {
      if (bound.has(name)) {
        throw new SecretLeakDetectedError(name, descriptor.id, descriptor.file)
      }
    }
  }
}
