import { ResolvedConfiguration } from "../resolved-configuration"
import { defineEntry } from "../utils/define-entry"

/**
 * Variables contributed by one source, tagged with its provenance id.
 */
export type Layer = Readonly<{
  id: string
  values: Readonly<Record<string, string>>
}>

export const SECRETS_LAYER_ID = "secrets"

/**
 * Folds layers in order. A later definition replaces both the value and the
 * provenance of an earlier one. The result holds the union of all names.
 *
 * @param base - Starting point; its values are overridden like any earlier layer.
 */
export function mergeLayers(
  layers: Iterable<Layer>,
  base: ResolvedConfiguration = ResolvedConfiguration.empty(),
): ResolvedConfiguration {
  const value: Record<string, string> = { ...base.value }
  const provenance: Record<string, string> = { ...base.provenance }
  const sourceOrder = base.sourcesUsed()

  for (const layer of layers) {
    if (!sourceOrder.includes(layer.id)) sourceOrder.push(layer.id)

    for (const [name, v] of Object.entries(layer.values)) {
      defineEntry(value, name, v)
      defineEntry(provenance, name, layer.id)
    }
  }

  return new ResolvedConfiguration({ value, provenance, sourceOrder })
}
