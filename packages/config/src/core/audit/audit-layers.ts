import type { SourceDescriptor } from "../../ports/source"
import type { Finding } from "./finding"

export type AuditedLayer = Readonly<{
  descriptor: SourceDescriptor
  values: Readonly<Record<string, string>>

  /** Keys of the committed example file, when it exists */
  exampleKeys?: ReadonlySet<string>

  /** First malformed line of the example file; its keys are then unknown */
  malformedExampleLine?: number
}>

const CREDENTIAL_NAME = /SECRET|TOKEN|PASSWORD|PASSWD|PRIVATE_KEY|API_KEY|CREDENTIAL/i
const CONVENTIONAL_NAME = /^[A-Z][A-Z0-9_]*$/

/**
 * Flags policy issues in loaded sources. Never throws on what it finds.
 *
 * @param bound - Names resolved from the secret provider.
 */
export function auditLayers(
  layers: Iterable<AuditedLayer>,
  bound: ReadonlySet<string>,
): Finding[] {
  const findings: Finding[] = []

  for (const { descriptor, values, exampleKeys, malformedExampleLine } of layers) {
    const at = { source: descriptor.id, file: descriptor.file }

    for (const [variable, value] of Object.entries(values)) {
      if (!CONVENTIONAL_NAME.test(variable)) {
        findings.push({
          kind: "unconventional-name",
          ...at,
          variable,
          message: `${variable} is not UPPER_SNAKE_CASE`,
        })
      }

      if (
        !descriptor.mayContainSecrets &&
        value !== "" &&
        CREDENTIAL_NAME.test(variable) &&
        !bound.has(variable)
      ) {
        findings.push({
          kind: "possible-secret",
          ...at,
          variable,
          message: `${variable} looks like a credential in committed source "${descriptor.id}"; bind it as a secret or move it to a .local file`,
        })
      }
    }

    if (exampleKeys) findings.push(...compareWithExample(descriptor, values, exampleKeys))

    if (malformedExampleLine !== undefined) {
      const example = descriptor.exampleFile ?? `${descriptor.file}-example`

      findings.push({
        kind: "malformed-example",
        source: descriptor.id,
        file: example,
        message: `Line ${malformedExampleLine} of ${example} is not NAME=VALUE; key comparison skipped`,
      })
    }
  }

  return findings
}

function compareWithExample(
  descriptor: SourceDescriptor,
  values: Readonly<Record<string, string>>,
  exampleKeys: ReadonlySet<string>,
): Finding[] {
  const findings: Finding[] = []
  const example = descriptor.exampleFile ?? `${descriptor.file}-example`

  for (const variable of [...exampleKeys].sort()) {
    if (!Object.hasOwn(values, variable)) {
      findings.push({
        kind: "missing-example-key",
        source: descriptor.id,
        file: descriptor.file,
        variable,
        message: `${variable} is listed in ${example} but not set in ${descriptor.fileName}`,
      })
    }
  }

  for (const variable of Object.keys(values).sort()) {
    if (!exampleKeys.has(variable)) {
      findings.push({
        kind: "undocumented-local-key",
        source: descriptor.id,
        file: descriptor.file,
        variable,
        message: `${variable} is set in ${descriptor.fileName} but missing from ${example}`,
      })
    }
  }

  return findings
}
