import { constants as fsConstants, type Stats } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { createNullLogger, type Logger } from "@envlayer/logger"
import type { ReadableSecretVault } from "@envlayer/secrets"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import type { SourceDescriptor } from "../ports/source"
import { type AuditedLayer, auditLayers } from "./audit/audit-layers"
import { environmentLabel } from "./environment/environment"
import { selectEnvironment } from "./environment/select-environment"
import { InvalidBaseDirectoryError, MalformedLineError } from "./errors"
import { locateSources, type SourceLayout } from "./layout/locate-sources"
import { type Layer, mergeLayers } from "./merge/merge-layers"
import type { ResolvedConfiguration, SourceReport } from "./resolved-configuration"
import { bindingsFor, type SecretBindings } from "./secrets/bindings"
import { assertNoSecretLeaks } from "./secrets/leak-check"
import { SecretSource } from "./secrets/secret-source"

export type ResolveOptions = {
  /** Directory holding the variable files */
  baseDir: string

  /** "dev", "test", "ci" or "production" */
  environment: string

  /** Required for production: "backend" or "frontend" */
  variant?: string

  bindings?: SecretBindings
  layout?: SourceLayout

  /**
   * Bound on the secret provider.
   *
   * @default 10_000
   */
  timeoutMs?: number
  signal?: AbortSignal
}

export type ResolveDeps = {
  vault?: ReadableSecretVault
  logger?: Logger
}

type LoadedLayer = AuditedLayer & Layer

/**
 * Resolves the effective variables for one environment.
 *
 * Runs environment selection, the base directory check, source loading in
 * precedence order, the leak check, the secret fetch and the merge, and
 * fails with the first error on the way.
 */
export async function resolveConfiguration(
  options: ResolveOptions,
  deps: ResolveDeps = {},
): Promise<ResolvedConfiguration> {
  const environment = selectEnvironment(options.environment, options.variant)
  const label = environmentLabel(environment)
  const baseDir = path.resolve(options.baseDir)
  const logger = (deps.logger ?? createNullLogger()).child({
    module: "resolve",
    environment: label,
    baseDir,
  })

  const secretSource = new SecretSource(
    { ...(deps.vault && { vault: deps.vault }), logger },
    { ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }) },
  )

  if (options.variant !== undefined && environment.name !== "production") {
    logger.warn("Variant is ignored outside production", { variant: options.variant })
  }

  await assertReadableDirectory(baseDir)

  const loaded: LoadedLayer[] = []
  const reports: SourceReport[] = []

  for (const descriptor of locateSources(baseDir, environment, options.layout)) {
    const values = await DotenvSource.fromDescriptor(descriptor).read()
    const at = { source: descriptor.id, file: descriptor.file }

    if (values === null) {
      logger.debug("Source not found", at)
      reports.push(report(descriptor, "missing", 0))
      continue
    }

    logger.debug("Loaded source", { ...at, keys: Object.keys(values).length })
    reports.push(report(descriptor, "loaded", Object.keys(values).length))

    loaded.push({
      id: descriptor.id,
      descriptor,
      values,
      ...(await readExample(descriptor)),
    })
  }

  const bound = bindingsFor(options.bindings, environment)

  assertNoSecretLeaks(loaded, bound)

  const secrets = await secretSource.resolve(bound, options.signal)

  const merged = mergeLayers([...loaded, { id: "secrets", values: secrets }])
  const findings = auditLayers(loaded, bound)

  for (const finding of findings) {
    logger.warn(finding.message, {
      source: finding.source,
      file: finding.file,
      ...(finding.variable !== undefined && { variable: finding.variable }),
      kind: finding.kind,
    })
  }

  logger.info("Resolved configuration", {
    variables: merged.keys().length,
    sources: merged.sourcesUsed(),
    secrets: bound.size,
  })

  return merged.withReport({
    environment: label,
    baseDir,
    sources: reports,
    secrets: [...bound].sort(),
    findings,
  })
}

async function assertReadableDirectory(baseDir: string): Promise<void> {
  let stats: Stats

  try {
    stats = await fs.stat(baseDir)
    await fs.access(baseDir, fsConstants.R_OK | fsConstants.X_OK)
  } catch (err) {
    throw new InvalidBaseDirectoryError(baseDir, err)
  }

  if (!stats.isDirectory()) throw new InvalidBaseDirectoryError(baseDir)
}

type ExampleAudit = Pick<AuditedLayer, "exampleKeys" | "malformedExampleLine">

/**
 * Example files document a local file and never fail the resolution: a
 * malformed one is reported as a finding.
 */
async function readExample(descriptor: SourceDescriptor): Promise<ExampleAudit> {
  if (descriptor.exampleFile === undefined) return {}

  try {
    const example = await new DotenvSource({
      id: `${descriptor.id}-example`,
      file: descriptor.exampleFile,
      required: false,
    }).read()

    return example ? { exampleKeys: new Set(Object.keys(example)) } : {}
  } catch (err) {
    if (err instanceof MalformedLineError) return { malformedExampleLine: err.line }
    throw err
  }
}

function report(
  descriptor: SourceDescriptor,
  status: SourceReport["status"],
  keys: number,
): SourceReport {
  return { id: descriptor.id, file: descriptor.file, rank: descriptor.rank, status, keys }
}
