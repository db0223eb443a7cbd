import type { IResolvedConfiguration } from "../ports/config"
import type { Finding } from "./audit/finding"

export type SourceStatus = "loaded" | "missing"

export type SourceReport = Readonly<{
  id: string
  file: string
  rank: number
  status: SourceStatus

  /** Number of variables the file assigns */
  keys: number
}>

/**
 * What a resolution looked at. Holds names and paths, never values.
 */
export type ResolutionReport = Readonly<{
  environment: string
  baseDir: string
  sources: readonly SourceReport[]

  /** Secret-bound names fetched from the provider, sorted */
  secrets: readonly string[]
  findings: readonly Finding[]
}>

export type ResolvedConfigurationInit = {
  value: Record<string, string>
  provenance: Record<string, string>

  /** Source ids in merge order; drives the order of sourcesUsed(). */
  sourceOrder?: readonly string[]
  report?: ResolutionReport
}

export class ResolvedConfiguration implements IResolvedConfiguration {
  readonly value: Readonly<Record<string, string>>
  readonly provenance: Readonly<Record<string, string>>
  readonly report: ResolutionReport | undefined
  private readonly sourceOrder: readonly string[]

  constructor(init: ResolvedConfigurationInit) {
    this.value = Object.freeze({ ...init.value })
    this.provenance = Object.freeze({ ...init.provenance })
    this.sourceOrder = Object.freeze([...(init.sourceOrder ?? [])])
    this.report = init.report
  }

  static empty(): ResolvedConfiguration {
    return new ResolvedConfiguration({ value: {}, provenance: {} })
  }

  get(name: string): string | undefined {
    return Object.hasOwn(this.value, name) ? this.value[name] : undefined
  }

  has(name: string): boolean {
    return Object.hasOwn(this.value, name)
  }

  keys(): string[] {
    return Object.keys(this.value).sort()
  }

  explain(name: string): string | undefined {
    return Object.hasOwn(this.provenance, name) ? this.provenance[name] : undefined
  }

  sourcesUsed(): string[] {
    const used = new Set(Object.values(this.provenance))
    const ordered = this.sourceOrder.filter((id) => used.has(id))
    const unordered = [...used].filter((id) => !this.sourceOrder.includes(id))

    return [...ordered, ...unordered]
  }

  /**
   * Attaches a report to a copy of this configuration.
   */
  withReport(report: ResolutionReport): ResolvedConfiguration {
    return new ResolvedConfiguration({
      value: this.value,
      provenance: this.provenance,
      sourceOrder: this.sourceOrder,
      report,
    })
  }

  toJSON(): { value: Record<string, string>; provenance: Record<string, string> } {
    return { value: { ...this.value }, provenance: { ...this.provenance } }
  }
}
