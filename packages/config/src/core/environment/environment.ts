export const environmentNames = ["dev", "test", "ci", "production"] as const
export type EnvironmentName = (typeof environmentNames)[number]

export const productionVariants = ["backend", "frontend"] as const
export type ProductionVariant = (typeof productionVariants)[number]

export type Environment =
  | { readonly name: "dev" }
  | { readonly name: "test" }
  | { readonly name: "ci" }
  | { readonly name: "production"; readonly variant: ProductionVariant }

/**
 * Stable label for logs and reports, e.g. "dev" or "production.backend".
 */
export function environmentLabel(environment: Environment): string {
  return environment.name === "production"
    ? `production.${environment.variant}`
    : environment.name
}
