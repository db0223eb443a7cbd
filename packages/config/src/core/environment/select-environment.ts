import { z } from "zod"
import { MissingProductionVariantError, UnknownEnvironmentError } from "../errors"
import {
  type Environment,
  environmentNames,
  type ProductionVariant,
  productionVariants,
} from "./environment"

const environmentNameSchema = z.enum(environmentNames)
const variantSchema = z.enum(productionVariants)

/**
 * Maps a raw environment name (and, for production, a variant) to an
 * {@link Environment}.
 *
 * Surrounding whitespace is ignored; names are case-sensitive. A variant given
 * for a non-production environment is ignored.
 *
 * @throws {UnknownEnvironmentError} for an unknown name, or an unknown variant of production
 * @throws {MissingProductionVariantError} for production without a variant
 */
export function selectEnvironment(raw: string, variant?: string): Environment {
  const name = environmentNameSchema.safeParse(raw.trim())

  if (!name.success) {
    throw new UnknownEnvironmentError(raw.trim())
  }

  if (name.data !== "production") {
    return { name: name.data }
  }

  return { name: "production", variant: parseVariant(variant) }
}

function parseVariant(raw: string | undefined): ProductionVariant {
  const trimmed = raw?.trim() ?? ""

  if (trimmed === "") {
    throw new MissingProductionVariantError()
  }

  const variant = variantSchema.safeParse(trimmed)

  if (!variant.success) {
    throw new UnknownEnvironmentError("production", trimmed)
  }

  return variant.data
}
