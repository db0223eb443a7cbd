import type { SourceRole } from "../../ports/source"
import type { Environment } from "../environment/environment"

export type SourceRoleSpec = Readonly<{
  role: SourceRole
  local: boolean
  optional: boolean

  /** Provenance id for the given environment */
  id: (environment: Environment) => string

  /** Present in the sequence for the given environment */
  appliesTo: (environment: Environment) => boolean
}>

const always = () => true

/**
 * Every file role, lowest precedence first.
 */
export const SOURCE_ROLES: readonly SourceRoleSpec[] = [
  { role: "entry", local: false, optional: true, id: () => "entry", appliesTo: always },
  { role: "common", local: false, optional: true, id: () => "common", appliesTo: always },
  {
    role: "common",
    local: true,
    optional: true,
    id: () => "common.local",
    appliesTo: always,
  },
  { role: "shared", local: false, optional: false, id: () => "shared", appliesTo: always },
  {
    role: "shared",
    local: true,
    optional: true,
    id: () => "shared.local",
    appliesTo: always,
  },
  {
    role: "environment",
    local: false,
    optional: true,
    id: (env) => env.name,
    appliesTo: always,
  },
  {
    role: "environment",
    local: true,
    optional: true,
    id: (env) => `${env.name}.local`,
    appliesTo: always,
  },
  {
    role: "variant",
    local: false,
    optional: true,
    id: (env) => (env.name === "production" ? `production.${env.variant}` : env.name),
    appliesTo: (env) => env.name === "production",
  },
]
