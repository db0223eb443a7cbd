export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { type AuditedLayer, auditLayers } from "./core/audit/audit-layers"
export type { Finding, FindingKind } from "./core/audit/finding"
export {
  type Environment,
  type EnvironmentName,
  environmentLabel,
  environmentNames,
  type ProductionVariant,
  productionVariants,
} from "./core/environment/environment"
export { selectEnvironment } from "./core/environment/select-environment"
export {
  type BindingIssue,
  InvalidBaseDirectoryError,
  InvalidSecretBindingsError,
  isResolutionError,
  MalformedLineError,
  MissingProductionVariantError,
  MissingRequiredSourceError,
  type ResolutionError,
  type ResolutionErrorCode,
  type SecretFailureReason,
  SecretLeakDetectedError,
  SecretResolutionFailedError,
  SourceUnreadableError,
  UnknownEnvironmentError,
} from "./core/errors"
export {
  defaultFileName,
  EXAMPLE_SUFFIX,
  locateSources,
  type SourceLayout,
  SourceSequence,
} from "./core/layout/locate-sources"
export { SOURCE_ROLES, type SourceRoleSpec } from "./core/layout/source-roles"
export { type Layer, mergeLayers, SECRETS_LAYER_ID } from "./core/merge/merge-layers"
export { parseEnvFile } from "./core/parse/parse-env-file"
export { type ResolveDeps, type ResolveOptions, resolveConfiguration } from "./core/resolve"
export {
  type ResolutionReport,
  ResolvedConfiguration,
  type ResolvedConfigurationInit,
  type SourceReport,
  type SourceStatus,
} from "./core/resolved-configuration"
export {
  type BindingScope,
  bindingScopes,
  bindingsFor,
  loadSecretBindings,
  parseSecretBindings,
  type SecretBindings,
} from "./core/secrets/bindings"
export { assertNoSecretLeaks, type LoadedSource } from "./core/secrets/leak-check"
export {
  DEFAULT_SECRET_TIMEOUT_MS,
  SecretSource,
  type SecretSourceDeps,
  type SecretSourceOptions,
} from "./core/secrets/secret-source"
export type { IResolvedConfiguration } from "./ports/config"
export type { ConfigSource, SourceDescriptor, SourceRole } from "./ports/source"
