import { BaseError } from "@envlayer/errors"

export class UnknownEnvironmentError extends BaseError<"unknown_environment"> {
  constructor(environment: string, variant?: string) {
    super(
      variant === undefined
        ? `Unknown environment "${environment}"`
        : `Unknown variant "${variant}" for environment "${environment}"`,
      {
        code: "unknown_environment",
        context: { environment, ...(variant !== undefined && { variant }) },
      },
    )
  }
}

export class MissingProductionVariantError extends BaseError<"missing_production_variant"> {
  constructor() {
    super('Environment "production" requires a variant (backend or frontend)', {
      code: "missing_production_variant",
      context: { environment: "production" },
    })
  }
}

export class InvalidBaseDirectoryError extends BaseError<"invalid_base_directory"> {
  constructor(baseDir: string, cause?: unknown) {
    super(`Base directory ${baseDir} is not a readable directory`, {
      code: "invalid_base_directory",
      context: { baseDir },
      cause,
    })
  }
}

export class MissingRequiredSourceError extends BaseError<"missing_required_source"> {
  constructor(source: string, file: string) {
    super(`Required source "${source}" not found at ${file}`, {
      code: "missing_required_source",
      context: { source, file },
    })
  }
}

export class SourceUnreadableError extends BaseError<"source_unreadable"> {
  constructor(source: string, file: string, cause: unknown) {
    super(`Source "${source}" could not be read from ${file}`, {
      code: "source_unreadable",
      context: { source, file },
      cause,
    })
  }
}

export class MalformedLineError extends BaseError<"malformed_line"> {
  constructor(
    readonly file: string,
    readonly line: number,
  ) {
    super(`Malformed line ${line} in ${file}: expected NAME=VALUE`, {
      code: "malformed_line",
      context: { file, line },
    })
  }
}

export type SecretFailureReason =
  | "not_found"
  | "provider_error"
  | "timeout"
  | "aborted"
  | "no_provider"

const reasonText: Record<SecretFailureReason, string> = {
  not_found: "is not known to the provider",
  provider_error: "could not be fetched",
  timeout: "was not fetched in time",
  aborted: "fetch was aborted",
  no_provider: "is secret-bound but no provider is configured",
}

export class SecretResolutionFailedError extends BaseError<"secret_resolution_failed"> {
  constructor(
    name: string,
    reason: SecretFailureReason,
    options: { provider?: string; cause?: unknown } = {},
  ) {
    super(`Secret ${name} ${reasonText[reason]}`, {
      code: "secret_resolution_failed",
      context: {
        name,
        reason,
        ...(options.provider !== undefined && { provider: options.provider }),
      },
      cause: options.cause,
    })
  }
}

export class SecretLeakDetectedError extends BaseError<"secret_leak_detected"> {
  constructor(name: string, source: string, file: string) {
    super(`Secret ${name} is assigned on disk in source "${source}" (${file})`, {
      code: "secret_leak_detected",
      context: { name, source, file },
    })
  }
}

export type BindingIssue = { path: string; message: string }

export class InvalidSecretBindingsError extends BaseError<"invalid_secret_bindings"> {
  constructor(file: string, issues: BindingIssue[], cause?: unknown) {
    super(issues[0]?.message ?? `Invalid secret bindings in ${file}`, {
      code: "invalid_secret_bindings",
      context: { file, issues },
      cause,
    })
  }
}

export type ResolutionError =
  | UnknownEnvironmentError
  | MissingProductionVariantError
  | InvalidBaseDirectoryError
  | MissingRequiredSourceError
  | SourceUnreadableError
  | MalformedLineError
  | SecretResolutionFailedError
  | SecretLeakDetectedError
  | InvalidSecretBindingsError

export type ResolutionErrorCode = ResolutionError["code"]

export function isResolutionError(err: unknown): err is ResolutionError {
  return (
    err instanceof UnknownEnvironmentError ||
    err instanceof MissingProductionVariantError ||
    err instanceof InvalidBaseDirectoryError ||
    err instanceof MissingRequiredSourceError ||
    err instanceof SourceUnreadableError ||
    err instanceof MalformedLineError ||
    err instanceof SecretResolutionFailedError ||
    err instanceof SecretLeakDetectedError ||
    err instanceof InvalidSecretBindingsError
  )
}
