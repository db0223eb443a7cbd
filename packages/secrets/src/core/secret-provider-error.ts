import { BaseError } from "@envlayer/errors"

export type SecretProviderOperation = "get" | "exists" | "load"

export class SecretProviderError extends BaseError<"secret_provider_error"> {
  constructor(
    provider: string,
    operation: SecretProviderOperation,
    key: string,
    cause?: unknown,
  ) {
    super(`Secret provider ${provider} failed to ${operation} ${key}`, {
      code: "secret_provider_error",
      context: { provider, operation, key },
      cause,
    })
  }
}
