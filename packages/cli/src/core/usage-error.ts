import { BaseError } from "@envlayer/errors"

/**
 * Invalid command line. Printed without a stack and exits with 1.
 */
export class UsageError extends BaseError<"usage_error"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "usage_error", cause })
  }
}
