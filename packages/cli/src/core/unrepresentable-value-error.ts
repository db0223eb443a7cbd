import { BaseError } from "@envlayer/errors"

/**
 * A value no quoting form of the dotenv format can carry unchanged.
 */
export class UnrepresentableValueError extends BaseError<"unrepresentable_value"> {
  constructor(variable: string) {
    super(`${variable} cannot be written as a dotenv value without changing it; use --format json`, {
      code: "unrepresentable_value",
      context: { variable },
    })
  }
}
