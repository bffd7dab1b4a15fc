import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type MissingFieldErrorOptions = DriverdockErrorOptions & {
  field: string
  url: string
}

/**
 * Thrown when valid metadata lacks the field being read.
 */
export class MissingFieldError extends DriverdockError {
  name = 'MissingFieldError'
  readonly code = ERROR_CODES.MissingFieldError

  /**
   * Dotted path of the missing field, e.g. `channels.Stable.version`.
   */
  readonly field: string
  readonly url: string

  constructor(message: string, options: MissingFieldErrorOptions) {
    super(message, options)
    this.field = options.field
    this.url = options.url
  }
}
