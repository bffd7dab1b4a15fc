import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type ParseErrorOptions = DriverdockErrorOptions & {
  url: string
}

/**
 * Thrown when a metadata response is not a JSON object.
 */
export class ParseError extends DriverdockError {
  name = 'ParseError'
  readonly code = ERROR_CODES.ParseError

  readonly url: string

  constructor(message: string, options: ParseErrorOptions) {
    super(message, options)
    this.url = options.url
  }
}
