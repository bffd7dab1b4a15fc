import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type NetworkErrorOptions = DriverdockErrorOptions & {
  url: string
  status?: number
}

/**
 * Thrown when a remote request cannot complete: DNS or connection failures,
 * aborted requests, and non-2xx responses.
 */
export class NetworkError extends DriverdockError {
  name = 'NetworkError'
  readonly code = ERROR_CODES.NetworkError

  readonly url: string

  /**
   * HTTP status, when the server answered.
   */
  readonly status?: number

  constructor(message: string, options: NetworkErrorOptions) {
    super(message, options)
    this.url = options.url
    this.status = options.status
  }
}
