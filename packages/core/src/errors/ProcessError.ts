import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type ProcessErrorOptions = DriverdockErrorOptions & {
  path: string
}

/**
 * Thrown when an executable cannot be spawned or its run is aborted.
 * A non-zero exit status is not an error.
 */
export class ProcessError extends DriverdockError {
  name = 'ProcessError'
  readonly code = ERROR_CODES.ProcessError

  readonly path: string

  constructor(message: string, options: ProcessErrorOptions) {
    super(message, options)
    this.path = options.path
  }
}
