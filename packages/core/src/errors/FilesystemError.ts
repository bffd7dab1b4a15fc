import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type FilesystemErrorOptions = DriverdockErrorOptions & {
  path: string
}

/**
 * Thrown when a directory cannot be created or permissions cannot be set.
 */
export class FilesystemError extends DriverdockError {
  name = 'FilesystemError'
  readonly code = ERROR_CODES.FilesystemError

  readonly path: string

  constructor(message: string, options: FilesystemErrorOptions) {
    super(message, options)
    this.path = options.path
  }
}
