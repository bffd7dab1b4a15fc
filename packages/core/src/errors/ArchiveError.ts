import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type ArchiveErrorOptions = DriverdockErrorOptions & {
  destination: string
}

/**
 * Thrown when a downloaded archive cannot be decoded or extracted. Entries
 * written before the failure are left in place.
 */
export class ArchiveError extends DriverdockError {
  name = 'ArchiveError'
  readonly code = ERROR_CODES.ArchiveError

  readonly destination: string

  constructor(message: string, options: ArchiveErrorOptions) {
    super(message, options)
    this.destination = options.destination
  }
}
