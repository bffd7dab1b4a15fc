import { DriverdockError, type DriverdockErrorOptions } from './DriverdockError.js'
import { ERROR_CODES } from './error-codes.js'

export type UnsupportedPlatformErrorOptions = DriverdockErrorOptions & {
  os: string
  arch: string
}

export class UnsupportedPlatformError extends DriverdockError {
  name = 'UnsupportedPlatformError'
  readonly code = ERROR_CODES.UnsupportedPlatformError

  readonly os: string
  readonly arch: string

  constructor(message: string, options: UnsupportedPlatformErrorOptions) {
    super(message, options)
    this.os = options.os
    this.arch = options.arch
  }
}
