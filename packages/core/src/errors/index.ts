export {
  type DriverdockErrorOptions,
  DriverdockError,
  errorMessage,
} from './DriverdockError.js'
export { ERROR_CODES } from './error-codes.js'
export { type NetworkErrorOptions, NetworkError } from './NetworkError.js'
export { type ParseErrorOptions, ParseError } from './ParseError.js'
export {
  type MissingFieldErrorOptions,
  MissingFieldError,
} from './MissingFieldError.js'
export {
  type UnsupportedPlatformErrorOptions,
  UnsupportedPlatformError,
} from './UnsupportedPlatformError.js'
export { type ArchiveErrorOptions, ArchiveError } from './ArchiveError.js'
export {
  type FilesystemErrorOptions,
  FilesystemError,
} from './FilesystemError.js'
export { type ProcessErrorOptions, ProcessError } from './ProcessError.js'
