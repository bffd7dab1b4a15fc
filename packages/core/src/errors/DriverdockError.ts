export type DriverdockErrorOptions = {
  cause?: unknown
}

/**
 * The base error. Every other driverdock error inherits from it, so callers
 * can tell install failures apart from their own with a single `instanceof`.
 */
export abstract class DriverdockError extends Error {
  /**
   * The name of the error class.
   */
  abstract name: string

  /**
   * Stable error code, see {@link ERROR_CODES}.
   */
  abstract readonly code: string

  protected constructor(message: string, options?: DriverdockErrorOptions) {
    super(message, { cause: options?.cause })
  }

  get [Symbol.toStringTag]() {
    return this.name
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
