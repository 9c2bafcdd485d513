/**
 * Error classes for location-lists
 * @module utils/errors
 */

/**
 * Base error class for all location-lists errors
 */
export class LocationListsError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'LocationListsError'
    this.code = code
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Error thrown when the input file cannot be opened or read.
 * No partial lists are ever returned alongside it.
 */
export class InputFileError extends LocationListsError {
  public readonly path: string

  constructor(path: string, cause: unknown, context?: Record<string, unknown>) {
    super(
      `Cannot read input file '${path}': ${describeError(cause)}`,
      'INPUT_FILE_ERROR',
      { path, systemCode: systemErrorCode(cause), ...context },
      { cause }
    )
    this.name = 'InputFileError'
    this.path = path
  }
}

/**
 * Error thrown when a running sum leaves the exactly representable integer range
 */
export class SummationOverflowError extends LocationListsError {
  public readonly operation: string

  constructor(operation: string, context?: Record<string, unknown>) {
    super(
      `Summation overflow in ${operation}: result exceeds ${Number.MAX_SAFE_INTEGER} in magnitude`,
      'SUMMATION_OVERFLOW',
      { operation, ...context }
    )
    this.name = 'SummationOverflowError'
    this.operation = operation
  }
}

/**
 * Message of an error, or the stringified value for anything else thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function systemErrorCode(cause: unknown): string | undefined {
  if (
    cause instanceof Error &&
    'code' in cause &&
    typeof cause.code === 'string'
  ) {
    return cause.code
  }
  return undefined
}

/**
 * Check if an error is a location-lists error
 */
export function isLocationListsError(error: unknown): error is LocationListsError {
  return error instanceof LocationListsError
}
