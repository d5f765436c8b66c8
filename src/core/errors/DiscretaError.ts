/**
 * Core error handling for Discreta
 *
 * Every precondition violation surfaces as a DiscretaError carrying:
 * - A structured code identifying which input domain was violated
 * - Context with the offending values
 * - A proper stack trace
 */

/**
 * Error codes for the input domains checked by the library
 */
export enum ErrorCode {
  // Parameter errors
  INVALID_PROBABILITY = 'INVALID_PROBABILITY',
  INVALID_SUPPORT = 'INVALID_SUPPORT',

  // Count errors
  INVALID_COUNT_TYPE = 'INVALID_COUNT_TYPE',
  INVALID_COUNT_RANGE = 'INVALID_COUNT_RANGE',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Custom error class for Discreta with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new DiscretaError(
 *   ErrorCode.INVALID_COUNT_RANGE,
 *   'k cannot exceed the number of trials',
 *   { k: 12, n: 10 }
 * );
 * ```
 */
export class DiscretaError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DiscretaError';

    // V8 only; keeps the constructor frame out of the trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DiscretaError);
    }
  }

  /**
   * Formatted representation including code, message and context
   */
  override toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a DiscretaError
 */
export function isDiscretaError(error: unknown): error is DiscretaError {
  return error instanceof DiscretaError;
}

/**
 * Wrap an unknown thrown value as a DiscretaError.
 * Useful in catch blocks of callers mixing library and foreign errors.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): DiscretaError {
  if (isDiscretaError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new DiscretaError(code, message, context);
}
