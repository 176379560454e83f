/**
 * Error handling for tint operations
 *
 * Class-string content never throws: unknown colors, malformed tints and
 * missing prefixes resolve to defaults. Only malformed *arguments* do.
 */

/**
 * Specific error codes for precondition violations
 */
export type TailColorsErrorCode =
  | 'INVALID_TINT'
  | 'INVALID_STEP';

/**
 * Custom error class for engine precondition failures
 */
export class TailColorsError extends Error {
  /**
   * Specific error code
   */
  readonly code: TailColorsErrorCode;

  /**
   * Offending values
   */
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: TailColorsErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TailColorsError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TailColorsError);
    }
  }

  /**
   * Check if this is a specific error code
   */
  is(code: TailColorsErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}
