/**
 * Errors raised by timecode construction, mutation and arithmetic.
 */

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a string is not shaped like HH:MM:SS:FF.
 */
export class TimecodeParseError extends Error {
  readonly input: string;

  constructor(input: string, message?: string) {
    super(message ?? `Invalid timecode format: ${input}. Expected HH:MM:SS:FF`);
    this.name = 'TimecodeParseError';
    this.input = input;
    Error.captureStackTrace?.(this, TimecodeParseError);
  }
}

/**
 * Thrown when a value falls outside its valid range: a component, a frame
 * rate, a frame count, or the result of a subtraction.
 *
 * Extends the built-in RangeError so callers can catch either.
 */
export class TimecodeRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'TimecodeRangeError';
    Error.captureStackTrace?.(this, TimecodeRangeError);
  }
}
