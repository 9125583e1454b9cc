/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every fractime package.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Calendar fields that do not form a valid date (month 13, February 30, hour 24...)
 */
export class InvalidCalendarDateError extends AppError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Invalid calendar date: ${reason}`, 'INVALID_CALENDAR_DATE', 400, context);
  }
}

/**
 * A duration with a zero denominator was used in arithmetic
 */
export class InvalidDurationDenominatorError extends AppError {
  constructor(operation: string, context?: Record<string, unknown>) {
    super(
      `Duration denominator must be non-zero (in ${operation})`,
      'INVALID_DURATION_DENOMINATOR',
      400,
      { operation, ...context }
    );
  }
}

/**
 * A zero-length unit was passed where intervals are counted
 */
export class ZeroDurationUnitError extends AppError {
  constructor(context?: Record<string, unknown>) {
    super('Cannot count intervals of a zero-length unit', 'ZERO_DURATION_UNIT', 400, context);
  }
}

/**
 * Integer arithmetic left its representable range.
 *
 * Not operational: the caller supplied an unreasonable unit or span.
 */
export class ArithmeticOverflowError extends AppError {
  constructor(operation: string, bits: number, context?: Record<string, unknown>) {
    super(
      `Arithmetic overflow in ${operation}: value exceeds signed ${bits}-bit range`,
      'ARITHMETIC_OVERFLOW',
      500,
      { operation, bits, ...context },
      false
    );
  }
}

/**
 * The calendar service returned a month or weekday outside its closed range
 */
export class InvalidEnumerationMappingError extends AppError {
  constructor(enumeration: string, value: number, context?: Record<string, unknown>) {
    super(
      `Calendar service returned out-of-range ${enumeration}: ${value}`,
      'INVALID_ENUMERATION_MAPPING',
      502,
      { enumeration, value, ...context },
      false
    );
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
