/**
 * Consolidated error system for rfc822-timestamp.
 *
 * All error classes extend TimestampError, which carries a typed error code.
 * Parse failures travel inside a Result; only configuration errors are thrown.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TimestampErrorCode = {
  // Parsing
  NO_MATCH: 'NO_MATCH',
  INVALID_CALENDAR_VALUE: 'INVALID_CALENDAR_VALUE',
  WEEKDAY_MISMATCH: 'WEEKDAY_MISMATCH',

  // Parser configuration
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type TimestampErrorCode = (typeof TimestampErrorCode)[keyof typeof TimestampErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimestampError extends Error {
  readonly code: TimestampErrorCode

  constructor(code: TimestampErrorCode, message: string) {
    super(message)
    this.name = 'TimestampError'
    this.code = code
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

/** The input does not have the shape of a date-time. */
export class NoMatchError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.NO_MATCH, message)
    this.name = 'NoMatchError'
  }
}

/** The shape matched, but the date or time does not exist. */
export class InvalidCalendarValueError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_CALENDAR_VALUE, message)
    this.name = 'InvalidCalendarValueError'
  }
}

export class WeekdayMismatchError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.WEEKDAY_MISMATCH, message)
    this.name = 'WeekdayMismatchError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}
