/**
 * rfc822-timestamp
 *
 * Public API exports
 */

// Error system
export {
  TimestampError, TimestampErrorCode,
  NoMatchError, InvalidCalendarValueError, WeekdayMismatchError,
  InvalidConfigError,
} from './errors'
export type { TimestampErrorCode as TimestampErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Value types
export type {
  Instant, Weekday,
  TimestampTokens, CivilDateTime, ParsedTimestamp,
} from './types'

// Vocabulary
export type { DayName, MonthName } from './tables'
export { DAY_NAMES, MONTH_NAMES, NAMED_ZONES, ZONE_OFFSET_HOURS } from './tables'

// Pipeline stages
export { matchTimestamp, isTimestampShape } from './grammar'
export type { DecodeOptions } from './decode'
export {
  decodeTokens,
  parseMonth, parseYear, parseSecond, parseTimeZone, parseLocalDifferential,
} from './decode'
export {
  isLeapYear, daysInMonth, floorDiv,
  isValidDate, isValidTime,
  daysFromCivil, weekdayOfDays, toInstant,
} from './calendar'

// Parsing & comparison
export type { ParseOptions } from './timestamp'
export {
  parse, tryParse, parseWithOptions, DEFAULT_PARSE_OPTIONS,
  compareTimestamps, timestampEquals, timestampBefore, timestampAfter,
  toDate,
} from './timestamp'

// Configured parser
export type { TimestampParser, TimestampParserConfig } from './parser'
export { createTimestampParser } from './parser'
