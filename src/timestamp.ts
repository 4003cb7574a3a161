/**
 * Timestamp Parsing
 *
 * Runs a string through match -> decode -> validate -> convert and
 * assembles the frozen result. Also provides instant-based comparison.
 */

import type { CivilDateTime, Instant, ParsedTimestamp, TimestampTokens, Weekday } from './types'
import { type Result, Ok, Err } from './result'
import { matchTimestamp } from './grammar'
import { type DecodeOptions, DEFAULT_DECODE_OPTIONS, decodeTokens } from './decode'
import { daysFromCivil, isValidDate, isValidTime, toInstant, weekdayOfDays } from './calendar'
import { DAY_NAMES, WEEKDAYS } from './tables'
import {
  type TimestampError,
  NoMatchError,
  InvalidCalendarValueError,
  WeekdayMismatchError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type ParseOptions = DecodeOptions & {
  /** Reject stamps whose day-of-week disagrees with the date */
  checkDayOfWeek: boolean
}

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({
  ...DEFAULT_DECODE_OPTIONS,
  checkDayOfWeek: false,
})

// ============================================================================
// Helpers
// ============================================================================

function weekdayOfToken(token: string): Weekday | null {
  const index = DAY_NAMES.findIndex((name) => name === token)
  return index === -1 ? null : WEEKDAYS[index]!
}

function assemble(
  stamp: string,
  tokens: TimestampTokens,
  dateTime: CivilDateTime,
  instant: Instant
): ParsedTimestamp {
  return Object.freeze({
    stamp,
    instant,
    tokens: Object.freeze({ ...tokens }),
    dateTime: Object.freeze({ ...dateTime }),
  })
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse with the reason for any failure. Shape and range failures are
 * reported as different error classes; `parse` folds them into null.
 */
export function parseWithOptions(
  stamp: string,
  options: ParseOptions
): Result<ParsedTimestamp, TimestampError> {
  const tokens = matchTimestamp(stamp)
  if (!tokens) return Err(new NoMatchError(`Not an RFC 822 date-time: '${stamp}'`))

  const dateTime = decodeTokens(tokens, options)

  if (!isValidDate(dateTime)) {
    return Err(new InvalidCalendarValueError(`Invalid date in '${stamp}'`))
  }
  if (!isValidTime(dateTime)) {
    return Err(new InvalidCalendarValueError(`Invalid time in '${stamp}'`))
  }

  if (options.checkDayOfWeek && tokens.dayOfWeek !== '') {
    const expected = weekdayOfDays(daysFromCivil(dateTime.year, dateTime.month, dateTime.day))
    if (weekdayOfToken(tokens.dayOfWeek) !== expected) {
      return Err(new WeekdayMismatchError(
        `Day of week '${tokens.dayOfWeek}' does not match the date in '${stamp}'`
      ))
    }
  }

  return Ok(assemble(stamp, tokens, dateTime, toInstant(dateTime)))
}

export function tryParse(stamp: string): Result<ParsedTimestamp, TimestampError> {
  return parseWithOptions(stamp, DEFAULT_PARSE_OPTIONS)
}

/** The parsed timestamp, or null if the string is not a valid date-time. */
export function parse(stamp: string): ParsedTimestamp | null {
  const result = tryParse(stamp)
  return result.ok ? result.value : null
}

// ============================================================================
// Comparison
// ============================================================================

export function compareTimestamps(a: ParsedTimestamp, b: ParsedTimestamp): -1 | 0 | 1 {
  if (a.instant < b.instant) return -1
  if (a.instant > b.instant) return 1
  return 0
}

export function timestampEquals(a: ParsedTimestamp, b: ParsedTimestamp): boolean {
  return a.instant === b.instant
}

export function timestampBefore(a: ParsedTimestamp, b: ParsedTimestamp): boolean {
  return a.instant < b.instant
}

export function timestampAfter(a: ParsedTimestamp, b: ParsedTimestamp): boolean {
  return a.instant > b.instant
}

export function toDate(ts: ParsedTimestamp): Date {
  return new Date(ts.instant)
}
