/**
 * Calendar Validation & Instant Conversion
 *
 * Range checks for decoded fields and a closed-form proleptic Gregorian
 * day count (Howard Hinnant's days_from_civil). Every division in the
 * day count is an integer division.
 */

import type { CivilDateTime, Instant, Weekday } from './types'
import { WEEKDAYS } from './tables'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

/** Integer division rounding toward negative infinity */
export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

// ============================================================================
// Validation
// ============================================================================

type CalendarDate = Pick<CivilDateTime, 'year' | 'month' | 'day'>
type TimeOfDay = Pick<CivilDateTime, 'hour' | 'minute' | 'second'>

export function isValidDate({ year, month, day }: CalendarDate): boolean {
  if (month < 1 || month > 12 || day < 1 || day > 31) return false

  const februaryDays = isLeapYear(year) ? 29 : 28
  if (day <= februaryDays) return true

  if (day === 31) {
    return month !== 2 && month !== 4 && month !== 6 && month !== 9 && month !== 11
  }

  // 29 or 30
  return month !== 2
}

export function isValidTime({ hour, minute, second }: TimeOfDay): boolean {
  return (
    hour >= 0 && hour <= 23 &&
    minute >= 0 && minute <= 59 &&
    second >= 0 && second <= 59
  )
}

// ============================================================================
// Day Counting
// ============================================================================

/**
 * Days since 1970-01-01 for a valid y-m-d. Negative before the epoch.
 * January and February count as months 13 and 14 of the previous year,
 * which puts the leap day at the end of each 400-year era.
 */
export function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year
  const era = floorDiv(y, 400)
  const yoe = y - era * 400 // [0, 399]
  const doy = Math.trunc((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1 // [0, 365]
  const doe = yoe * 365 + Math.trunc(yoe / 4) - Math.trunc(yoe / 100) + doy // [0, 146096]
  return era * 146097 + doe - 719468
}

export function weekdayOfDays(days: number): Weekday {
  // 1970-01-01 was a Thursday (index 3)
  const idx = (((days + 3) % 7) + 7) % 7
  return WEEKDAYS[idx]!
}

// ============================================================================
// Instant Conversion
// ============================================================================

/**
 * UTC instant of a validated local date-time. The fields are first read
 * as if they were UT, then the differential is taken off: 10:00 at -0500
 * is 15:00 UT.
 */
export function toInstant(dt: CivilDateTime): Instant {
  const days = daysFromCivil(dt.year, dt.month, dt.day)
  const localSeconds = ((days * 24 + dt.hour) * 60 + dt.minute) * 60 + dt.second
  const utcSeconds = localSeconds - dt.timeZoneDifferential * 60
  return (utcSeconds * 1000) as Instant
}
