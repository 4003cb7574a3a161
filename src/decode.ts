/**
 * Token Decoder
 *
 * Turns matched substrings into numeric fields. Inputs are assumed to have
 * passed the grammar, so integer parsing cannot fail here.
 */

import type { CivilDateTime, TimestampTokens } from './types'
import { MONTH_NAMES, ZONE_OFFSET_HOURS } from './tables'

// ============================================================================
// Types
// ============================================================================

export type DecodeOptions = {
  /** Century added to years below 100 */
  twoDigitYearBase: number
}

export const DEFAULT_DECODE_OPTIONS: Readonly<DecodeOptions> = Object.freeze({
  twoDigitYearBase: 2000,
})

// ============================================================================
// Field Decoders
// ============================================================================

/** 1-12 for a known abbreviation, 0 otherwise (never a valid month). */
export function parseMonth(token: string): number {
  const index = MONTH_NAMES.findIndex((name) => name === token)
  return index + 1
}

export function parseYear(token: string, base: number = DEFAULT_DECODE_OPTIONS.twoDigitYearBase): number {
  const year = parseInt(token, 10)
  return year < 100 ? year + base : year
}

export function parseSecond(token: string): number {
  return token === '' ? 0 : parseInt(token, 10)
}

/**
 * (+|-)HHMM as minutes east of UT. The sign covers both parts:
 * "-0530" is -330, not -270.
 */
export function parseLocalDifferential(token: string): number {
  const value = parseInt(token, 10)
  const hours = Math.trunc(value / 100)
  const minutes = value - hours * 100
  return hours * 60 + minutes
}

export function parseTimeZone(token: string): number {
  if (token.startsWith('+') || token.startsWith('-')) {
    return parseLocalDifferential(token)
  }

  // UT, GMT, Z, and anything the grammar would not have let through
  const hours = ZONE_OFFSET_HOURS[token] ?? 0
  return hours * 60
}

// ============================================================================
// Public API
// ============================================================================

export function decodeTokens(
  tokens: TimestampTokens,
  options: DecodeOptions = DEFAULT_DECODE_OPTIONS
): CivilDateTime {
  return {
    day: parseInt(tokens.day, 10),
    month: parseMonth(tokens.month),
    year: parseYear(tokens.year, options.twoDigitYearBase),
    hour: parseInt(tokens.hour, 10),
    minute: parseInt(tokens.minute, 10),
    second: parseSecond(tokens.second),
    timeZoneDifferential: parseTimeZone(tokens.timeZone),
  }
}
