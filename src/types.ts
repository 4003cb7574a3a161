/**
 * Shared Types
 *
 * Branded instant type and the value shapes produced by a successful parse.
 */

// ============================================================================
// Branded Types
// ============================================================================

declare const __instant: unique symbol

/** Milliseconds since 1970-01-01T00:00:00Z */
export type Instant = number & { readonly [__instant]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Parse Output
// ============================================================================

/** Substrings exactly as they appeared in the input. */
export type TimestampTokens = {
  readonly dayOfWeek: string // '' when absent, comma stripped
  readonly day: string
  readonly month: string
  readonly year: string
  readonly hour: string
  readonly minute: string
  readonly second: string // '' when absent, colon stripped
  readonly timeZone: string
}

/**
 * Calendar fields as written, in the timestamp's own zone.
 * They are never shifted by the differential; only the instant is UTC.
 */
export type CivilDateTime = {
  readonly day: number
  readonly month: number
  readonly year: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  /** Minutes east of UT, e.g. EST = -300, +1230 = 750 */
  readonly timeZoneDifferential: number
}

export type ParsedTimestamp = {
  readonly stamp: string
  readonly instant: Instant
  readonly tokens: TimestampTokens
  readonly dateTime: CivilDateTime
}
