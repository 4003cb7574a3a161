/**
 * Lookup Tables
 *
 * Fixed vocabulary of the date-time grammar. Frozen at load time.
 */

import type { Weekday } from './types'

export const DAY_NAMES = Object.freeze(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const)

export const MONTH_NAMES = Object.freeze([
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const)

export type DayName = (typeof DAY_NAMES)[number]
export type MonthName = (typeof MONTH_NAMES)[number]

/** Hours east of UT. North American zones from ANSI X3.51, single letters are military. */
export const ZONE_OFFSET_HOURS: Readonly<Record<string, number>> = Object.freeze({
  UT: 0,
  GMT: 0,
  EST: -5,
  EDT: -4,
  CST: -6,
  CDT: -5,
  MST: -7,
  MDT: -6,
  PST: -8,
  PDT: -7,
  Z: 0,
  A: -1,
  M: -12,
  N: 1,
  Y: 12,
})

export const NAMED_ZONES: readonly string[] = Object.freeze(Object.keys(ZONE_OFFSET_HOURS))

export const WEEKDAYS: readonly Weekday[] = Object.freeze(['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'])
