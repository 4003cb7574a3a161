/**
 * Grammar Matcher
 *
 * Recognizes the shape of an RFC 822 §5.1 date-time, widened to accept
 * four-digit years as RSS feeds use them:
 *
 *   date-time = [ day "," ] date time
 *   date      = 1*2DIGIT month 2*4DIGIT
 *   time      = 2DIGIT ":" 2DIGIT [":" 2DIGIT] zone
 *   zone      = named / ( ("+" / "-") 4DIGIT )
 *
 * Only the shape of each field is checked here. Ranges are the
 * calendar module's job, so "99 Jan 2020 10:00 GMT" still matches.
 */

import type { TimestampTokens } from './types'
import { DAY_NAMES, MONTH_NAMES, NAMED_ZONES } from './tables'

const DATE_TIME_PATTERN = new RegExp(
  '^' +
    `(?:(${DAY_NAMES.join('|')}),)?` + // 1 day of week
    ' *(\\d{1,2})' + // 2 day of month
    ` +(${MONTH_NAMES.join('|')})` + // 3 month
    ' +(\\d{2,4})' + // 4 year
    ' +(\\d{2}):(\\d{2})' + // 5 hour, 6 minute
    '(?::(\\d{2}))?' + // 7 second
    ` +(${NAMED_ZONES.join('|')}|[+-]\\d{4})` + // 8 zone
    '$'
)

export function matchTimestamp(input: string): TimestampTokens | null {
  const match = DATE_TIME_PATTERN.exec(input)
  if (!match) return null

  return {
    dayOfWeek: match[1] ?? '',
    day: match[2] ?? '',
    month: match[3] ?? '',
    year: match[4] ?? '',
    hour: match[5] ?? '',
    minute: match[6] ?? '',
    second: match[7] ?? '',
    timeZone: match[8] ?? '',
  }
}

export function isTimestampShape(input: string): boolean {
  return DATE_TIME_PATTERN.test(input)
}
