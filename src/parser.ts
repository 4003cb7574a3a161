/**
 * Configured Parser
 *
 * Factory for a parser with non-default decoding rules and a rejection
 * hook. The module-level `parse` in timestamp.ts is this with defaults.
 */

import type { ParsedTimestamp } from './types'
import type { Result } from './result'
import { type TimestampError, InvalidConfigError } from './errors'
import { type ParseOptions, DEFAULT_PARSE_OPTIONS, parseWithOptions } from './timestamp'

// ============================================================================
// Types
// ============================================================================

export type TimestampParserConfig = {
  /** Century for two-digit years (default 2000). Must be a non-negative multiple of 100. */
  twoDigitYearBase?: number
  /** Require a present day-of-week to match the date (default false) */
  checkDayOfWeek?: boolean
  /** Called for every rejected stamp. Exceptions are logged, not rethrown. */
  onReject?: (stamp: string, error: TimestampError) => void
}

export type TimestampParser = {
  readonly options: Readonly<ParseOptions>
  parse(stamp: string): ParsedTimestamp | null
  tryParse(stamp: string): Result<ParsedTimestamp, TimestampError>
}

// ============================================================================
// Implementation
// ============================================================================

export function createTimestampParser(config: TimestampParserConfig = {}): TimestampParser {
  const base = config.twoDigitYearBase ?? DEFAULT_PARSE_OPTIONS.twoDigitYearBase
  if (!Number.isInteger(base) || base < 0 || base % 100 !== 0) {
    throw new InvalidConfigError(`Invalid twoDigitYearBase: ${base}`)
  }
  if (config.onReject !== undefined && typeof config.onReject !== 'function') {
    throw new InvalidConfigError('onReject must be a function')
  }

  const options: Readonly<ParseOptions> = Object.freeze({
    twoDigitYearBase: base,
    checkDayOfWeek: config.checkDayOfWeek ?? DEFAULT_PARSE_OPTIONS.checkDayOfWeek,
  })
  const onReject = config.onReject

  function reject(stamp: string, error: TimestampError): void {
    if (!onReject) return
    try {
      onReject(stamp, error)
    } catch (e) {
      console.error(`onReject handler error for '${stamp}':`, e)
    }
  }

  function tryParse(stamp: string): Result<ParsedTimestamp, TimestampError> {
    const result = parseWithOptions(stamp, options)
    if (!result.ok) reject(stamp, result.error)
    return result
  }

  function parse(stamp: string): ParsedTimestamp | null {
    const result = tryParse(stamp)
    return result.ok ? result.value : null
  }

  return { options, parse, tryParse }
}
