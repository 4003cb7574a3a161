/**
 * Generators for date-time stamps.
 *
 * Each generated stamp comes with the fields it was built from, so
 * properties can check the parse against an independent oracle.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { DAY_NAMES, MONTH_NAMES, ZONE_OFFSET_HOURS } from '../../../src/tables'
import { daysInMonth } from '../../../src/calendar'

// ============================================================================
// Types
// ============================================================================

export type CivilFields = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

export type GeneratedZone = {
  token: string
  minutes: number
}

export type GeneratedStamp = {
  stamp: string
  fields: CivilFields
  zone: GeneratedZone
  withSeconds: boolean
}

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** Oracle independent of the code under test */
export function expectedInstant(fields: CivilFields, zoneMinutes: number): number {
  const local = Date.UTC(fields.year, fields.month - 1, fields.day, fields.hour, fields.minute, fields.second)
  return local - zoneMinutes * 60_000
}

// ============================================================================
// Generators
// ============================================================================

/**
 * Valid civil fields. Years start at 1000 so they always print as four
 * digits and Date.UTC reads them literally.
 */
export function civilFieldsGen(minYear = 1000, maxYear = 9999): Arbitrary<CivilFields> {
  return fc
    .record({
      year: fc.integer({ min: minYear, max: maxYear }),
      month: fc.integer({ min: 1, max: 12 }),
      hour: fc.integer({ min: 0, max: 23 }),
      minute: fc.integer({ min: 0, max: 59 }),
      second: fc.integer({ min: 0, max: 59 }),
    })
    .chain((rest) =>
      fc
        .integer({ min: 1, max: daysInMonth(rest.year, rest.month) })
        .map((day) => ({ ...rest, day }))
    )
}

export function namedZoneGen(): Arbitrary<GeneratedZone> {
  return fc
    .constantFrom(...Object.entries(ZONE_OFFSET_HOURS))
    .map(([token, hours]) => ({ token, minutes: hours * 60 }))
}

export function offsetZoneGen(): Arbitrary<GeneratedZone> {
  return fc
    .record({
      negative: fc.boolean(),
      hours: fc.integer({ min: 0, max: 14 }),
      minutes: fc.integer({ min: 0, max: 59 }),
    })
    .map(({ negative, hours, minutes }) => {
      const sign = negative ? '-' : '+'
      const total = hours * 60 + minutes
      return {
        token: `${sign}${pad2(hours)}${pad2(minutes)}`,
        minutes: negative && total !== 0 ? -total : total, // keep +0 for -0000
      }
    })
}

export function zoneGen(): Arbitrary<GeneratedZone> {
  return fc.oneof(namedZoneGen(), offsetZoneGen())
}

export function formatStamp(
  fields: CivilFields,
  zone: GeneratedZone,
  opts: { dayName?: string; withSeconds: boolean; padDay: boolean }
): string {
  const prefix = opts.dayName ? `${opts.dayName}, ` : ''
  const day = opts.padDay ? pad2(fields.day) : String(fields.day)
  const month = MONTH_NAMES[fields.month - 1] ?? 'Jan'
  const seconds = opts.withSeconds ? `:${pad2(fields.second)}` : ''
  return `${prefix}${day} ${month} ${fields.year} ${pad2(fields.hour)}:${pad2(fields.minute)}${seconds} ${zone.token}`
}

/** Well-formed, in-range stamps. Day-of-week is arbitrary, not necessarily correct. */
export function validStampGen(): Arbitrary<GeneratedStamp> {
  return fc
    .record({
      fields: civilFieldsGen(),
      zone: zoneGen(),
      dayName: fc.option(fc.constantFrom(...DAY_NAMES), { nil: undefined }),
      withSeconds: fc.boolean(),
      padDay: fc.boolean(),
    })
    .map(({ fields, zone, dayName, withSeconds, padDay }) => ({
      stamp: formatStamp(fields, zone, { dayName, withSeconds, padDay }),
      fields: withSeconds ? fields : { ...fields, second: 0 },
      zone,
      withSeconds,
    }))
}
