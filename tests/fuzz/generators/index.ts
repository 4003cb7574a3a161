/**
 * Generator barrel.
 */
export {
  civilFieldsGen,
  namedZoneGen,
  offsetZoneGen,
  zoneGen,
  validStampGen,
  formatStamp,
  expectedInstant,
} from './timestamp'
export type { CivilFields, GeneratedZone, GeneratedStamp } from './timestamp'
