/**
 * korean-lunisolar
 *
 * Public API exports
 */

// Error system
export {
  LunisolarError, LunisolarErrorCode,
  OutOfRangeYearError, OutOfRangeMonthError, OutOfRangeDayError, OutOfRangeCycleError,
  MalformedReferenceSymbolError, InvalidTableError, ParseError,
} from './errors'
export type { LunisolarErrorCode as LunisolarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Solar calendar utilities
export type { LocalDate, Weekday, SolarDate } from './time-date'
export {
  isLeapYear, daysInMonth, daysInYear,
  parseDate, makeDate, yearOf, monthOf, dayOf, splitDate,
  WEEKDAYS, weekdayToIndex, indexToWeekday,
} from './time-date'

// Julian day numbers
export {
  BASE_SOLAR_YEAR, END_SOLAR_YEAR,
  SOLAR_BASE_JULIAN_DAY, LUNAR_BASE_JULIAN_DAY,
  solarToDaysSinceBase, daysSinceBaseToJulian, solarToJulian,
  julianToSolar, dayOfWeek,
} from './julian-day'

// Lunar months
export { BASE_LUNAR_YEAR, END_LUNAR_YEAR } from './tables'
export type { LunarMonth, LunarMonthLength } from './lunar-month'
export { leapMonthOf, daysOfLunarMonth, lunarMonthsOf, daysOfLunarYear } from './lunar-month'

// Sexagenary cycle
export type { Script } from './sexagenary'
export {
  heavenlyStem, earthlyBranch, sexagenaryLabel, describeCycle, parseSexagenaryLabel,
} from './sexagenary'

// Conversion
export type { LunisolarDate } from './lunisolar-date'
export {
  lunisolarDateEquals, solarDateString, lunarDateString, describeLunisolarDate,
} from './lunisolar-date'
export { lunarDateOf } from './solar-to-lunar'
export { solarDateOf } from './lunar-to-solar'

// Date adapter
export { DEFAULT_TIME_ZONE, calendarDateIn, toJsDate, lunarDateOfJsDate } from './js-date'
