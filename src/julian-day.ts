/**
 * Julian Day Converter
 *
 * Maps solar dates to day counts since 1900-01-01 and Julian day numbers, and back.
 * Julian day numbers are the common arithmetic basis of both converters.
 */

import { daysInMonth, daysInYear, indexToWeekday } from './time-date'
import type { SolarDate, Weekday } from './time-date'

// ============================================================================
// Constants
// ============================================================================

export const BASE_SOLAR_YEAR = 1900
export const END_SOLAR_YEAR = 2049

/** Julian day number of solar 1900-01-01 */
export const SOLAR_BASE_JULIAN_DAY = 2415021

/** Julian day number of lunar 1900-01-01 (solar 1900-01-31) */
export const LUNAR_BASE_JULIAN_DAY = 2415051

/** Days between the solar and the lunar epoch */
export const LUNAR_EPOCH_OFFSET = LUNAR_BASE_JULIAN_DAY - SOLAR_BASE_JULIAN_DAY

/** First Gregorian day, 1582-10-15 */
export const GREGORIAN_ADOPTION_JULIAN_DAY = 2299161

// ============================================================================
// Solar Date → Julian Day
// ============================================================================

export function solarToDaysSinceBase(year: number, month: number, day: number): number {
  let days = 0
  for (let y = BASE_SOLAR_YEAR; y < year; y++) {
    days += daysInYear(y)
  }
  for (let m = 1; m < month; m++) {
    days += daysInMonth(year, m)
  }
  return days + (day - 1)
}

export function daysSinceBaseToJulian(days: number): number {
  return days + SOLAR_BASE_JULIAN_DAY
}

export function solarToJulian(year: number, month: number, day: number): number {
  return daysSinceBaseToJulian(solarToDaysSinceBase(year, month, day))
}

// ============================================================================
// Julian Day → Solar Date
// ============================================================================

/**
 * Civil date of a Julian day number (Numerical Recipes `caldat`).
 * Days from 1582-10-15 on get the Gregorian correction; earlier days are Julian calendar dates.
 */
export function julianToSolar(julianDay: number): SolarDate {
  let ja = julianDay
  if (ja >= GREGORIAN_ADOPTION_JULIAN_DAY) {
    const alpha = Math.trunc((ja - 1867216 - 0.25) / 36524.25)
    ja = ja + 1 + alpha - Math.trunc(alpha / 4)
  }

  const jb = ja + 1524
  const jc = Math.trunc(6680.0 + (jb - 2439870 - 122.1) / 365.25)
  const jd = 365 * jc + Math.trunc(jc / 4)
  const je = Math.trunc((jb - jd) / 30.6001)

  const day = jb - jd - Math.trunc(30.6001 * je)
  let month = je - 1
  if (month > 12) month -= 12
  let year = jc - 4715
  if (month > 2) year--

  return { year, month, day }
}

// ============================================================================
// Day-of-Week
// ============================================================================

export function dayOfWeek(julianDay: number): Weekday {
  // JD 2451545 (2000-01-01) mod 7 = 5 → sat
  return indexToWeekday(julianDay % 7)
}
