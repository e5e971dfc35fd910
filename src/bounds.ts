/**
 * Range Validation
 *
 * Assertions run by every public operation before any table lookup.
 * Year is checked first, then month, then day against the real length of that month.
 */

import { OutOfRangeYearError, OutOfRangeMonthError, OutOfRangeDayError } from './errors'
import { BASE_SOLAR_YEAR, END_SOLAR_YEAR } from './julian-day'
import { BASE_LUNAR_YEAR, END_LUNAR_YEAR } from './tables'
import { daysInMonth } from './time-date'

export type CalendarKind = 'solar' | 'lunar'

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function assertMonthInBounds(month: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new OutOfRangeMonthError(`Month must be between 1 and 12, got ${month}.`)
  }
}

export function assertDayInBounds(
  kind: CalendarKind,
  year: number,
  month: number,
  day: number,
  maxDays: number
): void {
  if (!Number.isInteger(day) || day < 1 || day > maxDays) {
    throw new OutOfRangeDayError(
      `Day must be between 1 and ${maxDays} for ${kind} date ${year}-${pad2(month)}, got ${day}.`
    )
  }
}

export function assertSolarDateInBounds(year: number, month: number, day: number): void {
  if (!Number.isInteger(year) || year < BASE_SOLAR_YEAR || year > END_SOLAR_YEAR) {
    throw new OutOfRangeYearError(
      `Solar year ${year} is not in bounds (${BASE_SOLAR_YEAR} - ${END_SOLAR_YEAR})`
    )
  }
  // The lunar tables begin on solar 1900-01-31; the supported solar range starts a day later.
  if (year === BASE_SOLAR_YEAR && month === 1) {
    throw new OutOfRangeYearError(`Solar dates are supported from ${BASE_SOLAR_YEAR}-02-01`)
  }
  assertMonthInBounds(month)
  assertDayInBounds('solar', year, month, day, daysInMonth(year, month))
}

export function assertLunarYearInBounds(year: number): void {
  if (!Number.isInteger(year) || year < BASE_LUNAR_YEAR || year > END_LUNAR_YEAR) {
    throw new OutOfRangeYearError(
      `Lunar year ${year} is not in bounds (${BASE_LUNAR_YEAR} - ${END_LUNAR_YEAR})`
    )
  }
}
