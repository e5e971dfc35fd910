/**
 * Lunar → Solar Converter
 */

import { assertDayInBounds, assertLunarYearInBounds, assertMonthInBounds } from './bounds'
import { LUNAR_BASE_JULIAN_DAY, julianToSolar } from './julian-day'
import { lunarMonthLength, resolveLeapFlag } from './lunar-month'
import { createLunisolarDate } from './lunisolar-date'
import type { LunisolarDate } from './lunisolar-date'
import { decodeYearRecord, yearBaseOffset } from './tables'

/**
 * Solar reading of a lunar date between 1900-01-01 and the last day of 2049-12.
 *
 * `isLeapMonth` is ignored unless `lunarMonth` is the year's leap month, so
 * `solarDateOf(2000, 1, 1, true)` equals `solarDateOf(2000, 1, 1)`.
 *
 * @throws OutOfRangeYearError, OutOfRangeMonthError or OutOfRangeDayError
 */
export function solarDateOf(
  lunarYear: number,
  lunarMonth: number,
  lunarDay: number,
  isLeapMonth: boolean = false
): LunisolarDate {
  assertLunarYearInBounds(lunarYear)
  assertMonthInBounds(lunarMonth)
  const inLeapMonth = resolveLeapFlag(lunarYear, lunarMonth, isLeapMonth)
  assertDayInBounds('lunar', lunarYear, lunarMonth, lunarDay,
    lunarMonthLength(lunarYear, lunarMonth, inLeapMonth))

  const { leapMonth } = decodeYearRecord(lunarYear)
  let days = yearBaseOffset(lunarYear)

  // Regular lengths only; the leap month is added separately below.
  for (let month = 1; month < lunarMonth; month++) {
    days += lunarMonthLength(lunarYear, month, false)
  }

  // A leap month follows its regular counterpart.
  if (inLeapMonth) {
    days += lunarMonthLength(lunarYear, lunarMonth, false)
  }

  if (leapMonth !== 0 && lunarMonth > leapMonth) {
    days += lunarMonthLength(lunarYear, leapMonth, true)
  }

  const julianDay = LUNAR_BASE_JULIAN_DAY + days + (lunarDay - 1)
  const solar = julianToSolar(julianDay)

  return createLunisolarDate({
    solarYear: solar.year,
    solarMonth: solar.month,
    solarDay: solar.day,
    julianDay,
    lunarYear,
    lunarMonth,
    lunarDay,
    isLunarLeapMonth: inLeapMonth,
  })
}
