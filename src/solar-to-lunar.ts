/**
 * Solar → Lunar Converter
 */

import { assertSolarDateInBounds } from './bounds'
import { LUNAR_EPOCH_OFFSET, daysSinceBaseToJulian, solarToDaysSinceBase } from './julian-day'
import { lunarMonthLength } from './lunar-month'
import { createLunisolarDate } from './lunisolar-date'
import type { LunisolarDate } from './lunisolar-date'
import { decodeYearRecord, yearBaseOffset, yearOfOffset } from './tables'

/**
 * Lunisolar reading of a solar date between 1900-02-01 and 2049-12-31.
 *
 * @throws OutOfRangeYearError, OutOfRangeMonthError or OutOfRangeDayError
 */
export function lunarDateOf(solarYear: number, solarMonth: number, solarDay: number): LunisolarDate {
  assertSolarDateInBounds(solarYear, solarMonth, solarDay)

  const daysSinceBase = solarToDaysSinceBase(solarYear, solarMonth, solarDay)
  const julianDay = daysSinceBaseToJulian(daysSinceBase)
  const daysSinceLunarBase = daysSinceBase - LUNAR_EPOCH_OFFSET

  const lunarYear = yearOfOffset(daysSinceLunarBase)
  let daysLeft = daysSinceLunarBase - yearBaseOffset(lunarYear)

  // The leap month is visited right after its regular month, with the month number held.
  const { leapMonth } = decodeYearRecord(lunarYear)
  let lunarMonth = 1
  let inLeapMonth = false
  let daysOfMonth = lunarMonthLength(lunarYear, lunarMonth, inLeapMonth)

  while (daysLeft >= daysOfMonth) {
    daysLeft -= daysOfMonth
    if (lunarMonth === leapMonth && !inLeapMonth) {
      inLeapMonth = true
    } else {
      inLeapMonth = false
      lunarMonth++
    }
    daysOfMonth = lunarMonthLength(lunarYear, lunarMonth, inLeapMonth)
  }

  return createLunisolarDate({
    solarYear,
    solarMonth,
    solarDay,
    julianDay,
    lunarYear,
    lunarMonth,
    lunarDay: daysLeft + 1,
    isLunarLeapMonth: inLeapMonth,
  })
}
