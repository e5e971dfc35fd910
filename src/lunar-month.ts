/**
 * Lunar Month Resolver
 *
 * Decides whether a lunar month is a leap month and how many days it has,
 * by decoding the packed year records.
 *
 * A leap month shares its number with the regular month it directly follows.
 * Asking for the leap variant of a month that is not the year's leap month
 * quietly falls back to the regular month.
 */

import { assertLunarYearInBounds, assertMonthInBounds } from './bounds'
import { decodeYearRecord, isLongLeapMonth } from './tables'

// ============================================================================
// Types
// ============================================================================

export type LunarMonthLength = 29 | 30

export type LunarMonth = {
  month: number
  isLeapMonth: boolean
  days: LunarMonthLength
  /** Days from the first day of the lunar year to the first day of this month */
  offset: number
}

export const SHORT_MONTH_DAYS = 29
export const LONG_MONTH_DAYS = 30

// ============================================================================
// Unchecked Primitives (arguments already validated by the caller)
// ============================================================================

/** True only when `isLeapMonth` is set and `month` really is the year's leap month */
export function resolveLeapFlag(lunarYear: number, month: number, isLeapMonth: boolean): boolean {
  return isLeapMonth && decodeYearRecord(lunarYear).leapMonth === month
}

/** Length of a month whose leap flag has already gone through resolveLeapFlag */
export function lunarMonthLength(
  lunarYear: number,
  month: number,
  isLeapMonth: boolean
): LunarMonthLength {
  if (isLeapMonth) {
    return isLongLeapMonth(lunarYear) ? LONG_MONTH_DAYS : SHORT_MONTH_DAYS
  }
  const { monthLengthBits } = decodeYearRecord(lunarYear)
  const bit = (monthLengthBits >>> (12 - month)) & 1
  return bit === 1 ? LONG_MONTH_DAYS : SHORT_MONTH_DAYS
}

// ============================================================================
// Public API
// ============================================================================

/** Leap month of `lunarYear`, or 0 when the year has none */
export function leapMonthOf(lunarYear: number): number {
  assertLunarYearInBounds(lunarYear)
  return decodeYearRecord(lunarYear).leapMonth
}

export function daysOfLunarMonth(
  lunarYear: number,
  month: number,
  isLeapMonth: boolean = false
): LunarMonthLength {
  assertLunarYearInBounds(lunarYear)
  assertMonthInBounds(month)
  return lunarMonthLength(lunarYear, month, resolveLeapFlag(lunarYear, month, isLeapMonth))
}

/**
 * All months of `lunarYear` in calendar order: 12 entries, or 13 when the
 * year has a leap month (placed right after its regular counterpart).
 */
export function lunarMonthsOf(lunarYear: number): readonly LunarMonth[] {
  assertLunarYearInBounds(lunarYear)
  const { leapMonth } = decodeYearRecord(lunarYear)

  const months: LunarMonth[] = []
  let offset = 0
  const push = (month: number, isLeapMonth: boolean) => {
    const days = lunarMonthLength(lunarYear, month, isLeapMonth)
    months.push(Object.freeze({ month, isLeapMonth, days, offset }))
    offset += days
  }

  for (let month = 1; month <= 12; month++) {
    push(month, false)
    if (month === leapMonth) push(month, true)
  }
  return Object.freeze(months)
}

export function daysOfLunarYear(lunarYear: number): number {
  return lunarMonthsOf(lunarYear).reduce((sum, m) => sum + m.days, 0)
}
