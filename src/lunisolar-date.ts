/**
 * Lunisolar Date Value
 *
 * The immutable result of both converters: the solar and lunar readings of one
 * day, its Julian day number and its three sexagenary cycle numbers.
 */

import { dayOfWeek } from './julian-day'
import { lunarMonthLength } from './lunar-month'
import type { LunarMonthLength } from './lunar-month'
import { dailyCycleOf, describeCycle, monthlyCycleOf, yearlyCycleOf } from './sexagenary'
import { isLeapYear, makeDate } from './time-date'
import type { LocalDate, Weekday } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type LunisolarDate = Readonly<{
  solarYear: number
  solarMonth: number
  solarDay: number
  solarDayOfWeek: Weekday
  isSolarLeapYear: boolean
  julianDay: number

  lunarYear: number
  lunarMonth: number
  lunarDay: number
  isLunarLeapMonth: boolean
  lunarDaysOfMonth: LunarMonthLength

  /** 1–60 */
  dailyCycle: number
  /** 1–60, or 0 in a leap month */
  monthlyCycle: number
  /** 1–60 */
  yearlyCycle: number
}>

/** The independent fields a converter resolves; everything else is derived */
export type LunisolarDateFields = {
  solarYear: number
  solarMonth: number
  solarDay: number
  julianDay: number
  lunarYear: number
  lunarMonth: number
  lunarDay: number
  isLunarLeapMonth: boolean
}

const FIELD_NAMES = [
  'solarYear', 'solarMonth', 'solarDay', 'solarDayOfWeek', 'isSolarLeapYear', 'julianDay',
  'lunarYear', 'lunarMonth', 'lunarDay', 'isLunarLeapMonth', 'lunarDaysOfMonth',
  'dailyCycle', 'monthlyCycle', 'yearlyCycle',
] as const satisfies readonly (keyof LunisolarDate)[]

// ============================================================================
// Assembly
// ============================================================================

export function createLunisolarDate(fields: LunisolarDateFields): LunisolarDate {
  const { lunarYear, lunarMonth, isLunarLeapMonth, julianDay } = fields
  return Object.freeze({
    solarYear: fields.solarYear,
    solarMonth: fields.solarMonth,
    solarDay: fields.solarDay,
    solarDayOfWeek: dayOfWeek(julianDay),
    isSolarLeapYear: isLeapYear(fields.solarYear),
    julianDay,
    lunarYear,
    lunarMonth,
    lunarDay: fields.lunarDay,
    isLunarLeapMonth,
    lunarDaysOfMonth: lunarMonthLength(lunarYear, lunarMonth, isLunarLeapMonth),
    dailyCycle: dailyCycleOf(julianDay),
    monthlyCycle: monthlyCycleOf(lunarYear, lunarMonth, isLunarLeapMonth),
    yearlyCycle: yearlyCycleOf(lunarYear),
  })
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

export function lunisolarDateEquals(a: LunisolarDate, b: LunisolarDate): boolean {
  return FIELD_NAMES.every((name) => a[name] === b[name])
}

export function solarDateString(date: LunisolarDate): LocalDate {
  return makeDate(date.solarYear, date.solarMonth, date.solarDay)
}

/** `1999-11-25`, or `2023-02(leap)-01` inside a leap month */
export function lunarDateString(date: LunisolarDate): string {
  const [year, month, day] = makeDate(date.lunarYear, date.lunarMonth, date.lunarDay).split('-')
  return date.isLunarLeapMonth ? `${year}-${month}(leap)-${day}` : `${year}-${month}-${day}`
}

export function describeLunisolarDate(date: LunisolarDate): string {
  const month = date.monthlyCycle === 0 ? 'leap' : describeCycle(date.monthlyCycle)
  return (
    `solar ${solarDateString(date)} (${date.solarDayOfWeek}), lunar ${lunarDateString(date)}, ` +
    `day ${describeCycle(date.dailyCycle)} / month ${month} / year ${describeCycle(date.yearlyCycle)}`
  )
}
