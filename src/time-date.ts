/**
 * Solar Calendar Utilities
 *
 * Pure functions over proleptic Gregorian dates: leap years, month lengths,
 * ISO 8601 date strings and weekday names.
 * Zero external dependencies.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

/** A solar calendar date split into its numeric components */
export type SolarDate = { year: number; month: number; day: number }

// ============================================================================
// Errors
// ============================================================================

export { ParseError, OutOfRangeMonthError } from './errors'
import { ParseError, OutOfRangeMonthError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const MONTH_DAYS: readonly number[] = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return year % 400 === 0 || (year % 4 === 0 && year % 100 !== 0)
}

export function daysInMonth(year: number, month: number): number {
  const days = MONTH_DAYS[month]
  if (days === undefined || month < 1) {
    throw new OutOfRangeMonthError('Month must be between 1 and 12.')
  }
  if (month === 2 && isLeapYear(year)) return 29
  return days
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

// ============================================================================
// Construction & Component Extraction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function splitDate(date: LocalDate): SolarDate {
  return { year: yearOf(date), month: monthOf(date), day: dayOf(date) }
}

// ============================================================================
// Weekdays
// ============================================================================

// Julian day 0 is a Monday, so `jd mod 7` indexes straight into this table.
export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7]!
}
