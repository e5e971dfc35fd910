/**
 * Encoded Calendar Tables
 *
 * Lookup primitives over the published month-length data for lunar years 1900–2049.
 *
 * Each packed word holds two lunar years, 16 bits each, the even year offset in the upper half.
 * Within a half, bits 12–15 are the leap month (0 = none) and bits 0–11 are the month-length
 * bitmap with month 1 at bit 11; a set bit is a 30-day month. Leap month lengths do not fit in
 * the word, so the years whose leap month has 30 days are listed separately.
 *
 * The data lives in `data/lunar-tables.json` and is frozen at module load.
 */

import tableData from './data/lunar-tables.json'
import { InvalidTableError, OutOfRangeYearError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type YearRecord = {
  /** 12-bit month-length bitmap, month 1 at bit 11 */
  monthLengthBits: number
  /** 0 when the year has no leap month */
  leapMonth: number
}

// ============================================================================
// Table Loading
// ============================================================================

function loadPackedWords(hexWords: readonly string[]): readonly number[] {
  return Object.freeze(
    hexWords.map((hex, i) => {
      if (!/^0x[0-9a-f]{8}$/i.test(hex)) {
        throw new InvalidTableError(`Packed word #${i} is not a 32-bit hex value: '${hex}'`)
      }
      return parseInt(hex.substring(2), 16)
    })
  )
}

function loadSortedNumbers(name: string, values: readonly number[]): readonly number[] {
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1] ?? 0
    const curr = values[i] ?? 0
    if (curr < prev) {
      throw new InvalidTableError(`${name} must be sorted: entry #${i} (${curr}) < ${prev}`)
    }
  }
  return Object.freeze([...values])
}

export const BASE_LUNAR_YEAR: number = tableData.baseYear
export const END_LUNAR_YEAR: number = tableData.endYear

const YEAR_COUNT = END_LUNAR_YEAR - BASE_LUNAR_YEAR + 1

const PACKED_MONTH_LENGTHS = loadPackedWords(tableData.packedMonthLengths)
const YEAR_OFFSETS = loadSortedNumbers('yearOffsets', tableData.yearOffsets)
const LONG_LEAP_MONTH_YEARS = loadSortedNumbers('longLeapMonthYears', tableData.longLeapMonthYears)

if (PACKED_MONTH_LENGTHS.length * 2 !== YEAR_COUNT) {
  throw new InvalidTableError(
    `Expected ${YEAR_COUNT / 2} packed words for ${YEAR_COUNT} years, found ${PACKED_MONTH_LENGTHS.length}`
  )
}
if (YEAR_OFFSETS.length !== YEAR_COUNT) {
  throw new InvalidTableError(`Expected ${YEAR_COUNT} year offsets, found ${YEAR_OFFSETS.length}`)
}

// ============================================================================
// Helpers
// ============================================================================

function yearOffsetOf(lunarYear: number): number {
  const offset = lunarYear - BASE_LUNAR_YEAR
  if (!Number.isInteger(offset) || offset < 0 || offset >= YEAR_COUNT) {
    throw new OutOfRangeYearError(
      `Lunar year ${lunarYear} is not in bounds (${BASE_LUNAR_YEAR} - ${END_LUNAR_YEAR})`
    )
  }
  return offset
}

// ============================================================================
// Lookups
// ============================================================================

export function decodeYearRecord(lunarYear: number): YearRecord {
  const offset = yearOffsetOf(lunarYear)
  const word = PACKED_MONTH_LENGTHS[offset >> 1] ?? 0
  const half = offset % 2 === 0 ? word >>> 16 : word & 0xffff
  return {
    monthLengthBits: half & 0x0fff,
    leapMonth: (half & 0xf000) >>> 12,
  }
}

export function isLongLeapMonth(lunarYear: number): boolean {
  const target = yearOffsetOf(lunarYear)
  let lo = 0
  let hi = LONG_LEAP_MONTH_YEARS.length - 1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    const value = LONG_LEAP_MONTH_YEARS[mid] ?? 0
    if (value === target) return true
    if (value < target) lo = mid + 1
    else hi = mid - 1
  }
  return false
}

/** Days from lunar 1900-01-01 to the first day of `lunarYear` */
export function yearBaseOffset(lunarYear: number): number {
  return YEAR_OFFSETS[yearOffsetOf(lunarYear)] ?? 0
}

/**
 * Lunar year containing the day `daysSinceLunarBase` days after lunar 1900-01-01.
 * Offsets past the last year's start resolve to END_LUNAR_YEAR.
 */
export function yearOfOffset(daysSinceLunarBase: number): number {
  if (daysSinceLunarBase < 0) {
    throw new OutOfRangeYearError(
      `Day offset ${daysSinceLunarBase} precedes lunar ${BASE_LUNAR_YEAR}-01-01`
    )
  }

  // Greatest index whose offset is <= target
  let lo = 0
  let hi = YEAR_OFFSETS.length - 1
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1
    if ((YEAR_OFFSETS[mid] ?? 0) <= daysSinceLunarBase) lo = mid
    else hi = mid - 1
  }
  return BASE_LUNAR_YEAR + lo
}
