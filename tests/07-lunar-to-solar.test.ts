/**
 * Segment 07: Lunar → Solar Converter Tests
 */

import { describe, it, expect } from 'vitest'
import { solarDateOf } from '../src/lunar-to-solar'
import { lunarDateOf } from '../src/solar-to-lunar'
import { OutOfRangeDayError, OutOfRangeMonthError, OutOfRangeYearError } from '../src/errors'

function solarOf(lunarYear: number, lunarMonth: number, lunarDay: number, isLeapMonth = false) {
  const date = solarDateOf(lunarYear, lunarMonth, lunarDay, isLeapMonth)
  return [date.solarYear, date.solarMonth, date.solarDay]
}

describe('solarDateOf', () => {
  it('converts lunar 1999-11-25 back to 2000-01-01', () => {
    expect(solarDateOf(1999, 11, 25)).toEqual(lunarDateOf(2000, 1, 1))
  })

  it('defaults isLeapMonth to false', () => {
    expect(solarDateOf(2023, 2, 1)).toEqual(solarDateOf(2023, 2, 1, false))
  })

  it('returns a frozen value', () => {
    expect(Object.isFrozen(solarDateOf(2024, 1, 1))).toBe(true)
  })

  describe('holidays', () => {
    it('Seollal 2024 is 2024-02-10', () => {
      expect(solarOf(2024, 1, 1)).toEqual([2024, 2, 10])
    })

    it('Chuseok 2024 is 2024-09-17', () => {
      const date = solarDateOf(2024, 8, 15)
      expect([date.solarYear, date.solarMonth, date.solarDay]).toEqual([2024, 9, 17])
      expect(date.solarDayOfWeek).toBe('tue')
    })
  })

  // ==========================================================================
  // Leap months
  // ==========================================================================

  describe('leap months', () => {
    it('regular month 2 of 2023 starts 2023-02-20', () => {
      expect(solarOf(2023, 2, 1)).toEqual([2023, 2, 20])
    })

    it('leap month 2 of 2023 starts 2023-03-22', () => {
      const date = solarDateOf(2023, 2, 1, true)
      expect([date.solarYear, date.solarMonth, date.solarDay]).toEqual([2023, 3, 22])
      expect(date.isLunarLeapMonth).toBe(true)
      expect(date.monthlyCycle).toBe(0)
      expect(date.julianDay).toBe(2460026)
    })

    it('months after the leap month include its length', () => {
      expect(solarOf(2023, 2, 29, true)).toEqual([2023, 4, 19])
      expect(solarOf(2023, 3, 1)).toEqual([2023, 4, 20])
    })

    it('leap month 4 of 2001 starts 2001-05-23', () => {
      expect(solarOf(2001, 4, 1)).toEqual([2001, 4, 24])
      expect(solarOf(2001, 4, 1, true)).toEqual([2001, 5, 23])
    })

    it('30-day leap month of 1906 accepts day 30', () => {
      const date = solarDateOf(1906, 4, 30, true)
      expect([date.solarYear, date.solarMonth, date.solarDay]).toEqual([1906, 6, 21])
      expect(date.lunarDaysOfMonth).toBe(30)
    })

    it('ignores the leap flag when the month is not a leap month', () => {
      const date = solarDateOf(2000, 1, 1, true)
      expect(date).toEqual(solarDateOf(2000, 1, 1, false))
      expect(date.isLunarLeapMonth).toBe(false)
      expect([date.solarYear, date.solarMonth, date.solarDay]).toEqual([2000, 2, 5])
    })

    it('ignores the leap flag for a non-leap month of a leap year', () => {
      expect(solarDateOf(2023, 3, 1, true)).toEqual(solarDateOf(2023, 3, 1))
    })
  })

  // ==========================================================================
  // Range
  // ==========================================================================

  describe('range', () => {
    it('accepts lunar 1900-01-01 (solar 1900-01-31)', () => {
      const date = solarDateOf(1900, 1, 1)
      expect([date.solarYear, date.solarMonth, date.solarDay]).toEqual([1900, 1, 31])
      expect(date.julianDay).toBe(2415051)
      expect(date.solarDayOfWeek).toBe('wed')
    })

    it('accepts the last day of lunar 2049 (solar 2050-01-22)', () => {
      expect(solarOf(2049, 12, 29)).toEqual([2050, 1, 22])
    })

    it('rejects lunar 2049-12-30, since 2049-12 has 29 days', () => {
      expect(() => solarDateOf(2049, 12, 30)).toThrow(
        'Day must be between 1 and 29 for lunar date 2049-12, got 30.'
      )
    })

    it('rejects lunar 2049-12-31', () => {
      expect(() => solarDateOf(2049, 12, 31)).toThrow(OutOfRangeDayError)
    })

    it('rejects years outside 1900-2049', () => {
      expect(() => solarDateOf(1899, 12, 1)).toThrow(OutOfRangeYearError)
      expect(() => solarDateOf(2050, 1, 1)).toThrow('Lunar year 2050 is not in bounds (1900 - 2049)')
    })

    it('rejects months outside 1-12', () => {
      expect(() => solarDateOf(2000, 0, 1)).toThrow(OutOfRangeMonthError)
      expect(() => solarDateOf(2000, 13, 1)).toThrow(OutOfRangeMonthError)
    })

    it('checks the day against the leap month length', () => {
      // Regular month 2 of 2023 has 30 days, its leap month 29
      expect(solarOf(2023, 2, 30)).toEqual([2023, 3, 21])
      expect(() => solarDateOf(2023, 2, 30, true)).toThrow(
        'Day must be between 1 and 29 for lunar date 2023-02, got 30.'
      )
    })

    it('rejects day 0', () => {
      expect(() => solarDateOf(2000, 1, 0)).toThrow(OutOfRangeDayError)
    })
  })
})
