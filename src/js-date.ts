/**
 * JavaScript Date Adapter
 *
 * Boundary helpers between LunisolarDate values and `Date` instants.
 * The converters never use this module; calendar dates are read and written
 * in an explicit IANA time zone (Korea Standard Time by default) through
 * Intl.DateTimeFormat.
 */

import { lunarDateOf } from './solar-to-lunar'
import type { LunisolarDate } from './lunisolar-date'
import type { SolarDate } from './time-date'

export const DEFAULT_TIME_ZONE = 'Asia/Seoul'

// ============================================================================
// Helpers
// ============================================================================

function wallClockParts(utcMs: number, tz: string) {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let hour = get('hour')
  if (hour === 24) hour = 0
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour,
    minute: get('minute'),
    second: get('second'),
  }
}

/** UTC offset in minutes of time zone `tz` at the instant `utcMs` */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const p = wallClockParts(utcMs, tz)
  const localMs = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second)
  return (localMs - Math.floor(utcMs / 1000) * 1000) / 60000
}

/** Calendar date of the instant `date` as seen in time zone `tz` */
export function calendarDateIn(date: Date, tz: string): SolarDate {
  const { year, month, day } = wallClockParts(date.getTime(), tz)
  return { year, month, day }
}

// ============================================================================
// Public API
// ============================================================================

/** The instant at which the solar date of `date` begins in time zone `tz` */
export function toJsDate(date: LunisolarDate, tz: string = DEFAULT_TIME_ZONE): Date {
  const localMs = Date.UTC(date.solarYear, date.solarMonth - 1, date.solarDay)

  // Two passes settle the offset when midnight sits near an offset change.
  let utcMs = localMs - utcOffsetAtMs(localMs, tz) * 60000
  utcMs = localMs - utcOffsetAtMs(utcMs, tz) * 60000
  return new Date(utcMs)
}

export function lunarDateOfJsDate(date: Date, tz: string = DEFAULT_TIME_ZONE): LunisolarDate {
  const { year, month, day } = calendarDateIn(date, tz)
  return lunarDateOf(year, month, day)
}
