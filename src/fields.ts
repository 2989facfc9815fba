/**
 * Calendar Fields
 *
 * Field accessors and composition written against the CalendarSystem
 * capability set, so they hold for any calendar that supplies it.
 * Extraction accepts every instant yearOf accepts; composition only
 * accepts years in the calendar's range.
 */

import { MILLIS_PER_DAY, type Instant, type Month, type Year } from './constants'
import type { CalendarSystem } from './calendar'
import { InvalidDayError, InvalidMonthError, InvalidTimeError } from './errors'

export { InvalidDayError, InvalidMonthError, InvalidTimeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CalendarDateTime = {
  year: Year
  month: Month
  /** Day of month, 1-based */
  day: number
  millisOfDay: number
}

// ============================================================================
// Helpers
// ============================================================================

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q
}

// ============================================================================
// Field Extraction
// ============================================================================

export function millisOfDay(instant: Instant): number {
  return Number(instant - floorDiv(instant, MILLIS_PER_DAY) * MILLIS_PER_DAY)
}

/** ISO day of week: 1 = Monday .. 7 = Sunday. 1970-01-01 was a Thursday. */
export function dayOfWeek(instant: Instant): number {
  const days = floorDiv(instant, MILLIS_PER_DAY)
  return Number((((days + 3n) % 7n) + 7n) % 7n) + 1
}

export function dayOfYear(calendar: CalendarSystem, instant: Instant, year: Year = calendar.yearOf(instant)): number {
  return Number((instant - calendar.yearStart(year)) / MILLIS_PER_DAY) + 1
}

export function monthOfYear(calendar: CalendarSystem, instant: Instant, year: Year = calendar.yearOf(instant)): Month {
  return calendar.monthOfDayOfYear(dayOfYear(calendar, instant, year) - 1)
}

export function dayOfMonth(calendar: CalendarSystem, instant: Instant, year: Year = calendar.yearOf(instant)): number {
  const doy = dayOfYear(calendar, instant, year)
  const month = calendar.monthOfDayOfYear(doy - 1)
  return doy - calendar.daysBeforeMonth(year, month)
}

/** Monday-based week of year, week 1 being the week that holds the first day */
export function weekOfYear(calendar: CalendarSystem, instant: Instant, year: Year = calendar.yearOf(instant)): number {
  const leadingDays = dayOfWeek(calendar.yearStart(year)) - 1
  return Math.floor((dayOfYear(calendar, instant, year) - 1 + leadingDays) / 7) + 1
}

// ============================================================================
// Composition
// ============================================================================

export function yearMonthDayMillis(calendar: CalendarSystem, year: Year, month: Month, day: number): Instant {
  if (!Number.isInteger(month) || month < 1 || month > calendar.maxMonth) {
    throw new InvalidMonthError(`Month must be an integer in [1, ${calendar.maxMonth}], got ${month}`)
  }
  const monthLength = calendar.daysInMonth(year, month)
  if (!Number.isInteger(day) || day < 1 || day > monthLength) {
    throw new InvalidDayError(`Day must be an integer in [1, ${monthLength}] for ${year}-${month}, got ${day}`)
  }
  const days = calendar.daysBeforeMonth(year, month) + day - 1
  return calendar.firstInstantOfYear(year) + BigInt(days) * MILLIS_PER_DAY
}

export function toDateTime(calendar: CalendarSystem, instant: Instant): CalendarDateTime {
  const year = calendar.yearOf(instant)
  return {
    year,
    month: monthOfYear(calendar, instant, year),
    day: dayOfMonth(calendar, instant, year),
    millisOfDay: millisOfDay(instant),
  }
}

export function fromDateTime(calendar: CalendarSystem, dateTime: CalendarDateTime): Instant {
  const { year, month, day, millisOfDay: millis } = dateTime
  if (!Number.isInteger(millis) || millis < 0 || BigInt(millis) >= MILLIS_PER_DAY) {
    throw new InvalidTimeError(`Millis of day must be an integer in [0, ${MILLIS_PER_DAY}), got ${millis}`)
  }
  return yearMonthDayMillis(calendar, year, month, day) + BigInt(millis)
}
