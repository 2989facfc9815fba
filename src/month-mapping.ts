/**
 * Month Mapping
 *
 * Every quarter is 91 days (30 + 30 + 31), so the first 364 days of any year
 * map to months arithmetically. Days past 364 are the intercalary week, which
 * belongs to month 12.
 */

import {
  DAYS_IN_COMMON_YEAR,
  DAYS_IN_YEAR_MAX,
  MAX_MONTH,
  MILLIS_PER_DAY,
  type Instant,
  type Month,
  type Year,
} from './constants'
import { InvalidDayError, InvalidMonthError } from './errors'
import { yearOf } from './instant-to-year'
import { daysInYear, isLeapYear } from './leap-year'
import { computeYearStart } from './year-boundary'

export { InvalidDayError, InvalidMonthError } from './errors'

// ============================================================================
// Month Tables
// ============================================================================

const DAYS_PER_MONTH: readonly number[] = [30, 30, 31, 30, 30, 31, 30, 30, 31, 30, 30, 31]

const MAX_DAYS_PER_MONTH: readonly number[] = [30, 30, 31, 30, 30, 31, 30, 30, 31, 30, 30, 38]

// Month 12 is the only month that changes length, so these hold in leap years too
const DAYS_BEFORE_MONTH: readonly number[] = [0, 30, 60, 91, 121, 151, 182, 212, 242, 273, 303, 333]

export function assertValidMonth(month: Month): void {
  if (!Number.isInteger(month) || month < 1 || month > MAX_MONTH) {
    throw new InvalidMonthError(`Month must be an integer in [1, ${MAX_MONTH}], got ${month}`)
  }
}

// ============================================================================
// Day of Year -> Month
// ============================================================================

export function monthOfDayOfYear(dayOfYearZeroBased: number): Month {
  if (!Number.isInteger(dayOfYearZeroBased) || dayOfYearZeroBased < 0 || dayOfYearZeroBased >= DAYS_IN_YEAR_MAX) {
    throw new InvalidDayError(
      `Zero-based day of year must be an integer in [0, ${DAYS_IN_YEAR_MAX - 1}], got ${dayOfYearZeroBased}`
    )
  }
  if (dayOfYearZeroBased >= DAYS_IN_COMMON_YEAR) {
    return MAX_MONTH
  }
  // Months start at 30d, 60d and 91d into each 91-day quarter: +2 puts each
  // of those starts exactly on a multiple of 91
  return Math.floor((dayOfYearZeroBased * 3 + 2) / 91) + 1
}

export function monthOf(instant: Instant, year: Year = yearOf(instant)): Month {
  const offset = Number.isSafeInteger(year) ? instant - computeYearStart(year) : -1n
  if (offset < 0n || offset >= BigInt(daysInYear(year)) * MILLIS_PER_DAY) {
    throw new InvalidDayError(`Instant ${instant} does not fall in year ${year}`)
  }
  return monthOfDayOfYear(Number(offset / MILLIS_PER_DAY))
}

// ============================================================================
// Month Lengths
// ============================================================================

export function daysInMonth(year: Year, month: Month): number {
  assertValidMonth(month)
  return isLeapYear(year) ? MAX_DAYS_PER_MONTH[month - 1] : DAYS_PER_MONTH[month - 1]
}

export function maxDaysInMonth(month: Month): number {
  assertValidMonth(month)
  return MAX_DAYS_PER_MONTH[month - 1]
}

/** Days of the year that precede the first day of the month */
export function daysBeforeMonth(month: Month): number {
  assertValidMonth(month)
  return DAYS_BEFORE_MONTH[month - 1]
}

/** Length of the month containing the instant */
export function maxDaysInMonthAt(instant: Instant): number {
  const year = yearOf(instant)
  return daysInMonth(year, monthOf(instant, year))
}
