/**
 * Year Arithmetic
 *
 * Whole-year differences and year replacement. Both have to reconcile the
 * intercalary week, which exists only in leap years.
 */

import { DAYS_IN_COMMON_YEAR, MILLIS_PER_DAY, type Instant, type Year } from './constants'
import { millisOfDay } from './fields'
import { yearOf } from './instant-to-year'
import { isLeapYear } from './leap-year'
import { assertYearInRange, computeYearStart } from './year-boundary'

/** Offset from the start of a year at which the intercalary week begins */
const INTERCALARY_WEEK_OFFSET = BigInt(DAYS_IN_COMMON_YEAR) * MILLIS_PER_DAY

// ============================================================================
// Year Difference
// ============================================================================

/**
 * Whole years from subtrahendInstant to minuendInstant. Negative when the
 * minuend is earlier; the count is truncated toward zero either way.
 */
export function yearsBetween(minuendInstant: Instant, subtrahendInstant: Instant): number {
  if (minuendInstant < subtrahendInstant) {
    const reversed = yearsBetween(subtrahendInstant, minuendInstant)
    return reversed === 0 ? 0 : -reversed
  }

  const minuendYear = yearOf(minuendInstant)
  const subtrahendYear = yearOf(subtrahendInstant)

  let minuendRem = minuendInstant - computeYearStart(minuendYear)
  let subtrahendRem = subtrahendInstant - computeYearStart(subtrahendYear)

  const minuendLeap = isLeapYear(minuendYear)
  const subtrahendLeap = isLeapYear(subtrahendYear)

  // A remainder inside the intercalary week has no counterpart in a common
  // year; pull it back one day before comparing.
  if (subtrahendRem >= INTERCALARY_WEEK_OFFSET && subtrahendLeap && !minuendLeap) {
    subtrahendRem -= MILLIS_PER_DAY
  } else if (minuendRem >= INTERCALARY_WEEK_OFFSET && minuendLeap && !subtrahendLeap) {
    minuendRem -= MILLIS_PER_DAY
  }

  let difference = minuendYear - subtrahendYear
  if (minuendRem < subtrahendRem) {
    difference--
  }
  return difference
}

// ============================================================================
// Set Year
// ============================================================================

/**
 * Moves an instant into another year, keeping day of year and time of day.
 * Intercalary days moved into a common year land on its last day.
 */
export function withYear(instant: Instant, year: Year): Instant {
  assertYearInRange(year)

  const thisYear = yearOf(instant)
  let dayOfYear = Number((instant - computeYearStart(thisYear)) / MILLIS_PER_DAY) + 1

  if (dayOfYear > DAYS_IN_COMMON_YEAR && !isLeapYear(year)) {
    dayOfYear = DAYS_IN_COMMON_YEAR
  }

  return computeYearStart(year) + BigInt(dayOfYear - 1) * MILLIS_PER_DAY + BigInt(millisOfDay(instant))
}
