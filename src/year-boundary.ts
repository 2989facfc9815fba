/**
 * Year Boundaries
 *
 * Maps a year to the instant of its first day. Years are laid end to end from
 * EPOCH_YEAR in both directions: 364 days each, plus one intercalary week per
 * leap year in between.
 */

import {
  DAYS_IN_COMMON_YEAR,
  DAYS_IN_INTERCALARY_WEEK,
  EPOCH_DAY_OFFSET,
  EPOCH_YEAR,
  MAX_YEAR,
  MILLIS_PER_DAY,
  MIN_YEAR,
  type Instant,
  type Year,
} from './constants'
import { YearOutOfRangeError } from './errors'
import { leapYearsBefore } from './leap-year'

export { YearOutOfRangeError } from './errors'

// ============================================================================
// Validation
// ============================================================================

export function assertYearInRange(year: Year): void {
  if (!Number.isSafeInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new YearOutOfRangeError(`Year must be an integer in [${MIN_YEAR}, ${MAX_YEAR}], got ${year}`)
  }
}

// ============================================================================
// Boundaries
// ============================================================================

/**
 * First instant of a year, without the range check.
 *
 * Used by the instant-to-year estimator, whose estimate may sit one year past
 * MIN_YEAR or MAX_YEAR for instants at the ends of the 64-bit range.
 */
export function computeYearStart(year: Year): Instant {
  const relativeYear = BigInt(year - EPOCH_YEAR)
  // Leap years in [EPOCH_YEAR, year), negated when year precedes the epoch
  const leapYears = BigInt(leapYearsBefore(year) - leapYearsBefore(EPOCH_YEAR))
  const days =
    relativeYear * BigInt(DAYS_IN_COMMON_YEAR) +
    leapYears * BigInt(DAYS_IN_INTERCALARY_WEEK) +
    EPOCH_DAY_OFFSET
  return days * MILLIS_PER_DAY
}

export function firstInstantOfYear(year: Year): Instant {
  assertYearInRange(year)
  return computeYearStart(year)
}
