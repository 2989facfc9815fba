/**
 * Instant to Year
 *
 * Estimate-then-correct inverse of the year boundaries. The estimate divides
 * by the average year length and is never more than one year off, so a single
 * comparison against the estimated year's boundaries settles it.
 */

import {
  APPROX_MILLIS_AT_EPOCH_DIVIDED_BY_TWO,
  AVERAGE_MILLIS_PER_YEAR_DIVIDED_BY_TWO,
  MAX_INSTANT,
  MILLIS_PER_DAY,
  MIN_INSTANT,
  type Instant,
  type Year,
} from './constants'
import { InstantOutOfRangeError } from './errors'
import { daysInYear } from './leap-year'
import { computeYearStart } from './year-boundary'

// ============================================================================
// Validation
// ============================================================================

export function assertInstantInRange(instant: Instant): void {
  if (instant < MIN_INSTANT || instant > MAX_INSTANT) {
    throw new InstantOutOfRangeError(`Instant ${instant} is outside the signed 64-bit range`)
  }
}

// ============================================================================
// Year Resolution
// ============================================================================

export function yearOf(instant: Instant): Year {
  assertInstantInRange(instant)

  // Both operands are halved so the estimate stays within 64 bits
  const unitMillis = AVERAGE_MILLIS_PER_YEAR_DIVIDED_BY_TWO
  let i2 = (instant >> 1n) + APPROX_MILLIS_AT_EPOCH_DIVIDED_BY_TWO
  if (i2 < 0n) {
    // bigint division truncates toward zero; shift to get the floor
    i2 = i2 - unitMillis + 1n
  }
  let year = Number(i2 / unitMillis)

  const yearStart = computeYearStart(year)
  const diff = instant - yearStart

  if (diff < 0n) {
    year--
  } else {
    const nextYearStart = yearStart + BigInt(daysInYear(year)) * MILLIS_PER_DAY
    if (nextYearStart <= instant) {
      year++
    }
  }

  return year
}
