/**
 * Leap Year Predicate
 *
 * A Hanke-Henry year carries the 7-day intercalary week when the Gregorian
 * year ends on a Thursday, or begins on one. These are exactly the ISO-8601
 * years with 53 weeks, which is what keeps every year starting on a Monday.
 */

import { DAYS_IN_COMMON_YEAR, DAYS_IN_YEAR_MAX, type Year } from './constants'

// ============================================================================
// Predicate
// ============================================================================

/** Gregorian day count from 0001-01-01 (day 1, a Monday) to Dec 31 of year i */
function gregorianDays(i: number): number {
  return i * 365 + Math.floor(i / 4) - Math.floor(i / 100) + Math.floor(i / 400)
}

export function isLeapYear(year: Year): boolean {
  let leap = false
  for (const i of [year - 1, year]) {
    const remainder = ((gregorianDays(i) % 7) + 7) % 7
    if ((i === year && remainder === 4) || (i === year - 1 && remainder === 3)) {
      leap = true
    }
  }
  return leap
}

export function daysInYear(year: Year): number {
  return isLeapYear(year) ? DAYS_IN_YEAR_MAX : DAYS_IN_COMMON_YEAR
}

export function weeksInYear(year: Year): number {
  return isLeapYear(year) ? 53 : 52
}

// ============================================================================
// Leap Year Counting
// ============================================================================

// 400 Gregorian years are 146097 days, a whole number of weeks, so the
// predicate repeats every 400 years.
export const LEAP_CYCLE_YEARS = 400

const LEAP_COUNT_PREFIX: readonly number[] = (() => {
  const prefix = [0]
  for (let y = 0; y < LEAP_CYCLE_YEARS; y++) {
    prefix.push(prefix[y] + (isLeapYear(y) ? 1 : 0))
  }
  return prefix
})()

export const LEAP_YEARS_PER_CYCLE = LEAP_COUNT_PREFIX[LEAP_CYCLE_YEARS]

/**
 * Signed number of leap years in [0, year): the count itself for year >= 0,
 * minus the count of leap years in [year, 0) below zero.
 */
export function leapYearsBefore(year: Year): number {
  const cycles = Math.floor(year / LEAP_CYCLE_YEARS)
  const offset = year - cycles * LEAP_CYCLE_YEARS
  return cycles * LEAP_YEARS_PER_CYCLE + LEAP_COUNT_PREFIX[offset]
}
