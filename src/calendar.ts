/**
 * Calendar Systems
 *
 * The capability set that field logic is written against, and the
 * Hanke-Henry implementation of it.
 */

import {
  AVERAGE_MILLIS_PER_MONTH,
  AVERAGE_MILLIS_PER_YEAR,
  DAYS_IN_YEAR_MAX,
  MAX_MONTH,
  MAX_YEAR,
  MIN_YEAR,
  type Instant,
  type Month,
  type Year,
} from './constants'
import { yearOf } from './instant-to-year'
import { daysInYear, isLeapYear } from './leap-year'
import { daysBeforeMonth, daysInMonth, maxDaysInMonth, monthOfDayOfYear } from './month-mapping'
import { computeYearStart, firstInstantOfYear } from './year-boundary'

// ============================================================================
// Types
// ============================================================================

export interface CalendarSystem {
  readonly name: string
  readonly minYear: Year
  readonly maxYear: Year
  readonly maxMonth: number
  readonly daysInYearMax: number
  readonly averageMillisPerYear: bigint
  readonly averageMillisPerMonth: bigint

  isLeapYear(year: Year): boolean
  daysInYear(year: Year): number
  firstInstantOfYear(year: Year): Instant
  /** First instant of any year yearOf can return, without the range check */
  yearStart(year: Year): Instant
  yearOf(instant: Instant): Year
  monthOfDayOfYear(dayOfYearZeroBased: number): Month
  daysInMonth(year: Year, month: Month): number
  maxDaysInMonth(month: Month): number
  daysBeforeMonth(year: Year, month: Month): number
}

// ============================================================================
// Hanke-Henry
// ============================================================================

export const hankeHenry: CalendarSystem = Object.freeze({
  name: 'hanke-henry',
  minYear: MIN_YEAR,
  maxYear: MAX_YEAR,
  maxMonth: MAX_MONTH,
  daysInYearMax: DAYS_IN_YEAR_MAX,
  averageMillisPerYear: AVERAGE_MILLIS_PER_YEAR,
  averageMillisPerMonth: AVERAGE_MILLIS_PER_MONTH,

  isLeapYear,
  daysInYear,
  firstInstantOfYear,
  yearStart: computeYearStart,
  yearOf,
  monthOfDayOfYear,
  daysInMonth,
  maxDaysInMonth,
  daysBeforeMonth: (_year: Year, month: Month) => daysBeforeMonth(month),
})
