/**
 * hanke-henry-calendar
 *
 * Public API exports
 */

// Error system (canonical source — base class, codes, all error classes)
export {
  CalendarError, CalendarErrorCode,
  YearOutOfRangeError, InstantOutOfRangeError,
  InvalidMonthError, InvalidDayError, InvalidTimeError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Constants
export type { Instant, Year, Month } from './constants'
export {
  MILLIS_PER_SECOND, MILLIS_PER_MINUTE, MILLIS_PER_HOUR, MILLIS_PER_DAY,
  DAYS_IN_COMMON_YEAR, DAYS_IN_YEAR_MAX, DAYS_IN_INTERCALARY_WEEK, MAX_MONTH,
  EPOCH_YEAR, EPOCH_DAY_OFFSET,
  MIN_INSTANT, MAX_INSTANT, MIN_YEAR, MAX_YEAR,
  AVERAGE_MILLIS_PER_YEAR, AVERAGE_MILLIS_PER_MONTH,
} from './constants'

// Leap years
export { isLeapYear, daysInYear, weeksInYear, leapYearsBefore } from './leap-year'

// Year boundaries
export { firstInstantOfYear } from './year-boundary'

// Instant to year
export { yearOf } from './instant-to-year'

// Months
export {
  monthOfDayOfYear, monthOf,
  daysInMonth, maxDaysInMonth, daysBeforeMonth, maxDaysInMonthAt,
} from './month-mapping'

// Year arithmetic
export { yearsBetween, withYear } from './year-arithmetic'

// Calendar systems
export type { CalendarSystem } from './calendar'
export { hankeHenry } from './calendar'

// Fields
export type { CalendarDateTime } from './fields'
export {
  millisOfDay, dayOfWeek, dayOfYear, monthOfYear, dayOfMonth, weekOfYear,
  yearMonthDayMillis, toDateTime, fromDateTime,
} from './fields'
