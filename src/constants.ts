/**
 * Calendar Constants
 *
 * Units, epoch alignment and the supported range. Instants are bigint
 * milliseconds since 1970-01-01T00:00:00Z; years and day counts are numbers.
 */

// ============================================================================
// Types
// ============================================================================

/** Signed 64-bit count of milliseconds since 1970-01-01T00:00:00Z */
export type Instant = bigint

/** Proleptic calendar year, zero and negative years included */
export type Year = number

/** Month of year, 1..12 */
export type Month = number

// ============================================================================
// Time Units
// ============================================================================

export const MILLIS_PER_SECOND = 1000n
export const MILLIS_PER_MINUTE = 60n * MILLIS_PER_SECOND
export const MILLIS_PER_HOUR = 60n * MILLIS_PER_MINUTE
export const MILLIS_PER_DAY = 24n * MILLIS_PER_HOUR

// ============================================================================
// Year Structure
// ============================================================================

export const DAYS_IN_COMMON_YEAR = 364
export const DAYS_IN_YEAR_MAX = 371
export const DAYS_IN_INTERCALARY_WEEK = 7
export const MAX_MONTH = 12

// ============================================================================
// Epoch Alignment
// ============================================================================

export const EPOCH_YEAR = 1970

/**
 * Day offset of the first day of EPOCH_YEAR relative to 1970-01-01.
 * Year 1970 starts on Monday 1969-12-29, the first day of ISO week 1970-W01.
 */
export const EPOCH_DAY_OFFSET = -3n

// ============================================================================
// Supported Range
// ============================================================================

export const MIN_INSTANT: Instant = -(2n ** 63n)
export const MAX_INSTANT: Instant = 2n ** 63n - 1n

/** The lowest year whose first instant fits a signed 64-bit instant */
export const MIN_YEAR: Year = -292275054

/** The highest year whose first instant fits a signed 64-bit instant */
export const MAX_YEAR: Year = 292278993

// ============================================================================
// Averages (year estimation)
// ============================================================================

/** 365.2425 days: 400 years hold 71 intercalary weeks */
export const AVERAGE_MILLIS_PER_YEAR = 31556952000n

export const AVERAGE_MILLIS_PER_YEAR_DIVIDED_BY_TWO = AVERAGE_MILLIS_PER_YEAR / 2n

export const AVERAGE_MILLIS_PER_MONTH = AVERAGE_MILLIS_PER_YEAR / 12n

export const APPROX_MILLIS_AT_EPOCH_DIVIDED_BY_TWO =
  (BigInt(EPOCH_YEAR) * AVERAGE_MILLIS_PER_YEAR - EPOCH_DAY_OFFSET * MILLIS_PER_DAY) / 2n
