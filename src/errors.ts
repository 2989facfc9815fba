/**
 * Consolidated error system for the Hanke-Henry calendar core.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * The core throws these synchronously and never catches them itself.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Range checks
  YEAR_OUT_OF_RANGE: 'YEAR_OUT_OF_RANGE',
  INSTANT_OUT_OF_RANGE: 'INSTANT_OUT_OF_RANGE',

  // Field validation
  INVALID_MONTH: 'INVALID_MONTH',
  INVALID_DAY: 'INVALID_DAY',
  INVALID_TIME: 'INVALID_TIME',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Range Errors
// ============================================================================

export class YearOutOfRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.YEAR_OUT_OF_RANGE, message)
    this.name = 'YearOutOfRangeError'
  }
}

export class InstantOutOfRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INSTANT_OUT_OF_RANGE, message)
    this.name = 'InstantOutOfRangeError'
  }
}

// ============================================================================
// Field Errors
// ============================================================================

export class InvalidMonthError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_MONTH, message)
    this.name = 'InvalidMonthError'
  }
}

export class InvalidDayError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_DAY, message)
    this.name = 'InvalidDayError'
  }
}

export class InvalidTimeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_TIME, message)
    this.name = 'InvalidTimeError'
  }
}
