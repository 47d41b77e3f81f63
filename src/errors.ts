/**
 * Consolidated error system for station-schedule.
 *
 * All error classes extend ScheduleError, which carries a typed error code.
 * Codes fall into three categories: storage failures raised by adapters,
 * usage errors the caller must fix, and schedule inconsistencies that signal
 * broken data or a defect in filling/tabulation.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ScheduleErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Caller errors
  VALIDATION: 'VALIDATION',
  INVALID_RANGE: 'INVALID_RANGE',
  PARSE_ERROR: 'PARSE_ERROR',

  // Filler / tabulator invariants
  SCHEDULE_INCONSISTENCY: 'SCHEDULE_INCONSISTENCY',
} as const

export type ScheduleErrorCode = (typeof ScheduleErrorCode)[keyof typeof ScheduleErrorCode]

export type ErrorCategory = 'storage' | 'usage' | 'inconsistency' | 'unknown'

const CATEGORIES: Record<ScheduleErrorCode, ErrorCategory> = {
  DUPLICATE_KEY: 'storage',
  NOT_FOUND: 'storage',
  FOREIGN_KEY: 'storage',
  INVALID_DATA: 'storage',
  VALIDATION: 'usage',
  INVALID_RANGE: 'usage',
  PARSE_ERROR: 'usage',
  SCHEDULE_INCONSISTENCY: 'inconsistency',
}

// ============================================================================
// Base Class
// ============================================================================

export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode

  constructor(code: ScheduleErrorCode, message: string) {
    super(message)
    this.name = 'ScheduleError'
    this.code = code
  }

  get category(): ErrorCategory {
    return CATEGORIES[this.code]
  }
}

export function errorCategory(e: unknown): ErrorCategory {
  return e instanceof ScheduleError ? e.category : 'unknown'
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Usage Errors
// ============================================================================

export class ValidationError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class InvalidRangeError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

export class ParseError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Inconsistency Errors
// ============================================================================

export class ScheduleInconsistencyError extends ScheduleError {
  constructor(message: string) {
    super(ScheduleErrorCode.SCHEDULE_INCONSISTENCY, message)
    this.name = 'ScheduleInconsistencyError'
  }
}

export function noTermWhileFilling(time: string): ScheduleInconsistencyError {
  return new ScheduleInconsistencyError(
    `Schedule inconsistency: attempting to fill a schedule gap starting at ${time}, ` +
      'but there is no term on or before that time. The term table is probably ' +
      'insufficiently populated, or a show is scheduled somewhere it should not be.'
  )
}
