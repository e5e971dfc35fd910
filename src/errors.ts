/**
 * Consolidated error system for korean-lunisolar.
 *
 * All error classes extend LunisolarError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from either place.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const LunisolarErrorCode = {
  // Range validation
  OUT_OF_RANGE_YEAR: 'OUT_OF_RANGE_YEAR',
  OUT_OF_RANGE_MONTH: 'OUT_OF_RANGE_MONTH',
  OUT_OF_RANGE_DAY: 'OUT_OF_RANGE_DAY',
  OUT_OF_RANGE_CYCLE: 'OUT_OF_RANGE_CYCLE',

  // Reference data
  MALFORMED_REFERENCE_SYMBOL: 'MALFORMED_REFERENCE_SYMBOL',
  INVALID_TABLE: 'INVALID_TABLE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type LunisolarErrorCode = (typeof LunisolarErrorCode)[keyof typeof LunisolarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class LunisolarError extends Error {
  readonly code: LunisolarErrorCode

  constructor(code: LunisolarErrorCode, message: string) {
    super(message)
    this.name = 'LunisolarError'
    this.code = code
  }
}

// ============================================================================
// Range Errors
// ============================================================================

export class OutOfRangeYearError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.OUT_OF_RANGE_YEAR, message)
    this.name = 'OutOfRangeYearError'
  }
}

export class OutOfRangeMonthError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.OUT_OF_RANGE_MONTH, message)
    this.name = 'OutOfRangeMonthError'
  }
}

export class OutOfRangeDayError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.OUT_OF_RANGE_DAY, message)
    this.name = 'OutOfRangeDayError'
  }
}

export class OutOfRangeCycleError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.OUT_OF_RANGE_CYCLE, message)
    this.name = 'OutOfRangeCycleError'
  }
}

// ============================================================================
// Reference Data Errors
// ============================================================================

export class MalformedReferenceSymbolError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.MALFORMED_REFERENCE_SYMBOL, message)
    this.name = 'MalformedReferenceSymbolError'
  }
}

export class InvalidTableError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.INVALID_TABLE, message)
    this.name = 'InvalidTableError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends LunisolarError {
  constructor(message: string) {
    super(LunisolarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
