/**
 * Consolidated error system for the reminder engine.
 *
 * All error classes extend ReminderEngineError, which carries a typed error code.
 * Callers branch on `code` (or `instanceof`) rather than on message text.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ReminderEngineErrorCode = {
  // Schedules
  INVALID_SCHEDULE: 'INVALID_SCHEDULE',

  // Ownership & lookup
  NOT_FOUND: 'NOT_FOUND',
  FORBIDDEN: 'FORBIDDEN',

  // Boundaries
  DELIVERY_FAILURE: 'DELIVERY_FAILURE',
  PERSISTENCE: 'PERSISTENCE',

  // Store layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Input
  VALIDATION: 'VALIDATION',
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type ReminderEngineErrorCode = (typeof ReminderEngineErrorCode)[keyof typeof ReminderEngineErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ReminderEngineError extends Error {
  readonly code: ReminderEngineErrorCode

  constructor(code: ReminderEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReminderEngineError'
    this.code = code
  }
}

// ============================================================================
// Schedule Errors
// ============================================================================

export class InvalidScheduleError extends ReminderEngineError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(ReminderEngineErrorCode.INVALID_SCHEDULE, message)
    this.name = 'InvalidScheduleError'
    this.issues = issues
  }
}

// ============================================================================
// Ownership Errors
// ============================================================================

export class NotFoundError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForbiddenError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.FORBIDDEN, message)
    this.name = 'ForbiddenError'
  }
}

// ============================================================================
// Boundary Errors
// ============================================================================

export class DeliveryFailureError extends ReminderEngineError {
  readonly reminderId: string

  constructor(reminderId: string, message: string, options?: { cause?: unknown }) {
    super(ReminderEngineErrorCode.DELIVERY_FAILURE, message, options)
    this.name = 'DeliveryFailureError'
    this.reminderId = reminderId
  }
}

export class PersistenceError extends ReminderEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ReminderEngineErrorCode.PERSISTENCE, message, options)
    this.name = 'PersistenceError'
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class DuplicateKeyError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class InvalidDataError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ParseError extends ReminderEngineError {
  constructor(message: string) {
    super(ReminderEngineErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Wrap an unknown store failure, leaving engine errors untouched. */
export function toPersistenceError(e: unknown, action: string): ReminderEngineError {
  if (e instanceof ReminderEngineError) return e
  const detail = e instanceof Error ? e.message : String(e)
  return new PersistenceError(`Failed to ${action}: ${detail}`, { cause: e })
}
