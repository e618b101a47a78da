/**
 * Internal Helpers
 *
 * Small utilities shared across services.
 */

import { ValidationError } from '../errors'
import { type LocalDate, parseDate } from '../time-date'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return crypto.randomUUID()
}

// ============================================================================
// Rounding
// ============================================================================

/** Round half away from zero to one decimal place. */
export function round1(n: number): number {
  const r = Math.sign(n) * Math.round(Math.abs(n) * 10) / 10
  return r === 0 ? 0 : r
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

// ============================================================================
// Input Coercion
// ============================================================================

/** Parse a caller-supplied date, throwing ValidationError when malformed. */
export function requireDate(value: string, field = 'date'): LocalDate {
  const parsed = parseDate(value)
  if (!parsed.ok) throw new ValidationError(`${field}: ${parsed.error.message}`)
  return parsed.value
}
