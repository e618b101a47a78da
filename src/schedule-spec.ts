/**
 * Schedule Validation
 *
 * zod schemas for the closed ScheduleSpec union. Every schedule that enters
 * the engine (create, update, store rows) goes through `parseSchedule`, so
 * downstream code can rely on the branded, normalized shape.
 */

import { z } from 'zod'
import type { ScheduleSpec } from './domain-types'
import { InvalidScheduleError } from './errors'
import { type Result, Ok, Err } from './result'
import { type WeekdayIndex, parseDate, parseTime, isValidTimezone } from './time-date'

// ============================================================================
// Field Schemas
// ============================================================================

export const TimeSchema = z.string().transform((value, ctx) => {
  const parsed = parseTime(value)
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
    return z.NEVER
  }
  return parsed.value
})

export const DateSchema = z.string().transform((value, ctx) => {
  const parsed = parseDate(value)
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
    return z.NEVER
  }
  return parsed.value
})

export const TimezoneSchema = z
  .string()
  .min(1, 'Timezone is required')
  .refine(isValidTimezone, (value) => ({ message: `Unknown timezone: '${value}'` }))

function isWeekdayIndex(n: number): n is WeekdayIndex {
  return Number.isInteger(n) && n >= 0 && n <= 6
}

export const DaysOfWeekSchema = z
  .array(z.number().int().min(0, 'Days run 0 (Monday) to 6 (Sunday)').max(6, 'Days run 0 (Monday) to 6 (Sunday)'))
  .min(1, 'At least one day must be selected')
  .max(7)
  .refine(
    (days) => new Set(days).size === days.length,
    { message: 'Duplicate days are not allowed' }
  )
  .transform((days) => days.filter(isWeekdayIndex).sort((a, b) => a - b))

// ============================================================================
// Schedule Union
// ============================================================================

export const DailyScheduleSchema = z.object({
  type: z.literal('daily'),
  time: TimeSchema,
  timezone: TimezoneSchema,
  daysOfWeek: DaysOfWeekSchema,
})

export const WeeklyScheduleSchema = z.object({
  type: z.literal('weekly'),
  time: TimeSchema,
  timezone: TimezoneSchema,
  daysOfWeek: DaysOfWeekSchema,
})

export const OneTimeScheduleSchema = z.object({
  type: z.literal('oneTime'),
  date: DateSchema,
  time: TimeSchema,
  timezone: TimezoneSchema,
})

export const ScheduleSpecSchema = z.discriminatedUnion('type', [
  DailyScheduleSchema,
  WeeklyScheduleSchema,
  OneTimeScheduleSchema,
])

/** Wire shape accepted from callers (plain strings and numbers). */
export type ScheduleInput = z.input<typeof ScheduleSpecSchema>

// ============================================================================
// Entry Points
// ============================================================================

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export function safeParseSchedule(input: unknown): Result<ScheduleSpec, InvalidScheduleError> {
  const parsed = ScheduleSpecSchema.safeParse(input)
  if (!parsed.success) {
    const issues = describeIssues(parsed.error)
    return Err(new InvalidScheduleError(`Invalid schedule: ${issues.join('; ')}`, issues))
  }
  return Ok(parsed.data)
}

/** Validate and normalize a schedule; throws InvalidScheduleError. */
export function parseSchedule(input: unknown): ScheduleSpec {
  const parsed = safeParseSchedule(input)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}
