/**
 * Schedule Resolver
 *
 * Pure occurrence computation. Given a schedule and a reference instant,
 * finds the next instant a reminder should fire. The clock is always a
 * parameter; nothing here reads the system time.
 */

import type { ScheduleSpec } from './domain-types'
import { InvalidScheduleError } from './errors'
import { safeParseSchedule } from './schedule-spec'
import {
  type LocalDate, type LocalTime, type WeekdayIndex,
  addDays, compareDates, localDateOf, weekdayIndex, zonedToInstant, isValidTimezone,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type Occurrence = {
  /** Absolute instant the reminder fires */
  at: Date
  /** Occurrence key: local calendar date in the reminder's timezone */
  scheduledDate: LocalDate
  scheduledTime: LocalTime
}

// ============================================================================
// Validation
// ============================================================================

/** Re-validate a schedule that arrived typed but unchecked (e.g. from storage). */
export function assertValidSchedule(schedule: ScheduleSpec): ScheduleSpec {
  const parsed = safeParseSchedule(schedule)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

function assertTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    throw new InvalidScheduleError(`Unknown timezone: '${timezone}'`, [`timezone: Unknown timezone: '${timezone}'`])
  }
}

// ============================================================================
// Resolution
// ============================================================================

/** The instant of an occurrence key in `timezone`. */
export function occurrenceInstant(date: LocalDate, time: LocalTime, timezone: string): Date {
  return zonedToInstant(date, time, timezone)
}

/**
 * Next occurrence strictly after `after`, or null when a one-time schedule
 * has already passed.
 */
export function nextOccurrence(schedule: ScheduleSpec, timezone: string, after: Date): Occurrence | null {
  const valid = assertValidSchedule(schedule)
  assertTimezone(timezone)

  if (valid.type === 'oneTime') {
    const at = zonedToInstant(valid.date, valid.time, timezone)
    if (at.getTime() <= after.getTime()) return null
    return { at, scheduledDate: valid.date, scheduledTime: valid.time }
  }

  const allowed = new Set<WeekdayIndex>(valid.daysOfWeek)
  const startDate = localDateOf(after, timezone)

  // Eight candidates cover "today already passed" plus a full week
  for (let i = 0; i <= 7; i++) {
    const date = addDays(startDate, i)
    if (!allowed.has(weekdayIndex(date))) continue
    const at = zonedToInstant(date, valid.time, timezone)
    if (at.getTime() > after.getTime()) {
      return { at, scheduledDate: date, scheduledTime: valid.time }
    }
  }

  throw new InvalidScheduleError('Schedule has no reachable weekday')
}

/**
 * Expected occurrence dates within the inclusive range [start, end],
 * oldest first.
 */
export function expectedDates(schedule: ScheduleSpec, start: LocalDate, end: LocalDate): LocalDate[] {
  if (compareDates(start, end) > 0) return []

  if (schedule.type === 'oneTime') {
    return compareDates(schedule.date, start) >= 0 && compareDates(schedule.date, end) <= 0
      ? [schedule.date]
      : []
  }

  const allowed = new Set<WeekdayIndex>(schedule.daysOfWeek)
  const dates: LocalDate[] = []
  for (let d = start; compareDates(d, end) <= 0; d = addDays(d, 1)) {
    if (allowed.has(weekdayIndex(d))) dates.push(d)
  }
  return dates
}

/** True when `date` is a scheduled day for the given schedule. */
export function isScheduledOn(schedule: ScheduleSpec, date: LocalDate): boolean {
  if (schedule.type === 'oneTime') return schedule.date === date
  return schedule.daysOfWeek.includes(weekdayIndex(date))
}
