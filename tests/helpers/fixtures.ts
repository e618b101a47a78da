/**
 * Shared test fixtures: branded value helpers, reminder and record builders,
 * a recording notifier and a capturing log writer.
 */
import type { Notification, DeliveryResult, Notifier } from '../../src/boundaries'
import type {
  CompletionRecord, Reminder, ScheduleSpec, SkipReason, SkipRecord,
} from '../../src/domain-types'
import type { LogEntry, LogWriter } from '../../src/logger'
import { unwrap } from '../../src/result'
import { parseSchedule } from '../../src/schedule-spec'
import { type LocalDate, type LocalTime, parseDate, parseTime } from '../../src/time-date'

// ============================================================================
// Branded Values
// ============================================================================

export function date(iso: string): LocalDate {
  return unwrap(parseDate(iso))
}

export function time(hhmm: string): LocalTime {
  return unwrap(parseTime(hhmm))
}

export function daily(hhmm: string, timezone = 'UTC'): ScheduleSpec {
  return parseSchedule({ type: 'daily', time: hhmm, timezone, daysOfWeek: [0, 1, 2, 3, 4, 5, 6] })
}

export function weekly(hhmm: string, days: number[], timezone = 'UTC'): ScheduleSpec {
  return parseSchedule({ type: 'weekly', time: hhmm, timezone, daysOfWeek: days })
}

export function oneTime(iso: string, hhmm: string, timezone = 'UTC'): ScheduleSpec {
  return parseSchedule({ type: 'oneTime', date: iso, time: hhmm, timezone })
}

// ============================================================================
// Records
// ============================================================================

export function makeReminder(overrides: Partial<Reminder> = {}): Reminder {
  return {
    id: 'r1',
    userId: 'u1',
    message: 'Take vitamins',
    active: true,
    schedule: daily('09:00'),
    trackingEnabled: true,
    streakMotivation: false,
    skipWhenCompleted: false,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export function completion(
  scheduledDate: string,
  completedAt: string,
  overrides: Partial<CompletionRecord> = {},
): CompletionRecord {
  return {
    id: `c-${scheduledDate}`,
    reminderId: 'r1',
    userId: 'u1',
    scheduledDate: date(scheduledDate),
    scheduledTime: time('09:00'),
    completedAt,
    ...overrides,
  }
}

export function skip(
  scheduledDate: string,
  reason: SkipReason = 'sick',
  overrides: Partial<SkipRecord> = {},
): SkipRecord {
  return {
    id: `s-${scheduledDate}`,
    reminderId: 'r1',
    userId: 'u1',
    scheduledDate: date(scheduledDate),
    scheduledTime: time('09:00'),
    reason,
    skippedAt: `${scheduledDate}T10:00:00.000Z`,
    ...overrides,
  }
}

/** Completions at 09:00 UTC on `count` consecutive days ending at `last`. */
export function dailyCompletions(last: string, count: number, delayMinutes = 0): CompletionRecord[] {
  const records: CompletionRecord[] = []
  const end = Date.parse(`${last}T00:00:00.000Z`)
  for (let i = count - 1; i >= 0; i--) {
    const day = new Date(end - i * 86400000).toISOString().slice(0, 10)
    const at = Date.parse(`${day}T09:00:00.000Z`) + delayMinutes * 60000
    records.push(completion(day, new Date(at).toISOString()))
  }
  return records
}

// ============================================================================
// Boundaries
// ============================================================================

export type RecordingNotifier = Notifier & {
  sent: Notification[]
  /** Result returned by the next calls; defaults to delivered */
  respondWith(result: DeliveryResult | Error): void
}

export function createRecordingNotifier(): RecordingNotifier {
  let response: DeliveryResult | Error = { delivered: true }
  const sent: Notification[] = []
  return {
    sent,
    respondWith(result) {
      response = result
    },
    async notify(notification) {
      sent.push(notification)
      if (response instanceof Error) throw response
      return response
    },
  }
}

export function captureLogs(): { entries: LogEntry[]; writer: LogWriter } {
  const entries: LogEntry[] = []
  return { entries, writer: (entry) => { entries.push(entry) } }
}
