/**
 * Canonical Domain Types
 *
 * Single source of truth for the business entities. Stores persist these
 * shapes, services return them, and derived views (streaks, analytics,
 * suggestions) are computed from them.
 */

import type { LocalDate, LocalTime, WeekdayIndex, WeekdayName } from './time-date'

// ============================================================================
// Schedules
// ============================================================================

export type DailySchedule = {
  type: 'daily'
  time: LocalTime
  timezone: string
  daysOfWeek: WeekdayIndex[]
}

export type WeeklySchedule = {
  type: 'weekly'
  time: LocalTime
  timezone: string
  daysOfWeek: WeekdayIndex[]
}

export type OneTimeSchedule = {
  type: 'oneTime'
  date: LocalDate
  time: LocalTime
  timezone: string
}

export type RecurringSchedule = DailySchedule | WeeklySchedule

export type ScheduleSpec = RecurringSchedule | OneTimeSchedule

export function isRecurring(schedule: ScheduleSpec): schedule is RecurringSchedule {
  return schedule.type !== 'oneTime'
}

// ============================================================================
// Reminders
// ============================================================================

export type Reminder = {
  id: string
  userId: string
  message: string
  active: boolean
  schedule: ScheduleSpec
  trackingEnabled: boolean
  /** Whether notifications should mention the current streak */
  streakMotivation: boolean
  /** Suppress the notification when the occurrence is already completed */
  skipWhenCompleted: boolean
  /** ISO-8601 instant */
  createdAt: string
  /** ISO-8601 instant */
  updatedAt: string
}

// ============================================================================
// Outcomes
// ============================================================================

export const SKIP_REASONS = ['sick', 'out_of_stock', 'doctor_advice', 'other'] as const

export type SkipReason = (typeof SKIP_REASONS)[number]

export type CompletionRecord = {
  id: string
  reminderId: string
  userId: string
  scheduledDate: LocalDate
  scheduledTime: LocalTime
  /** ISO-8601 instant */
  completedAt: string
  note?: string
}

export type SkipRecord = {
  id: string
  reminderId: string
  userId: string
  scheduledDate: LocalDate
  scheduledTime: LocalTime
  reason: SkipReason
  /** ISO-8601 instant */
  skippedAt: string
  note?: string
}

export type CompletionTiming =
  | { status: 'early' }
  | { status: 'late'; delayMinutes: number }

// ============================================================================
// Derived Views
// ============================================================================

export type StreakState =
  | { status: 'computed'; currentStreak: number; bestStreak: number }
  | { status: 'notApplicable'; currentStreak: 0; bestStreak: 0 }

export type DayBreakdown = {
  expected: number
  completions: number
  skips: number
  missed: number
  completionRate: number
  averageDelayMinutes: number
}

export type AnalyticsSnapshot = {
  reminderId: string
  periodDays: number
  window: { start: LocalDate; end: LocalDate }
  completionRate: number
  totalCompletions: number
  totalExpected: number
  totalSkips: number
  totalMissed: number
  averageDelayMinutes: number
  skipReasonCounts: Record<SkipReason, number>
  dayOfWeekBreakdown: Record<WeekdayName, DayBreakdown>
  currentStreak: number
  bestStreak: number
}

export type ReminderComparison = {
  reminderId: string
  message: string
  completionRate: number
  totalCompletions: number
  totalExpected: number
  currentStreak: number
  bestStreak: number
}

export type SuggestionKind = 'timeShift' | 'difficultDaySupport' | 'scheduleSplit'

export type SuggestionPriority = 'high' | 'medium' | 'low'

export type ProposedChange =
  | { kind: 'timeShift'; currentTime: LocalTime; suggestedTime: LocalTime }
  | { kind: 'difficultDaySupport'; weekday: WeekdayIndex; backupTime: LocalTime }
  | {
      kind: 'scheduleSplit'
      weekdays: WeekdayIndex[]
      weekdayTime: LocalTime
      weekendDays: WeekdayIndex[]
      weekendTime: LocalTime
    }

export type Suggestion = {
  kind: SuggestionKind
  priority: SuggestionPriority
  title: string
  rationale: string
  proposedChange: ProposedChange
}
