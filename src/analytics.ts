/**
 * Analytics Engine
 *
 * Completion statistics over a trailing window of days. Each expected
 * occurrence in the window is classified as completed, skipped or missed;
 * the snapshot aggregates those outcomes overall and per weekday.
 *
 * Dates before the reminder existed are left out unless something was
 * recorded on them, and today is left out until it resolves (recorded, or
 * past its scheduled time plus grace).
 */

import type { ReminderStore } from './adapter'
import type { EngineSettings } from './config'
import { defaultSettings } from './config'
import type {
  AnalyticsSnapshot, CompletionRecord, DayBreakdown, Reminder, ReminderComparison,
  SkipReason, SkipRecord,
} from './domain-types'
import { ForbiddenError, NotFoundError, ValidationError, toPersistenceError } from './errors'
import { mean, round1 } from './internal/helpers'
import { type Logger, createSilentLogger } from './logger'
import { expectedDates, occurrenceInstant } from './schedule'
import { calculateStreak } from './streaks'
import {
  type LocalDate, type WeekdayIndex, type WeekdayName,
  addDays, compareDates, localDateOf, weekdayIndex,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type OccurrenceOutcome =
  | { date: LocalDate; weekday: WeekdayIndex; outcome: 'completed'; delayMinutes: number }
  | { date: LocalDate; weekday: WeekdayIndex; outcome: 'skipped'; reason: SkipReason }
  | { date: LocalDate; weekday: WeekdayIndex; outcome: 'missed' }

export type AnalyticsInput = {
  reminder: Reminder
  completions: readonly CompletionRecord[]
  skips: readonly SkipRecord[]
  periodDays: number
  now: Date
  graceMinutes?: number
  lookbackDays?: number
}

export const MAX_PERIOD_DAYS = 3650

// ============================================================================
// Classification
// ============================================================================

export function analyticsWindow(reminder: Reminder, periodDays: number, now: Date): { start: LocalDate; end: LocalDate } {
  const end = localDateOf(now, reminder.schedule.timezone)
  return { start: addDays(end, -periodDays), end }
}

/** Outcome of every counted occurrence in the window, oldest first. */
export function classifyOccurrences(input: AnalyticsInput): OccurrenceOutcome[] {
  const { reminder, now } = input
  const { schedule } = reminder
  const tz = schedule.timezone
  const graceMs = (input.graceMinutes ?? 0) * 60000
  const { start, end } = analyticsWindow(reminder, input.periodDays, now)
  const createdOn = localDateOf(new Date(reminder.createdAt), tz)

  const completions = new Map(input.completions.map((c) => [c.scheduledDate, c]))
  const skips = new Map(input.skips.map((s) => [s.scheduledDate, s]))

  const outcomes: OccurrenceOutcome[] = []
  for (const date of expectedDates(schedule, start, end)) {
    const weekday = weekdayIndex(date)
    const completion = completions.get(date)
    const skip = skips.get(date)

    if (completion) {
      const scheduledAt = occurrenceInstant(date, completion.scheduledTime, tz)
      const delayMinutes = (Date.parse(completion.completedAt) - scheduledAt.getTime()) / 60000
      outcomes.push({ date, weekday, outcome: 'completed', delayMinutes })
      continue
    }
    if (skip) {
      outcomes.push({ date, weekday, outcome: 'skipped', reason: skip.reason })
      continue
    }

    if (compareDates(date, createdOn) < 0) continue
    if (date === end) {
      const dueAt = occurrenceInstant(date, schedule.time, tz).getTime() + graceMs
      if (now.getTime() < dueAt) continue
    }
    outcomes.push({ date, weekday, outcome: 'missed' })
  }
  return outcomes
}

// ============================================================================
// Aggregation
// ============================================================================

function rate(completions: number, expected: number): number {
  return expected === 0 ? 0 : round1((completions / expected) * 100)
}

function breakdown(outcomes: readonly OccurrenceOutcome[]): DayBreakdown {
  const delays: number[] = []
  let skips = 0
  let missed = 0
  for (const o of outcomes) {
    if (o.outcome === 'completed') delays.push(o.delayMinutes)
    else if (o.outcome === 'skipped') skips++
    else missed++
  }
  return {
    expected: outcomes.length,
    completions: delays.length,
    skips,
    missed,
    completionRate: rate(delays.length, outcomes.length),
    averageDelayMinutes: round1(mean(delays)),
  }
}

function emptySkipCounts(): Record<SkipReason, number> {
  return { sick: 0, out_of_stock: 0, doctor_advice: 0, other: 0 }
}

export function computeAnalytics(input: AnalyticsInput): AnalyticsSnapshot {
  const outcomes = classifyOccurrences(input)
  const overall = breakdown(outcomes)

  const skipReasonCounts = emptySkipCounts()
  for (const o of outcomes) {
    if (o.outcome === 'skipped') skipReasonCounts[o.reason]++
  }

  const byDay = (day: WeekdayIndex) => breakdown(outcomes.filter((o) => o.weekday === day))
  const perDay: Record<WeekdayName, DayBreakdown> = {
    Monday: byDay(0),
    Tuesday: byDay(1),
    Wednesday: byDay(2),
    Thursday: byDay(3),
    Friday: byDay(4),
    Saturday: byDay(5),
    Sunday: byDay(6),
  }

  const streak = calculateStreak({
    schedule: input.reminder.schedule,
    completions: input.completions,
    skips: input.skips,
    now: input.now,
    graceMinutes: input.graceMinutes,
    lookbackDays: input.lookbackDays,
  })

  return {
    reminderId: input.reminder.id,
    periodDays: input.periodDays,
    window: analyticsWindow(input.reminder, input.periodDays, input.now),
    completionRate: overall.completionRate,
    totalCompletions: overall.completions,
    totalExpected: overall.expected,
    totalSkips: overall.skips,
    totalMissed: overall.missed,
    averageDelayMinutes: overall.averageDelayMinutes,
    skipReasonCounts,
    dayOfWeekBreakdown: perDay,
    currentStreak: streak.currentStreak,
    bestStreak: streak.bestStreak,
  }
}

export function rankComparisons(a: ReminderComparison, b: ReminderComparison): number {
  if (a.completionRate !== b.completionRate) return b.completionRate - a.completionRate
  if (a.currentStreak !== b.currentStreak) return b.currentStreak - a.currentStreak
  if (a.message !== b.message) return a.message < b.message ? -1 : 1
  return a.reminderId < b.reminderId ? -1 : a.reminderId > b.reminderId ? 1 : 0
}

// ============================================================================
// Service
// ============================================================================

export type AnalyticsQuery = {
  periodDays?: number
  /** When given, the reminder must belong to this user */
  userId?: string
}

export type ReminderHistory = {
  reminder: Reminder
  completions: CompletionRecord[]
  skips: SkipRecord[]
}

export type AnalyticsEngine = {
  getSnapshot(reminderId: string, query?: AnalyticsQuery): Promise<AnalyticsSnapshot>
  getOccurrences(reminderId: string, query?: AnalyticsQuery): Promise<{ snapshot: AnalyticsSnapshot; outcomes: OccurrenceOutcome[]; reminder: Reminder }>
  compareAcrossReminders(userId: string, periodDays?: number): Promise<ReminderComparison[]>
}

export function createAnalyticsEngine(deps: {
  store: ReminderStore
  settings?: Pick<EngineSettings, 'analytics' | 'streak'>
  now?: () => Date
  logger?: Logger
}): AnalyticsEngine {
  const { store } = deps
  const settings = deps.settings ?? defaultSettings()
  const now = deps.now ?? (() => new Date())
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'analytics' })

  function resolvePeriod(periodDays: number | undefined): number {
    const period = periodDays ?? settings.analytics.defaultPeriodDays
    if (!Number.isInteger(period) || period < 1 || period > MAX_PERIOD_DAYS) {
      throw new ValidationError(`periodDays must be a whole number between 1 and ${MAX_PERIOD_DAYS}`)
    }
    return period
  }

  async function loadHistory(reminder: Reminder): Promise<ReminderHistory> {
    try {
      const [completions, skips] = await Promise.all([
        store.getCompletionsByReminder(reminder.id),
        store.getSkipsByReminder(reminder.id),
      ])
      return { reminder, completions, skips }
    } catch (e) {
      throw toPersistenceError(e, `load history for '${reminder.id}'`)
    }
  }

  async function loadReminder(reminderId: string, userId?: string): Promise<Reminder> {
    let reminder: Reminder | null
    try {
      reminder = await store.getReminder(reminderId)
    } catch (e) {
      throw toPersistenceError(e, `read reminder '${reminderId}'`)
    }
    if (!reminder) throw new NotFoundError(`Reminder '${reminderId}' not found`)
    if (userId !== undefined && reminder.userId !== userId) {
      logger.warn('Analytics read denied: reminder belongs to another user', { reminderId, userId })
      throw new ForbiddenError(`Reminder '${reminderId}' does not belong to user '${userId}'`)
    }
    return reminder
  }

  function inputFor(history: ReminderHistory, periodDays: number, at: Date): AnalyticsInput {
    return {
      ...history,
      periodDays,
      now: at,
      graceMinutes: settings.streak.graceMinutes,
      lookbackDays: settings.streak.lookbackDays,
    }
  }

  async function getOccurrences(reminderId: string, query: AnalyticsQuery = {}) {
    const periodDays = resolvePeriod(query.periodDays)
    const reminder = await loadReminder(reminderId, query.userId)
    const input = inputFor(await loadHistory(reminder), periodDays, now())
    return { reminder, snapshot: computeAnalytics(input), outcomes: classifyOccurrences(input) }
  }

  async function getSnapshot(reminderId: string, query: AnalyticsQuery = {}): Promise<AnalyticsSnapshot> {
    return (await getOccurrences(reminderId, query)).snapshot
  }

  async function compareAcrossReminders(userId: string, periodDays?: number): Promise<ReminderComparison[]> {
    const period = resolvePeriod(periodDays)
    let reminders: Reminder[]
    try {
      reminders = await store.getRemindersByUser(userId)
    } catch (e) {
      throw toPersistenceError(e, `list reminders for '${userId}'`)
    }

    const at = now()
    const rows: ReminderComparison[] = []
    for (const reminder of reminders) {
      if (!reminder.active || !reminder.trackingEnabled) continue
      const snapshot = computeAnalytics(inputFor(await loadHistory(reminder), period, at))
      rows.push({
        reminderId: reminder.id,
        message: reminder.message,
        completionRate: snapshot.completionRate,
        totalCompletions: snapshot.totalCompletions,
        totalExpected: snapshot.totalExpected,
        currentStreak: snapshot.currentStreak,
        bestStreak: snapshot.bestStreak,
      })
    }
    return rows.sort(rankComparisons)
  }

  return { getSnapshot, getOccurrences, compareAcrossReminders }
}
