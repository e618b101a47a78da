/**
 * Streaks
 *
 * Current and best streak for recurring reminders, derived from completion
 * and skip history. `calculateStreak` is pure; `createStreakService` reads
 * through the store's streak cache and recomputes when an entry expires.
 */

import type { ReminderStore } from './adapter'
import type { StreakSettings } from './config'
import { defaultSettings } from './config'
import type { CompletionRecord, Reminder, ScheduleSpec, SkipRecord, StreakState } from './domain-types'
import { NotFoundError, toPersistenceError } from './errors'
import { type Logger, createSilentLogger } from './logger'
import { expectedDates, isScheduledOn } from './schedule'
import { type LocalDate, addDays, localDateOf, zonedToInstant, makeTime } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type StreakInput = {
  schedule: ScheduleSpec
  completions: readonly { scheduledDate: LocalDate }[]
  skips: readonly { scheduledDate: LocalDate }[]
  now: Date
  graceMinutes?: number
  lookbackDays?: number
}

export type StreakEvaluation = {
  state: StreakState
  /** Earliest instant at which the result can change without a new record */
  validUntil: Date
}

const NOT_APPLICABLE: StreakState = { status: 'notApplicable', currentStreak: 0, bestStreak: 0 }

// ============================================================================
// Pure Calculation
// ============================================================================

export function evaluateStreak(input: StreakInput): StreakEvaluation {
  const { schedule, now } = input
  const graceMinutes = input.graceMinutes ?? 0
  const lookbackDays = input.lookbackDays ?? 365

  const tz = schedule.timezone
  const today = localDateOf(now, tz)
  const startOfTomorrow = zonedToInstant(addDays(today, 1), makeTime(0, 0), tz)

  if (schedule.type === 'oneTime') {
    return { state: NOT_APPLICABLE, validUntil: startOfTomorrow }
  }

  const completed = new Set(input.completions.map((c) => c.scheduledDate))
  const skipped = new Set(input.skips.map((s) => s.scheduledDate))

  // Today stays out of the count until it is resolved: recorded, or past due
  let lastResolved = today
  let validUntil = startOfTomorrow
  if (isScheduledOn(schedule, today) && !completed.has(today) && !skipped.has(today)) {
    const dueAt = new Date(zonedToInstant(today, schedule.time, tz).getTime() + graceMinutes * 60000)
    if (now.getTime() < dueAt.getTime()) {
      lastResolved = addDays(today, -1)
      if (dueAt.getTime() < validUntil.getTime()) validUntil = dueAt
    }
  }

  const dates = expectedDates(schedule, addDays(today, -lookbackDays), lastResolved)

  let run = 0
  let best = 0
  for (const date of dates) {
    if (completed.has(date)) {
      run++
      if (run > best) best = run
    } else {
      run = 0
    }
  }

  return {
    state: { status: 'computed', currentStreak: run, bestStreak: best },
    validUntil,
  }
}

export function calculateStreak(input: StreakInput): StreakState {
  return evaluateStreak(input).state
}

// ============================================================================
// Cached Service
// ============================================================================

export type StreakService = {
  /** Streak for a reminder by id; NotFoundError when it does not exist */
  get(reminderId: string): Promise<StreakState>
  forReminder(reminder: Reminder): Promise<StreakState>
  invalidate(reminderId: string): Promise<void>
}

export function createStreakService(deps: {
  store: ReminderStore
  settings?: StreakSettings
  now?: () => Date
  logger?: Logger
}): StreakService {
  const { store } = deps
  const settings = deps.settings ?? defaultSettings().streak
  const now = deps.now ?? (() => new Date())
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'streaks' })

  async function forReminder(reminder: Reminder): Promise<StreakState> {
    if (reminder.schedule.type === 'oneTime') return NOT_APPLICABLE

    const at = now()
    try {
      const cached = await store.getStreakCache(reminder.id)
      if (cached && Date.parse(cached.validUntil) > at.getTime()) {
        return { status: 'computed', currentStreak: cached.currentStreak, bestStreak: cached.bestStreak }
      }
    } catch (e) {
      logger.warn('Streak cache read failed; recomputing', {
        reminderId: reminder.id,
        error: e instanceof Error ? e.message : String(e),
      })
    }

    let completions: CompletionRecord[]
    let skips: SkipRecord[]
    try {
      [completions, skips] = await Promise.all([
        store.getCompletionsByReminder(reminder.id),
        store.getSkipsByReminder(reminder.id),
      ])
    } catch (e) {
      throw toPersistenceError(e, `load history for reminder '${reminder.id}'`)
    }

    const { state, validUntil } = evaluateStreak({
      schedule: reminder.schedule,
      completions,
      skips,
      now: at,
      graceMinutes: settings.graceMinutes,
      lookbackDays: settings.lookbackDays,
    })

    try {
      await store.setStreakCache({
        reminderId: reminder.id,
        currentStreak: state.currentStreak,
        bestStreak: state.bestStreak,
        computedAt: at.toISOString(),
        validUntil: validUntil.toISOString(),
      })
    } catch (e) {
      logger.warn('Streak cache write failed', {
        reminderId: reminder.id,
        error: e instanceof Error ? e.message : String(e),
      })
    }

    return state
  }

  async function get(reminderId: string): Promise<StreakState> {
    let reminder: Reminder | null
    try {
      reminder = await store.getReminder(reminderId)
    } catch (e) {
      throw toPersistenceError(e, `read reminder '${reminderId}'`)
    }
    if (!reminder) throw new NotFoundError(`Reminder '${reminderId}' not found`)
    return forReminder(reminder)
  }

  async function invalidate(reminderId: string): Promise<void> {
    try {
      await store.clearStreakCache(reminderId)
    } catch (e) {
      throw toPersistenceError(e, `clear streak cache for '${reminderId}'`)
    }
  }

  return { get, forReminder, invalidate }
}
