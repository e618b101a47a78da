/**
 * Completion Tracker
 *
 * Records what the user did with each occurrence. An occurrence key is
 * (reminderId, scheduledDate) and holds at most one outcome: recording a
 * completion replaces a skip for that date and vice versa. Events for the
 * same reminder are applied in call order.
 */

import type { ReminderStore } from './adapter'
import type { GamificationReporter, GamificationResult } from './boundaries'
import type {
  CompletionRecord, CompletionTiming, Reminder, SkipReason, SkipRecord,
} from './domain-types'
import { SKIP_REASONS } from './domain-types'
import {
  ForbiddenError, NotFoundError, ValidationError, toPersistenceError,
} from './errors'
import { requireDate, uuid } from './internal/helpers'
import { createKeyedMutex } from './internal/keyed-mutex'
import { type Logger, createSilentLogger } from './logger'
import { occurrenceInstant } from './schedule'
import type { LocalDate } from './time-date'

// ============================================================================
// Types
// ============================================================================

export const MAX_NOTE_LENGTH = 200

export type CompletionInput = {
  reminderId: string
  userId: string
  scheduledDate: string
  note?: string
  /** Defaults to the stored instant when the date is already completed, else the tracker's clock */
  completedAt?: Date
}

export type SkipInput = {
  reminderId: string
  userId: string
  scheduledDate: string
  reason: SkipReason
  note?: string
}

export type NoteInput = {
  reminderId: string
  userId: string
  scheduledDate: string
  /** Empty string clears the note */
  note: string
}

export type CompletionResult = {
  record: CompletionRecord
  timing: CompletionTiming
  replacedSkip: boolean
  gamification?: GamificationResult
}

export type SkipResult = {
  record: SkipRecord
  replacedCompletion: boolean
}

export type OccurrenceHistory = {
  completions: CompletionRecord[]
  skips: SkipRecord[]
}

export type TrackerEvent =
  | { type: 'completionRecorded'; record: CompletionRecord; timing: CompletionTiming }
  | { type: 'skipRecorded'; record: SkipRecord }

export type CompletionTracker = {
  recordCompletion(input: CompletionInput): Promise<CompletionResult>
  recordSkip(input: SkipInput): Promise<SkipResult>
  updateNote(input: NoteInput): Promise<CompletionRecord>
  getHistory(reminderId: string, userId?: string): Promise<OccurrenceHistory>
  hasCompletedOn(reminderId: string, scheduledDate: string): Promise<boolean>
}

export type CompletionTrackerDeps = {
  store: ReminderStore
  gamification?: GamificationReporter
  logger?: Logger
  now?: () => Date
  onEvent?: (event: TrackerEvent) => void
}

// ============================================================================
// Timing
// ============================================================================

/** Early when done at or before the scheduled instant, else late by whole minutes. */
export function completionTiming(scheduledAt: Date, completedAt: Date): CompletionTiming {
  const deltaMs = completedAt.getTime() - scheduledAt.getTime()
  if (deltaMs <= 0) return { status: 'early' }
  return { status: 'late', delayMinutes: Math.round(deltaMs / 60000) }
}

function validateNote(note: string | undefined): string | undefined {
  if (note === undefined) return undefined
  const trimmed = note.trim()
  if (trimmed.length > MAX_NOTE_LENGTH) {
    throw new ValidationError(`Note must be ${MAX_NOTE_LENGTH} characters or less`)
  }
  return trimmed.length === 0 ? undefined : trimmed
}

function isSkipReason(value: string): value is SkipReason {
  return SKIP_REASONS.some((r) => r === value)
}

// ============================================================================
// Factory
// ============================================================================

export function createCompletionTracker(deps: CompletionTrackerDeps): CompletionTracker {
  const { store, gamification } = deps
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'tracker' })
  const now = deps.now ?? (() => new Date())
  const queue = createKeyedMutex()

  function emit(event: TrackerEvent): void {
    if (!deps.onEvent) return
    try {
      deps.onEvent(event)
    } catch (e) {
      logger.error(`Event handler failed on '${event.type}'`, e)
    }
  }

  async function loadOwned(reminderId: string, userId: string, action: string): Promise<Reminder> {
    let reminder: Reminder | null
    try {
      reminder = await store.getReminder(reminderId)
    } catch (e) {
      throw toPersistenceError(e, `read reminder '${reminderId}'`)
    }
    if (!reminder) throw new NotFoundError(`Reminder '${reminderId}' not found`)
    if (reminder.userId !== userId) {
      logger.warn(`${action} denied: reminder belongs to another user`, { reminderId, userId })
      throw new ForbiddenError(`Reminder '${reminderId}' does not belong to user '${userId}'`)
    }
    return reminder
  }

  function requireTracking(reminder: Reminder): void {
    if (!reminder.trackingEnabled) {
      throw new ValidationError(`Tracking is disabled for reminder '${reminder.id}'`)
    }
  }

  // ========== Operations ==========

  async function recordCompletion(input: CompletionInput): Promise<CompletionResult> {
    const scheduledDate = requireDate(input.scheduledDate, 'scheduledDate')
    const note = validateNote(input.note)

    return queue.run(input.reminderId, async () => {
      const reminder = await loadOwned(input.reminderId, input.userId, 'Completion')
      requireTracking(reminder)

      const scheduledTime = reminder.schedule.time

      let record: CompletionRecord
      let replacedSkip = false
      try {
        record = await store.transaction(async () => {
          const existing = await store.getCompletion(reminder.id, scheduledDate)
          // A retried action keeps the original completion instant
          const completedAt = input.completedAt?.toISOString() ?? existing?.completedAt ?? now().toISOString()
          const next: CompletionRecord = {
            id: existing?.id ?? uuid(),
            reminderId: reminder.id,
            userId: reminder.userId,
            scheduledDate,
            scheduledTime,
            completedAt,
          }
          if (note !== undefined) next.note = note
          await store.upsertCompletion(next)
          if (await store.getSkip(reminder.id, scheduledDate)) {
            await store.deleteSkip(reminder.id, scheduledDate)
            replacedSkip = true
          }
          await store.clearStreakCache(reminder.id)
          return next
        })
      } catch (e) {
        throw toPersistenceError(e, `record completion for '${reminder.id}'`)
      }

      const timing = completionTiming(
        occurrenceInstant(scheduledDate, scheduledTime, reminder.schedule.timezone),
        new Date(record.completedAt),
      )

      logger.info('Completion recorded', {
        reminderId: reminder.id,
        scheduledDate,
        timing: timing.status,
        ...(timing.status === 'late' ? { delayMinutes: timing.delayMinutes } : {}),
      })
      emit({ type: 'completionRecorded', record, timing })

      const result: CompletionResult = { record, timing, replacedSkip }
      if (gamification) {
        try {
          result.gamification = await gamification.reportCompletion({
            userId: reminder.userId,
            reminderId: reminder.id,
            completedAt: record.completedAt,
            scheduledTime,
          })
        } catch (e) {
          logger.error('Gamification report failed; completion kept', e, { reminderId: reminder.id })
        }
      }
      return result
    })
  }

  async function recordSkip(input: SkipInput): Promise<SkipResult> {
    const scheduledDate = requireDate(input.scheduledDate, 'scheduledDate')
    const note = validateNote(input.note)
    if (!isSkipReason(input.reason)) {
      throw new ValidationError(`Skip reason must be one of ${SKIP_REASONS.join(', ')}`)
    }
    const reason = input.reason

    return queue.run(input.reminderId, async () => {
      const reminder = await loadOwned(input.reminderId, input.userId, 'Skip')
      requireTracking(reminder)

      let record: SkipRecord
      let replacedCompletion = false
      try {
        record = await store.transaction(async () => {
          const existing = await store.getSkip(reminder.id, scheduledDate)
          const next: SkipRecord = {
            id: existing?.id ?? uuid(),
            reminderId: reminder.id,
            userId: reminder.userId,
            scheduledDate,
            scheduledTime: reminder.schedule.time,
            reason,
            skippedAt: existing?.skippedAt ?? now().toISOString(),
          }
          if (note !== undefined) next.note = note
          await store.upsertSkip(next)
          if (await store.getCompletion(reminder.id, scheduledDate)) {
            await store.deleteCompletion(reminder.id, scheduledDate)
            replacedCompletion = true
          }
          await store.clearStreakCache(reminder.id)
          return next
        })
      } catch (e) {
        throw toPersistenceError(e, `record skip for '${reminder.id}'`)
      }

      logger.info('Skip recorded', { reminderId: reminder.id, scheduledDate, reason })
      emit({ type: 'skipRecorded', record })
      return { record, replacedCompletion }
    })
  }

  async function updateNote(input: NoteInput): Promise<CompletionRecord> {
    const scheduledDate = requireDate(input.scheduledDate, 'scheduledDate')
    const note = validateNote(input.note)

    return queue.run(input.reminderId, async () => {
      const reminder = await loadOwned(input.reminderId, input.userId, 'Note update')
      try {
        return await store.transaction(async () => {
          const existing = await store.getCompletion(reminder.id, scheduledDate)
          if (!existing) {
            throw new NotFoundError(`No completion for reminder '${reminder.id}' on ${scheduledDate}`)
          }
          const { note: _previous, ...rest } = existing
          const next: CompletionRecord = note === undefined ? rest : { ...rest, note }
          await store.upsertCompletion(next)
          return next
        })
      } catch (e) {
        throw toPersistenceError(e, `update note for '${reminder.id}'`)
      }
    })
  }

  async function getHistory(reminderId: string, userId?: string): Promise<OccurrenceHistory> {
    if (userId !== undefined) await loadOwned(reminderId, userId, 'History read')
    try {
      const [completions, skips] = await Promise.all([
        store.getCompletionsByReminder(reminderId),
        store.getSkipsByReminder(reminderId),
      ])
      return { completions, skips }
    } catch (e) {
      throw toPersistenceError(e, `load history for '${reminderId}'`)
    }
  }

  async function hasCompletedOn(reminderId: string, scheduledDate: string): Promise<boolean> {
    const date: LocalDate = requireDate(scheduledDate, 'scheduledDate')
    try {
      return (await store.getCompletion(reminderId, date)) !== null
    } catch (e) {
      throw toPersistenceError(e, `read completion for '${reminderId}'`)
    }
  }

  return { recordCompletion, recordSkip, updateNote, getHistory, hasCompletedOn }
}
