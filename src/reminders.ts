/**
 * Reminders Module
 *
 * Reminder lifecycle: create, edit, pause, resume and delete. Every mutation
 * is owner-checked, validated before anything is persisted, and applied in
 * the same critical section as the matching scheduler change.
 */

import { z } from 'zod'
import type { ReminderChanges, ReminderStore } from './adapter'
import type { Reminder } from './domain-types'
import {
  ForbiddenError, NotFoundError, ValidationError, toPersistenceError,
} from './errors'
import { uuid } from './internal/helpers'
import type { JobScheduler, ScheduleOutcome } from './job-scheduler'
import { type Logger, createSilentLogger } from './logger'
import { parseSchedule } from './schedule-spec'

// ============================================================================
// Types
// ============================================================================

export const MAX_MESSAGE_LENGTH = 4000

const MessageSchema = z
  .string()
  .trim()
  .min(1, 'Message cannot be empty')
  .max(MAX_MESSAGE_LENGTH, `Message must be ${MAX_MESSAGE_LENGTH} characters or less`)

export type CreateReminderInput = {
  userId: string
  message: string
  /** Validated into a ScheduleSpec; see ScheduleInput */
  schedule: unknown
  trackingEnabled?: boolean
  streakMotivation?: boolean
  skipWhenCompleted?: boolean
}

export type UpdateReminderInput = {
  message?: string
  schedule?: unknown
  trackingEnabled?: boolean
  streakMotivation?: boolean
  skipWhenCompleted?: boolean
}

export type ReminderMutation = {
  reminder: Reminder
  outcome: ScheduleOutcome
}

export type ReminderService = {
  create(input: CreateReminderInput): Promise<ReminderMutation>
  update(reminderId: string, userId: string, changes: UpdateReminderInput): Promise<ReminderMutation>
  pause(reminderId: string, userId: string): Promise<Reminder>
  resume(reminderId: string, userId: string): Promise<ReminderMutation>
  delete(reminderId: string, userId: string): Promise<void>
  get(reminderId: string, userId: string): Promise<Reminder>
  listForUser(userId: string, options?: { activeOnly?: boolean }): Promise<Reminder[]>
}

export type ReminderServiceDeps = {
  store: ReminderStore
  scheduler: JobScheduler
  logger?: Logger
  now?: () => Date
}

// ============================================================================
// Validation
// ============================================================================

function validateMessage(message: string): string {
  const parsed = MessageSchema.safeParse(message)
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '))
  }
  return parsed.data
}

function validateUserId(userId: string): string {
  if (userId.trim().length === 0) throw new ValidationError('userId is required')
  return userId
}

// ============================================================================
// Factory
// ============================================================================

export function createReminderService(deps: ReminderServiceDeps): ReminderService {
  const { store, scheduler } = deps
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'reminders' })
  const now = deps.now ?? (() => new Date())

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

  /** The reminder a mutation produced; set once the critical section has run */
  function settled(reminder: Reminder | null, reminderId: string): Reminder {
    if (!reminder) throw new NotFoundError(`Reminder '${reminderId}' not found`)
    return reminder
  }

  async function persist(action: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (e) {
      throw toPersistenceError(e, action)
    }
  }

  // ========== Operations ==========

  async function create(input: CreateReminderInput): Promise<ReminderMutation> {
    const userId = validateUserId(input.userId)
    const message = validateMessage(input.message)
    const schedule = parseSchedule(input.schedule)
    const timestamp = now().toISOString()

    const reminder: Reminder = {
      id: uuid(),
      userId,
      message,
      active: true,
      schedule,
      trackingEnabled: input.trackingEnabled ?? true,
      streakMotivation: input.streakMotivation ?? false,
      skipWhenCompleted: input.skipWhenCompleted ?? false,
      createdAt: timestamp,
      updatedAt: timestamp,
    }

    const outcome = await scheduler.reschedule(
      reminder,
      () => persist(`create reminder '${reminder.id}'`, () => store.createReminder(reminder)),
    )
    logger.info('Reminder created', { reminderId: reminder.id, userId, status: outcome.status })
    return { reminder, outcome }
  }

  async function update(reminderId: string, userId: string, input: UpdateReminderInput): Promise<ReminderMutation> {
    const changes: ReminderChanges = {}
    if (input.message !== undefined) changes.message = validateMessage(input.message)
    if (input.schedule !== undefined) changes.schedule = parseSchedule(input.schedule)
    if (input.trackingEnabled !== undefined) changes.trackingEnabled = input.trackingEnabled
    if (input.streakMotivation !== undefined) changes.streakMotivation = input.streakMotivation
    if (input.skipWhenCompleted !== undefined) changes.skipWhenCompleted = input.skipWhenCompleted

    let next: Reminder | null = null
    const outcome = await scheduler.rearm(reminderId, async () => {
      const current = await loadOwned(reminderId, userId, 'Update')
      changes.updatedAt = now().toISOString()
      await persist(`update reminder '${reminderId}'`, async () => {
        await store.updateReminder(reminderId, changes)
        if (changes.schedule !== undefined || changes.trackingEnabled !== undefined) {
          await store.clearStreakCache(reminderId)
        }
      })
      next = { ...current, ...changes }
      return next
    })
    logger.info('Reminder updated', { reminderId, fields: Object.keys(changes), status: outcome.status })
    return { reminder: settled(next, reminderId), outcome }
  }

  async function pause(reminderId: string, userId: string): Promise<Reminder> {
    let next: Reminder | null = null
    await scheduler.cancel(reminderId, async () => {
      const current = await loadOwned(reminderId, userId, 'Pause')
      const changes: ReminderChanges = { active: false, updatedAt: now().toISOString() }
      await persist(`pause reminder '${reminderId}'`, () => store.updateReminder(reminderId, changes))
      next = { ...current, ...changes }
    })
    logger.info('Reminder paused', { reminderId })
    return settled(next, reminderId)
  }

  async function resume(reminderId: string, userId: string): Promise<ReminderMutation> {
    let next: Reminder | null = null
    const outcome = await scheduler.rearm(reminderId, async () => {
      const current = await loadOwned(reminderId, userId, 'Resume')
      const changes: ReminderChanges = { active: true, updatedAt: now().toISOString() }
      await persist(`resume reminder '${reminderId}'`, () => store.updateReminder(reminderId, changes))
      next = { ...current, ...changes }
      return next
    })
    logger.info('Reminder resumed', { reminderId, status: outcome.status })
    return { reminder: settled(next, reminderId), outcome }
  }

  async function remove(reminderId: string, userId: string): Promise<void> {
    await scheduler.cancel(reminderId, async () => {
      await loadOwned(reminderId, userId, 'Delete')
      await persist(`delete reminder '${reminderId}'`, () => store.deleteReminder(reminderId))
    })
    logger.info('Reminder deleted', { reminderId })
  }

  async function get(reminderId: string, userId: string): Promise<Reminder> {
    return loadOwned(reminderId, userId, 'Read')
  }

  async function listForUser(userId: string, options: { activeOnly?: boolean } = {}): Promise<Reminder[]> {
    let reminders: Reminder[]
    try {
      reminders = await store.getRemindersByUser(userId)
    } catch (e) {
      throw toPersistenceError(e, `list reminders for '${userId}'`)
    }
    return options.activeOnly ? reminders.filter((r) => r.active) : reminders
  }

  return { create, update, pause, resume, delete: remove, get, listForUser }
}
