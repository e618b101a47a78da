/**
 * Duplicate Detection
 *
 * Active reminders of one user that share message, time and timezone are
 * duplicates. The earliest-created reminder of each group is kept (ties go to
 * the lowest id); the rest are deactivated, never deleted, and their timers
 * cancelled in the same critical section.
 */

import type { ReminderStore } from './adapter'
import { byCreation } from './adapter'
import type { Reminder } from './domain-types'
import { toPersistenceError } from './errors'
import type { JobScheduler } from './job-scheduler'
import { type Logger, createSilentLogger } from './logger'
import type { LocalTime } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type DuplicateGroup = {
  userId: string
  message: string
  time: LocalTime
  timezone: string
  keepId: string
  removeIds: string[]
  duplicateCount: number
}

export type DuplicateResolution = {
  /** Active reminders examined */
  checked: number
  groups: DuplicateGroup[]
  deactivated: number
  removedIds: string[]
  failedIds: string[]
}

export type DuplicateDetector = {
  scan(userId?: string): Promise<DuplicateGroup[]>
  resolve(userId?: string): Promise<DuplicateResolution>
}

// ============================================================================
// Grouping
// ============================================================================

function duplicateKey(r: Reminder): string {
  return JSON.stringify([r.userId, r.message, r.schedule.time, r.schedule.timezone])
}

/** Pure grouping over already-loaded reminders; inactive ones are ignored. */
export function findDuplicateGroups(reminders: readonly Reminder[]): DuplicateGroup[] {
  const buckets = new Map<string, Reminder[]>()
  for (const r of reminders) {
    if (!r.active) continue
    const key = duplicateKey(r)
    const bucket = buckets.get(key)
    if (bucket) bucket.push(r)
    else buckets.set(key, [r])
  }

  const groups: DuplicateGroup[] = []
  for (const bucket of buckets.values()) {
    if (bucket.length < 2) continue
    const [keep, ...rest] = [...bucket].sort(byCreation)
    if (!keep) continue
    groups.push({
      userId: keep.userId,
      message: keep.message,
      time: keep.schedule.time,
      timezone: keep.schedule.timezone,
      keepId: keep.id,
      removeIds: rest.map((r) => r.id),
      duplicateCount: bucket.length,
    })
  }

  return groups.sort((a, b) => {
    if (a.userId !== b.userId) return a.userId < b.userId ? -1 : 1
    if (a.duplicateCount !== b.duplicateCount) return b.duplicateCount - a.duplicateCount
    if (a.message !== b.message) return a.message < b.message ? -1 : 1
    return a.keepId < b.keepId ? -1 : 1
  })
}

// ============================================================================
// Factory
// ============================================================================

export function createDuplicateDetector(deps: {
  store: ReminderStore
  scheduler: JobScheduler
  logger?: Logger
  now?: () => Date
}): DuplicateDetector {
  const { store, scheduler } = deps
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'duplicates' })
  const now = deps.now ?? (() => new Date())

  async function loadActive(userId?: string): Promise<Reminder[]> {
    try {
      if (userId === undefined) return (await store.getActiveReminders()).reminders
      return (await store.getRemindersByUser(userId)).filter((r) => r.active)
    } catch (e) {
      throw toPersistenceError(e, 'load reminders for duplicate scan')
    }
  }

  async function scan(userId?: string): Promise<DuplicateGroup[]> {
    return findDuplicateGroups(await loadActive(userId))
  }

  async function resolve(userId?: string): Promise<DuplicateResolution> {
    const active = await loadActive(userId)
    const groups = findDuplicateGroups(active)
    const removedIds: string[] = []
    const failedIds: string[] = []

    for (const group of groups) {
      for (const id of group.removeIds) {
        try {
          await scheduler.cancel(id, async () => {
            try {
              await store.updateReminder(id, { active: false, updatedAt: now().toISOString() })
            } catch (e) {
              throw toPersistenceError(e, `deactivate duplicate '${id}'`)
            }
          })
          removedIds.push(id)
        } catch (e) {
          failedIds.push(id)
          logger.error('Could not deactivate duplicate', e, { reminderId: id, keepId: group.keepId })
        }
      }
    }

    if (groups.length > 0) {
      logger.info('Resolved duplicate reminders', {
        checked: active.length,
        groups: groups.length,
        deactivated: removedIds.length,
        failed: failedIds.length,
      })
    }

    return {
      checked: active.length,
      groups,
      deactivated: removedIds.length,
      removedIds,
      failedIds,
    }
  }

  return { scan, resolve }
}
