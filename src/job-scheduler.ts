/**
 * Job Scheduler
 *
 * Owns the in-process timer registry. Each active reminder has at most one
 * armed occurrence timer, plus any number of one-shot snooze timers.
 *
 * Per reminder the lifecycle is Unscheduled → Scheduled → Fired → (Scheduled
 * | Unscheduled). All registry mutations for a reminder happen inside that
 * reminder's critical section; delivery itself runs outside it.
 *
 * Every armed timer carries a token. A fire whose token no longer matches the
 * registry (because the reminder was cancelled or rescheduled meanwhile) is
 * dropped, so a cancel that wins the race is never undone by a re-arm.
 */

import type { ReminderBatch, ReminderStore } from './adapter'
import type { Notifier } from './boundaries'
import type { SchedulerSettings } from './config'
import { defaultSettings } from './config'
import type { Reminder } from './domain-types'
import { isRecurring } from './domain-types'
import {
  DeliveryFailureError, ForbiddenError, NotFoundError, ValidationError, toPersistenceError,
} from './errors'
import { requireDate } from './internal/helpers'
import { createKeyedMutex } from './internal/keyed-mutex'
import { type Logger, createSilentLogger } from './logger'
import { type Occurrence, nextOccurrence } from './schedule'
import { type LocalDate, type LocalTime, localDateOf } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type ScheduleOutcome =
  | { status: 'scheduled'; occurrence: Occurrence }
  | { status: 'inactive' }
  | { status: 'noFurtherOccurrence' }
  | { status: 'stopped' }

export type LoadReport = {
  armed: number
  skipped: number
  failed: number
  failures: { reminderId: string; error: string }[]
}

export type SnoozeRequest = {
  reminderId: string
  /** When given, the reminder must belong to this user */
  userId?: string
  delayMinutes?: number
  /** Occurrence being snoozed; defaults to the last fired one */
  scheduledDate?: string
}

export type SnoozeOutcome = {
  reminderId: string
  scheduledDate: LocalDate
  scheduledTime: LocalTime
  delayMinutes: number
  fireAt: Date
}

export type JobInfo = {
  reminderId: string
  at: Date
  scheduledDate: LocalDate
  scheduledTime: LocalTime
}

export type SchedulerEvent =
  | { type: 'scheduled'; reminderId: string; at: Date; scheduledDate: LocalDate }
  | { type: 'fired'; reminderId: string; scheduledDate: LocalDate; snoozed: boolean }
  | { type: 'suppressed'; reminderId: string; scheduledDate: LocalDate; snoozed: boolean }
  | { type: 'deliveryFailed'; reminderId: string; scheduledDate: LocalDate; error: DeliveryFailureError }
  | { type: 'cancelled'; reminderId: string }
  | { type: 'snoozed'; reminderId: string; scheduledDate: LocalDate; fireAt: Date }

export type JobScheduler = {
  schedule(reminder: Reminder): Promise<ScheduleOutcome>
  cancel(reminderId: string, mutation?: () => Promise<void>): Promise<true>
  reschedule(reminder: Reminder, mutation?: () => Promise<void>): Promise<ScheduleOutcome>
  /** Runs `mutation` in the reminder's critical section and arms the reminder it returns */
  rearm(reminderId: string, mutation: () => Promise<Reminder>): Promise<ScheduleOutcome>
  loadAll(): Promise<LoadReport>
  snooze(request: SnoozeRequest): Promise<SnoozeOutcome>
  getJob(reminderId: string): JobInfo | null
  listJobs(): JobInfo[]
  jobCount(): number
  snoozeCount(reminderId?: string): number
  /** Resolves once no fire handling or delivery is in flight */
  idle(): Promise<void>
  shutdown(): Promise<void>
}

export type JobSchedulerDeps = {
  store: ReminderStore
  notifier: Notifier
  logger?: Logger
  settings?: SchedulerSettings
  now?: () => Date
  onEvent?: (event: SchedulerEvent) => void
  /** Current streak for reminders that opted into streak motivation */
  streakOf?: (reminder: Reminder) => Promise<number>
}

// ============================================================================
// Long Timers
// ============================================================================

/** setTimeout's delay is a signed 32-bit millisecond count */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1

type TimerRef = { handle: ReturnType<typeof setTimeout> | null }

function clearTimer(ref: TimerRef): void {
  if (ref.handle !== null) clearTimeout(ref.handle)
  ref.handle = null
}

// ============================================================================
// Registry Entries
// ============================================================================

type ArmedJob = {
  token: number
  occurrence: Occurrence
  /** Snapshot used when the store cannot be read at fire time */
  reminder: Reminder
  timer: TimerRef
}

type SnoozeJob = {
  id: number
  reminderId: string
  scheduledDate: LocalDate
  scheduledTime: LocalTime
  fireAt: Date
  timer: TimerRef
}

// ============================================================================
// Factory
// ============================================================================

export function createJobScheduler(deps: JobSchedulerDeps): JobScheduler {
  const { store, notifier, streakOf } = deps
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'scheduler' })
  const settings = deps.settings ?? defaultSettings().scheduler
  const now = deps.now ?? (() => new Date())

  const mutex = createKeyedMutex()
  const jobs = new Map<string, ArmedJob>()
  const snoozes = new Map<number, SnoozeJob>()
  const lastFired = new Map<string, Occurrence>()
  const inFlight = new Set<Promise<void>>()

  let nextToken = 1
  let nextSnoozeId = 1
  let stopped = false

  // ========== Plumbing ==========

  function emit(event: SchedulerEvent): void {
    if (!deps.onEvent) return
    try {
      deps.onEvent(event)
    } catch (e) {
      logger.error(`Event handler failed on '${event.type}'`, e)
    }
  }

  function track(task: Promise<void>): void {
    inFlight.add(task)
    const done = () => { inFlight.delete(task) }
    void task.then(done, done)
  }

  function setLongTimeout(at: Date, fn: () => void): TimerRef {
    const ref: TimerRef = { handle: null }
    const tick = () => {
      const remaining = at.getTime() - now().getTime()
      if (remaining > MAX_TIMEOUT_MS) {
        ref.handle = setTimeout(tick, MAX_TIMEOUT_MS)
        return
      }
      ref.handle = setTimeout(fn, Math.max(0, remaining))
    }
    tick()
    return ref
  }

  function toInfo(reminderId: string, job: ArmedJob): JobInfo {
    return {
      reminderId,
      at: new Date(job.occurrence.at.getTime()),
      scheduledDate: job.occurrence.scheduledDate,
      scheduledTime: job.occurrence.scheduledTime,
    }
  }

  // ========== Registry (callers hold the reminder's lock) ==========

  function clearJob(reminderId: string): boolean {
    const job = jobs.get(reminderId)
    if (!job) return false
    clearTimer(job.timer)
    jobs.delete(reminderId)
    return true
  }

  function clearSnoozes(reminderId: string): number {
    let cleared = 0
    for (const [id, snooze] of snoozes) {
      if (snooze.reminderId !== reminderId) continue
      clearTimer(snooze.timer)
      snoozes.delete(id)
      cleared++
    }
    return cleared
  }

  function arm(reminder: Reminder, after: Date): ScheduleOutcome {
    clearJob(reminder.id)
    if (stopped) return { status: 'stopped' }
    if (!reminder.active) return { status: 'inactive' }

    const occurrence = nextOccurrence(reminder.schedule, reminder.schedule.timezone, after)
    if (!occurrence) return { status: 'noFurtherOccurrence' }

    const token = nextToken++
    const timer = setLongTimeout(occurrence.at, () => onOccurrenceTimer(reminder.id, token))
    jobs.set(reminder.id, { token, occurrence, reminder, timer })

    logger.debug('Armed reminder', {
      reminderId: reminder.id,
      at: occurrence.at.toISOString(),
      scheduledDate: occurrence.scheduledDate,
    })
    emit({ type: 'scheduled', reminderId: reminder.id, at: occurrence.at, scheduledDate: occurrence.scheduledDate })
    return { status: 'scheduled', occurrence }
  }

  async function readReminder(reminderId: string): Promise<Reminder | null> {
    try {
      return await store.getReminder(reminderId)
    } catch (e) {
      throw toPersistenceError(e, `read reminder '${reminderId}'`)
    }
  }

  // ========== Delivery (never awaited inside a lock) ==========

  async function isCompleted(reminder: Reminder, scheduledDate: LocalDate): Promise<boolean> {
    try {
      return (await store.getCompletion(reminder.id, scheduledDate)) !== null
    } catch (e) {
      logger.warn('Completion check failed; notifying anyway', {
        reminderId: reminder.id,
        error: e instanceof Error ? e.message : String(e),
      })
      return false
    }
  }

  async function deliver(reminder: Reminder, occurrence: Occurrence, snoozed: boolean): Promise<void> {
    if (reminder.skipWhenCompleted && reminder.trackingEnabled && await isCompleted(reminder, occurrence.scheduledDate)) {
      logger.info('Occurrence already completed; notification suppressed', {
        reminderId: reminder.id,
        scheduledDate: occurrence.scheduledDate,
      })
      emit({ type: 'suppressed', reminderId: reminder.id, scheduledDate: occurrence.scheduledDate, snoozed })
      return
    }

    emit({ type: 'fired', reminderId: reminder.id, scheduledDate: occurrence.scheduledDate, snoozed })

    let currentStreak: number | undefined
    if (streakOf && reminder.streakMotivation && reminder.trackingEnabled) {
      try {
        currentStreak = await streakOf(reminder)
      } catch (e) {
        logger.warn('Streak lookup failed; notifying without it', {
          reminderId: reminder.id,
          error: e instanceof Error ? e.message : String(e),
        })
      }
    }

    let failure: DeliveryFailureError | null = null
    try {
      const result = await notifier.notify({
        userId: reminder.userId,
        reminderId: reminder.id,
        message: reminder.message,
        scheduledDate: occurrence.scheduledDate,
        scheduledTime: occurrence.scheduledTime,
        snoozed,
        ...(currentStreak === undefined ? {} : { currentStreak }),
      })
      if (!result.delivered) {
        failure = new DeliveryFailureError(reminder.id, result.error ?? 'Notifier reported the message as undelivered')
      }
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e)
      failure = new DeliveryFailureError(reminder.id, `Notifier threw: ${detail}`, { cause: e })
    }

    if (failure) {
      logger.error('Delivery failed', failure, { reminderId: reminder.id, scheduledDate: occurrence.scheduledDate })
      emit({ type: 'deliveryFailed', reminderId: reminder.id, scheduledDate: occurrence.scheduledDate, error: failure })
    }
  }

  function dispatch(reminder: Reminder, occurrence: Occurrence, snoozed: boolean): void {
    track(deliver(reminder, occurrence, snoozed))
  }

  // ========== Fire Handling ==========

  function onOccurrenceTimer(reminderId: string, token: number): void {
    track(
      mutex.run(reminderId, () => handleOccurrence(reminderId, token)).catch((e: unknown) => {
        logger.error('Fire handling failed', e, { reminderId })
      }),
    )
  }

  async function handleOccurrence(reminderId: string, token: number): Promise<void> {
    const job = jobs.get(reminderId)
    if (!job || job.token !== token) {
      logger.debug('Dropped stale fire', { reminderId, token })
      return
    }
    jobs.delete(reminderId)

    let current: Reminder | null
    try {
      current = await store.getReminder(reminderId)
    } catch (e) {
      logger.error('Store read failed at fire time; using armed snapshot', toPersistenceError(e, 'read reminder'), { reminderId })
      current = job.reminder
    }

    if (!current || !current.active) {
      logger.info('Reminder deleted or inactive at fire time; unscheduled', { reminderId })
      return
    }

    dispatch(current, job.occurrence, false)
    lastFired.set(reminderId, job.occurrence)

    if (!isRecurring(current.schedule)) return

    const nowMs = now().getTime()
    const after = new Date(Math.max(nowMs, job.occurrence.at.getTime()))
    try {
      arm(current, after)
    } catch (e) {
      logger.error('Could not re-arm reminder', e, { reminderId })
    }
  }

  function onSnoozeTimer(reminderId: string, snoozeId: number): void {
    track(
      mutex.run(reminderId, () => handleSnooze(reminderId, snoozeId)).catch((e: unknown) => {
        logger.error('Snooze handling failed', e, { reminderId })
      }),
    )
  }

  async function handleSnooze(reminderId: string, snoozeId: number): Promise<void> {
    const snooze = snoozes.get(snoozeId)
    if (!snooze) return
    snoozes.delete(snoozeId)

    let current: Reminder | null
    try {
      current = await store.getReminder(reminderId)
    } catch (e) {
      logger.error('Store read failed for snoozed reminder; dropping', toPersistenceError(e, 'read reminder'), { reminderId })
      return
    }
    if (!current || !current.active) {
      logger.info('Snoozed reminder deleted or inactive; dropping', { reminderId })
      return
    }

    dispatch(current, { at: snooze.fireAt, scheduledDate: snooze.scheduledDate, scheduledTime: snooze.scheduledTime }, true)
  }

  // ========== Operations ==========

  function schedule(reminder: Reminder): Promise<ScheduleOutcome> {
    return mutex.run(reminder.id, () => arm(reminder, now()))
  }

  function cancel(reminderId: string, mutation?: () => Promise<void>): Promise<true> {
    return mutex.run(reminderId, async () => {
      if (mutation) await mutation()
      const hadJob = clearJob(reminderId)
      const snoozesCleared = clearSnoozes(reminderId)
      lastFired.delete(reminderId)
      if (hadJob || snoozesCleared > 0) {
        logger.debug('Cancelled reminder', { reminderId, snoozesCleared })
        emit({ type: 'cancelled', reminderId })
      }
      return true as const
    })
  }

  function reschedule(reminder: Reminder, mutation?: () => Promise<void>): Promise<ScheduleOutcome> {
    return mutex.run(reminder.id, async () => {
      if (mutation) await mutation()
      return arm(reminder, now())
    })
  }

  function rearm(reminderId: string, mutation: () => Promise<Reminder>): Promise<ScheduleOutcome> {
    return mutex.run(reminderId, async () => {
      const reminder = await mutation()
      if (reminder.id !== reminderId) {
        throw new ValidationError(`Mutation for '${reminderId}' returned reminder '${reminder.id}'`)
      }
      return arm(reminder, now())
    })
  }

  async function loadAll(): Promise<LoadReport> {
    let batch: ReminderBatch
    try {
      batch = await store.getActiveReminders()
    } catch (e) {
      throw toPersistenceError(e, 'load active reminders')
    }

    const report: LoadReport = { armed: 0, skipped: 0, failed: 0, failures: [] }
    for (const row of batch.invalid) {
      report.failed++
      report.failures.push({ reminderId: row.id, error: row.error })
      logger.error('Stored reminder could not be decoded; not armed', undefined, { reminderId: row.id, detail: row.error })
    }
    for (const reminder of batch.reminders) {
      try {
        const outcome = await schedule(reminder)
        if (outcome.status === 'scheduled') {
          report.armed++
        } else {
          report.skipped++
          logger.info('Reminder not armed at load', { reminderId: reminder.id, status: outcome.status })
        }
      } catch (e) {
        report.failed++
        const detail = e instanceof Error ? e.message : String(e)
        report.failures.push({ reminderId: reminder.id, error: detail })
        logger.error('Could not schedule reminder at load', e, { reminderId: reminder.id })
      }
    }

    logger.info('Loaded reminders', { armed: report.armed, skipped: report.skipped, failed: report.failed })
    return report
  }

  async function snooze(request: SnoozeRequest): Promise<SnoozeOutcome> {
    const delayMinutes = request.delayMinutes ?? settings.defaultSnoozeMinutes
    if (!Number.isInteger(delayMinutes) || delayMinutes < 1 || delayMinutes > settings.maxSnoozeMinutes) {
      throw new ValidationError(`Snooze delay must be a whole number of minutes between 1 and ${settings.maxSnoozeMinutes}`)
    }
    const explicitDate = request.scheduledDate === undefined
      ? undefined
      : requireDate(request.scheduledDate, 'scheduledDate')

    return mutex.run(request.reminderId, async () => {
      const reminder = await readReminder(request.reminderId)
      if (!reminder) throw new NotFoundError(`Reminder '${request.reminderId}' not found`)
      if (request.userId !== undefined && reminder.userId !== request.userId) {
        logger.warn('Snooze denied: reminder belongs to another user', {
          reminderId: reminder.id,
          userId: request.userId,
        })
        throw new ForbiddenError(`Reminder '${reminder.id}' does not belong to user '${request.userId}'`)
      }
      if (stopped) throw new ValidationError('Scheduler has been shut down')

      const fired = lastFired.get(reminder.id)
      const scheduledDate = explicitDate ?? fired?.scheduledDate ?? localDateOf(now(), reminder.schedule.timezone)
      const scheduledTime = fired && fired.scheduledDate === scheduledDate
        ? fired.scheduledTime
        : reminder.schedule.time
      const fireAt = new Date(now().getTime() + delayMinutes * 60000)

      const id = nextSnoozeId++
      const timer = setLongTimeout(fireAt, () => onSnoozeTimer(reminder.id, id))
      snoozes.set(id, { id, reminderId: reminder.id, scheduledDate, scheduledTime, fireAt, timer })

      logger.info('Snoozed reminder', { reminderId: reminder.id, scheduledDate, delayMinutes })
      emit({ type: 'snoozed', reminderId: reminder.id, scheduledDate, fireAt })
      return { reminderId: reminder.id, scheduledDate, scheduledTime, delayMinutes, fireAt }
    })
  }

  function getJob(reminderId: string): JobInfo | null {
    const job = jobs.get(reminderId)
    return job ? toInfo(reminderId, job) : null
  }

  function listJobs(): JobInfo[] {
    return [...jobs.entries()]
      .map(([id, job]) => toInfo(id, job))
      .sort((a, b) => a.at.getTime() - b.at.getTime() || (a.reminderId < b.reminderId ? -1 : 1))
  }

  function snoozeCount(reminderId?: string): number {
    if (reminderId === undefined) return snoozes.size
    let n = 0
    for (const s of snoozes.values()) if (s.reminderId === reminderId) n++
    return n
  }

  async function idle(): Promise<void> {
    while (inFlight.size > 0) {
      await Promise.allSettled([...inFlight])
    }
  }

  async function shutdown(): Promise<void> {
    stopped = true
    for (const job of jobs.values()) clearTimer(job.timer)
    jobs.clear()
    for (const snooze of snoozes.values()) clearTimer(snooze.timer)
    snoozes.clear()
    await idle()
    logger.info('Scheduler stopped')
  }

  return {
    schedule,
    cancel,
    reschedule,
    rearm,
    loadAll,
    snooze,
    getJob,
    listJobs,
    jobCount: () => jobs.size,
    snoozeCount,
    idle,
    shutdown,
  }
}
