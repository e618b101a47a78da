/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together: settings,
 * logging, the scheduler, tracking, analytics and suggestions over one store
 * and one notifier. Handles startup loading, periodic duplicate cleanup,
 * event fan-out and shutdown.
 */

import type { ReminderStore } from './adapter'
import type { AnalyticsEngine } from './analytics'
import { createAnalyticsEngine } from './analytics'
import type { ActionHandlers, GamificationReporter, Notifier } from './boundaries'
import { createActionHandlers } from './boundaries'
import type { CompletionTracker, TrackerEvent } from './completion-tracker'
import { createCompletionTracker } from './completion-tracker'
import type { EngineSettings, EngineSettingsOverrides } from './config'
import { resolveSettings } from './config'
import type { DuplicateDetector, DuplicateResolution } from './duplicates'
import { createDuplicateDetector } from './duplicates'
import type { JobScheduler, LoadReport, SchedulerEvent } from './job-scheduler'
import { createJobScheduler } from './job-scheduler'
import { type LogWriter, type Logger, createLogger } from './logger'
import type { ReminderService } from './reminders'
import { createReminderService } from './reminders'
import type { StreakService } from './streaks'
import { createStreakService } from './streaks'
import type { SuggestionEngine } from './suggestions'
import { createSuggestionEngine } from './suggestions'

// ============================================================================
// Types
// ============================================================================

export type EngineEvent =
  | SchedulerEvent
  | TrackerEvent
  | { type: 'duplicatesResolved'; resolution: DuplicateResolution }

export type EngineEventType = EngineEvent['type']

export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>

export type ReminderEngineConfig = {
  store: ReminderStore
  notifier: Notifier
  gamification?: GamificationReporter
  settings?: EngineSettingsOverrides
  /** Environment consulted for settings; defaults to process.env */
  env?: Record<string, string | undefined>
  /** Replaces the logger built from settings.logging */
  logger?: Logger
  /** Output sink for the logger built from settings.logging */
  logWriter?: LogWriter
  now?: () => Date
}

export type ReminderEngine = {
  readonly settings: EngineSettings
  readonly logger: Logger
  readonly reminders: ReminderService
  readonly tracker: CompletionTracker
  readonly scheduler: JobScheduler
  readonly streaks: StreakService
  readonly analytics: AnalyticsEngine
  readonly suggestions: SuggestionEngine
  readonly actions: ActionHandlers
  readonly duplicates: DuplicateDetector

  /** Arms every active reminder and starts periodic duplicate cleanup */
  init(): Promise<LoadReport>
  /** Deactivates duplicate reminders and emits 'duplicatesResolved' */
  resolveDuplicates(userId?: string): Promise<DuplicateResolution>
  /** Returns an unsubscribe function */
  on<K extends EngineEventType>(event: K, handler: (event: EngineEventOf<K>) => void): () => void
  shutdown(): Promise<void>
}

function isEventOf<K extends EngineEventType>(event: EngineEvent, type: K): event is EngineEventOf<K> {
  return event.type === type
}

// ============================================================================
// Implementation
// ============================================================================

export function createReminderEngine(config: ReminderEngineConfig): ReminderEngine {
  const settings = resolveSettings(config.settings, config.env ?? process.env)
  const now = config.now ?? (() => new Date())
  const rootLogger = config.logger ?? createLogger({
    level: settings.logging.level,
    json: settings.logging.json,
    writer: config.logWriter,
  })
  const logger = rootLogger.child({ component: 'engine' })
  const { store } = config

  // ========== Events ==========

  const listeners = new Set<(event: EngineEvent) => void>()

  function emit(event: EngineEvent): void {
    for (const listener of [...listeners]) {
      try {
        listener(event)
      } catch (e) {
        logger.error(`Event handler failed on '${event.type}'`, e)
      }
    }
  }

  function on<K extends EngineEventType>(type: K, handler: (event: EngineEventOf<K>) => void): () => void {
    const listener = (event: EngineEvent) => {
      if (isEventOf(event, type)) handler(event)
    }
    listeners.add(listener)
    return () => { listeners.delete(listener) }
  }

  // ========== Components ==========

  const streaks = createStreakService({ store, settings: settings.streak, now, logger: rootLogger })

  const scheduler = createJobScheduler({
    store,
    notifier: config.notifier,
    logger: rootLogger,
    settings: settings.scheduler,
    now,
    onEvent: emit,
    streakOf: async (reminder) => (await streaks.forReminder(reminder)).currentStreak,
  })

  const tracker = createCompletionTracker({
    store,
    gamification: config.gamification,
    logger: rootLogger,
    now,
    onEvent: emit,
  })

  const reminders = createReminderService({ store, scheduler, logger: rootLogger, now })
  const duplicates = createDuplicateDetector({ store, scheduler, logger: rootLogger, now })
  const analytics = createAnalyticsEngine({ store, settings, now, logger: rootLogger })
  const suggestions = createSuggestionEngine({ analytics, settings: settings.suggestions, logger: rootLogger })
  const actions = createActionHandlers({ tracker, scheduler })

  // ========== Lifecycle ==========

  let cleanupTimer: ReturnType<typeof setInterval> | null = null
  let cleanupRun: Promise<void> | null = null

  async function resolveDuplicates(userId?: string): Promise<DuplicateResolution> {
    const resolution = await duplicates.resolve(userId)
    if (resolution.groups.length > 0) emit({ type: 'duplicatesResolved', resolution })
    return resolution
  }

  function runCleanup(): void {
    if (cleanupRun) {
      logger.debug('Duplicate cleanup still running; tick skipped')
      return
    }
    cleanupRun = resolveDuplicates()
      .then(() => undefined, (e: unknown) => {
        logger.error('Periodic duplicate cleanup failed', e)
      })
      .finally(() => { cleanupRun = null })
  }

  async function init(): Promise<LoadReport> {
    const report = await scheduler.loadAll()
    const interval = settings.duplicates.cleanupIntervalMinutes
    if (interval > 0 && cleanupTimer === null) {
      cleanupTimer = setInterval(runCleanup, interval * 60000)
      logger.info('Periodic duplicate cleanup enabled', { intervalMinutes: interval })
    }
    return report
  }

  async function shutdown(): Promise<void> {
    if (cleanupTimer !== null) {
      clearInterval(cleanupTimer)
      cleanupTimer = null
    }
    if (cleanupRun) await cleanupRun
    await scheduler.shutdown()
    if (store.close) await store.close()
    listeners.clear()
    logger.info('Engine stopped')
  }

  return {
    settings,
    logger: rootLogger,
    reminders,
    tracker,
    scheduler,
    streaks,
    analytics,
    suggestions,
    actions,
    duplicates,
    init,
    resolveDuplicates,
    on,
    shutdown,
  }
}
