/**
 * External Boundaries
 *
 * Contracts for the collaborators the engine talks to but does not own:
 * message delivery, gamification, and the action callbacks a delivery
 * channel invokes when the user taps a button.
 */

import type { CompletionTracker, CompletionResult, SkipResult } from './completion-tracker'
import type { SkipReason } from './domain-types'
import type { JobScheduler, SnoozeOutcome } from './job-scheduler'
import type { LocalDate, LocalTime } from './time-date'

// ============================================================================
// Notifier
// ============================================================================

export type Notification = {
  userId: string
  reminderId: string
  message: string
  scheduledDate: LocalDate
  scheduledTime: LocalTime
  snoozed: boolean
  /** Present when the reminder opted into streak motivation */
  currentStreak?: number
}

export type DeliveryResult = { delivered: boolean; error?: string }

export interface Notifier {
  notify(notification: Notification): Promise<DeliveryResult>
}

// ============================================================================
// Gamification
// ============================================================================

export type GamificationEvent = {
  userId: string
  reminderId: string
  /** ISO-8601 instant */
  completedAt: string
  scheduledTime: LocalTime
}

export type GamificationResult = {
  xpAwarded: number
  achievementsUnlocked: string[]
  streakInfo?: { currentStreak: number; bestStreak: number }
}

export interface GamificationReporter {
  reportCompletion(event: GamificationEvent): Promise<GamificationResult>
}

// ============================================================================
// Action Callbacks
// ============================================================================

export type CompleteAction = {
  reminderId: string
  userId: string
  scheduledDate: string
  note?: string
}

export type SkipAction = {
  reminderId: string
  userId: string
  scheduledDate: string
  reason: SkipReason
  note?: string
}

export type ActionHandlers = {
  onComplete(action: CompleteAction): Promise<CompletionResult>
  onSkip(action: SkipAction): Promise<SkipResult>
  onSnooze(reminderId: string, userId: string, delayMinutes?: number): Promise<SnoozeOutcome>
}

/** Map delivery-channel button presses onto the tracker and scheduler. */
export function createActionHandlers(deps: {
  tracker: CompletionTracker
  scheduler: JobScheduler
}): ActionHandlers {
  const { tracker, scheduler } = deps

  return {
    onComplete: (action) => tracker.recordCompletion(action),
    onSkip: (action) => tracker.recordSkip(action),
    onSnooze: (reminderId, userId, delayMinutes) =>
      scheduler.snooze({ reminderId, userId, delayMinutes }),
  }
}
