/**
 * Adaptive Suggestions
 *
 * Turns an analytics snapshot and the per-occurrence outcomes behind it into
 * ranked schedule suggestions. Three signals are checked:
 *
 * - timeShift: completions consistently land well before or after the
 *   scheduled time, so the time itself should move.
 * - difficultDaySupport: one weekday lags the overall completion rate, so
 *   that day gets an earlier backup reminder.
 * - scheduleSplit: weekdays and weekends behave differently, so each side
 *   gets its own time.
 *
 * An empty list means nothing crossed a threshold.
 */

import type { AnalyticsEngine, AnalyticsQuery, OccurrenceOutcome } from './analytics'
import type { SuggestionSettings } from './config'
import { defaultSettings } from './config'
import type {
  AnalyticsSnapshot, RecurringSchedule, ScheduleSpec, Suggestion, SuggestionKind,
  SuggestionPriority,
} from './domain-types'
import { isRecurring } from './domain-types'
import { mean, round1 } from './internal/helpers'
import { type Logger, createSilentLogger } from './logger'
import { type WeekdayIndex, addMinutesToTime, isWeekend, weekdayName } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type SuggestionInput = {
  schedule: ScheduleSpec
  snapshot: AnalyticsSnapshot
  outcomes: readonly OccurrenceOutcome[]
  settings?: SuggestionSettings
}

const PRIORITY_RANK: Record<SuggestionPriority, number> = { high: 0, medium: 1, low: 2 }

const KIND_RANK: Record<SuggestionKind, number> = {
  timeShift: 0,
  scheduleSplit: 1,
  difficultDaySupport: 2,
}

// ============================================================================
// Helpers
// ============================================================================

function sortedDelays(outcomes: readonly OccurrenceOutcome[]): number[] {
  const delays: number[] = []
  for (const o of outcomes) {
    if (o.outcome === 'completed') delays.push(o.delayMinutes)
  }
  return delays.sort((a, b) => a - b)
}

function formatMinutes(minutes: number): string {
  const abs = Math.abs(round1(minutes))
  return `${abs} minute${abs === 1 ? '' : 's'}`
}

function direction(minutes: number): string {
  return minutes > 0 ? 'late' : 'early'
}

type GroupStats = { expected: number; completions: number; rate: number; averageDelay: number }

function groupStats(outcomes: readonly OccurrenceOutcome[]): GroupStats {
  const delays = sortedDelays(outcomes)
  return {
    expected: outcomes.length,
    completions: delays.length,
    rate: outcomes.length === 0 ? 0 : round1((delays.length / outcomes.length) * 100),
    averageDelay: mean(delays),
  }
}

function weekdayOf(s: Suggestion): number {
  return s.proposedChange.kind === 'difficultDaySupport' ? s.proposedChange.weekday : -1
}

function bySuggestionRank(a: Suggestion, b: Suggestion): number {
  const p = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]
  if (p !== 0) return p
  const k = KIND_RANK[a.kind] - KIND_RANK[b.kind]
  if (k !== 0) return k
  return weekdayOf(a) - weekdayOf(b)
}

// ============================================================================
// Signals
// ============================================================================

function timeShift(
  schedule: RecurringSchedule,
  outcomes: readonly OccurrenceOutcome[],
  settings: SuggestionSettings,
): Suggestion | null {
  const delays = sortedDelays(outcomes)
  if (delays.length < settings.timeShiftMinSamples) return null

  const average = mean(delays)
  if (Math.abs(average) <= settings.timeShiftThresholdMinutes) return null

  const suggestedTime = addMinutesToTime(schedule.time, Math.round(average))
  return {
    kind: 'timeShift',
    priority: Math.abs(average) > settings.timeShiftHighPriorityMinutes ? 'high' : 'medium',
    title: 'Adjust Reminder Time',
    rationale:
      `Across ${delays.length} completions you finished on average ${formatMinutes(average)} ` +
      `${direction(average)}. Moving the reminder from ${schedule.time} to ${suggestedTime} ` +
      'matches when you actually act on it.',
    proposedChange: { kind: 'timeShift', currentTime: schedule.time, suggestedTime },
  }
}

function difficultDays(
  schedule: RecurringSchedule,
  snapshot: AnalyticsSnapshot,
  settings: SuggestionSettings,
): Suggestion[] {
  const found: Suggestion[] = []
  const backupTime = addMinutesToTime(schedule.time, -settings.backupLeadMinutes)

  for (const weekday of schedule.daysOfWeek) {
    const name = weekdayName(weekday)
    const day = snapshot.dayOfWeekBreakdown[name]
    if (day.expected < settings.difficultDayMinExpected) continue
    if (snapshot.completionRate - day.completionRate <= settings.difficultDayMarginPoints) continue

    found.push({
      kind: 'difficultDaySupport',
      priority: day.completionRate < settings.difficultDayHighPriorityRate ? 'high' : 'medium',
      title: `${name} Needs Support`,
      rationale:
        `${name} completion is ${day.completionRate}% against ${snapshot.completionRate}% overall ` +
        `(${day.completions} of ${day.expected}). An extra reminder at ${backupTime} on ${name}s ` +
        'may help.',
      proposedChange: { kind: 'difficultDaySupport', weekday, backupTime },
    })
  }
  return found
}

function scheduleSplit(
  schedule: RecurringSchedule,
  outcomes: readonly OccurrenceOutcome[],
  settings: SuggestionSettings,
): Suggestion | null {
  const weekdays: WeekdayIndex[] = schedule.daysOfWeek.filter((d) => !isWeekend(d))
  const weekendDays: WeekdayIndex[] = schedule.daysOfWeek.filter((d) => isWeekend(d))
  if (weekdays.length === 0 || weekendDays.length === 0) return null

  const weekday = groupStats(outcomes.filter((o) => !isWeekend(o.weekday)))
  const weekend = groupStats(outcomes.filter((o) => isWeekend(o.weekday)))
  if (weekday.expected < settings.splitMinWeekdayExpected) return null
  if (weekend.expected < settings.splitMinWeekendExpected) return null

  const rateGap = Math.abs(weekday.rate - weekend.rate)
  const delayGap = weekday.completions > 0 && weekend.completions > 0
    ? Math.abs(weekday.averageDelay - weekend.averageDelay)
    : 0
  if (rateGap <= settings.splitRateThresholdPoints && delayGap <= settings.splitDelayThresholdMinutes) {
    return null
  }

  const weekdayTime = addMinutesToTime(schedule.time, Math.round(weekday.averageDelay))
  const weekendTime = addMinutesToTime(schedule.time, Math.round(weekend.averageDelay))
  return {
    kind: 'scheduleSplit',
    priority: 'medium',
    title: 'Different Schedule for Weekends',
    rationale:
      `Weekdays: ${weekday.rate}% completed, ${formatMinutes(weekday.averageDelay)} ` +
      `${direction(weekday.averageDelay)} on average. Weekends: ${weekend.rate}% completed, ` +
      `${formatMinutes(weekend.averageDelay)} ${direction(weekend.averageDelay)} on average. ` +
      `Try ${weekdayTime} on weekdays and ${weekendTime} on weekends.`,
    proposedChange: { kind: 'scheduleSplit', weekdays, weekdayTime, weekendDays, weekendTime },
  }
}

// ============================================================================
// Generation
// ============================================================================

export function generateSuggestions(input: SuggestionInput): Suggestion[] {
  const { schedule, snapshot, outcomes } = input
  if (!isRecurring(schedule)) return []
  const settings = input.settings ?? defaultSettings().suggestions

  const suggestions: Suggestion[] = []
  const shift = timeShift(schedule, outcomes, settings)
  if (shift) suggestions.push(shift)
  const split = scheduleSplit(schedule, outcomes, settings)
  if (split) suggestions.push(split)
  suggestions.push(...difficultDays(schedule, snapshot, settings))

  return suggestions.sort(bySuggestionRank)
}

// ============================================================================
// Service
// ============================================================================

export type SuggestionEngine = {
  suggest(reminderId: string, query?: AnalyticsQuery): Promise<Suggestion[]>
}

export function createSuggestionEngine(deps: {
  analytics: AnalyticsEngine
  settings?: SuggestionSettings
  logger?: Logger
}): SuggestionEngine {
  const { analytics } = deps
  const settings = deps.settings ?? defaultSettings().suggestions
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'suggestions' })

  async function suggest(reminderId: string, query: AnalyticsQuery = {}): Promise<Suggestion[]> {
    const { reminder, snapshot, outcomes } = await analytics.getOccurrences(reminderId, query)
    const suggestions = generateSuggestions({ schedule: reminder.schedule, snapshot, outcomes, settings })
    logger.debug('Suggestions generated', {
      reminderId,
      count: suggestions.length,
      kinds: suggestions.map((s) => s.kind),
    })
    return suggestions
  }

  return { suggest }
}
