/**
 * Formatters
 *
 * Plain-text renderings of analytics for chat-style front ends. Every
 * function is pure and returns lines joined with '\n'.
 */

import type {
  AnalyticsSnapshot, CompletionTiming, DayBreakdown, ReminderComparison, SkipReason,
} from './domain-types'
import { SKIP_REASONS } from './domain-types'
import { round1 } from './internal/helpers'
import { WEEKDAY_NAMES, type WeekdayName } from './time-date'

// ============================================================================
// Shared
// ============================================================================

const SKIP_REASON_LABELS: Record<SkipReason, string> = {
  sick: 'Not feeling well',
  out_of_stock: 'Out of stock',
  doctor_advice: "Doctor's advice",
  other: 'Other',
}

const COMPARISON_MESSAGE_WIDTH = 40

type RateBand = 'excellent' | 'good' | 'improving' | 'starting'

export function rateBand(rate: number): RateBand {
  if (rate >= 80) return 'excellent'
  if (rate >= 60) return 'good'
  if (rate >= 40) return 'improving'
  return 'starting'
}

const BAND_LABELS: Record<RateBand, string> = {
  excellent: 'Excellent!',
  good: 'Good job!',
  improving: 'Keep improving!',
  starting: 'You got this!',
}

/** 45 -> "45m", 90 -> "1h 30m" */
export function formatDuration(minutes: number): string {
  const total = Math.round(Math.abs(minutes))
  const hours = Math.floor(total / 60)
  const mins = total % 60
  return hours > 0 ? `${hours}h ${mins}m` : `${mins}m`
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text
}

// ============================================================================
// Statistics Summary
// ============================================================================

export function formatStatistics(snapshot: AnalyticsSnapshot, message: string): string {
  const rate = snapshot.completionRate
  const lines = [
    `Statistics for: ${message}`,
    `(Last ${snapshot.periodDays} days)`,
    '',
    `Completion rate: ${rate}% ${BAND_LABELS[rateBand(rate)]}`,
    `Completed: ${snapshot.totalCompletions} / ${snapshot.totalExpected} days`,
  ]
  if (snapshot.totalSkips > 0) lines.push(`Skipped: ${plural(snapshot.totalSkips, 'day')}`)
  if (snapshot.totalMissed > 0) lines.push(`Missed: ${plural(snapshot.totalMissed, 'day')}`)

  lines.push('')
  lines.push(snapshot.currentStreak > 0
    ? `Current streak: ${plural(snapshot.currentStreak, 'day')}`
    : 'Current streak: 0 days (start today!)')
  if (snapshot.bestStreak > 0) lines.push(`Best streak: ${plural(snapshot.bestStreak, 'day')}`)

  const delay = snapshot.averageDelayMinutes
  if (delay > 0) lines.push(`Average: ${formatDuration(delay)} after scheduled time`)
  else if (delay < 0) lines.push(`Average: ${formatDuration(delay)} before scheduled time`)

  const reasons = SKIP_REASONS.filter((r) => snapshot.skipReasonCounts[r] > 0)
  if (reasons.length > 0) {
    lines.push('')
    lines.push('Skip reasons:')
    for (const r of reasons) lines.push(`  ${SKIP_REASON_LABELS[r]}: ${snapshot.skipReasonCounts[r]}`)
  }

  return lines.join('\n')
}

// ============================================================================
// Weekly Pattern
// ============================================================================

function dayLine(name: WeekdayName, day: DayBreakdown): string {
  const parts = [`${day.completions} done`]
  if (day.skips > 0) parts.push(`${day.skips} skipped`)
  if (day.missed > 0) parts.push(`${day.missed} missed`)
  return `${name}: ${day.completionRate}% (${parts.join(', ')})`
}

/**
 * One line per weekday, Monday first, followed by the best day and, when it
 * differs, the day needing most focus. Days with nothing expected are listed
 * but not ranked.
 */
export function formatWeeklyPattern(snapshot: AnalyticsSnapshot, message: string): string {
  const breakdown = snapshot.dayOfWeekBreakdown
  const lines = [`Weekly pattern: ${message}`, '']
  for (const name of WEEKDAY_NAMES) lines.push(dayLine(name, breakdown[name]))

  const ranked = WEEKDAY_NAMES.filter((n) => breakdown[n].expected > 0)
  if (ranked.length === 0) return lines.join('\n')

  let best = ranked[0]
  let worst = ranked[0]
  for (const name of ranked) {
    if (best === undefined || breakdown[name].completionRate > breakdown[best].completionRate) best = name
    if (worst === undefined || breakdown[name].completionRate < breakdown[worst].completionRate) worst = name
  }
  if (best === undefined || worst === undefined) return lines.join('\n')

  lines.push('')
  lines.push(`Best day: ${best} (${breakdown[best].completionRate}%)`)
  if (breakdown[worst].completionRate < breakdown[best].completionRate) {
    lines.push(`Needs focus: ${worst} (${breakdown[worst].completionRate}%)`)
  }
  return lines.join('\n')
}

// ============================================================================
// Comparison
// ============================================================================

export function formatComparison(rows: readonly ReminderComparison[]): string {
  if (rows.length === 0) return 'No tracked reminders found'

  const lines = [`All reminders (${rows.length} tracked)`, '']
  rows.forEach((row, i) => {
    lines.push(`${i + 1}. ${truncate(row.message, COMPARISON_MESSAGE_WIDTH)}`)
    lines.push(`   Rate: ${row.completionRate}% | Streak: ${row.currentStreak} | Done: ${row.totalCompletions}`)
  })

  const totalDone = rows.reduce((sum, r) => sum + r.totalCompletions, 0)
  const averageRate = round1(rows.reduce((sum, r) => sum + r.completionRate, 0) / rows.length)
  lines.push('')
  lines.push(`Overall: ${averageRate}% average | ${totalDone} total completions`)
  return lines.join('\n')
}

// ============================================================================
// Completion Feedback
// ============================================================================

export function formatTiming(timing: CompletionTiming): string {
  if (timing.status === 'early') return 'Done on time'
  return `Done ${formatDuration(timing.delayMinutes)} after the scheduled time`
}

export function isStreakMilestone(streak: number): boolean {
  return streak === 5 || streak === 10 || (streak >= 20 && streak % 10 === 0)
}

export function formatStreakMessage(streak: number, message: string): string {
  if (!isStreakMilestone(streak)) return `${streak}-day streak for ${message}!`
  if (streak >= 30) return `Incredible! A ${streak}-day streak for: ${message}`
  if (streak >= 20) return `Amazing streak! ${streak} days in a row for: ${message}`
  if (streak >= 10) return `Double digits! ${streak} days strong for: ${message}`
  return `5-day milestone! You're on a roll with: ${message}`
}
