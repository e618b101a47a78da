/**
 * reminder-engine
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  ReminderEngineError, ReminderEngineErrorCode,
  InvalidScheduleError, NotFoundError, ForbiddenError, DeliveryFailureError,
  PersistenceError, DuplicateKeyError, InvalidDataError, ValidationError, ParseError,
} from './errors'
export type { ReminderEngineErrorCode as ReminderEngineErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date (branded types + utilities)
export type { LocalDate, LocalTime, WeekdayIndex, WeekdayName } from './time-date'
export {
  WEEKDAY_NAMES, ALL_WEEKDAYS,
  isLeapYear, daysInMonth,
  parseDate, parseTime, makeDate, makeTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf,
  addDays, daysBetween, compareDates,
  minutesOfDay, timeFromMinutes, addMinutesToTime,
  weekdayIndex, weekdayName, isWeekend,
  isValidTimezone, localDateOf, localTimeOf, isDSTAt, zonedToInstant,
} from './time-date'

// Domain types
export type {
  DailySchedule, WeeklySchedule, OneTimeSchedule, RecurringSchedule, ScheduleSpec,
  Reminder, SkipReason, CompletionRecord, SkipRecord, CompletionTiming, StreakState,
  DayBreakdown, AnalyticsSnapshot, ReminderComparison,
  SuggestionKind, SuggestionPriority, ProposedChange, Suggestion,
} from './domain-types'
export { SKIP_REASONS, isRecurring } from './domain-types'

// Schedule validation and resolution
export type { ScheduleInput } from './schedule-spec'
export { ScheduleSpecSchema, parseSchedule, safeParseSchedule } from './schedule-spec'
export type { Occurrence } from './schedule'
export { nextOccurrence, expectedDates, isScheduledOn, occurrenceInstant } from './schedule'

// Settings and logging
export type {
  EngineSettings, EngineSettingsOverrides, StreakSettings, SuggestionSettings, SchedulerSettings,
} from './config'
export { EngineSettingsSchema, resolveSettings, defaultSettings } from './config'
export type { LogLevel, LogEntry, LogContext, LogWriter, LoggerOptions } from './logger'
export { Logger, createLogger, createSilentLogger } from './logger'

// Persistence
export type {
  ReminderStore, ReminderChanges, ReminderBatch, InvalidReminderRow, StreakCacheEntry, MockStore,
} from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteStore } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// External boundaries
export type {
  Notification, DeliveryResult, Notifier,
  GamificationEvent, GamificationResult, GamificationReporter,
  CompleteAction, SkipAction, ActionHandlers,
} from './boundaries'
export { createActionHandlers } from './boundaries'

// Components
export type {
  ScheduleOutcome, LoadReport, SnoozeRequest, SnoozeOutcome, JobInfo, SchedulerEvent, JobScheduler,
} from './job-scheduler'
export { createJobScheduler } from './job-scheduler'
export type {
  CreateReminderInput, UpdateReminderInput, ReminderMutation, ReminderService,
} from './reminders'
export { createReminderService } from './reminders'
export type {
  CompletionInput, SkipInput, NoteInput, CompletionResult, SkipResult, TrackerEvent, CompletionTracker,
} from './completion-tracker'
export { createCompletionTracker, completionTiming } from './completion-tracker'
export type { DuplicateGroup, DuplicateResolution, DuplicateDetector } from './duplicates'
export { createDuplicateDetector, findDuplicateGroups } from './duplicates'
export type { StreakInput, StreakService } from './streaks'
export { calculateStreak, createStreakService } from './streaks'
export type { OccurrenceOutcome, AnalyticsQuery, AnalyticsEngine } from './analytics'
export { computeAnalytics, classifyOccurrences, createAnalyticsEngine } from './analytics'
export type { SuggestionInput, SuggestionEngine } from './suggestions'
export { generateSuggestions, createSuggestionEngine } from './suggestions'
export {
  formatStatistics, formatWeeklyPattern, formatComparison, formatTiming,
  formatStreakMessage, isStreakMilestone, formatDuration,
} from './formatters'

// High-level API (wraps all modules into one engine object)
export type {
  ReminderEngine, ReminderEngineConfig, EngineEvent, EngineEventType, EngineEventOf,
} from './public-api'
export { createReminderEngine } from './public-api'
