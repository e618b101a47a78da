/**
 * Engine Settings
 *
 * Tunable thresholds for streaks, analytics, suggestions, snoozing and
 * duplicate cleanup. Values resolve in order: defaults, environment,
 * explicit overrides. The merged result is validated with zod.
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import { isLogLevel, type LogLevel } from './logger'

// ============================================================================
// Schema
// ============================================================================

const minutes = z.number().int().min(0)
const positiveInt = z.number().int().min(1)
const percentPoints = z.number().min(0).max(100)

export const EngineSettingsSchema = z.object({
  streak: z.object({
    /** Minutes after the scheduled time before an unresolved day counts as missed */
    graceMinutes: minutes.max(1439).default(0),
    lookbackDays: positiveInt.max(3650).default(365),
  }).default({}),
  analytics: z.object({
    defaultPeriodDays: positiveInt.max(3650).default(30),
  }).default({}),
  suggestions: z.object({
    timeShiftThresholdMinutes: minutes.default(30),
    timeShiftMinSamples: positiveInt.default(5),
    timeShiftHighPriorityMinutes: minutes.default(60),
    difficultDayMarginPoints: percentPoints.default(25),
    difficultDayMinExpected: positiveInt.default(3),
    difficultDayHighPriorityRate: percentPoints.default(30),
    backupLeadMinutes: minutes.max(1439).default(60),
    splitRateThresholdPoints: percentPoints.default(30),
    splitDelayThresholdMinutes: minutes.default(30),
    splitMinWeekdayExpected: positiveInt.default(3),
    splitMinWeekendExpected: positiveInt.default(2),
  }).default({}),
  scheduler: z.object({
    defaultSnoozeMinutes: positiveInt.default(30),
    maxSnoozeMinutes: positiveInt.default(1440),
  }).default({}),
  duplicates: z.object({
    /** 0 disables the periodic cleanup */
    cleanupIntervalMinutes: minutes.default(0),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    json: z.boolean().default(false),
  }).default({}),
})

export type EngineSettings = z.output<typeof EngineSettingsSchema>

export type StreakSettings = EngineSettings['streak']
export type SuggestionSettings = EngineSettings['suggestions']
export type SchedulerSettings = EngineSettings['scheduler']

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] }

export type EngineSettingsOverrides = DeepPartial<EngineSettings>

// ============================================================================
// Environment
// ============================================================================

type Env = Record<string, string | undefined>

function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.toLowerCase()
  if (value === undefined) return undefined
  return value === 'true' || value === '1' || value === 'yes'
}

function envNumber(env: Env, key: string): number | undefined {
  const value = env[key]
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Environment variable ${key} must be a number, got '${value}'`)
  }
  return parsed
}

function envLogLevel(env: Env, key: string): LogLevel | undefined {
  const value = env[key]?.toLowerCase()
  if (value === undefined) return undefined
  if (!isLogLevel(value)) {
    throw new ValidationError(`Environment variable ${key} must be one of debug, info, warn, error`)
  }
  return value
}

function fromEnv(env: Env): EngineSettingsOverrides {
  return {
    streak: {
      graceMinutes: envNumber(env, 'REMINDER_GRACE_MINUTES'),
      lookbackDays: envNumber(env, 'REMINDER_STREAK_LOOKBACK_DAYS'),
    },
    analytics: {
      defaultPeriodDays: envNumber(env, 'REMINDER_ANALYTICS_PERIOD_DAYS'),
    },
    scheduler: {
      defaultSnoozeMinutes: envNumber(env, 'REMINDER_SNOOZE_MINUTES'),
    },
    duplicates: {
      cleanupIntervalMinutes: envNumber(env, 'REMINDER_DUPLICATE_CLEANUP_MINUTES'),
    },
    logging: {
      level: envLogLevel(env, 'LOG_LEVEL'),
      json: envBool(env, 'LOG_JSON'),
    },
  }
}

// ============================================================================
// Resolution
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Merge `source` into `target`, ignoring undefined leaves. */
function mergeDefined(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...target }
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue
    const existing = out[key]
    out[key] = isPlainObject(existing) && isPlainObject(value) ? mergeDefined(existing, value) : value
  }
  return out
}

/**
 * Build validated settings from defaults, `env` and `overrides`
 * (later sources win). Throws ValidationError on out-of-range values.
 */
export function resolveSettings(overrides: EngineSettingsOverrides = {}, env: Env = process.env): EngineSettings {
  const merged = mergeDefined(mergeDefined({}, fromEnv(env)), overrides)
  const parsed = EngineSettingsSchema.safeParse(merged)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Invalid engine settings: ${detail}`)
  }
  return parsed.data
}

export function defaultSettings(): EngineSettings {
  return resolveSettings({}, {})
}
