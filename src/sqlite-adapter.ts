/**
 * SQLite Adapter
 *
 * Production implementation of ReminderStore using better-sqlite3.
 * Schedules are stored as JSON and re-validated on read, so a corrupted row
 * surfaces as InvalidDataError instead of a malformed schedule.
 */
import Database from 'better-sqlite3'
import {
  type ReminderBatch, type ReminderChanges, type ReminderStore, type StoreOperations, type StreakCacheEntry,
  gateOperations,
} from './adapter'
import type { CompletionRecord, Reminder, SkipReason, SkipRecord } from './domain-types'
import { SKIP_REASONS } from './domain-types'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'
import { createStoreGate } from './internal/store-gate'
import { safeParseSchedule } from './schedule-spec'
import { type LocalDate, type LocalTime, parseDate, parseTime } from './time-date'

export type SqliteStore = ReminderStore & {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS reminders (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    message TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1,
    schedule_json TEXT NOT NULL,
    tracking_enabled INTEGER NOT NULL DEFAULT 1,
    streak_motivation INTEGER NOT NULL DEFAULT 0,
    skip_when_completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_reminders_user ON reminders(user_id);
  CREATE INDEX IF NOT EXISTS idx_reminders_active ON reminders(active);

  CREATE TABLE IF NOT EXISTS completions (
    id TEXT NOT NULL,
    reminder_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    scheduled_date TEXT NOT NULL,
    scheduled_time TEXT NOT NULL,
    completed_at TEXT NOT NULL,
    note TEXT,
    PRIMARY KEY (reminder_id, scheduled_date)
  );

  CREATE TABLE IF NOT EXISTS skips (
    id TEXT NOT NULL,
    reminder_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    scheduled_date TEXT NOT NULL,
    scheduled_time TEXT NOT NULL,
    reason TEXT NOT NULL CHECK (reason IN ('sick', 'out_of_stock', 'doctor_advice', 'other')),
    skipped_at TEXT NOT NULL,
    note TEXT,
    PRIMARY KEY (reminder_id, scheduled_date)
  );

  CREATE TABLE IF NOT EXISTS streak_cache (
    reminder_id TEXT PRIMARY KEY,
    current_streak INTEGER NOT NULL,
    best_streak INTEGER NOT NULL,
    computed_at TEXT NOT NULL,
    valid_until TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint|PRIMARY KEY constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint|NOT NULL constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ReminderRow = {
  id: string
  user_id: string
  message: string
  active: number
  schedule_json: string
  tracking_enabled: number
  streak_motivation: number
  skip_when_completed: number
  created_at: string
  updated_at: string
}

type CompletionRow = {
  id: string
  reminder_id: string
  user_id: string
  scheduled_date: string
  scheduled_time: string
  completed_at: string
  note: string | null
}

type SkipRow = {
  id: string
  reminder_id: string
  user_id: string
  scheduled_date: string
  scheduled_time: string
  reason: string
  skipped_at: string
  note: string | null
}

type StreakCacheRow = {
  reminder_id: string
  current_streak: number
  best_streak: number
  computed_at: string
  valid_until: string
}

type SchemaVersionRow = { v: number | null }

// ============================================================================
// Row Mappers
// ============================================================================

function rowDate(value: string, table: string): LocalDate {
  const parsed = parseDate(value)
  if (!parsed.ok) throw new InvalidDataError(`Corrupt date '${value}' in ${table}`)
  return parsed.value
}

function rowTime(value: string, table: string): LocalTime {
  const parsed = parseTime(value)
  if (!parsed.ok) throw new InvalidDataError(`Corrupt time '${value}' in ${table}`)
  return parsed.value
}

function isSkipReason(value: string): value is SkipReason {
  return SKIP_REASONS.some((r) => r === value)
}

function mapReminder(row: ReminderRow): Reminder {
  let raw: unknown
  try {
    raw = JSON.parse(row.schedule_json)
  } catch (e) {
    throw new InvalidDataError(`Corrupt schedule JSON for reminder '${row.id}': ${e instanceof Error ? e.message : String(e)}`)
  }
  const schedule = safeParseSchedule(raw)
  if (!schedule.ok) {
    throw new InvalidDataError(`Stored schedule for reminder '${row.id}' is invalid: ${schedule.error.message}`)
  }
  return {
    id: row.id,
    userId: row.user_id,
    message: row.message,
    active: row.active === 1,
    schedule: schedule.value,
    trackingEnabled: row.tracking_enabled === 1,
    streakMotivation: row.streak_motivation === 1,
    skipWhenCompleted: row.skip_when_completed === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function mapCompletion(row: CompletionRow): CompletionRecord {
  const record: CompletionRecord = {
    id: row.id,
    reminderId: row.reminder_id,
    userId: row.user_id,
    scheduledDate: rowDate(row.scheduled_date, 'completions'),
    scheduledTime: rowTime(row.scheduled_time, 'completions'),
    completedAt: row.completed_at,
  }
  if (row.note !== null) record.note = row.note
  return record
}

function mapSkip(row: SkipRow): SkipRecord {
  if (!isSkipReason(row.reason)) throw new InvalidDataError(`Unknown skip reason '${row.reason}'`)
  const record: SkipRecord = {
    id: row.id,
    reminderId: row.reminder_id,
    userId: row.user_id,
    scheduledDate: rowDate(row.scheduled_date, 'skips'),
    scheduledTime: rowTime(row.scheduled_time, 'skips'),
    reason: row.reason,
    skippedAt: row.skipped_at,
  }
  if (row.note !== null) record.note = row.note
  return record
}

function mapStreakCache(row: StreakCacheRow): StreakCacheEntry {
  return {
    reminderId: row.reminder_id,
    currentStreak: row.current_streak,
    bestStreak: row.best_streak,
    computedAt: row.computed_at,
    validUntil: row.valid_until,
  }
}

// ============================================================================
// Factory
// ============================================================================

/** Open (or create) a store at `path`; use ':memory:' for an ephemeral database. */
export async function createSqliteAdapter(path: string): Promise<SqliteStore> {
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const gate = createStoreGate({
    begin: () => { db.exec('BEGIN IMMEDIATE') },
    commit: () => { db.exec('COMMIT') },
    rollback: () => { db.exec('ROLLBACK') },
  })

  const ops: StoreOperations = {
    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder) {
      safe(() =>
        db.prepare(
          `INSERT INTO reminders (id, user_id, message, active, schedule_json, tracking_enabled, streak_motivation, skip_when_completed, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          reminder.id,
          reminder.userId,
          reminder.message,
          reminder.active ? 1 : 0,
          JSON.stringify(reminder.schedule),
          reminder.trackingEnabled ? 1 : 0,
          reminder.streakMotivation ? 1 : 0,
          reminder.skipWhenCompleted ? 1 : 0,
          reminder.createdAt,
          reminder.updatedAt,
        ),
      )
    },

    async getReminder(id) {
      const row = db.prepare('SELECT * FROM reminders WHERE id = ?').get(id) as ReminderRow | undefined
      return row ? mapReminder(row) : null
    },

    async getRemindersByUser(userId) {
      const rows = db.prepare(
        'SELECT * FROM reminders WHERE user_id = ? ORDER BY created_at, id',
      ).all(userId) as ReminderRow[]
      return rows.map(mapReminder)
    },

    async getActiveReminders() {
      const rows = db.prepare(
        'SELECT * FROM reminders WHERE active = 1 ORDER BY created_at, id',
      ).all() as ReminderRow[]
      const batch: ReminderBatch = { reminders: [], invalid: [] }
      for (const row of rows) {
        try {
          batch.reminders.push(mapReminder(row))
        } catch (e) {
          if (!(e instanceof InvalidDataError)) throw e
          batch.invalid.push({ id: row.id, userId: row.user_id, error: e.message })
        }
      }
      return batch
    },

    async updateReminder(id, changes: ReminderChanges) {
      const existing = db.prepare('SELECT * FROM reminders WHERE id = ?').get(id) as ReminderRow | undefined
      if (!existing) throw new NotFoundError(`Reminder '${id}' not found`)
      const current = mapReminder(existing)
      const next: Reminder = { ...current, ...changes }
      safe(() =>
        db.prepare(
          `UPDATE reminders
           SET message = ?, active = ?, schedule_json = ?, tracking_enabled = ?, streak_motivation = ?, skip_when_completed = ?,
               updated_at = ?
           WHERE id = ?`,
        ).run(
          next.message,
          next.active ? 1 : 0,
          JSON.stringify(next.schedule),
          next.trackingEnabled ? 1 : 0,
          next.streakMotivation ? 1 : 0,
          next.skipWhenCompleted ? 1 : 0,
          next.updatedAt,
          id,
        ),
      )
    },

    async deleteReminder(id) {
      const info = safe(() => db.prepare('DELETE FROM reminders WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Reminder '${id}' not found`)
      db.prepare('DELETE FROM streak_cache WHERE reminder_id = ?').run(id)
    },

    // ================================================================
    // Completion
    // ================================================================
    async upsertCompletion(completion) {
      safe(() =>
        db.prepare(
          `INSERT INTO completions (id, reminder_id, user_id, scheduled_date, scheduled_time, completed_at, note)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (reminder_id, scheduled_date) DO UPDATE SET
             id = excluded.id,
             user_id = excluded.user_id,
             scheduled_time = excluded.scheduled_time,
             completed_at = excluded.completed_at,
             note = excluded.note`,
        ).run(
          completion.id,
          completion.reminderId,
          completion.userId,
          completion.scheduledDate,
          completion.scheduledTime,
          completion.completedAt,
          completion.note ?? null,
        ),
      )
    },

    async getCompletion(reminderId, scheduledDate) {
      const row = db.prepare(
        'SELECT * FROM completions WHERE reminder_id = ? AND scheduled_date = ?',
      ).get(reminderId, scheduledDate) as CompletionRow | undefined
      return row ? mapCompletion(row) : null
    },

    async getCompletionsByReminder(reminderId) {
      const rows = db.prepare(
        'SELECT * FROM completions WHERE reminder_id = ? ORDER BY scheduled_date',
      ).all(reminderId) as CompletionRow[]
      return rows.map(mapCompletion)
    },

    async deleteCompletion(reminderId, scheduledDate) {
      db.prepare('DELETE FROM completions WHERE reminder_id = ? AND scheduled_date = ?').run(reminderId, scheduledDate)
    },

    // ================================================================
    // Skip
    // ================================================================
    async upsertSkip(skip) {
      safe(() =>
        db.prepare(
          `INSERT INTO skips (id, reminder_id, user_id, scheduled_date, scheduled_time, reason, skipped_at, note)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (reminder_id, scheduled_date) DO UPDATE SET
             id = excluded.id,
             user_id = excluded.user_id,
             scheduled_time = excluded.scheduled_time,
             reason = excluded.reason,
             skipped_at = excluded.skipped_at,
             note = excluded.note`,
        ).run(
          skip.id,
          skip.reminderId,
          skip.userId,
          skip.scheduledDate,
          skip.scheduledTime,
          skip.reason,
          skip.skippedAt,
          skip.note ?? null,
        ),
      )
    },

    async getSkip(reminderId, scheduledDate) {
      const row = db.prepare(
        'SELECT * FROM skips WHERE reminder_id = ? AND scheduled_date = ?',
      ).get(reminderId, scheduledDate) as SkipRow | undefined
      return row ? mapSkip(row) : null
    },

    async getSkipsByReminder(reminderId) {
      const rows = db.prepare(
        'SELECT * FROM skips WHERE reminder_id = ? ORDER BY scheduled_date',
      ).all(reminderId) as SkipRow[]
      return rows.map(mapSkip)
    },

    async deleteSkip(reminderId, scheduledDate) {
      db.prepare('DELETE FROM skips WHERE reminder_id = ? AND scheduled_date = ?').run(reminderId, scheduledDate)
    },

    // ================================================================
    // Streak cache
    // ================================================================
    async getStreakCache(reminderId) {
      const row = db.prepare('SELECT * FROM streak_cache WHERE reminder_id = ?').get(reminderId) as StreakCacheRow | undefined
      return row ? mapStreakCache(row) : null
    },

    async setStreakCache(entry) {
      db.prepare(
        `INSERT INTO streak_cache (reminder_id, current_streak, best_streak, computed_at, valid_until)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (reminder_id) DO UPDATE SET
           current_streak = excluded.current_streak,
           best_streak = excluded.best_streak,
           computed_at = excluded.computed_at,
           valid_until = excluded.valid_until`,
      ).run(entry.reminderId, entry.currentStreak, entry.bestStreak, entry.computedAt, entry.validUntil)
    },

    async clearStreakCache(reminderId) {
      db.prepare('DELETE FROM streak_cache WHERE reminder_id = ?').run(reminderId)
    },
  }

  return {
    ...gateOperations(ops, gate),

    // ================================================================
    // Introspection & lifecycle
    // ================================================================
    listTables: () => gate.run(() => {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all() as { name: string }[]
      return rows.map((r) => r.name)
    }),

    getSchemaVersion: () => gate.run(() => {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    }),

    close: () => gate.run(() => { db.close() }),
  }
}
