/**
 * Adapter
 *
 * Domain-oriented persistence interface (ReminderStore) + in-memory mock
 * implementation. All methods are async so synchronous drivers
 * (better-sqlite3) and networked ones share one contract.
 */

import type { CompletionRecord, Reminder, SkipRecord } from './domain-types'
import { DuplicateKeyError, NotFoundError } from './errors'
import { type StoreGate, createStoreGate } from './internal/store-gate'
import type { LocalDate } from './time-date'

export type { LocalDate } from './time-date'

// ============================================================================
// Entity Types
// ============================================================================

/** Mutable reminder fields; id, userId and createdAt never change. */
export type ReminderChanges = Partial<Pick<Reminder,
  'message' | 'active' | 'schedule' | 'trackingEnabled' | 'streakMotivation' | 'skipWhenCompleted'
  | 'updatedAt'
>>

export type StreakCacheEntry = {
  reminderId: string
  currentStreak: number
  bestStreak: number
  /** ISO-8601 instant computed at */
  computedAt: string
  /** ISO-8601 instant after which the entry must be recomputed */
  validUntil: string
}

/** A stored reminder that could not be decoded */
export type InvalidReminderRow = {
  id: string
  userId: string
  error: string
}

export type ReminderBatch = {
  reminders: Reminder[]
  invalid: InvalidReminderRow[]
}

// ============================================================================
// Store Interface
// ============================================================================

export interface ReminderStore {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Reminder
  createReminder(reminder: Reminder): Promise<void>
  getReminder(id: string): Promise<Reminder | null>
  getRemindersByUser(userId: string): Promise<Reminder[]>
  /** Active reminders; rows that fail to decode are reported, not thrown */
  getActiveReminders(): Promise<ReminderBatch>
  updateReminder(id: string, changes: ReminderChanges): Promise<void>
  deleteReminder(id: string): Promise<void>

  // Completion
  upsertCompletion(completion: CompletionRecord): Promise<void>
  getCompletion(reminderId: string, scheduledDate: LocalDate): Promise<CompletionRecord | null>
  getCompletionsByReminder(reminderId: string): Promise<CompletionRecord[]>
  deleteCompletion(reminderId: string, scheduledDate: LocalDate): Promise<void>

  // Skip
  upsertSkip(skip: SkipRecord): Promise<void>
  getSkip(reminderId: string, scheduledDate: LocalDate): Promise<SkipRecord | null>
  getSkipsByReminder(reminderId: string): Promise<SkipRecord[]>
  deleteSkip(reminderId: string, scheduledDate: LocalDate): Promise<void>

  // Streak cache
  getStreakCache(reminderId: string): Promise<StreakCacheEntry | null>
  setStreakCache(entry: StreakCacheEntry): Promise<void>
  clearStreakCache(reminderId: string): Promise<void>

  // Lifecycle (optional: persistent stores may implement)
  close?(): Promise<void>
}

// ============================================================================
// Gating
// ============================================================================

/** The data methods a concrete store implements before gating */
export type StoreOperations = Omit<ReminderStore, 'transaction' | 'close'>

/**
 * Routes every data method through the gate, so no call lands inside
 * another caller's open transaction.
 */
export function gateOperations(ops: StoreOperations, gate: StoreGate): ReminderStore {
  return {
    transaction: <T>(fn: () => Promise<T>) => gate.transaction(fn),

    createReminder: (reminder) => gate.run(() => ops.createReminder(reminder)),
    getReminder: (id) => gate.run(() => ops.getReminder(id)),
    getRemindersByUser: (userId) => gate.run(() => ops.getRemindersByUser(userId)),
    getActiveReminders: () => gate.run(() => ops.getActiveReminders()),
    updateReminder: (id, changes) => gate.run(() => ops.updateReminder(id, changes)),
    deleteReminder: (id) => gate.run(() => ops.deleteReminder(id)),

    upsertCompletion: (c) => gate.run(() => ops.upsertCompletion(c)),
    getCompletion: (reminderId, date) => gate.run(() => ops.getCompletion(reminderId, date)),
    getCompletionsByReminder: (reminderId) => gate.run(() => ops.getCompletionsByReminder(reminderId)),
    deleteCompletion: (reminderId, date) => gate.run(() => ops.deleteCompletion(reminderId, date)),

    upsertSkip: (s) => gate.run(() => ops.upsertSkip(s)),
    getSkip: (reminderId, date) => gate.run(() => ops.getSkip(reminderId, date)),
    getSkipsByReminder: (reminderId) => gate.run(() => ops.getSkipsByReminder(reminderId)),
    deleteSkip: (reminderId, date) => gate.run(() => ops.deleteSkip(reminderId, date)),

    getStreakCache: (reminderId) => gate.run(() => ops.getStreakCache(reminderId)),
    setStreakCache: (entry) => gate.run(() => ops.setStreakCache(entry)),
    clearStreakCache: (reminderId) => gate.run(() => ops.clearStreakCache(reminderId)),
  }
}

// ============================================================================
// Ordering
// ============================================================================

export function byCreation(a: Reminder, b: Reminder): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function byDate(a: { scheduledDate: LocalDate }, b: { scheduledDate: LocalDate }): number {
  return a.scheduledDate < b.scheduledDate ? -1 : a.scheduledDate > b.scheduledDate ? 1 : 0
}

// ============================================================================
// Mock Adapter
// ============================================================================

export type MockStore = ReminderStore & {
  /** Makes every subsequent call to `method` reject with `error` until cleared. */
  failOn(method: keyof ReminderStore, error: Error): void
  clearFailures(): void
}

export function createMockAdapter(): MockStore {
  // ---- State ----
  let state = {
    reminders: new Map<string, Reminder>(),
    completions: new Map<string, CompletionRecord>(),
    skips: new Map<string, SkipRecord>(),
    streakCache: new Map<string, StreakCacheEntry>(),
  }

  const failures = new Map<string, Error>()

  // ---- Transaction ----
  let snapshot: typeof state | null = null

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function key(reminderId: string, date: LocalDate): string {
    return `${reminderId}|${date}`
  }

  function check(method: keyof ReminderStore): void {
    const error = failures.get(method)
    if (error) throw error
  }

  const ops: StoreOperations = {
    // ================================================================
    // Reminder
    // ================================================================
    async createReminder(reminder) {
      check('createReminder')
      if (state.reminders.has(reminder.id)) {
        throw new DuplicateKeyError(`Reminder '${reminder.id}' already exists`)
      }
      state.reminders.set(reminder.id, clone(reminder))
    },

    async getReminder(id) {
      check('getReminder')
      const r = state.reminders.get(id)
      return r ? clone(r) : null
    },

    async getRemindersByUser(userId) {
      check('getRemindersByUser')
      return [...state.reminders.values()]
        .filter((r) => r.userId === userId)
        .sort(byCreation)
        .map(clone)
    },

    async getActiveReminders() {
      check('getActiveReminders')
      const reminders = [...state.reminders.values()]
        .filter((r) => r.active)
        .sort(byCreation)
        .map(clone)
      return { reminders, invalid: [] }
    },

    async updateReminder(id, changes) {
      check('updateReminder')
      const existing = state.reminders.get(id)
      if (!existing) throw new NotFoundError(`Reminder '${id}' not found`)
      state.reminders.set(id, clone({ ...existing, ...changes }))
    },

    async deleteReminder(id) {
      check('deleteReminder')
      if (!state.reminders.delete(id)) throw new NotFoundError(`Reminder '${id}' not found`)
      // History is kept; the derived cache is not
      state.streakCache.delete(id)
    },

    // ================================================================
    // Completion
    // ================================================================
    async upsertCompletion(completion) {
      check('upsertCompletion')
      state.completions.set(key(completion.reminderId, completion.scheduledDate), clone(completion))
    },

    async getCompletion(reminderId, scheduledDate) {
      check('getCompletion')
      const c = state.completions.get(key(reminderId, scheduledDate))
      return c ? clone(c) : null
    },

    async getCompletionsByReminder(reminderId) {
      check('getCompletionsByReminder')
      return [...state.completions.values()]
        .filter((c) => c.reminderId === reminderId)
        .sort(byDate)
        .map(clone)
    },

    async deleteCompletion(reminderId, scheduledDate) {
      check('deleteCompletion')
      state.completions.delete(key(reminderId, scheduledDate))
    },

    // ================================================================
    // Skip
    // ================================================================
    async upsertSkip(skip) {
      check('upsertSkip')
      state.skips.set(key(skip.reminderId, skip.scheduledDate), clone(skip))
    },

    async getSkip(reminderId, scheduledDate) {
      check('getSkip')
      const s = state.skips.get(key(reminderId, scheduledDate))
      return s ? clone(s) : null
    },

    async getSkipsByReminder(reminderId) {
      check('getSkipsByReminder')
      return [...state.skips.values()]
        .filter((s) => s.reminderId === reminderId)
        .sort(byDate)
        .map(clone)
    },

    async deleteSkip(reminderId, scheduledDate) {
      check('deleteSkip')
      state.skips.delete(key(reminderId, scheduledDate))
    },

    // ================================================================
    // Streak cache
    // ================================================================
    async getStreakCache(reminderId) {
      check('getStreakCache')
      const entry = state.streakCache.get(reminderId)
      return entry ? clone(entry) : null
    },

    async setStreakCache(entry) {
      check('setStreakCache')
      state.streakCache.set(entry.reminderId, clone(entry))
    },

    async clearStreakCache(reminderId) {
      check('clearStreakCache')
      state.streakCache.delete(reminderId)
    },
  }

  const gate = createStoreGate({
    begin: () => { snapshot = clone(state) },
    commit: () => { snapshot = null },
    rollback: () => {
      if (snapshot) state = snapshot
      snapshot = null
    },
  })

  return {
    ...gateOperations(ops, gate),

    // ================================================================
    // Fault injection
    // ================================================================
    failOn(method, error) {
      failures.set(method, error)
    },

    clearFailures() {
      failures.clear()
    },
  }
}
