/**
 * Segment 13: Public API Tests
 *
 * The assembled engine: settings resolution, startup loading, event fan-out,
 * action callbacks, periodic duplicate cleanup and shutdown, plus the
 * end-to-end reminder scenarios.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMockAdapter, type MockStore } from '../src/adapter';
import { ValidationError } from '../src/errors';
import {
  createReminderEngine, type EngineEvent, type ReminderEngine, type ReminderEngineConfig,
} from '../src/public-api';
import {
  captureLogs, createRecordingNotifier, makeReminder, oneTime, type RecordingNotifier,
} from './helpers/fixtures';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

const DAILY_9_UTC = { type: 'daily', time: '09:00', timezone: 'UTC', daysOfWeek: [0, 1, 2, 3, 4, 5, 6] };
const DAILY_9_STOCKHOLM = { ...DAILY_9_UTC, timezone: 'Europe/Stockholm' };

describe('Reminder Engine', () => {
  let store: MockStore;
  let notifier: RecordingNotifier;
  let logs: ReturnType<typeof captureLogs>;
  let engine: ReminderEngine;

  function build(overrides: Partial<ReminderEngineConfig> = {}): ReminderEngine {
    engine = createReminderEngine({ store, notifier, env: {}, logWriter: logs.writer, ...overrides });
    return engine;
  }

  async function advance(ms: number): Promise<void> {
    await vi.advanceTimersByTimeAsync(ms);
    await engine.scheduler.idle();
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T07:00:00.000Z'));
    store = createMockAdapter();
    notifier = createRecordingNotifier();
    logs = captureLogs();
    build();
  });

  afterEach(async () => {
    await engine.shutdown();
    vi.useRealTimers();
  });

  // ==========================================================================
  // Construction
  // ==========================================================================

  describe('settings', () => {
    it('merges environment and explicit overrides', () => {
      build({ env: { REMINDER_SNOOZE_MINUTES: '15' }, settings: { analytics: { defaultPeriodDays: 14 } } });
      expect(engine.settings.scheduler.defaultSnoozeMinutes).toBe(15);
      expect(engine.settings.analytics.defaultPeriodDays).toBe(14);
      expect(engine.settings.streak.graceMinutes).toBe(0);
    });

    it('rejects invalid settings', () => {
      expect(() => createReminderEngine({
        store, notifier, env: {}, settings: { scheduler: { defaultSnoozeMinutes: 0 } },
      })).toThrow(ValidationError);
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe('init', () => {
    it('arms active reminders and tolerates finished one-time reminders', async () => {
      await store.createReminder(makeReminder());
      await store.createReminder(makeReminder({ id: 'past', schedule: oneTime('2024-01-10', '09:00') }));

      const report = await engine.init();

      expect(report).toEqual({ armed: 1, skipped: 1, failed: 0, failures: [] });
      expect(engine.scheduler.getJob('past')).toBeNull();
    });
  });

  describe('shutdown', () => {
    it('stops timers, closes the store and logs', async () => {
      const close = vi.fn(async () => {});
      store = Object.assign(createMockAdapter(), { close });
      build();
      await store.createReminder(makeReminder());
      await engine.init();

      await engine.shutdown();

      expect(close).toHaveBeenCalledTimes(1);
      expect(engine.scheduler.jobCount()).toBe(0);
      expect(logs.entries.map((e) => e.message)).toContain('Engine stopped');
    });
  });

  // ==========================================================================
  // Events
  // ==========================================================================

  describe('events', () => {
    it('delivers typed events and supports unsubscribe', async () => {
      const scheduled: string[] = [];
      const off = engine.on('scheduled', (event) => { scheduled.push(event.at.toISOString()); });

      const { reminder } = await engine.reminders.create({ userId: 'u1', message: 'A', schedule: DAILY_9_UTC });
      off();
      await engine.reminders.update(reminder.id, 'u1', { schedule: { ...DAILY_9_UTC, time: '10:00' } });

      expect(scheduled).toEqual(['2024-01-15T09:00:00.000Z']);
    });

    it('logs a failing handler and carries on', async () => {
      engine.on('scheduled', () => { throw new Error('listener broke'); });

      const { outcome } = await engine.reminders.create({ userId: 'u1', message: 'A', schedule: DAILY_9_UTC });

      expect(outcome.status).toBe('scheduled');
      const failure = logs.entries.find((e) => e.level === 'error');
      expect(failure?.message).toBe("Event handler failed on 'scheduled'");
      expect(failure?.component).toBe('engine');
      expect(failure?.error?.message).toBe('listener broke');
    });
  });

  // ==========================================================================
  // Delivery & Actions
  // ==========================================================================

  describe('delivery and actions', () => {
    it('fires, records the completion through the action callback and updates the streak', async () => {
      const events: EngineEvent[] = [];
      engine.on('fired', (e) => { events.push(e); });
      engine.on('completionRecorded', (e) => { events.push(e); });

      const { reminder } = await engine.reminders.create({
        userId: 'u1', message: 'Take vitamin D', schedule: DAILY_9_STOCKHOLM, streakMotivation: true,
      });

      await advance(HOUR);
      expect(notifier.sent).toEqual([{
        userId: 'u1',
        reminderId: reminder.id,
        message: 'Take vitamin D',
        scheduledDate: '2024-01-15',
        scheduledTime: '09:00',
        snoozed: false,
        currentStreak: 0,
      }]);

      await advance(10 * MINUTE);
      const result = await engine.actions.onComplete({ reminderId: reminder.id, userId: 'u1', scheduledDate: '2024-01-15' });

      expect(result.timing).toEqual({ status: 'late', delayMinutes: 10 });
      expect(events.map((e) => e.type)).toEqual(['fired', 'completionRecorded']);
      expect(await engine.streaks.get(reminder.id)).toEqual({ status: 'computed', currentStreak: 1, bestStreak: 1 });
    });

    it('snoozes with the configured default delay', async () => {
      const { reminder } = await engine.reminders.create({ userId: 'u1', message: 'A', schedule: DAILY_9_UTC });
      await advance(2 * HOUR);

      const outcome = await engine.actions.onSnooze(reminder.id, 'u1');
      expect(outcome.delayMinutes).toBe(30);
      expect(outcome.fireAt.toISOString()).toBe('2024-01-15T09:30:00.000Z');

      await advance(30 * MINUTE);
      expect(notifier.sent.map((n) => n.snoozed)).toEqual([false, true]);
    });

    it('records a skip through the action callback', async () => {
      const { reminder } = await engine.reminders.create({ userId: 'u1', message: 'A', schedule: DAILY_9_UTC });
      const result = await engine.actions.onSkip({
        reminderId: reminder.id, userId: 'u1', scheduledDate: '2024-01-15', reason: 'doctor_advice',
      });
      expect(result.record.reason).toBe('doctor_advice');
    });
  });

  // ==========================================================================
  // Scenarios
  // ==========================================================================

  describe('scenarios', () => {
    it('a missed Saturday ends a five-day streak', async () => {
      vi.setSystemTime(new Date('2024-01-15T06:00:00.000Z'));
      const { reminder } = await engine.reminders.create({
        userId: 'u1', message: 'Take vitamin D', schedule: DAILY_9_STOCKHOLM,
      });
      for (const day of ['2024-01-15', '2024-01-16', '2024-01-17', '2024-01-18', '2024-01-19']) {
        await engine.tracker.recordCompletion({
          reminderId: reminder.id, userId: 'u1', scheduledDate: day, completedAt: new Date(`${day}T08:10:00.000Z`),
        });
      }

      vi.setSystemTime(new Date('2024-01-20T11:00:00.000Z'));

      expect(await engine.streaks.get(reminder.id)).toEqual({ status: 'computed', currentStreak: 0, bestStreak: 5 });
      const snapshot = await engine.analytics.getSnapshot(reminder.id, { periodDays: 7 });
      expect(snapshot).toMatchObject({
        totalExpected: 6, totalCompletions: 5, totalMissed: 1, completionRate: 83.3, averageDelayMinutes: 10,
      });
    });

    it('identical reminders are reduced to the earliest one', async () => {
      const resolved: string[][] = [];
      engine.on('duplicatesResolved', (e) => { resolved.push(e.resolution.removedIds); });

      const first = await engine.reminders.create({ userId: 'u1', message: 'Drink water', schedule: { ...DAILY_9_UTC, time: '10:00' } });
      vi.setSystemTime(new Date('2024-01-15T07:01:00.000Z'));
      const second = await engine.reminders.create({ userId: 'u1', message: 'Drink water', schedule: { ...DAILY_9_UTC, time: '10:00' } });

      const groups = await engine.duplicates.scan();
      expect(groups.map((g) => [g.keepId, g.duplicateCount])).toEqual([[first.reminder.id, 2]]);

      await engine.resolveDuplicates();
      await engine.resolveDuplicates();

      expect(resolved).toEqual([[second.reminder.id]]);
      expect(engine.scheduler.getJob(second.reminder.id)).toBeNull();
      expect((await store.getReminder(second.reminder.id))?.active).toBe(false);
    });

    it('a consistent delay produces a time shift', async () => {
      vi.setSystemTime(new Date('2024-01-06T00:00:00.000Z'));
      const { reminder } = await engine.reminders.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9_UTC });
      for (let day = 6; day <= 15; day++) {
        const date = `2024-01-${String(day).padStart(2, '0')}`;
        await engine.tracker.recordCompletion({
          reminderId: reminder.id, userId: 'u1', scheduledDate: date, completedAt: new Date(`${date}T09:45:00.000Z`),
        });
      }
      vi.setSystemTime(new Date('2024-01-15T12:00:00.000Z'));

      const suggestions = await engine.suggestions.suggest(reminder.id, { userId: 'u1' });
      expect(suggestions.map((s) => s.proposedChange)).toEqual([
        { kind: 'timeShift', currentTime: '09:00', suggestedTime: '09:45' },
      ]);
    });
  });

  // ==========================================================================
  // Periodic Cleanup
  // ==========================================================================

  describe('periodic duplicate cleanup', () => {
    it('runs on the configured interval', async () => {
      build({ settings: { duplicates: { cleanupIntervalMinutes: 60 } } });
      await store.createReminder(makeReminder({ id: 'a' }));
      await store.createReminder(makeReminder({ id: 'b', createdAt: '2024-01-02T00:00:00.000Z' }));
      const resolved: string[][] = [];
      engine.on('duplicatesResolved', (e) => { resolved.push(e.resolution.removedIds); });

      await engine.init();
      await vi.advanceTimersByTimeAsync(30 * MINUTE);
      expect(resolved).toEqual([]);

      await vi.advanceTimersByTimeAsync(30 * MINUTE);
      await engine.shutdown();

      expect(resolved).toEqual([['b']]);
      expect((await store.getReminder('b'))?.active).toBe(false);
    });

    it('is off by default', async () => {
      await store.createReminder(makeReminder({ id: 'a' }));
      await store.createReminder(makeReminder({ id: 'b', createdAt: '2024-01-02T00:00:00.000Z' }));
      await engine.init();

      await vi.advanceTimersByTimeAsync(HOUR);
      expect((await store.getReminder('b'))?.active).toBe(true);
    });
  });
});
