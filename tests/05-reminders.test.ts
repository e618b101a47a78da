/**
 * Segment 05: Reminder Lifecycle Tests
 *
 * Create, update, pause, resume and delete. Each mutation is validated
 * before anything is persisted, owner-checked, and applied together with the
 * matching timer change.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMockAdapter, type MockStore } from '../src/adapter';
import { createJobScheduler, type JobScheduler } from '../src/job-scheduler';
import { createReminderService, MAX_MESSAGE_LENGTH, type ReminderService } from '../src/reminders';
import {
  ForbiddenError, InvalidScheduleError, NotFoundError, PersistenceError, ValidationError,
} from '../src/errors';
import { completion, createRecordingNotifier } from './helpers/fixtures';

const DAILY_9 = { type: 'daily', time: '09:00', timezone: 'UTC', daysOfWeek: [0, 1, 2, 3, 4, 5, 6] };

describe('Reminder Service', () => {
  let store: MockStore;
  let scheduler: JobScheduler;
  let service: ReminderService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T08:00:00.000Z'));
    store = createMockAdapter();
    scheduler = createJobScheduler({ store, notifier: createRecordingNotifier() });
    service = createReminderService({ store, scheduler });
  });

  afterEach(async () => {
    await scheduler.shutdown();
    vi.useRealTimers();
  });

  // ==========================================================================
  // Create
  // ==========================================================================

  describe('create', () => {
    it('persists, applies defaults and arms the next occurrence', async () => {
      const { reminder, outcome } = await service.create({
        userId: 'u1',
        message: '  Take vitamins  ',
        schedule: DAILY_9,
      });

      expect(reminder.message).toBe('Take vitamins');
      expect(reminder.active).toBe(true);
      expect(reminder.trackingEnabled).toBe(true);
      expect(reminder.streakMotivation).toBe(false);
      expect(reminder.createdAt).toBe('2024-01-15T08:00:00.000Z');
      expect(await store.getReminder(reminder.id)).toEqual(reminder);

      expect(outcome.status).toBe('scheduled');
      expect(scheduler.getJob(reminder.id)?.at.toISOString()).toBe('2024-01-15T09:00:00.000Z');
    });

    it('rejects an empty message', async () => {
      await expect(service.create({ userId: 'u1', message: '   ', schedule: DAILY_9 }))
        .rejects.toThrow(new ValidationError('Message cannot be empty'));
    });

    it('rejects a message over the limit', async () => {
      const message = 'x'.repeat(MAX_MESSAGE_LENGTH + 1);
      await expect(service.create({ userId: 'u1', message, schedule: DAILY_9 }))
        .rejects.toThrow('Message must be 4000 characters or less');
    });

    it('rejects an invalid schedule without persisting or arming', async () => {
      await expect(service.create({
        userId: 'u1',
        message: 'Stretch',
        schedule: { type: 'weekly', time: '09:00', timezone: 'UTC', daysOfWeek: [] },
      })).rejects.toThrow(InvalidScheduleError);
      expect(await store.getRemindersByUser('u1')).toEqual([]);
      expect(scheduler.jobCount()).toBe(0);
    });

    it('keeps a one-time reminder whose moment already passed, unarmed', async () => {
      const { reminder, outcome } = await service.create({
        userId: 'u1',
        message: 'Call the pharmacy',
        schedule: { type: 'oneTime', date: '2024-01-14', time: '12:00', timezone: 'UTC' },
      });
      expect(outcome.status).toBe('noFurtherOccurrence');
      expect(await store.getReminder(reminder.id)).not.toBeNull();
      expect(scheduler.jobCount()).toBe(0);
    });

    it('wraps a store failure and leaves no timer behind', async () => {
      store.failOn('createReminder', new Error('disk full'));
      await expect(service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 }))
        .rejects.toThrow(PersistenceError);
      expect(scheduler.jobCount()).toBe(0);
    });
  });

  // ==========================================================================
  // Update
  // ==========================================================================

  describe('update', () => {
    it('re-arms at the new time and clears the streak cache', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      await store.setStreakCache({
        reminderId: reminder.id,
        currentStreak: 2,
        bestStreak: 2,
        computedAt: '2024-01-15T08:00:00.000Z',
        validUntil: '2024-01-15T09:00:00.000Z',
      });

      const { reminder: updated, outcome } = await service.update(reminder.id, 'u1', {
        schedule: { ...DAILY_9, time: '10:30' },
      });

      expect(updated.schedule.time).toBe('10:30');
      expect(outcome.status).toBe('scheduled');
      expect(scheduler.getJob(reminder.id)?.at.toISOString()).toBe('2024-01-15T10:30:00.000Z');
      expect(scheduler.jobCount()).toBe(1);
      expect(await store.getStreakCache(reminder.id)).toBeNull();
    });

    it('toggles the completion check', async () => {
      const { reminder } = await service.create({
        userId: 'u1', message: 'Stretch', schedule: DAILY_9, skipWhenCompleted: true,
      });
      expect(reminder.skipWhenCompleted).toBe(true);

      const { reminder: updated } = await service.update(reminder.id, 'u1', { skipWhenCompleted: false });
      expect(updated.skipWhenCompleted).toBe(false);
      expect((await store.getReminder(reminder.id))?.skipWhenCompleted).toBe(false);
    });

    it('keeps the streak cache when only the message changes', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      const entry = {
        reminderId: reminder.id,
        currentStreak: 2,
        bestStreak: 2,
        computedAt: '2024-01-15T08:00:00.000Z',
        validUntil: '2024-01-15T09:00:00.000Z',
      };
      await store.setStreakCache(entry);
      await service.update(reminder.id, 'u1', { message: 'Stretch well' });
      expect(await store.getStreakCache(reminder.id)).toEqual(entry);
      expect((await store.getReminder(reminder.id))?.message).toBe('Stretch well');
    });

    it('leaves the stored reminder untouched when the new schedule is invalid', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      await expect(service.update(reminder.id, 'u1', { schedule: { ...DAILY_9, time: '26:00' } }))
        .rejects.toThrow(InvalidScheduleError);
      expect((await store.getReminder(reminder.id))?.schedule.time).toBe('09:00');
      expect(scheduler.getJob(reminder.id)?.scheduledTime).toBe('09:00');
    });

    it('arms the stored schedule when two updates race', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });

      const [bySchedule, byMessage] = await Promise.all([
        service.update(reminder.id, 'u1', { schedule: { ...DAILY_9, time: '20:00' } }),
        service.update(reminder.id, 'u1', { message: 'new text' }),
      ]);

      const stored = await store.getReminder(reminder.id);
      expect(stored?.schedule.time).toBe('20:00');
      expect(stored?.message).toBe('new text');
      expect(bySchedule.reminder.message).toBe('Stretch');
      expect(byMessage.reminder.schedule.time).toBe('20:00');
      expect(scheduler.getJob(reminder.id)?.at.toISOString()).toBe('2024-01-15T20:00:00.000Z');
      expect(scheduler.jobCount()).toBe(1);
    });

    it('does not re-arm a reminder paused while an update was queued', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });

      const [, updated] = await Promise.all([
        service.pause(reminder.id, 'u1'),
        service.update(reminder.id, 'u1', { message: 'later' }),
      ]);

      expect(updated.outcome.status).toBe('inactive');
      expect(updated.reminder.active).toBe(false);
      expect(scheduler.getJob(reminder.id)).toBeNull();
    });

    it('rejects another user', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      await expect(service.update(reminder.id, 'intruder', { message: 'x' })).rejects.toThrow(ForbiddenError);
    });

    it('rejects an unknown reminder', async () => {
      await expect(service.update('missing', 'u1', { message: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  // ==========================================================================
  // Pause / Resume / Delete
  // ==========================================================================

  describe('pause and resume', () => {
    it('pausing deactivates and cancels; resuming re-arms', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });

      const paused = await service.pause(reminder.id, 'u1');
      expect(paused.active).toBe(false);
      expect((await store.getReminder(reminder.id))?.active).toBe(false);
      expect(scheduler.getJob(reminder.id)).toBeNull();

      const { reminder: resumed, outcome } = await service.resume(reminder.id, 'u1');
      expect(resumed.active).toBe(true);
      expect(outcome.status).toBe('scheduled');
      expect(scheduler.getJob(reminder.id)?.scheduledDate).toBe('2024-01-15');
    });
  });

  describe('delete', () => {
    it('removes the reminder and its timer but keeps history', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      await store.upsertCompletion(completion('2024-01-14', '2024-01-14T09:00:00.000Z', { reminderId: reminder.id }));

      await service.delete(reminder.id, 'u1');

      expect(await store.getReminder(reminder.id)).toBeNull();
      expect(scheduler.jobCount()).toBe(0);
      expect(await store.getCompletionsByReminder(reminder.id)).toHaveLength(1);
    });

    it('rejects another user without touching anything', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'Stretch', schedule: DAILY_9 });
      await expect(service.delete(reminder.id, 'intruder')).rejects.toThrow(ForbiddenError);
      expect(scheduler.jobCount()).toBe(1);
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe('reads', () => {
    it('lists a user reminders, optionally only active ones', async () => {
      const a = await service.create({ userId: 'u1', message: 'A', schedule: DAILY_9 });
      vi.setSystemTime(new Date('2024-01-15T08:01:00.000Z'));
      const b = await service.create({ userId: 'u1', message: 'B', schedule: DAILY_9 });
      await service.create({ userId: 'u2', message: 'C', schedule: DAILY_9 });
      await service.pause(a.reminder.id, 'u1');

      expect((await service.listForUser('u1')).map((r) => r.message)).toEqual(['A', 'B']);
      expect((await service.listForUser('u1', { activeOnly: true })).map((r) => r.id)).toEqual([b.reminder.id]);
    });

    it('get enforces ownership', async () => {
      const { reminder } = await service.create({ userId: 'u1', message: 'A', schedule: DAILY_9 });
      expect((await service.get(reminder.id, 'u1')).id).toBe(reminder.id);
      await expect(service.get(reminder.id, 'u2')).rejects.toThrow(ForbiddenError);
    });
  });
});
