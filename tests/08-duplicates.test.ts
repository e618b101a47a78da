/**
 * Segment 08: Duplicate Detection Tests
 *
 * Active reminders of one user sharing message, time and timezone form a
 * group. The earliest-created one survives; the rest are deactivated and
 * their timers cancelled.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMockAdapter, type MockStore } from '../src/adapter';
import { createDuplicateDetector, findDuplicateGroups, type DuplicateDetector } from '../src/duplicates';
import { createJobScheduler, type JobScheduler } from '../src/job-scheduler';
import { createRecordingNotifier, daily, makeReminder } from './helpers/fixtures';

// ============================================================================
// Pure Grouping
// ============================================================================

describe('findDuplicateGroups', () => {
  it('groups by user, message, time and timezone', () => {
    const groups = findDuplicateGroups([
      makeReminder({ id: 'a', message: 'Drink water', schedule: daily('10:00') }),
      makeReminder({ id: 'b', message: 'Drink water', schedule: daily('10:00'), createdAt: '2024-01-02T00:00:00.000Z' }),
      makeReminder({ id: 'c', message: 'Drink water', schedule: daily('11:00') }),
      makeReminder({ id: 'd', message: 'Drink water', schedule: daily('10:00', 'Europe/Stockholm') }),
      makeReminder({ id: 'e', message: 'Drink water', schedule: daily('10:00'), userId: 'u2' }),
    ]);

    expect(groups).toEqual([{
      userId: 'u1',
      message: 'Drink water',
      time: '10:00',
      timezone: 'UTC',
      keepId: 'a',
      removeIds: ['b'],
      duplicateCount: 2,
    }]);
  });

  it('ignores inactive reminders', () => {
    expect(findDuplicateGroups([
      makeReminder({ id: 'a' }),
      makeReminder({ id: 'b', active: false }),
    ])).toEqual([]);
  });

  it('keeps the lowest id when creation times tie', () => {
    const [group] = findDuplicateGroups([makeReminder({ id: 'z' }), makeReminder({ id: 'm' })]);
    expect(group?.keepId).toBe('m');
    expect(group?.removeIds).toEqual(['z']);
  });

  it('orders groups by user, then larger groups first', () => {
    const groups = findDuplicateGroups([
      makeReminder({ id: 'a1', message: 'A' }),
      makeReminder({ id: 'a2', message: 'A' }),
      makeReminder({ id: 'b1', message: 'B' }),
      makeReminder({ id: 'b2', message: 'B' }),
      makeReminder({ id: 'b3', message: 'B' }),
      makeReminder({ id: 'c1', message: 'C', userId: 'u0' }),
      makeReminder({ id: 'c2', message: 'C', userId: 'u0' }),
    ]);
    expect(groups.map((g) => g.keepId)).toEqual(['c1', 'b1', 'a1']);
  });
});

// ============================================================================
// Detector Service
// ============================================================================

describe('Duplicate Detector', () => {
  let store: MockStore;
  let scheduler: JobScheduler;
  let detector: DuplicateDetector;

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T08:00:00.000Z'));
    store = createMockAdapter();
    scheduler = createJobScheduler({ store, notifier: createRecordingNotifier() });
    detector = createDuplicateDetector({ store, scheduler });

    const first = makeReminder({ id: 'first', message: 'Drink water', schedule: daily('10:00') });
    const second = makeReminder({
      id: 'second', message: 'Drink water', schedule: daily('10:00'), createdAt: '2024-01-05T00:00:00.000Z',
    });
    for (const r of [first, second]) {
      await store.createReminder(r);
      await scheduler.schedule(r);
    }
  });

  afterEach(async () => {
    await scheduler.shutdown();
    vi.useRealTimers();
  });

  it('scans without changing anything', async () => {
    const groups = await detector.scan();
    expect(groups).toHaveLength(1);
    expect(groups[0]?.duplicateCount).toBe(2);
    expect(scheduler.jobCount()).toBe(2);
  });

  it('deactivates the later-created reminder and cancels its timer', async () => {
    const result = await detector.resolve();

    expect(result).toMatchObject({ checked: 2, deactivated: 1, removedIds: ['second'], failedIds: [] });
    expect((await store.getReminder('second'))?.active).toBe(false);
    expect((await store.getReminder('second'))?.updatedAt).toBe('2024-01-15T08:00:00.000Z');
    expect((await store.getReminder('first'))?.active).toBe(true);
    expect(scheduler.getJob('second')).toBeNull();
    expect(scheduler.getJob('first')).not.toBeNull();
  });

  it('is a no-op the second time', async () => {
    await detector.resolve();
    const again = await detector.resolve();
    expect(again).toEqual({ checked: 1, groups: [], deactivated: 0, removedIds: [], failedIds: [] });
  });

  it('can be limited to one user', async () => {
    expect(await detector.scan('someone-else')).toEqual([]);
    expect(await detector.resolve('someone-else')).toMatchObject({ checked: 0, deactivated: 0 });
    expect(scheduler.jobCount()).toBe(2);
  });

  it('reports a reminder it could not deactivate and keeps its timer', async () => {
    store.failOn('updateReminder', new Error('locked'));
    const result = await detector.resolve();
    expect(result.failedIds).toEqual(['second']);
    expect(result.deactivated).toBe(0);
    expect(scheduler.getJob('second')).not.toBeNull();
  });
});
