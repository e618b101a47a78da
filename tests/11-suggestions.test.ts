/**
 * Segment 11: Adaptive Suggestion Tests
 *
 * Suggestions are derived from real analytics over generated histories:
 * a consistent delay moves the time, a lagging weekday gets a backup
 * reminder, and diverging weekdays and weekends get separate times.
 */
import { describe, it, expect } from 'vitest';
import { createMockAdapter } from '../src/adapter';
import { classifyOccurrences, computeAnalytics, createAnalyticsEngine } from '../src/analytics';
import type { CompletionRecord, Reminder } from '../src/domain-types';
import { ForbiddenError } from '../src/errors';
import { createSuggestionEngine, generateSuggestions, type SuggestionInput } from '../src/suggestions';
import { completion, makeReminder, oneTime, weekly } from './helpers/fixtures';

const DAY_MS = 86_400_000;

/** Completions for each date in [first, last] where `delay` returns minutes late, or null for none. */
function history(first: string, last: string, delay: (weekday: number) => number | null): CompletionRecord[] {
  const records: CompletionRecord[] = [];
  for (let t = Date.parse(`${first}T00:00:00.000Z`); t <= Date.parse(`${last}T00:00:00.000Z`); t += DAY_MS) {
    const day = new Date(t).toISOString().slice(0, 10);
    // getUTCDay: 0 = Sunday; shift to 0 = Monday
    const weekday = (new Date(t).getUTCDay() + 6) % 7;
    const minutes = delay(weekday);
    if (minutes === null) continue;
    const at = Date.parse(`${day}T09:00:00.000Z`) + minutes * 60_000;
    records.push(completion(day, new Date(at).toISOString()));
  }
  return records;
}

function analyse(reminder: Reminder, completions: CompletionRecord[], now: Date): SuggestionInput {
  const input = { reminder, completions, skips: [], periodDays: 30, now };
  return {
    schedule: reminder.schedule,
    snapshot: computeAnalytics(input),
    outcomes: classifyOccurrences(input),
  };
}

/** Four full weeks, Monday 2023-12-18 through Sunday 2024-01-14 */
const fourWeeks = makeReminder({ createdAt: '2023-12-18T00:00:00.000Z' });
const SUNDAY_NOON = new Date('2024-01-14T12:00:00.000Z');

// ============================================================================
// Time Shift
// ============================================================================

describe('time shift', () => {
  const tenDays = makeReminder({ createdAt: '2024-01-06T00:00:00.000Z' });
  const now = new Date('2024-01-15T12:00:00.000Z');

  it('moves the time by the average delay', () => {
    const suggestions = generateSuggestions(analyse(tenDays, history('2024-01-06', '2024-01-15', () => 45), now));

    expect(suggestions).toEqual([{
      kind: 'timeShift',
      priority: 'medium',
      title: 'Adjust Reminder Time',
      rationale:
        'Across 10 completions you finished on average 45 minutes late. ' +
        'Moving the reminder from 09:00 to 09:45 matches when you actually act on it.',
      proposedChange: { kind: 'timeShift', currentTime: '09:00', suggestedTime: '09:45' },
    }]);
  });

  it('is high priority beyond an hour', () => {
    const [suggestion] = generateSuggestions(analyse(tenDays, history('2024-01-06', '2024-01-15', () => 90), now));
    expect(suggestion?.priority).toBe('high');
    expect(suggestion?.proposedChange).toEqual({ kind: 'timeShift', currentTime: '09:00', suggestedTime: '10:30' });
  });

  it('moves the time earlier for early completions', () => {
    const [suggestion] = generateSuggestions(analyse(tenDays, history('2024-01-06', '2024-01-15', () => -40), now));
    expect(suggestion?.proposedChange).toEqual({ kind: 'timeShift', currentTime: '09:00', suggestedTime: '08:20' });
    expect(suggestion?.rationale).toContain('40 minutes early');
  });

  it('stays quiet at the threshold', () => {
    expect(generateSuggestions(analyse(tenDays, history('2024-01-06', '2024-01-15', () => 30), now))).toEqual([]);
  });

  it('needs enough completions', () => {
    const recent = makeReminder({ createdAt: '2024-01-12T00:00:00.000Z' });
    expect(generateSuggestions(analyse(recent, history('2024-01-12', '2024-01-15', () => 45), now))).toEqual([]);
  });
});

// ============================================================================
// Difficult Days
// ============================================================================

describe('difficult day support', () => {
  it('proposes an earlier backup on a lagging weekday', () => {
    const completions = history('2023-12-18', '2024-01-14', (weekday) => (weekday === 0 ? null : 0));
    const suggestions = generateSuggestions(analyse(fourWeeks, completions, SUNDAY_NOON));

    expect(suggestions).toEqual([{
      kind: 'difficultDaySupport',
      priority: 'high',
      title: 'Monday Needs Support',
      rationale:
        'Monday completion is 0% against 85.7% overall (0 of 4). ' +
        'An extra reminder at 08:00 on Mondays may help.',
      proposedChange: { kind: 'difficultDaySupport', weekday: 0, backupTime: '08:00' },
    }]);
  });

  it('ignores weekdays the reminder is not scheduled on', () => {
    const weekdaysOnly = makeReminder({ createdAt: '2023-12-18T00:00:00.000Z', schedule: weekly('09:00', [1, 2, 3, 4]) });
    const completions = history('2023-12-18', '2024-01-14', (weekday) => (weekday === 0 ? null : 0));
    expect(generateSuggestions(analyse(weekdaysOnly, completions, SUNDAY_NOON))).toEqual([]);
  });
});

// ============================================================================
// Schedule Split
// ============================================================================

describe('schedule split', () => {
  it('splits when weekend timing diverges, after the time shift', () => {
    const completions = history('2023-12-18', '2024-01-14', (weekday) => (weekday >= 5 ? 120 : 0));
    const suggestions = generateSuggestions(analyse(fourWeeks, completions, SUNDAY_NOON));

    expect(suggestions.map((s) => s.kind)).toEqual(['timeShift', 'scheduleSplit']);
    expect(suggestions[0]?.proposedChange).toEqual({ kind: 'timeShift', currentTime: '09:00', suggestedTime: '09:34' });
    expect(suggestions[1]).toMatchObject({
      priority: 'medium',
      title: 'Different Schedule for Weekends',
      proposedChange: {
        kind: 'scheduleSplit',
        weekdays: [0, 1, 2, 3, 4],
        weekdayTime: '09:00',
        weekendDays: [5, 6],
        weekendTime: '11:00',
      },
    });
  });

  it('ranks high-priority day support ahead of the split', () => {
    const completions = history('2023-12-18', '2024-01-14', (weekday) => (weekday >= 5 ? null : 0));
    const suggestions = generateSuggestions(analyse(fourWeeks, completions, SUNDAY_NOON));

    expect(suggestions.map((s) => s.kind)).toEqual(['difficultDaySupport', 'difficultDaySupport', 'scheduleSplit']);
    expect(suggestions.map((s) => s.title)).toEqual([
      'Saturday Needs Support', 'Sunday Needs Support', 'Different Schedule for Weekends',
    ]);
  });
});

// ============================================================================
// Engine
// ============================================================================

describe('Suggestion Engine', () => {
  it('returns nothing for one-time reminders', () => {
    const once = makeReminder({ schedule: oneTime('2024-01-15', '09:00') });
    expect(generateSuggestions(analyse(once, history('2024-01-15', '2024-01-15', () => 120), SUNDAY_NOON))).toEqual([]);
  });

  it('suggests from stored history', async () => {
    const store = createMockAdapter();
    await store.createReminder(makeReminder({ createdAt: '2024-01-06T00:00:00.000Z' }));
    for (const c of history('2024-01-06', '2024-01-15', () => 45)) await store.upsertCompletion(c);

    const analytics = createAnalyticsEngine({ store, now: () => new Date('2024-01-15T12:00:00.000Z') });
    const engine = createSuggestionEngine({ analytics });

    const suggestions = await engine.suggest('r1');
    expect(suggestions.map((s) => s.proposedChange)).toEqual([
      { kind: 'timeShift', currentTime: '09:00', suggestedTime: '09:45' },
    ]);
    await expect(engine.suggest('r1', { userId: 'u2' })).rejects.toThrow(ForbiddenError);
  });
});
