/**
 * Tests for writing stats, goals and streaks.
 */

import { describe, it, expect } from 'vitest';
import {
  createStatsState,
  dateKey,
  formatElapsed,
  observeWordCount,
  previousDay,
  progress,
  rebaseWordCount,
  sessionStats,
  streak,
  wordsOn,
} from './stats.ts';

/** Local noon on the given day, so time zones never shift the date */
function noon(year: number, month: number, day: number): number {
  return new Date(year, month - 1, day, 12).getTime();
}

// =============================================================================
// Date Tests
// =============================================================================

describe('dates', () => {
  it('should key timestamps by local date', () => {
    expect(dateKey(noon(2024, 1, 5))).toBe('2024-01-05');
    expect(dateKey(new Date(2024, 11, 31, 23, 59).getTime())).toBe('2024-12-31');
  });

  it('should step back across month and year boundaries', () => {
    expect(previousDay('2024-03-10')).toBe('2024-03-09');
    expect(previousDay('2024-03-01')).toBe('2024-02-29');
    expect(previousDay('2023-03-01')).toBe('2023-02-28');
    expect(previousDay('2024-01-01')).toBe('2023-12-31');
  });
});

// =============================================================================
// Tracking Tests
// =============================================================================

describe('observeWordCount', () => {
  const start = noon(2024, 3, 10);

  it('should credit increases to today', () => {
    let stats = createStatsState({}, 10, start);
    stats = observeWordCount(stats, 15, start + 1000);
    expect(wordsOn(stats.days, '2024-03-10')).toBe(5);
  });

  it('should move the baseline down without crediting', () => {
    let stats = createStatsState({ '2024-03-10': 100 }, 10, start);
    stats = observeWordCount(stats, 4, start + 1000);
    expect(wordsOn(stats.days, '2024-03-10')).toBe(100);
    stats = observeWordCount(stats, 12, start + 2000);
    expect(wordsOn(stats.days, '2024-03-10')).toBe(108);
  });

  it('should return the same state when the count is unchanged', () => {
    const stats = createStatsState({}, 10, start);
    expect(observeWordCount(stats, 10, start + 1000)).toBe(stats);
  });

  it('should credit the day the words were written', () => {
    let stats = createStatsState({}, 0, start);
    stats = observeWordCount(stats, 3, start);
    stats = observeWordCount(stats, 10, noon(2024, 3, 11));
    expect(stats.days).toEqual({ '2024-03-10': 3, '2024-03-11': 7 });
  });
});

describe('rebaseWordCount', () => {
  it('should move the baseline without touching the totals', () => {
    const stats = rebaseWordCount(createStatsState({}, 10, 0), 500);
    expect(stats.lastWordCount).toBe(500);
    expect(stats.days).toEqual({});
  });
});

// =============================================================================
// Goal Tests
// =============================================================================

describe('streak', () => {
  const days = {
    '2024-03-01': 500,
    '2024-03-02': 650,
    '2024-03-03': 500,
    '2024-03-05': 100,
  };

  it('should count consecutive days meeting the goal', () => {
    expect(streak(days, 500, '2024-03-03')).toBe(3);
  });

  it('should not break while today is still short of the goal', () => {
    expect(streak(days, 500, '2024-03-04')).toBe(3);
  });

  it('should reset after a day without meeting the goal', () => {
    expect(streak(days, 500, '2024-03-05')).toBe(0);
  });

  it('should be zero when goals are off', () => {
    expect(streak(days, 0, '2024-03-03')).toBe(0);
  });
});

describe('progress', () => {
  it('should report the fraction of the goal reached', () => {
    expect(progress({ '2024-03-10': 250 }, 500, '2024-03-10')).toEqual({
      ratio: 0.5,
      raw: 0.5,
      exceeded: false,
    });
  });

  it('should clamp the ratio and flag an exceeded goal', () => {
    expect(progress({ '2024-03-10': 750 }, 500, '2024-03-10')).toEqual({
      ratio: 1,
      raw: 1.5,
      exceeded: true,
    });
  });

  it('should report nothing when goals are off', () => {
    expect(progress({ '2024-03-10': 750 }, 0, '2024-03-10')).toEqual({
      ratio: 0,
      raw: 0,
      exceeded: false,
    });
  });
});

// =============================================================================
// Session Tests
// =============================================================================

describe('formatElapsed', () => {
  it('should format minutes and hours', () => {
    expect(formatElapsed(0)).toBe('0m');
    expect(formatElapsed(59_999)).toBe('0m');
    expect(formatElapsed(25 * 60_000)).toBe('25m');
    expect(formatElapsed(65 * 60_000)).toBe('1h 5m');
  });
});

describe('sessionStats', () => {
  it('should report words written since the session started', () => {
    const stats = createStatsState({}, 10, 1000);
    expect(sessionStats(stats, 25, 1000 + 5 * 60_000)).toEqual({
      startWordCount: 10,
      currentWordCount: 25,
      wordsWritten: 15,
      elapsedMs: 5 * 60_000,
      elapsed: '5m',
    });
  });

  it('should never report a negative count', () => {
    const stats = createStatsState({}, 10, 1000);
    expect(sessionStats(stats, 3, 1000).wordsWritten).toBe(0);
  });
});
