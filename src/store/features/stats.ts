/**
 * Writing stats and daily goals.
 * Per-day totals are keyed by local calendar date; the streak is derived
 * from them on demand and never stored.
 */

/** Local date "YYYY-MM-DD" → words written that day */
export type DailyTotals = Readonly<Record<string, number>>;

export interface StatsState {
  readonly days: DailyTotals;
  readonly sessionStart: number;
  readonly startWordCount: number;
  /** Word count at the previous observation */
  readonly lastWordCount: number;
}

export interface GoalProgress {
  /** today / goal, clamped to [0, 1] */
  readonly ratio: number;
  /** today / goal, unclamped */
  readonly raw: number;
  readonly exceeded: boolean;
}

export interface SessionStats {
  readonly startWordCount: number;
  readonly currentWordCount: number;
  readonly wordsWritten: number;
  readonly elapsedMs: number;
  readonly elapsed: string;
}

// =============================================================================
// Dates
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local calendar date of a timestamp.
 */
export function dateKey(timestamp: number): string {
  return formatDate(new Date(timestamp));
}

/**
 * The calendar day before `key`. Goes through the Date constructor so
 * month and year rollovers come out right.
 */
export function previousDay(key: string): string {
  const [year, month, day] = key.split('-').map(Number);
  return formatDate(new Date(year, month - 1, day - 1));
}

// =============================================================================
// Tracking
// =============================================================================

export function createStatsState(
  days: DailyTotals,
  wordCount: number,
  now: number
): StatsState {
  return Object.freeze({
    days: Object.freeze({ ...days }),
    sessionStart: now,
    startWordCount: wordCount,
    lastWordCount: wordCount,
  });
}

/**
 * Record the current word count. An increase over the previous
 * observation is credited to today; a decrease only moves the baseline.
 */
export function observeWordCount(stats: StatsState, wordCount: number, now: number): StatsState {
  if (wordCount === stats.lastWordCount) return stats;

  const delta = wordCount - stats.lastWordCount;
  if (delta < 0) {
    return Object.freeze({ ...stats, lastWordCount: wordCount });
  }

  const today = dateKey(now);
  return Object.freeze({
    ...stats,
    days: Object.freeze({ ...stats.days, [today]: (stats.days[today] ?? 0) + delta }),
    lastWordCount: wordCount,
  });
}

/**
 * Move the baseline without crediting anything, for content that was
 * loaded rather than typed.
 */
export function rebaseWordCount(stats: StatsState, wordCount: number): StatsState {
  return wordCount === stats.lastWordCount
    ? stats
    : Object.freeze({ ...stats, lastWordCount: wordCount });
}

export function wordsOn(days: DailyTotals, key: string): number {
  return days[key] ?? 0;
}

/**
 * Consecutive days meeting `goal`, counted back from today. A today that
 * has not met the goal yet does not break the streak; counting then
 * starts from yesterday.
 */
export function streak(days: DailyTotals, goal: number, today: string): number {
  if (goal <= 0) return 0;

  let day = wordsOn(days, today) >= goal ? today : previousDay(today);
  let count = 0;
  while (wordsOn(days, day) >= goal) {
    count++;
    day = previousDay(day);
  }
  return count;
}

export function progress(days: DailyTotals, goal: number, today: string): GoalProgress {
  if (goal <= 0) {
    return { ratio: 0, raw: 0, exceeded: false };
  }
  const raw = wordsOn(days, today) / goal;
  return {
    ratio: Math.min(1, Math.max(0, raw)),
    raw,
    exceeded: raw > 1,
  };
}

/**
 * "2h 5m" or "5m".
 */
export function formatElapsed(ms: number): string {
  const minutes = Math.floor(Math.max(0, ms) / 60_000);
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes}m`;
}

export function sessionStats(stats: StatsState, currentWordCount: number, now: number): SessionStats {
  const elapsedMs = Math.max(0, now - stats.sessionStart);
  return {
    startWordCount: stats.startWordCount,
    currentWordCount,
    wordsWritten: Math.max(0, currentWordCount - stats.startWordCount),
    elapsedMs,
    elapsed: formatElapsed(elapsedMs),
  };
}
