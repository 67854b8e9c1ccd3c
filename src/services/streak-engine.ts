import { WordEntry, WordMap } from '../types';
import { MASTERY_STREAK, getStreak, reviewedToday } from '../models/word-entry';

/**
 * Streak engine
 * Fixed-streak mastery: every successful day adds one, any failure resets to zero.
 */

export function isMastered(entry: WordEntry): boolean {
  return getStreak(entry) >= MASTERY_STREAK;
}

export function isDueToday(entry: WordEntry, today: string): boolean {
  return !isMastered(entry) && !reviewedToday(entry, today);
}

/**
 * Every due entry exactly once, in map order. Callers shuffle.
 */
export function buildReviewQueue(entries: WordMap, today: string): WordEntry[] {
  return [...entries.values()].filter(entry => isDueToday(entry, today));
}

/**
 * Non-mastered entries already reviewed today.
 */
export function countReviewedToday(entries: WordMap, today: string): number {
  return [...entries.values()].filter(entry => !isMastered(entry) && reviewedToday(entry, today)).length;
}

/** Appends today at most once per day. */
export function recordSuccess(entry: WordEntry, today: string): void {
  if (reviewedToday(entry, today)) {
    return;
  }
  entry.history.push(today);
}

export function resetStreak(entry: WordEntry): void {
  entry.history.length = 0;
}

/**
 * Apply one review result in place.
 * A failure always clears the whole history, including credit earned earlier the same day.
 */
export function recordOutcome(entry: WordEntry, today: string, correct: boolean): WordEntry {
  if (correct) {
    recordSuccess(entry, today);
  } else {
    resetStreak(entry);
  }
  return entry;
}

// Fisher-Yates
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Shuffle first, then cap, so the skipped words are random rather than positional.
 */
export function selectReviewBatch<T>(queue: readonly T[], limit?: number, random: () => number = Math.random): T[] {
  const shuffled = shuffle(queue, random);
  return limit === undefined ? shuffled : shuffled.slice(0, Math.max(0, limit));
}
