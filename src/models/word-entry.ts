import { WordEntry } from '../types';

export const MASTERY_STREAK = 5;

export function createWordEntry(word: string, phrase = '', history: string[] = []): WordEntry {
  return { word, phrase, history: [...history] };
}

/** Number of distinct successful days since the last reset. */
export function getStreak(entry: WordEntry): number {
  return entry.history.length;
}

export function lastReview(entry: WordEntry): string | null {
  return entry.history.length > 0 ? entry.history[entry.history.length - 1] : null;
}

export function reviewedToday(entry: WordEntry, today: string): boolean {
  return lastReview(entry) === today;
}
