import { ListedWord, WordEntry, WordListing, WordMap } from '../types';
import { createWordEntry, getStreak, lastReview, reviewedToday } from '../models/word-entry';
import { InvalidInputError } from '../utils/errors';
import { isMastered } from './streak-engine';

export function compareWords(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Trimmed word.
 * @throws InvalidInputError when nothing but whitespace was given
 */
export function normalizeWord(word: string): string {
  const trimmed = word.trim();
  if (!trimmed) {
    throw new InvalidInputError('Word must not be empty.');
  }
  return trimmed;
}

/**
 * Insert a new word, or replace the phrase of an existing one (history kept).
 */
export function addWord(entries: WordMap, word: string, phrase: string): WordEntry {
  const trimmedWord = normalizeWord(word);
  const trimmedPhrase = phrase.trim();

  const existing = entries.get(trimmedWord);
  if (existing) {
    existing.phrase = trimmedPhrase;
    return existing;
  }

  const entry = createWordEntry(trimmedWord, trimmedPhrase);
  entries.set(trimmedWord, entry);
  return entry;
}

function toListed(entry: WordEntry, today: string): ListedWord {
  return {
    word: entry.word,
    streak: getStreak(entry),
    lastReview: lastReview(entry),
    reviewedToday: reviewedToday(entry, today)
  };
}

/**
 * Due words (not yet reviewed today first, then alphabetical) and mastered words (alphabetical).
 */
export function listWords(entries: WordMap, today: string): WordListing {
  const all = [...entries.values()].map(entry => ({ entry, listed: toListed(entry, today) }));

  const due = all
    .filter(({ entry }) => !isMastered(entry))
    .map(({ listed }) => listed)
    .sort((a, b) => Number(a.reviewedToday) - Number(b.reviewedToday) || compareWords(a.word, b.word));

  const mastered = all
    .filter(({ entry }) => isMastered(entry))
    .map(({ listed }) => listed)
    .sort((a, b) => compareWords(a.word, b.word));

  return { today, due, mastered };
}
