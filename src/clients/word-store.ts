import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { WordMap } from '../types';
import { createWordEntry } from '../models/word-entry';
import { compareWords } from '../services/word-service';
import { logger } from '../utils/logger';
import { isNotFoundError } from '../utils/errors';

export const HISTORY_SEPARATOR = '|';
export const WORD_COLUMNS = ['word', 'phrase', 'history'] as const;

type WordRow = Partial<Record<string, string>>;

export interface WordStore {
  readonly path: string;
  load(): Promise<WordMap>;
  save(entries: WordMap): Promise<void>;
}

export function parseHistory(raw: string): string[] {
  return raw
    .split(HISTORY_SEPARATOR)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

export function parseWordsCsv(content: string): WordMap {
  const rows: WordRow[] = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });

  const entries: WordMap = new Map();
  for (const row of rows) {
    const word = (row.word ?? '').trim();
    if (!word) {
      logger.debug('Skipping row without a word', { row });
      continue;
    }
    const phrase = (row.phrase ?? '').trim();
    const history = parseHistory(row.history ?? '');
    entries.set(word, createWordEntry(word, phrase, history));
  }
  return entries;
}

export function formatWordsCsv(entries: WordMap): string {
  const rows = [...entries.values()]
    .sort((a, b) => compareWords(a.word, b.word))
    .map(entry => ({
      word: entry.word,
      phrase: entry.phrase,
      history: entry.history.join(HISTORY_SEPARATOR)
    }));

  return stringify(rows, { header: true, columns: [...WORD_COLUMNS] });
}

/**
 * Whole-file CSV store: load everything, mutate in memory, replace the file on save.
 */
export class CsvWordStore implements WordStore {
  constructor(readonly path: string) {}

  async load(): Promise<WordMap> {
    let content: string;
    try {
      content = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug('No word file yet, starting empty', { path: this.path });
        return new Map();
      }
      throw error;
    }

    const entries = parseWordsCsv(content);
    logger.debug('Loaded words', { path: this.path, count: entries.size });
    return entries;
  }

  async save(entries: WordMap): Promise<void> {
    await fs.mkdir(path.dirname(this.path), { recursive: true });

    // Write beside the target and rename, so an interrupted run never leaves half a file
    const tempPath = `${this.path}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, formatWordsCsv(entries), 'utf8');
    await fs.rename(tempPath, this.path);

    logger.debug('Saved words', { path: this.path, count: entries.size });
  }
}

/**
 * Data file for a run: an explicit file wins, then a per-user file, then words.csv.
 */
export function resolveDataFile(user: string | undefined, fileOverride: string | undefined, dataDir: string): string {
  if (fileOverride) {
    return fileOverride;
  }
  if (!user) {
    return 'words.csv';
  }

  const safe = [...user.trim().toLowerCase()]
    .filter(ch => /[\p{L}\p{N}_-]/u.test(ch))
    .join('');
  return path.join(dataDir, `${safe || 'user'}.csv`);
}
