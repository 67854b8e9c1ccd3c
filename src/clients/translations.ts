import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { Locale, MessageVars, Translator } from '../types';
import { logger } from '../utils/logger';
import { isNotFoundError } from '../utils/errors';

export type TranslationTable = Record<string, Partial<Record<Locale, string>>>;

// Locale -> column header in the translation CSV
const LOCALE_COLUMNS: Record<Locale, string> = {
  en: 'English',
  de: 'German'
};

const FALLBACK_LOCALE: Locale = 'en';

type TranslationRow = Partial<Record<string, string>>;

export function parseTranslationsCsv(content: string): TranslationTable {
  const rows: TranslationRow[] = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });

  const table: TranslationTable = {};
  for (const row of rows) {
    const key = (row.Key ?? '').trim();
    if (!key) {
      continue;
    }
    table[key] = {
      en: (row[LOCALE_COLUMNS.en] ?? '').trim(),
      de: (row[LOCALE_COLUMNS.de] ?? '').trim()
    };
  }
  return table;
}

/**
 * Load a Key,English,German CSV. A missing file yields an empty table.
 */
export async function loadTranslations(filePath: string): Promise<TranslationTable> {
  try {
    return parseTranslationsCsv(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.warn(`Translation file not found: ${filePath}; showing message keys`);
      return {};
    }
    throw error;
  }
}

/**
 * Text for a key: requested locale, then English, then the key itself.
 */
export function lookup(table: TranslationTable, key: string, locale: Locale): string {
  const entry = table[key];
  if (!entry) {
    return key;
  }
  return entry[locale] || entry[FALLBACK_LOCALE] || key;
}

/**
 * Replace {name} placeholders; placeholders without a value stay as they are.
 */
export function formatMessage(template: string, vars: MessageVars = {}): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? String(vars[name]) : placeholder
  );
}

export class I18n implements Translator {
  constructor(
    readonly locale: Locale,
    private readonly table: TranslationTable
  ) {}

  t(key: string, vars?: MessageVars): string {
    return formatMessage(lookup(this.table, key, this.locale), vars);
  }
}
