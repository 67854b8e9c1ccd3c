import * as os from 'os';
import path from 'path';
import {
  formatMessage,
  I18n,
  loadTranslations,
  lookup,
  parseTranslationsCsv,
  TranslationTable
} from '../../src/clients/translations';

const table: TranslationTable = {
  GREETING: { en: 'Hello {name}', de: 'Hallo {name}' },
  ONLY_EN: { en: 'English only', de: '' },
  EMPTY: { en: '', de: '' }
};

describe('Translations', () => {
  describe('lookup', () => {
    it('should use the requested locale first', () => {
      expect(lookup(table, 'GREETING', 'de')).toBe('Hallo {name}');
    });

    it('should fall back to English when the locale has no text', () => {
      expect(lookup(table, 'ONLY_EN', 'de')).toBe('English only');
    });

    it('should fall back to the key when no text exists', () => {
      expect(lookup(table, 'EMPTY', 'de')).toBe('EMPTY');
      expect(lookup(table, 'UNKNOWN_KEY', 'en')).toBe('UNKNOWN_KEY');
    });
  });

  describe('formatMessage', () => {
    it('should fill known placeholders and keep unknown ones', () => {
      expect(formatMessage('streak {s}/{m} for {word}', { s: 3, m: 5 })).toBe('streak 3/5 for {word}');
    });

    it('should leave text without placeholders unchanged', () => {
      expect(formatMessage('Correct!')).toBe('Correct!');
    });
  });

  describe('I18n', () => {
    it('should translate and format in one step', () => {
      expect(new I18n('de', table).t('GREETING', { name: 'Mia' })).toBe('Hallo Mia');
      expect(new I18n('en', table).t('GREETING', { name: 'Mia' })).toBe('Hello Mia');
    });
  });

  describe('parseTranslationsCsv', () => {
    it('should read Key,English,German rows and skip blank keys', () => {
      const parsed = parseTranslationsCsv(
        'Key,English,German\n' +
        'CORRECT,Correct!,Richtig!\n' +
        'PRESS_ENTER,"Read it, then press Enter.",Lies vor.\n' +
        ',orphan,verwaist\n'
      );

      expect(parsed).toEqual({
        CORRECT: { en: 'Correct!', de: 'Richtig!' },
        PRESS_ENTER: { en: 'Read it, then press Enter.', de: 'Lies vor.' }
      });
    });
  });

  describe('loadTranslations', () => {
    it('should return an empty table for a missing file', async () => {
      const missing = path.join(os.tmpdir(), 'spelling-no-such-dir', 'locales.csv');

      expect(await loadTranslations(missing)).toEqual({});
    });

    it('should provide every key used by the bundled messages in both languages', async () => {
      const bundled = await loadTranslations(path.resolve(__dirname, '../../locales.csv'));

      for (const key of ['CORRECT', 'WRONG', 'SAY_SPELL_NOW', 'PRESS_ENTER', 'TYPE_WORD', 'CANCELLED', 'DONE']) {
        expect(bundled[key]?.en).toBeTruthy();
        expect(bundled[key]?.de).toBeTruthy();
      }
      expect(new I18n('en', bundled).t('STREAK', { s: 2, m: 5 })).toBe('streak 2/5');
      expect(new I18n('de', bundled).t('PRESS_ENTER')).toBe('Lies den Satz vor und drücke dann Enter.');
      expect(new I18n('en', bundled).t('PRESS_ENTER')).toBe('Read the phrase aloud, then press Enter.');
    });
  });
});
