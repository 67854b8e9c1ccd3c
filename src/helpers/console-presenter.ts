import chalk from 'chalk';
import {
  AddPresenter,
  ListedWord,
  ReviewPresenter,
  ReviewPrompt,
  Translator,
  WordEntry,
  WordListing
} from '../types';
import { MASTERY_STREAK, getStreak } from '../models/word-entry';
import { isMastered } from '../services/streak-engine';
import { createStyles, highlightWordInPhrase, TerminalStyles } from './terminal';

export type LineWriter = (line: string) => void;

export interface ConsolePresenterOptions {
  palette: chalk.Chalk;
  translator: Translator;
  /** Hide anything that would show the answer while prompts are spoken. */
  speechMode: boolean;
  write?: LineWriter;
}

const SEPARATOR = '='.repeat(50);

const writeStdout: LineWriter = line => {
  process.stdout.write(`${line}\n`);
};

export class ConsolePresenter implements ReviewPresenter, AddPresenter {
  private styles: TerminalStyles;
  private translator: Translator;
  private speechMode: boolean;
  private write: LineWriter;

  constructor(options: ConsolePresenterOptions) {
    this.styles = createStyles(options.palette);
    this.translator = options.translator;
    this.speechMode = options.speechMode;
    this.write = options.write ?? writeStdout;
  }

  // ---------- run header ----------

  runHeader(user: string | undefined, dataFile: string): void {
    const t = this.translator.t.bind(this.translator);
    this.write(t('USER', { user: user || t('FILE_OVERRIDE') }));
    this.write(`${t('DATA_FILE', { path: dataFile })}\n`);
  }

  dataFile(dataFile: string): void {
    this.write(this.translator.t('DATA_FILE', { path: dataFile }));
  }

  cancelled(): void {
    this.write(`\n${this.translator.t('CANCELLED')}`);
  }

  // ---------- review ----------

  sessionStarted(today: string, alreadyReviewed: number, total: number): void {
    if (this.speechMode) return;
    this.write(this.translator.t('TODAY', { today }));
    if (alreadyReviewed > 0) {
      this.write(this.translator.t('ALREADY_REVIEWED_TODAY', { n: alreadyReviewed }));
    }
    this.write(`${this.translator.t('REVIEW_START', { n: total, m: MASTERY_STREAK })}\n`);
  }

  showPrompt({ index, total, entry }: ReviewPrompt): void {
    if (this.speechMode) return;
    this.write(SEPARATOR);
    this.write(this.styles.strong(
      this.translator.t('PROGRESS', { i: index, n: total, s: getStreak(entry), m: MASTERY_STREAK })
    ));
    if (entry.phrase) {
      this.write(`  ${highlightWordInPhrase(entry.phrase, entry.word, this.styles.highlight)}`);
    } else {
      this.write(this.translator.t('NO_PHRASE'));
    }
  }

  answeredCorrectly(entry: WordEntry): void {
    if (this.speechMode) return;
    const vars = { s: getStreak(entry), m: MASTERY_STREAK };
    const key = isMastered(entry) ? 'MASTERED_NOW' : 'CORRECT_STREAK';
    this.write(this.styles.success(this.translator.t(key, vars)));
  }

  // The answer is already in, so speech mode still reveals the spelling
  answeredWrongly(entry: WordEntry): void {
    const expected = this.styles.error(this.translator.t('EXPECTED', { word: this.styles.highlight(entry.word) }));
    if (this.speechMode) {
      this.write(expected);
      return;
    }
    this.write(this.styles.error(this.translator.t('WRONG')));
    this.write(expected);
    this.write(this.styles.error(this.translator.t('RESET_STREAK', { m: MASTERY_STREAK })));
  }

  sessionFinished(): void {
    if (this.speechMode) return;
    this.write(`\n${this.translator.t('DONE')}`);
  }

  allReviewedToday(): void {
    this.write(this.translator.t('ALL_DONE_TODAY'));
  }

  nothingDue(): void {
    this.write(this.translator.t('NO_WORDS_DUE'));
  }

  // ---------- add ----------

  addModeStarted(): void {
    this.write(`${this.translator.t('ADD_MODE_TITLE')}\n`);
  }

  wordSaved(word: string): void {
    this.write(`${this.translator.t('SAVED')} ${word}\n`);
  }

  addModeFinished(): void {
    this.write(this.translator.t('LEAVING_ADD'));
  }

  // ---------- list ----------

  showListing(listing: WordListing): void {
    const t = this.translator.t.bind(this.translator);
    this.write(`${t('TODAY', { today: listing.today })}\n`);

    this.write(t('DUE_TITLE'));
    if (listing.due.length === 0) {
      this.write(`  ${t('NONE')}`);
    }
    for (const item of listing.due) {
      const flag = item.reviewedToday ? t('TODAY_FLAG') : ' ';
      this.write(`  [${flag.padEnd(6)}] ${this.describe(item)}`);
    }

    this.write(`\n${t('MASTERED_TITLE')}`);
    if (listing.mastered.length === 0) {
      this.write(`  ${t('NONE')}`);
    }
    for (const item of listing.mastered) {
      this.write(`  ${this.describe(item)}`);
    }
  }

  private describe(item: ListedWord): string {
    const streak = this.translator.t('STREAK', { s: item.streak, m: MASTERY_STREAK });
    const last = this.translator.t('LAST', { last: item.lastReview ?? '-' });
    return `${item.word.padEnd(20)}  ${streak}  ${last}`;
  }
}
