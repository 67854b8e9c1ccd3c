import {
  Prompter,
  ReviewPresenter,
  ReviewSummary,
  Speaker,
  Translator,
  WordEntry,
  WordMap
} from '../types';
import { isTrainerError, TrainerErrorType } from '../utils/errors';
import { logger } from '../utils/logger';
import { joinSpeechParts } from '../clients/speaker';
import {
  buildReviewQueue,
  countReviewedToday,
  isMastered,
  recordOutcome,
  selectReviewBatch
} from './streak-engine';

export interface ReviewSessionDeps {
  presenter: ReviewPresenter;
  speaker: Speaker;
  prompter: Prompter;
  translator: Translator;
}

export interface ReviewSessionOptions {
  today: string;
  limit?: number;
  speechMode: boolean;
  random?: () => number;
}

export function isCorrectSpelling(typed: string, word: string): boolean {
  return typed.trim().toLowerCase() === word.toLowerCase();
}

/**
 * One interactive pass over today's due words.
 * Entries are mutated in place through recordOutcome only; the caller persists.
 */
export class ReviewSession {
  private presenter: ReviewPresenter;
  private speaker: Speaker;
  private prompter: Prompter;
  private translator: Translator;

  constructor(deps: ReviewSessionDeps) {
    this.presenter = deps.presenter;
    this.speaker = deps.speaker;
    this.prompter = deps.prompter;
    this.translator = deps.translator;
  }

  async run(entries: WordMap, options: ReviewSessionOptions): Promise<ReviewSummary> {
    const { today, limit, speechMode, random } = options;
    const summary: ReviewSummary = {
      outcome: 'completed',
      planned: 0,
      reviewed: 0,
      correct: 0,
      incorrect: 0,
      newlyMastered: []
    };

    const queue = buildReviewQueue(entries, today);
    const alreadyReviewed = countReviewedToday(entries, today);

    if (queue.length === 0) {
      if (alreadyReviewed > 0) {
        this.presenter.allReviewedToday();
        return { ...summary, outcome: 'all-reviewed-today' };
      }
      this.presenter.nothingDue();
      return { ...summary, outcome: 'nothing-due' };
    }

    const batch = selectReviewBatch(queue, limit, random);
    summary.planned = batch.length;
    logger.debug('Review session started', { due: queue.length, planned: batch.length, speechMode });

    this.presenter.sessionStarted(today, alreadyReviewed, batch.length);

    for (const [position, entry] of batch.entries()) {
      let typed: string;
      try {
        typed = speechMode
          ? await this.askBySpeech(entry)
          : await this.askByText(entry, position + 1, batch.length);
      } catch (error) {
        if (isTrainerError(error, TrainerErrorType.INTERRUPTED)) {
          this.speaker.stop();
          logger.debug('Review session interrupted', { reviewed: summary.reviewed });
          return { ...summary, outcome: 'interrupted' };
        }
        throw error;
      }

      await this.applyAnswer(entry, typed, today, speechMode, summary);
    }

    this.presenter.sessionFinished();
    return summary;
  }

  private async askBySpeech(entry: WordEntry): Promise<string> {
    const spellPrompt = `${this.translator.t('SAY_SPELL_NOW')} ${entry.word}`;
    this.speaker.speak(joinSpeechParts([entry.phrase, spellPrompt]));

    try {
      return await this.prompter.ask('> ');
    } finally {
      this.speaker.stop();
    }
  }

  private async askByText(entry: WordEntry, index: number, total: number): Promise<string> {
    this.presenter.showPrompt({ index, total, entry });
    await this.prompter.ask(`${this.translator.t('PRESS_ENTER')} `);
    return this.prompter.ask(`${this.translator.t('TYPE_WORD')} `);
  }

  private async applyAnswer(
    entry: WordEntry,
    typed: string,
    today: string,
    speechMode: boolean,
    summary: ReviewSummary
  ): Promise<void> {
    const correct = isCorrectSpelling(typed, entry.word);
    const wasMastered = isMastered(entry);

    recordOutcome(entry, today, correct);
    summary.reviewed += 1;

    if (correct) {
      summary.correct += 1;
      if (!wasMastered && isMastered(entry)) {
        summary.newlyMastered.push(entry.word);
      }
      this.presenter.answeredCorrectly(entry);
    } else {
      summary.incorrect += 1;
      this.presenter.answeredWrongly(entry);
    }

    if (speechMode) {
      await this.speaker.speakAndWait(this.translator.t(correct ? 'CORRECT' : 'WRONG'));
    }
  }
}
