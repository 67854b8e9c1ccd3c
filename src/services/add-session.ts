import { AddPresenter, Prompter, Translator, WordMap } from '../types';
import { isTrainerError, TrainerErrorType } from '../utils/errors';
import { addWord, normalizeWord } from './word-service';

export const EXIT_WORD = 'exitnow';

export interface AddSessionDeps {
  presenter: AddPresenter;
  prompter: Prompter;
  translator: Translator;
}

/**
 * Ask for words and phrases until the exit word is typed.
 * Only the word prompt checks for the exit word; phrases may contain it.
 * Returns how many words were saved.
 */
export async function runAddSession(entries: WordMap, deps: AddSessionDeps): Promise<number> {
  const { presenter, prompter, translator } = deps;
  let saved = 0;

  presenter.addModeStarted();

  for (;;) {
    let word: string;
    try {
      word = normalizeWord(await prompter.ask(`${translator.t('WORD_PROMPT')} `));
    } catch (error) {
      if (isTrainerError(error, TrainerErrorType.INVALID_INPUT)) {
        continue;
      }
      throw error;
    }

    if (word.toLowerCase() === EXIT_WORD) {
      presenter.addModeFinished();
      return saved;
    }

    const phrase = await prompter.ask(`${translator.t('PHRASE_PROMPT')} `);
    const entry = addWord(entries, word, phrase);
    saved += 1;
    presenter.wordSaved(entry.word);
  }
}
