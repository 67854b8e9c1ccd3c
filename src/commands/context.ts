import { Prompter, Speaker, Translator } from '../types';
import { WordStore } from '../clients/word-store';
import { ConsolePresenter } from '../helpers/console-presenter';

/**
 * Everything a command needs, built once per run by the CLI.
 */
export interface CommandContext {
  store: WordStore;
  presenter: ConsolePresenter;
  translator: Translator;
  speaker: Speaker;
  prompter: Prompter;
  today: string;
  user?: string;
  speechMode: boolean;
}
