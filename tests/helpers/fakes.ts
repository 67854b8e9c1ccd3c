import { AddPresenter, Prompter, ReviewPresenter, Speaker } from '../../src/types';
import { InterruptedError } from '../../src/utils/errors';

/**
 * Answers questions from a script; an Error in the script is thrown instead.
 * Running out of answers behaves like Ctrl+C.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: Array<string | Error>) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (next === undefined) {
      throw new InterruptedError();
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  close(): void {
    this.closed = true;
  }
}

export class RecordingSpeaker implements Speaker {
  readonly enabled = true;
  readonly calls: string[] = [];

  speak(text: string): void {
    this.calls.push(`speak:${text}`);
  }

  async speakAndWait(text: string): Promise<void> {
    this.calls.push(`wait:${text}`);
  }

  stop(): void {
    this.calls.push('stop');
  }
}

export function createPresenterMock(): jest.Mocked<ReviewPresenter & AddPresenter> {
  return {
    sessionStarted: jest.fn(),
    showPrompt: jest.fn(),
    answeredCorrectly: jest.fn(),
    answeredWrongly: jest.fn(),
    sessionFinished: jest.fn(),
    allReviewedToday: jest.fn(),
    nothingDue: jest.fn(),
    addModeStarted: jest.fn(),
    wordSaved: jest.fn(),
    addModeFinished: jest.fn()
  };
}

// Keeps the original order when passed to shuffle
export const keepOrder = (): number => 0.999;
