export type Locale = 'en' | 'de';

/**
 * A vocabulary item and its review history.
 * `history` holds ISO dates (YYYY-MM-DD), oldest first, one per successful day.
 */
export interface WordEntry {
  word: string;
  phrase: string;
  history: string[];
}

// Keyed by the word exactly as stored
export type WordMap = Map<string, WordEntry>;

export interface ListedWord {
  word: string;
  streak: number;
  lastReview: string | null;
  reviewedToday: boolean;
}

export interface WordListing {
  today: string;
  due: ListedWord[];
  mastered: ListedWord[];
}

export type ReviewOutcome = 'completed' | 'interrupted' | 'all-reviewed-today' | 'nothing-due';

export interface ReviewSummary {
  outcome: ReviewOutcome;
  planned: number;
  reviewed: number;
  correct: number;
  incorrect: number;
  newlyMastered: string[];
}

export type MessageVars = Record<string, string | number>;

export interface Translator {
  readonly locale: Locale;
  t(key: string, vars?: MessageVars): string;
}

export interface Speaker {
  readonly enabled: boolean;
  /** Start playback and return immediately. */
  speak(text: string): void;
  speakAndWait(text: string): Promise<void>;
  stop(): void;
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export interface ReviewPrompt {
  index: number;
  total: number;
  entry: WordEntry;
}

export interface ReviewPresenter {
  sessionStarted(today: string, alreadyReviewed: number, total: number): void;
  showPrompt(prompt: ReviewPrompt): void;
  answeredCorrectly(entry: WordEntry): void;
  answeredWrongly(entry: WordEntry): void;
  sessionFinished(): void;
  allReviewedToday(): void;
  nothingDue(): void;
}

export interface AddPresenter {
  addModeStarted(): void;
  wordSaved(word: string): void;
  addModeFinished(): void;
}
