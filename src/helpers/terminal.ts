import chalk from 'chalk';

export type Style = (text: string) => string;

export interface TerminalStyles {
  success: Style;
  error: Style;
  highlight: Style;
  strong: Style;
}

/**
 * Colour support is decided once by the caller; nothing here reads global terminal state.
 */
export function createChalk(level: chalk.Level): chalk.Chalk {
  return new chalk.Instance({ level });
}

export function detectColorLevel(): chalk.Level {
  return chalk.supportsColor ? chalk.supportsColor.level : 0;
}

export function createStyles(palette: chalk.Chalk): TerminalStyles {
  return {
    success: text => palette.green(text),
    error: text => palette.red.bold(text),
    highlight: text => palette.yellow.bold(text),
    strong: text => palette.bold(text)
  };
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Apply `style` to every case-insensitive occurrence of `word` in `phrase`.
 */
export function highlightWordInPhrase(phrase: string, word: string, style: Style): string {
  if (!phrase || !word) {
    return phrase;
  }
  const pattern = new RegExp(escapeRegExp(word), 'gi');
  return phrase.replace(pattern, match => style(match));
}
