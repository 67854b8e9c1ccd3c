import { Command, InvalidArgumentError, Option } from 'commander';
import { config, SUPPORTED_LANGUAGES, validateConfig } from './config/environment';
import { Locale, Speaker, Translator } from './types';
import { CsvWordStore, resolveDataFile } from './clients/word-store';
import { I18n, loadTranslations } from './clients/translations';
import { CommandLookup, detectSpeechEngine, joinSpeechParts, NullSpeaker, SystemSpeaker } from './clients/speaker';
import { ConsolePresenter } from './helpers/console-presenter';
import { ReadlinePrompter } from './helpers/prompt';
import { createChalk, detectColorLevel } from './helpers/terminal';
import { setupTts } from './helpers/tts-setup';
import { CommandContext } from './commands/context';
import { addCommand } from './commands/add';
import { reviewCommand } from './commands/review';
import { listCommand } from './commands/list';
import { todayIso } from './utils/date';
import { isTrainerError, TrainerErrorType } from './utils/errors';
import { logger } from './utils/logger';

export type GlobalOptions = {
  user?: string;
  dataDir: string;
  file?: string;
  speak: boolean;
  language: Locale;
  i18nFile: string;
};

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(limit)) {
    throw new InvalidArgumentError('Limit must be a non-negative integer.');
  }
  return limit;
}

export function isLocale(value: string): value is Locale {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

/**
 * Picks the OS speech engine when speech is requested. A missing engine is
 * reported once and replaced by a silent speaker.
 */
export function createSpeaker(
  enabled: boolean,
  language: Locale,
  translator: Translator,
  platform: NodeJS.Platform = process.platform,
  lookup?: CommandLookup
): Speaker {
  if (!enabled) {
    return new NullSpeaker();
  }
  try {
    return new SystemSpeaker(detectSpeechEngine(platform, language, lookup));
  } catch (error) {
    if (isTrainerError(error, TrainerErrorType.RESOURCE_UNAVAILABLE)) {
      logger.warn(`[TTS] ${error.message} ${translator.t('TTS_UNAVAILABLE')}`);
      return new NullSpeaker();
    }
    throw error;
  }
}

async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const translator = new I18n(options.language, await loadTranslations(options.i18nFile));
  const speaker = createSpeaker(options.speak, options.language, translator);
  // Without a working engine the session falls back to the visible text flow
  const speechMode = speaker.enabled;

  const presenter = new ConsolePresenter({
    palette: createChalk(detectColorLevel()),
    translator,
    speechMode
  });

  if (speechMode && options.user) {
    await speaker.speakAndWait(joinSpeechParts([`${translator.t('WELCOME')} ${options.user}`, translator.t('LETSGO')]));
  }

  return {
    store: new CsvWordStore(resolveDataFile(options.user, options.file, options.dataDir)),
    presenter,
    translator,
    speaker,
    prompter: new ReadlinePrompter(),
    today: todayIso(),
    user: options.user,
    speechMode
  };
}

async function withContext(command: Command, action: (ctx: CommandContext) => Promise<unknown>): Promise<void> {
  const ctx = await createContext(command.optsWithGlobals<GlobalOptions>());
  try {
    await action(ctx);
  } finally {
    ctx.speaker.stop();
    ctx.prompter.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('spelling-trainer')
    .description('Spelling trainer (CSV-backed, multi-user)')
    .option('--user <name>', 'user/profile name (e.g. daughter, son)')
    .option('--data-dir <dir>', 'directory for user CSV files', config.dataDir)
    .option('--file <path>', 'override CSV file path (bypasses --user/--data-dir)')
    .option('--speak', 'read prompts aloud (TTS)', false)
    .addOption(
      new Option('--language <code>', 'UI language')
        .choices([...SUPPORTED_LANGUAGES])
        .default(isLocale(config.language) ? config.language : 'en')
    )
    .option('--i18n-file <path>', 'translation CSV file (Key,English,German)', config.i18nFile);

  program
    .command('add')
    .description('add words interactively (type exitnow to stop)')
    .action(async (_options: object, command: Command) => {
      await withContext(command, ctx => addCommand(ctx));
    });

  program
    .command('review')
    .description('run a review session')
    .option('--limit <n>', 'review at most N words today', parseLimit)
    .action(async (options: { limit?: number }, command: Command) => {
      await withContext(command, ctx => reviewCommand(ctx, { limit: options.limit }));
    });

  program
    .command('list')
    .description('show due and mastered words')
    .action(async (_options: object, command: Command) => {
      await withContext(command, ctx => listCommand(ctx));
    });

  program
    .command('setup-tts')
    .description('help install TTS (Ubuntu/Debian)')
    .option('--install', 'actually run apt install (uses sudo)', false)
    .action(async (options: { install: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const translator = new I18n(globals.language, await loadTranslations(globals.i18nFile));
      const code = await setupTts(options.install, translator, line => process.stdout.write(`${line}\n`));
      process.exitCode = code;
    });

  return program;
}

/**
 * Parse arguments and run one command. Resolves with the process exit code.
 */
export async function run(argv: string[] = process.argv): Promise<number> {
  try {
    validateConfig();
    await buildProgram().parseAsync(argv);
    return typeof process.exitCode === 'number' ? process.exitCode : 0;
  } catch (error) {
    logger.error('Spelling trainer failed:', error);
    return 1;
  }
}
