import { runAddSession } from '../services/add-session';
import { isTrainerError, TrainerErrorType } from '../utils/errors';
import { CommandContext } from './context';

/**
 * Interactive add loop. Words entered before an interruption are still saved.
 */
export async function addCommand(ctx: CommandContext): Promise<number> {
  const entries = await ctx.store.load();
  let saved = 0;

  try {
    saved = await runAddSession(entries, {
      presenter: ctx.presenter,
      prompter: ctx.prompter,
      translator: ctx.translator
    });
  } catch (error) {
    if (!isTrainerError(error, TrainerErrorType.INTERRUPTED)) {
      throw error;
    }
    ctx.presenter.cancelled();
  }

  await ctx.store.save(entries);
  ctx.presenter.dataFile(ctx.store.path);
  return saved;
}
