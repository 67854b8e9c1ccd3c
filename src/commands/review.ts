import { ReviewSummary } from '../types';
import { ReviewSession } from '../services/review-session';
import { logger } from '../utils/logger';
import { CommandContext } from './context';

export interface ReviewCommandOptions {
  limit?: number;
  random?: () => number;
}

export async function reviewCommand(ctx: CommandContext, options: ReviewCommandOptions = {}): Promise<ReviewSummary> {
  const entries = await ctx.store.load();

  if (!ctx.speechMode) {
    ctx.presenter.runHeader(ctx.user, ctx.store.path);
  }

  const session = new ReviewSession({
    presenter: ctx.presenter,
    speaker: ctx.speaker,
    prompter: ctx.prompter,
    translator: ctx.translator
  });

  const summary = await session.run(entries, {
    today: ctx.today,
    limit: options.limit,
    speechMode: ctx.speechMode,
    random: options.random
  });

  if (summary.outcome === 'interrupted') {
    ctx.presenter.cancelled();
  }

  // Persist whatever was recorded, interrupted or not
  await ctx.store.save(entries);
  logger.info('Review finished', { ...summary });
  return summary;
}
