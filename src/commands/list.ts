import { WordListing } from '../types';
import { listWords } from '../services/word-service';
import { CommandContext } from './context';

export async function listCommand(ctx: CommandContext): Promise<WordListing> {
  const entries = await ctx.store.load();
  const listing = listWords(entries, ctx.today);

  ctx.presenter.runHeader(ctx.user, ctx.store.path);
  ctx.presenter.showListing(listing);
  return listing;
}
