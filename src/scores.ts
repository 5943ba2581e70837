/**
 * `black-friday scores` - print or reset the saved leaderboard
 */

import * as p from '@clack/prompts';
import { createStoreGateway, LEADERBOARD_KEY } from './games/blackfriday/leaderboard';
import { formatLeaderboardLine } from './games/blackfriday/render';
import { createFileStore, defaultScoresDirectory } from './games/blackfriday/storage';

export interface ScoresCommandOptions {
  scoresDir: string | undefined;
  reset: boolean;
}

export async function scoresCommand(options: ScoresCommandOptions): Promise<void> {
  const store = createFileStore(options.scoresDir ?? defaultScoresDirectory());
  const entries = createStoreGateway(store).load();

  p.intro('black-friday scores');

  if (entries.length === 0) {
    p.log.info(`No scores saved in ${store.directory}`);
  } else {
    p.note(entries.map((entry, i) => formatLeaderboardLine(entry, i + 1)).join('\n'), 'Top shoppers');
  }

  if (!options.reset) {
    p.outro('See you at the doors.');
    return;
  }

  if (entries.length === 0) {
    p.outro('Nothing to reset.');
    return;
  }

  const confirmed = await p.confirm({
    message: `Delete all ${entries.length} saved scores?`,
    initialValue: false,
  });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Leaderboard kept.');
    return;
  }

  store.removeItem(LEADERBOARD_KEY);
  p.log.success('Leaderboard cleared.');
  p.outro('Fresh start.');
}
