/**
 * black-friday-rush
 *
 * Terminal arcade game for xterm.js hosts and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runBlackFridayGame, createStoreGateway, setTheme } from 'black-friday-rush';
 *   setTheme('amber');
 *   const controller = runBlackFridayGame(terminal, {
 *     leaderboard: createStoreGateway(window.localStorage),
 *   });
 *
 * CLI usage:
 *   black-friday
 *   black-friday scores
 *
 * The file store lives in ./games/blackfriday/storage and needs Node's fs;
 * it is exported from here for Node hosts only.
 */

export * from './games';

export { createFileStore, defaultScoresDirectory, HOME_ENV_VAR } from './games/blackfriday/storage';
export type { FileStore } from './games/blackfriday/storage';

export {
  themes,
  getThemeModes,
  isValidThemeMode,
  ANSI_RESET,
  DEFAULT_THEME,
  type ThemeColors,
} from './themes';
