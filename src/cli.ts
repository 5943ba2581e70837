/**
 * CLI entry point for black-friday-rush
 *
 * black-friday                 Play
 * black-friday scores          Print the saved leaderboard
 * black-friday scores --reset  Clear it (asks first)
 */

import { parseCliArgs } from './args';
import { runBlackFridayGame, setTheme } from './games';
import { createStoreGateway } from './games/blackfriday/leaderboard';
import { createFileStore, defaultScoresDirectory, HOME_ENV_VAR } from './games/blackfriday/storage';
import { createNodeTerminal } from './node-terminal';
import { getThemeModes, type ThemeMode } from './themes';

function printHelp() {
  console.log(`
  black-friday - catch the deals, dodge the junk

  Usage:
    black-friday                      Play (menu: 1P or 2P)
    black-friday scores               Show the saved leaderboard
    black-friday scores --reset       Clear the saved leaderboard
    black-friday --theme <theme>      Set color theme
    black-friday --scores-file <dir>  Keep scores in <dir>
    black-friday --help               Show this help

  Scores are saved in ~/.black-friday unless ${HOME_ENV_VAR} or --scores-file says otherwise.

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    1 / 2                Quick start solo / two players
    Arrow keys           Player 1 move, menus, initials
    Enter / Space        Player 1 confirm
    D / G, A             Player 2 move, confirm
    Q                    Quit (menu and game over)
`);
}

function play(theme: ThemeMode, scoresDir: string | undefined) {
  setTheme(theme);

  const terminal = createNodeTerminal();
  const store = createFileStore(scoresDir ?? defaultScoresDirectory());

  runBlackFridayGame(terminal, {
    leaderboard: createStoreGateway(store),
    onQuit: () => {
      terminal.cleanup();
      process.exit(0);
    },
  });
}

function main() {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      printHelp();
      process.exit(0);
      break;

    case 'error':
      console.error(command.message);
      console.error('Run black-friday --help for usage.');
      process.exit(1);
      break;

    case 'scores':
      import('./scores')
        .then(m => m.scoresCommand(command))
        .catch((err: unknown) => {
          console.error('[Scores]', err);
          process.exit(1);
        });
      break;

    case 'play':
      play(command.theme, command.scoresDir);
      break;
  }
}

main();
