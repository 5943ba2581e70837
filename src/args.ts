/**
 * Command-line argument parsing for the black-friday CLI
 */

import { DEFAULT_THEME, isValidThemeMode, type ThemeMode } from './themes';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'play'; theme: ThemeMode; scoresDir: string | undefined }
  | { kind: 'scores'; theme: ThemeMode; scoresDir: string | undefined; reset: boolean }
  | { kind: 'error'; message: string };

export function parseCliArgs(argv: readonly string[]): CliCommand {
  let theme: ThemeMode = DEFAULT_THEME;
  let scoresDir: string | undefined;
  let reset = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };

      case '--theme': {
        const value = argv[i + 1];
        if (value === undefined) return { kind: 'error', message: 'Missing value for --theme' };
        if (!isValidThemeMode(value)) return { kind: 'error', message: `Unknown theme: ${value}` };
        theme = value;
        i++;
        break;
      }

      case '--scores-file': {
        const value = argv[i + 1];
        if (value === undefined) return { kind: 'error', message: 'Missing value for --scores-file' };
        scoresDir = value;
        i++;
        break;
      }

      case '--reset':
        reset = true;
        break;

      default:
        if (arg.startsWith('-')) return { kind: 'error', message: `Unknown option: ${arg}` };
        positional.push(arg);
    }
  }

  const [command, extra] = positional;
  if (extra !== undefined) return { kind: 'error', message: `Unexpected argument: ${extra}` };

  if (command === 'scores') {
    return { kind: 'scores', theme, scoresDir, reset };
  }
  if (command !== undefined) {
    return { kind: 'error', message: `Unknown command: ${command}` };
  }
  if (reset) {
    return { kind: 'error', message: '--reset only applies to the scores command' };
  }
  return { kind: 'play', theme, scoresDir };
}
