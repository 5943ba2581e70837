import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './args';

describe('parseCliArgs', () => {
  it('plays with defaults when given nothing', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'play', theme: 'cyan', scoresDir: undefined });
  });

  it('reads theme and scores directory', () => {
    expect(parseCliArgs(['--theme', 'amber', '--scores-file', '/tmp/scores'])).toEqual({
      kind: 'play',
      theme: 'amber',
      scoresDir: '/tmp/scores',
    });
  });

  it('stops at the first flag that decides the outcome', () => {
    expect(parseCliArgs(['--theme', 'nope', '--help'])).toEqual({ kind: 'error', message: 'Unknown theme: nope' });
    expect(parseCliArgs(['-h', '--theme', 'nope'])).toEqual({ kind: 'help' });
  });

  it('rejects unknown themes', () => {
    expect(parseCliArgs(['--theme', 'plaid'])).toEqual({ kind: 'error', message: 'Unknown theme: plaid' });
  });

  it('rejects a flag missing its value', () => {
    expect(parseCliArgs(['--theme'])).toEqual({ kind: 'error', message: 'Missing value for --theme' });
    expect(parseCliArgs(['--scores-file'])).toEqual({ kind: 'error', message: 'Missing value for --scores-file' });
  });

  it('parses the scores command', () => {
    expect(parseCliArgs(['scores', '--reset'])).toEqual({
      kind: 'scores',
      theme: 'cyan',
      scoresDir: undefined,
      reset: true,
    });
  });

  it('only accepts --reset with scores', () => {
    expect(parseCliArgs(['--reset'])).toEqual({
      kind: 'error',
      message: '--reset only applies to the scores command',
    });
  });

  it('rejects unknown commands and options', () => {
    expect(parseCliArgs(['snake'])).toEqual({ kind: 'error', message: 'Unknown command: snake' });
    expect(parseCliArgs(['--fast'])).toEqual({ kind: 'error', message: 'Unknown option: --fast' });
    expect(parseCliArgs(['scores', 'now'])).toEqual({ kind: 'error', message: 'Unexpected argument: now' });
  });
});
