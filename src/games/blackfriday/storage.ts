/**
 * File-backed key-value store for the CLI
 *
 * Each key lives in `<directory>/<key>.json`. The directory is created on
 * first write.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import type { KeyValueStore } from './leaderboard';

export const HOME_ENV_VAR = 'BLACK_FRIDAY_HOME';

export function defaultScoresDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[HOME_ENV_VAR];
  return override ? resolve(override) : resolve(homedir(), '.black-friday');
}

export interface FileStore extends KeyValueStore {
  readonly directory: string;
  removeItem(key: string): void;
}

export function createFileStore(directory: string = defaultScoresDirectory()): FileStore {
  const pathFor = (key: string) => resolve(directory, `${encodeURIComponent(key)}.json`);

  return {
    directory,
    getItem(key) {
      const file = pathFor(key);
      if (!existsSync(file)) return null;
      return readFileSync(file, 'utf-8');
    },
    setItem(key, value) {
      mkdirSync(directory, { recursive: true });
      writeFileSync(pathFor(key), value, 'utf-8');
    },
    removeItem(key) {
      rmSync(pathFor(key), { force: true });
    },
  };
}
