/**
 * History file path resolution.
 *
 * Priority: explicit path argument → $HISTFILE → ~/.zsh_history.
 * A leading `~` is expanded to the home directory in the first two.
 */

import path from 'node:path';
import os from 'node:os';

/** Return value for getHistoryPath() — carries both the resolved path and its source. */
export interface HistoryPathResult {
  /** Absolute path to the history file. */
  filePath: string;
  /** How the path was determined. */
  source: 'override' | 'env' | 'default';
}

/**
 * Resolve the zsh history file path.
 *
 * @param override - A user-supplied path. Takes priority over everything.
 */
export function getHistoryPath(override?: string): HistoryPathResult {
  if (override) {
    return { filePath: path.resolve(expandTilde(override)), source: 'override' };
  }

  const envPath = process.env.HISTFILE;
  if (envPath) {
    return { filePath: path.resolve(expandTilde(envPath)), source: 'env' };
  }

  return {
    filePath: path.join(os.homedir(), '.zsh_history'),
    source: 'default',
  };
}

/** Replace a leading `~` (alone or followed by a separator) with the home directory. */
export function expandTilde(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/') || filePath.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
