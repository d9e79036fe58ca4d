import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { expandTilde, getHistoryPath } from '../../src/utils/history-paths.js';

describe('getHistoryPath', () => {
  const originalHistfile = process.env.HISTFILE;
  const home = os.homedir();

  beforeEach(() => {
    delete process.env.HISTFILE;
  });

  afterEach(() => {
    if (originalHistfile === undefined) delete process.env.HISTFILE;
    else process.env.HISTFILE = originalHistfile;
  });

  // ── Override argument ────────────────────────────────────────────────────

  it('returns user-supplied override path (absolute)', () => {
    const result = getHistoryPath('/custom/history.txt');
    expect(result.filePath).toBe(path.resolve('/custom/history.txt'));
    expect(result.source).toBe('override');
  });

  it('resolves relative override to absolute', () => {
    const result = getHistoryPath('relative/history.txt');
    expect(result.filePath).toBe(path.resolve('relative/history.txt'));
    expect(result.source).toBe('override');
  });

  it('expands ~ in the override', () => {
    expect(getHistoryPath('~/.zsh_history_work').filePath).toBe(path.join(home, '.zsh_history_work'));
  });

  it('prefers the override over $HISTFILE', () => {
    process.env.HISTFILE = '/tmp/from_env';
    expect(getHistoryPath('/tmp/from_arg').source).toBe('override');
  });

  // ── Environment ──────────────────────────────────────────────────────────

  it('honours $HISTFILE', () => {
    process.env.HISTFILE = '/tmp/my_zsh_history';
    const result = getHistoryPath();
    expect(result.filePath).toBe(path.resolve('/tmp/my_zsh_history'));
    expect(result.source).toBe('env');
  });

  it('expands ~ in $HISTFILE', () => {
    process.env.HISTFILE = '~/.histfile';
    expect(getHistoryPath().filePath).toBe(path.join(home, '.histfile'));
  });

  it('ignores an empty $HISTFILE', () => {
    process.env.HISTFILE = '';
    expect(getHistoryPath().source).toBe('default');
  });

  // ── Default ──────────────────────────────────────────────────────────────

  it('defaults to ~/.zsh_history', () => {
    const result = getHistoryPath();
    expect(result.filePath).toBe(path.join(home, '.zsh_history'));
    expect(result.source).toBe('default');
  });
});

describe('expandTilde', () => {
  it('expands a lone ~ and a ~/ prefix', () => {
    expect(expandTilde('~')).toBe(os.homedir());
    expect(expandTilde('~/a/b')).toBe(path.join(os.homedir(), 'a/b'));
  });

  it('leaves other paths alone', () => {
    expect(expandTilde('/abs/~/x')).toBe('/abs/~/x');
    expect(expandTilde('~user/x')).toBe('~user/x');
  });
});
