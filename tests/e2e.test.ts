/**
 * End-to-end workflow tests.
 *
 * Drive the real CLI program against a copy of the fixture:
 *   analyze → clean → analyze
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';

const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');

// ── Mock ora to suppress spinner output ──────────────────────────────────────

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    warn: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    text: '',
  }),
}));

import { createProgram } from '../src/cli.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

async function zhc(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'zhc', ...args]);
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('E2E: Full workflow', () => {
  let dir: string;
  let historyFile: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'zhc-e2e-'));
    historyFile = path.join(dir, '.zsh_history');
    await fs.copyFile(path.join(FIXTURES_DIR, 'sample_zsh_history.txt'), historyFile);

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function lastJson(): unknown {
    const call = [...logSpy.mock.calls].reverse().find((args) => String(args[0]).startsWith('{'));
    return JSON.parse(String(call?.[0]));
  }

  it('clean removes what analyze reported as duplicated', async () => {
    await zhc('analyze', historyFile, '--format', 'json');
    expect(lastJson()).toMatchObject({ size: 8, skipped: 2, duplicateCount: 2 });

    await zhc(historyFile);

    await zhc('analyze', historyFile, '--format', 'json');
    expect(lastJson()).toMatchObject({
      size: 5,
      skipped: 0,
      duplicateCount: 0,
      topExecutables: [
        { value: 'git', count: 2 },
        { value: 'docker', count: 1 },
        { value: 'ls', count: 1 },
        { value: 'npm', count: 1 },
      ],
    });

    const files = await fs.readdir(dir);
    expect(files.filter((f) => f.startsWith('.zsh_history.backup-'))).toHaveLength(1);
  });

  it('a second clean leaves the file unchanged', async () => {
    await zhc('clean', historyFile, '--no-backup');
    const once = await fs.readFile(historyFile);

    await zhc('clean', historyFile, '--no-backup');
    expect((await fs.readFile(historyFile)).equals(once)).toBe(true);
  });

  it('a dry run changes nothing', async () => {
    const before = await fs.readFile(historyFile);
    await zhc('clean', historyFile, '--dry-run', '--filter', 'git');
    expect((await fs.readFile(historyFile)).equals(before)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(['.zsh_history']);
  });
});
