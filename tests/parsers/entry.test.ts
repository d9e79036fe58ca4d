import { describe, it, expect } from 'vitest';
import {
  describeEntry,
  parseEntry,
  sameCommand,
  toHistoryLine,
  tryParseEntry,
} from '../../src/parsers/entry.js';
import { EntryParseError } from '../../src/utils/errors.js';
import { formatTimestamp } from '../../src/utils/dates.js';

function catchParseError(record: string): EntryParseError {
  try {
    parseEntry(record);
  } catch (error) {
    if (error instanceof EntryParseError) return error;
    throw error;
  }
  throw new Error(`expected '${record}' to be rejected`);
}

// ── parseEntry ───────────────────────────────────────────────────────────────

describe('parseEntry', () => {
  it('parses a simple entry', () => {
    expect(parseEntry(': 1731884069:0;sleep 2')).toEqual({
      command: 'sleep 2',
      timestamp: 1731884069,
      elapsed: 0,
    });
    expect(parseEntry(': 1731884069:10;cargo build')).toEqual({
      command: 'cargo build',
      timestamp: 1731884069,
      elapsed: 10,
    });
  });

  it('does not treat colons and semicolons in the command as structure', () => {
    const entry = parseEntry(': 1731317544:12;for d in VWT.*; do l $d; done');
    expect(entry.command).toBe('for d in VWT.*; do l $d; done');
    expect(entry.elapsed).toBe(12);

    expect(parseEntry(': 1731317544:0;echo a:1;b').command).toBe('echo a:1;b');
  });

  it('keeps the command verbatim, surrounding whitespace included', () => {
    expect(parseEntry(': 1731317544:0;  ls -la  ').command).toBe('  ls -la  ');
  });

  it('accepts an empty command', () => {
    expect(parseEntry(': 1731317544:0;').command).toBe('');
  });

  it('parses a multi-line command with its continuation backslashes', () => {
    const entry = parseEntry(': 1731622185:9;brew update\\\nbrew install opentofu');
    expect(entry.timestamp).toBe(1731622185);
    expect(entry.elapsed).toBe(9);
    expect(entry.command).toBe('brew update\\\nbrew install opentofu');
  });

  it('keeps a trailing backslash', () => {
    const entry = parseEntry(": 1732663091:0;echo 'hello hacha\\\nworld'\\");
    expect(entry.command).toBe("echo 'hello hacha\\\nworld'\\");
  });

  it('keeps the digits of an elapsed field with leading zeros', () => {
    expect(parseEntry(': 1700000000:01;ls')).toEqual({
      command: 'ls',
      timestamp: 1700000000,
      elapsed: 1,
      elapsedDigits: '01',
    });
    expect(parseEntry(': 1700000000:10;ls')).not.toHaveProperty('elapsedDigits');
  });

  it('accepts timestamp 0 written with ten digits', () => {
    expect(parseEntry(': 0000000000:0;ls').timestamp).toBe(0);
  });

  it('rejects records that do not match the grammar', () => {
    for (const record of [
      '',
      ': 1731884069;',
      ': 173188406:0;ls',
      ' : 1731884069:0;ls',
      ':1731884069:0;ls',
      ': 1731884069:0ls',
      'git status',
    ]) {
      const error = catchParseError(record);
      expect(error.kind).toBe('no-match');
      expect(error.record).toBe(record);
    }
  });

  it('rejects a negative elapsed field as an invalid integer', () => {
    const error = catchParseError(': 1731884069:-10;sleep 2');
    expect(error.kind).toBe('invalid-integer');
    expect(error.message).toBe("Failed to parse integer: '-10' is not an unsigned integer.");
  });

  it('rejects an elapsed field too large to represent', () => {
    const error = catchParseError(': 1731884069:99999999999999999999;sleep 2');
    expect(error.kind).toBe('invalid-integer');
  });

  it('uses a clear message for unmatched records', () => {
    expect(catchParseError('nope').message).toBe(
      "Failed to parse 'nope' as a history entry. Make sure this is a valid entry from a Zsh history file.",
    );
  });

  it('is deterministic', () => {
    const record = ': 1731884069:3;make test';
    expect(parseEntry(record)).toEqual(parseEntry(record));
  });
});

// ── tryParseEntry ────────────────────────────────────────────────────────────

describe('tryParseEntry', () => {
  it('returns the entry for a valid record', () => {
    expect(tryParseEntry(': 1731884069:0;ls')?.command).toBe('ls');
  });

  it('returns undefined for malformed records', () => {
    expect(tryParseEntry('garbage')).toBeUndefined();
    expect(tryParseEntry(': 1731884069:-1;ls')).toBeUndefined();
  });
});

// ── toHistoryLine ────────────────────────────────────────────────────────────

describe('toHistoryLine', () => {
  it('encodes without a trailing newline', () => {
    expect(toHistoryLine({ command: 'ls', timestamp: 1731884069, elapsed: 4 })).toBe(
      ': 1731884069:4;ls',
    );
  });

  it('pads the timestamp to ten digits', () => {
    expect(toHistoryLine({ command: 'ls', timestamp: 0, elapsed: 0 })).toBe(': 0000000000:0;ls');
  });

  it('round-trips valid records', () => {
    const records = [
      ': 1731317544:12;for d in VWT.*; do l $d; done',
      ': 1731622185:9;brew update\\\nbrew install opentofu',
      ": 1732663091:0;echo 'hello hacha\\\nworld'\\",
      ': 1733005037:0;docker run -d --name db \\\n-v db:/var/lib/db \\\n-p 3306:3306 db:8\n',
      ': 0000000000:0;ls',
      ': 1731317544:0;',
      ': 1731317544:7;  spaced  ',
      ': 1700000000:01;ls',
      ': 1700000000:000;ls',
    ];
    for (const record of records) {
      expect(toHistoryLine(parseEntry(record))).toBe(record);
    }
  });
});

// ── Equality & description ───────────────────────────────────────────────────

describe('sameCommand', () => {
  it('compares the command text only', () => {
    const a = parseEntry(': 1731884069:0;ls');
    const b = parseEntry(': 1731084669:10;ls');
    const c = parseEntry(': 1731084669:1;terraform apply');
    expect(sameCommand(a, b)).toBe(true);
    expect(sameCommand(a, c)).toBe(false);
  });
});

describe('describeEntry', () => {
  it('shows the local time, duration and command', () => {
    const entry = parseEntry(': 1731884069:10;cd ~');
    expect(describeEntry(entry)).toBe(
      `Command executed at '${formatTimestamp(1731884069)}' for '10s': cd ~`,
    );
  });
});
