import { describe, it, expect } from 'vitest';
import { plural, singleLine, truncate, truncateLeft } from '../../src/utils/strings.js';

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('ls', 10)).toBe('ls');
    expect(truncate('0123456789', 10)).toBe('0123456789');
  });

  it('cuts long strings to the limit, ellipsis included', () => {
    expect(truncate('0123456789a', 10)).toBe('0123456...');
  });
});

describe('truncateLeft', () => {
  it('keeps the end of the string', () => {
    expect(truncateLeft('/home/user/.zsh_history', 12)).toBe('...h_history');
    expect(truncateLeft('/tmp/h', 12)).toBe('/tmp/h');
  });
});

describe('singleLine', () => {
  it('joins lines with a single space', () => {
    expect(singleLine('a \\\n   b\n c')).toBe('a \\ b c');
    expect(singleLine('no newline')).toBe('no newline');
  });
});

describe('plural', () => {
  it('picks the form from the count', () => {
    expect(plural(1, 'day')).toBe('1 day');
    expect(plural(0, 'day')).toBe('0 days');
    expect(plural(2, 'entry', 'entries')).toBe('2 entries');
    expect(plural(1, 'entry', 'entries')).toBe('1 entry');
  });
});
