/**
 * Zsh `extended_history` entry parser and encoder.
 *
 * Record grammar:
 *
 *   : <10-digit timestamp>:<elapsed seconds>;<command>
 *
 * Only the fixed prefix is structural. Everything after the first `;` that
 * follows the elapsed field is the command, newlines, colons and semicolons
 * included.
 */

import type { HistoryEntry } from '../types/index.js';
import { EntryParseError } from '../utils/errors.js';
import { formatTimestamp } from '../utils/dates.js';

/**
 * The elapsed field accepts a leading `-` so that a negative duration is
 * reported as an invalid integer rather than as an unrecognised line.
 */
const HISTORY_LINE_RE = /^: (\d{10}):(-?\d+);([\s\S]*)$/;

const TIMESTAMP_WIDTH = 10;

/**
 * Parse one logical record into a {@link HistoryEntry}.
 *
 * @throws {EntryParseError} `no-match` when the record does not follow the
 *   grammar, `invalid-integer` when a numeric field is negative or too large
 *   to be represented exactly.
 */
export function parseEntry(record: string): HistoryEntry {
  const match = HISTORY_LINE_RE.exec(record);
  if (!match) {
    throw new EntryParseError('no-match', record);
  }

  const elapsed = parseUnsigned(match[2], record);
  return {
    timestamp: parseUnsigned(match[1], record),
    elapsed,
    command: match[3],
    ...(match[2] === String(elapsed) ? {} : { elapsedDigits: match[2] }),
  };
}

/** Like {@link parseEntry}, but returns `undefined` for a malformed record. */
export function tryParseEntry(record: string): HistoryEntry | undefined {
  try {
    return parseEntry(record);
  } catch (error) {
    if (error instanceof EntryParseError) return undefined;
    throw error;
  }
}

function parseUnsigned(digits: string, record: string): number {
  const value = Number(digits);
  if (digits.startsWith('-') || !Number.isSafeInteger(value)) {
    throw new EntryParseError('invalid-integer', record, `'${digits}' is not an unsigned integer`);
  }
  return value;
}

/**
 * Encode an entry back to its on-disk form, without the trailing newline.
 *
 * The timestamp is zero-padded to the width the grammar requires and the
 * elapsed field keeps its original digits, so
 * `toHistoryLine(parseEntry(line)) === line` for every line the grammar accepts.
 */
export function toHistoryLine(entry: HistoryEntry): string {
  const timestamp = String(entry.timestamp).padStart(TIMESTAMP_WIDTH, '0');
  return `: ${timestamp}:${entry.elapsedDigits ?? entry.elapsed};${entry.command}`;
}

/** `true` when both entries record the same command text. */
export function sameCommand(a: HistoryEntry, b: HistoryEntry): boolean {
  return a.command === b.command;
}

/** One-line human description, used by `zhc parse-line`. */
export function describeEntry(entry: HistoryEntry): string {
  return `Command executed at '${formatTimestamp(entry.timestamp)}' for '${entry.elapsed}s': ${entry.command}`;
}
