/**
 * Zsh history file loader.
 *
 * Pipeline
 * ────────
 * 1. Read file → raw bytes
 * 2. Decode bytes → logical records (unmetafy, validate UTF-8, join continuations)
 * 3. Parse records → HistoryEntry[], skipping the ones that do not parse
 *
 * A decoding error aborts the whole load: the file is presumed corrupt or
 * foreign. A record that merely fails to parse is counted and dropped.
 */

import fs from 'node:fs/promises';
import type { HistoryEntry } from '../types/index.js';
import { EntryParseError, IoError } from '../utils/errors.js';
import { decodeRecords } from './zsh-line.js';
import { parseEntry } from './entry.js';

/** Entries parsed from a history file, plus how many records were dropped. */
export interface ZshHistoryLoadResult {
  entries: HistoryEntry[];
  skipped: number;
}

/**
 * Parse every logical record found in `chunks`.
 *
 * @throws {LineDecodeError} when the byte stream cannot be decoded.
 */
export function parseZshRecords(chunks: Iterable<Uint8Array>): ZshHistoryLoadResult {
  const entries: HistoryEntry[] = [];
  let skipped = 0;

  for (const record of decodeRecords(chunks)) {
    try {
      entries.push(parseEntry(record));
    } catch (error) {
      if (!(error instanceof EntryParseError)) throw error;
      skipped++;
    }
  }

  return { entries, skipped };
}

/**
 * Read and parse a zsh history file.
 *
 * @param filePath - Absolute path to the history file.
 * @throws {IoError} when the file cannot be read.
 * @throws {LineDecodeError} when a line is not valid UTF-8 once unmetafied.
 */
export async function loadZshHistory(filePath: string): Promise<ZshHistoryLoadResult> {
  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    throw new IoError(filePath, error);
  }

  return parseZshRecords([content]);
}
