/**
 * In-memory history for one file.
 *
 * Entries stay in file order (append order). Every destructive operation
 * keeps the relative order of the survivors and returns how many entries it
 * removed.
 */

import type { HistoryEntry, LocalDate } from '../types/index.js';
import { loadZshHistory } from '../parsers/zsh.js';
import { toHistoryLine } from '../parsers/entry.js';
import { metafy } from '../parsers/zsh-line.js';
import { compareLocalDates, timestampToLocalDate } from '../utils/dates.js';
import { createBackup, replaceFileContents, resolveFilePath } from '../utils/file-operations.js';
import { WordFilter } from './filter.js';

/** Options for {@link HistoryCollection.write}. */
export interface WriteOptions {
  /** Copy the current file aside before rewriting it. */
  backup: boolean;
  /** Clock used for the backup name. */
  now?: Date;
}

export class HistoryCollection {
  private items: HistoryEntry[];

  private constructor(
    readonly filePath: string,
    entries: readonly HistoryEntry[],
    readonly skipped: number,
  ) {
    this.items = [...entries];
  }

  /**
   * Load a history file. Records that do not parse are dropped and counted
   * in {@link skipped}.
   *
   * @throws {IoError} when the file cannot be read.
   * @throws {LineDecodeError} when the content cannot be decoded.
   */
  static async load(filePath: string): Promise<HistoryCollection> {
    const { entries, skipped } = await loadZshHistory(filePath);
    return new HistoryCollection(filePath, entries, skipped);
  }

  static fromEntries(filePath: string, entries: readonly HistoryEntry[]): HistoryCollection {
    return new HistoryCollection(filePath, entries, 0);
  }

  get entries(): readonly HistoryEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  // ── Mutations ──────────────────────────────────────────────────────────────

  /**
   * Keep only the last occurrence of every command.
   *
   * Later occurrences carry the most recent timing, so they win.
   */
  deduplicate(): number {
    const lastIndex = new Map<string, number>();
    this.items.forEach((entry, index) => lastIndex.set(entry.command, index));

    return this.retain((entry, index) => lastIndex.get(entry.command) === index);
  }

  /**
   * Remove entries whose local date falls in `[start, end]`.
   * Entries whose timestamp has no calendar date are kept.
   *
   * @throws {RangeError} when `start` is after `end`.
   */
  removeInDateRange(start: LocalDate, end: LocalDate): number {
    if (compareLocalDates(start, end) > 0) {
      throw new RangeError('The start date must not be after the end date.');
    }

    return this.retain((entry) => {
      const date = timestampToLocalDate(entry.timestamp);
      if (!date) return true;
      return compareLocalDates(date, start) < 0 || compareLocalDates(date, end) > 0;
    });
  }

  /** Remove entries whose command contains any of `words`. */
  removeMatching(words: readonly string[], ignoreCase: boolean): number {
    const filter = new WordFilter(words, ignoreCase);
    if (filter.isEmpty) return 0;

    return this.retain((entry) => !filter.matches(entry.command));
  }

  private retain(keep: (entry: HistoryEntry, index: number) => boolean): number {
    const before = this.items.length;
    this.items = this.items.filter(keep);
    return before - this.items.length;
  }

  // ── Queries ────────────────────────────────────────────────────────────────

  /**
   * Number of distinct commands occurring more than once.
   * Not the number of extra occurrences.
   */
  countDuplicates(): number {
    const counts = new Map<string, number>();
    for (const entry of this.items) {
      counts.set(entry.command, (counts.get(entry.command) ?? 0) + 1);
    }

    let duplicates = 0;
    for (const count of counts.values()) {
      if (count > 1) duplicates++;
    }
    return duplicates;
  }

  // ── Encoding ───────────────────────────────────────────────────────────────

  /** File content for the current entries, metafied the way zsh writes it. */
  encode(): Buffer {
    const text = this.items.map((entry) => `${toHistoryLine(entry)}\n`).join('');
    return Buffer.from(metafy(Buffer.from(text, 'utf-8')));
  }

  /**
   * Rewrite the history file with the current entries, keeping its
   * permissions. A symlinked history file is rewritten through the link.
   *
   * @returns The backup path when a backup was taken, otherwise `null`.
   * @throws {BackupError} when the backup fails; the file is not touched.
   * @throws {IoError} when the rewrite fails; the file keeps its old content.
   */
  async write(options: WriteOptions): Promise<string | null> {
    // Through a symlink, both the backup and the rewrite land beside the target.
    const target = await resolveFilePath(this.filePath);
    const backupPath = options.backup ? await createBackup(target, options.now) : null;
    await replaceFileContents(target, this.encode());
    return backupPath;
  }
}
