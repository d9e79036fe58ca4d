/**
 * Frequency analysis engine.
 *
 * Counts exact commands and executables (first word of a command), ranks
 * them, and computes the span of dates a history covers. All functions are
 * read-only over the entries they are given.
 */

import type {
  AnalysisResult,
  DateRange,
  HistoryEntry,
  RankedItem,
} from '../types/index.js';
import type { HistoryCollection } from '../history/collection.js';
import { compareLocalDates, timestampToLocalDate } from '../utils/dates.js';

/** Ranking size used when the caller does not ask for one. */
export const DEFAULT_TOP_N = 10;

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * The `n` most frequent commands.
 *
 * Ranked by count (descending), then by command text (ascending code-unit
 * order) so ties always come out the same way.
 */
export function topNCommands(entries: readonly HistoryEntry[], n: number): RankedItem[] {
  if (n <= 0 || entries.length === 0) return [];
  return rank(countBy(entries, (entry) => entry.command), n);
}

/**
 * The `n` most frequent executables, keyed on the first whitespace-delimited
 * token of each command. Blank commands are not counted.
 */
export function topNExecutables(entries: readonly HistoryEntry[], n: number): RankedItem[] {
  if (n <= 0 || entries.length === 0) return [];
  return rank(countBy(entries, (entry) => executableOf(entry.command)), n);
}

/**
 * Earliest and latest local dates across all entries.
 *
 * Scans everything: append order is not timestamp order once histories are
 * merged or edited.
 */
export function dateRange(entries: readonly HistoryEntry[]): DateRange | undefined {
  let range: DateRange | undefined;

  for (const entry of entries) {
    const date = timestampToLocalDate(entry.timestamp);
    if (!date) continue;

    if (!range) {
      range = { start: date, end: date };
      continue;
    }
    if (compareLocalDates(date, range.start) < 0) range.start = date;
    if (compareLocalDates(date, range.end) > 0) range.end = date;
  }

  return range;
}

/** Distinct commands occurring more than once. */
export function duplicateCount(history: HistoryCollection): number {
  return history.countDuplicates();
}

/** First whitespace-delimited word of a command, or `undefined` if blank. */
export function executableOf(command: string): string | undefined {
  const trimmed = command.trim();
  if (trimmed === '') return undefined;
  return trimmed.split(/\s+/, 1)[0];
}

/**
 * Full statistics for `zhc analyze`.
 */
export function analyzeHistory(history: HistoryCollection, topN: number): AnalysisResult {
  const { entries } = history;
  return {
    historyFile: history.filePath,
    size: history.size,
    skipped: history.skipped,
    dateRange: dateRange(entries),
    duplicateCount: duplicateCount(history),
    topN,
    topCommands: topNCommands(entries, topN),
    topExecutables: topNExecutables(entries, topN),
  };
}

// ── Internal helpers ────────────────────────────────────────────────────────

function countBy(
  entries: readonly HistoryEntry[],
  keyOf: (entry: HistoryEntry) => string | undefined,
): Map<string, number> {
  const counts = new Map<string, number>();

  for (const entry of entries) {
    const key = keyOf(entry);
    if (key === undefined) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return counts;
}

function rank(counts: Map<string, number>, n: number): RankedItem[] {
  const ranked = [...counts.entries()].map(([value, count]) => ({ value, count }));

  ranked.sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    if (a.value < b.value) return -1;
    if (a.value > b.value) return 1;
    return 0;
  });

  return ranked.slice(0, n);
}
