/**
 * Shared type definitions for zsh-history-cleaner.
 */

// ── History data ────────────────────────────────────────────────────────────

/**
 * A single command recorded in a zsh `extended_history` file.
 *
 * Two entries are "the same" for deduplication purposes when their
 * `command` text is identical; `timestamp` and `elapsed` are ignored.
 */
export interface HistoryEntry {
  /** Exact command text, embedded newlines and continuation backslashes included. */
  readonly command: string;
  /** Seconds since the Unix epoch when the command started. */
  readonly timestamp: number;
  /** Seconds the command took to run. */
  readonly elapsed: number;
  /**
   * The elapsed field as written in the file, present only when it differs
   * from `String(elapsed)` (e.g. `01`), so the record encodes back unchanged.
   */
  readonly elapsedDigits?: string;
}

/** A calendar date in the local time zone. `month` is 1-based. */
export interface LocalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/** Inclusive span of local dates. */
export interface DateRange {
  start: LocalDate;
  end: LocalDate;
}

// ── Analysis ────────────────────────────────────────────────────────────────

/** A ranked value (command or executable) and its number of occurrences. */
export interface RankedItem {
  value: string;
  count: number;
}

/** Result of `zhc analyze`, consumed by the formatters. */
export interface AnalysisResult {
  /** Absolute path of the analysed history file. */
  historyFile: string;
  /** Number of entries loaded. */
  size: number;
  /** Records dropped at load time because they did not parse. */
  skipped: number;
  /** First and last local dates covered, if any timestamp converts. */
  dateRange?: DateRange;
  /** Distinct commands that occur more than once. */
  duplicateCount: number;
  /** Requested ranking size. */
  topN: number;
  topCommands: RankedItem[];
  topExecutables: RankedItem[];
}

// ── Command options ─────────────────────────────────────────────────────────

export type OutputFormat = 'table' | 'json';

/** Options for `zhc analyze`. */
export interface AnalyzeOptions {
  historyFile?: string;
  top: number;
  format: OutputFormat;
}

/** Options for `zhc clean`. */
export interface CleanOptions {
  historyFile?: string;
  /** Copy the file aside before rewriting it. */
  backup: boolean;
  keepDuplicates: boolean;
  /** Inclusive date range to remove (both ends required together). */
  removeRange?: DateRange;
  /** Remove commands containing any of these words. */
  filter?: string[];
  ignoreCase: boolean;
  /** Report what would change without writing. */
  dryRun: boolean;
}

/** Per-step removal counts reported by `zhc clean`. */
export interface CleanSummary {
  historyFile: string;
  loaded: number;
  skipped: number;
  duplicatesRemoved: number;
  dateRangeRemoved: number;
  filteredRemoved: number;
  remaining: number;
  written: boolean;
  backupPath: string | null;
}
