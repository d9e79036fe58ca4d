/**
 * Error types raised while loading, parsing and rewriting a history file.
 */

/** Base class: every error surfaced by the tool carries a stable `code`. */
export class HistoryError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryError';
    this.code = code;
  }
}

/** Opening, reading, creating or renaming a file failed. */
export class IoError extends HistoryError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Error when handling the file '${path}': ${describeCause(cause)}.`, 'IO_ERROR', {
      cause,
    });
    this.name = 'IoError';
    this.path = path;
  }
}

/** A physical line could not be read or is not valid UTF-8 once unmetafied. */
export class LineDecodeError extends HistoryError {
  /** 1-based physical line number. */
  readonly lineNumber: number;

  constructor(lineNumber: number, cause: unknown) {
    super(`Error when reading line ${lineNumber}: ${describeCause(cause)}.`, 'LINE_DECODE_ERROR', {
      cause,
    });
    this.name = 'LineDecodeError';
    this.lineNumber = lineNumber;
  }
}

export type EntryParseErrorKind = 'no-match' | 'invalid-integer';

/** A logical record is not a valid `: <timestamp>:<elapsed>;<command>` entry. */
export class EntryParseError extends HistoryError {
  readonly kind: EntryParseErrorKind;
  /** The record as it was given to the parser. */
  readonly record: string;

  constructor(kind: EntryParseErrorKind, record: string, detail?: string) {
    const message =
      kind === 'no-match'
        ? `Failed to parse '${record}' as a history entry. Make sure this is a valid entry from a Zsh history file.`
        : `Failed to parse integer: ${detail ?? record}.`;
    super(message, 'ENTRY_PARSE_ERROR');
    this.name = 'EntryParseError';
    this.kind = kind;
    this.record = record;
  }
}

/** The backup copy could not be written; the original must not be rewritten. */
export class BackupError extends HistoryError {
  readonly backupPath: string;

  constructor(backupPath: string, cause: unknown) {
    super(
      `Error when backing up the history to '${backupPath}': ${describeCause(cause)}.`,
      'BACKUP_ERROR',
      { cause },
    );
    this.name = 'BackupError';
    this.backupPath = backupPath;
  }
}

/** Message text of an unknown thrown value. */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
