/**
 * Command-line interface definition.
 *
 *   zhc [clean] [history-file]   dedupe / filter / rewrite the history
 *   zhc analyze [history-file]   print usage statistics
 *   zhc parse-line <record>      parse one record (diagnostics)
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { runClean } from './commands/clean.js';
import { runAnalyze } from './commands/analyze.js';
import { runParseLine } from './commands/parse-line.js';
import { DEFAULT_TOP_N } from './analyzers/frequency.js';
import { compareLocalDates, parseLocalDate } from './utils/dates.js';
import type { DateRange, LocalDate, OutputFormat } from './types/index.js';

export const VERSION = '1.0.0';

interface CleanFlags {
  backup: boolean;
  keepDuplicates?: boolean;
  removeFrom?: LocalDate;
  removeTo?: LocalDate;
  filter?: string[];
  ignoreCase?: boolean;
  dryRun?: boolean;
}

interface AnalyzeFlags {
  top: number;
  format: OutputFormat;
}

// ── Option parsers ──────────────────────────────────────────────────────────

/** Commander argument parser for `YYYY-MM-DD` dates. */
export function parseDateOption(value: string): LocalDate {
  const date = parseLocalDate(value);
  if (!date) {
    throw new InvalidArgumentError(`'${value}' is not a valid date, expected YYYY-MM-DD.`);
  }
  return date;
}

/** Commander argument parser for a strictly positive integer. */
export function parseTopOption(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError(`'${value}' is not a positive integer.`);
  }
  return n;
}

/**
 * Combine `--remove-from` and `--remove-to` into one inclusive range.
 *
 * @throws {InvalidArgumentError} when only one bound is given or the range is inverted.
 */
export function toDateRange(from?: LocalDate, to?: LocalDate): DateRange | undefined {
  if (!from && !to) return undefined;
  if (!from || !to) {
    throw new InvalidArgumentError('--remove-from and --remove-to must be used together.');
  }
  if (compareLocalDates(from, to) > 0) {
    throw new InvalidArgumentError('--remove-from must not be after --remove-to.');
  }
  return { start: from, end: to };
}

// ── Program ─────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('zhc')
    .description('Clean your history by removing duplicate commands, commands matching words, date ranges etc...')
    .version(VERSION);

  program
    .command('clean', { isDefault: true })
    .description('Remove duplicates and unwanted entries, then rewrite the history file')
    .argument('[history-file]', 'history file (default: $HISTFILE or ~/.zsh_history)')
    .option('--no-backup', 'do not copy the history file aside before rewriting it')
    .option('-k, --keep-duplicates', 'do not remove duplicate commands')
    .option('--remove-from <date>', 'remove entries dated on or after this day (YYYY-MM-DD)', parseDateOption)
    .option('--remove-to <date>', 'remove entries dated on or before this day (YYYY-MM-DD)', parseDateOption)
    .option('-f, --filter <words...>', 'remove commands containing any of these words')
    .option('-i, --ignore-case', 'match --filter words case-insensitively')
    .option('-n, --dry-run', 'report what would be removed without writing')
    .action(async (historyFile: string | undefined, flags: CleanFlags, command: Command) => {
      let removeRange: DateRange | undefined;
      try {
        removeRange = toDateRange(flags.removeFrom, flags.removeTo);
      } catch (error) {
        if (error instanceof InvalidArgumentError) command.error(error.message);
        throw error;
      }

      await runClean({
        historyFile,
        backup: flags.backup,
        keepDuplicates: flags.keepDuplicates ?? false,
        removeRange,
        filter: flags.filter,
        ignoreCase: flags.ignoreCase ?? false,
        dryRun: flags.dryRun ?? false,
      });
    });

  program
    .command('analyze')
    .description('Show statistics about the history file')
    .argument('[history-file]', 'history file (default: $HISTFILE or ~/.zsh_history)')
    .option('-t, --top <n>', 'number of commands and executables to rank', parseTopOption, DEFAULT_TOP_N)
    .addOption(
      new Option('--format <format>', 'output format').choices(['table', 'json']).default('table'),
    )
    .action(async (historyFile: string | undefined, flags: AnalyzeFlags) => {
      await runAnalyze({ historyFile, top: flags.top, format: flags.format });
    });

  program
    .command('parse-line')
    .description('Parse a single history record and describe it')
    .argument('<record>', "a record such as ': 1731884069:0;ls'")
    .action(async (record: string) => {
      await runParseLine(record);
    });

  return program;
}
