/**
 * `zhc clean` command implementation.
 *
 * Flow:
 *  1. Load the history file
 *  2. Remove duplicates (unless --keep-duplicates)
 *  3. Remove entries in the requested date range
 *  4. Remove entries matching the filter words
 *  5. Back up and rewrite the file (unless --dry-run or nothing changed)
 */

import { getHistoryPath } from '../utils/history-paths.js';
import { fileExists } from '../utils/file-operations.js';
import { describeCause } from '../utils/errors.js';
import { formatLocalDate } from '../utils/dates.js';
import { plural } from '../utils/strings.js';
import { HistoryCollection } from '../history/collection.js';
import type { CleanOptions, CleanSummary } from '../types/index.js';

/**
 * Run the `clean` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns Per-step removal counts (also printed to stdout).
 */
export async function runClean(options: CleanOptions): Promise<CleanSummary> {
  // Dynamic imports for ESM-only packages.
  const { default: ora } = await import('ora');
  const { default: chalk } = await import('chalk');

  const spinner = ora('Resolving history file…').start();

  try {
    // 1 ── Load ──────────────────────────────────────────────────────────────
    const { filePath } = getHistoryPath(options.historyFile);
    if (!(await fileExists(filePath))) {
      spinner.fail(`History file not found: ${filePath}`);
      process.exit(1);
    }

    spinner.text = `Reading history from ${filePath}…`;
    const history = await HistoryCollection.load(filePath);
    const loaded = history.size;
    spinner.succeed(`${plural(loaded, 'history entry', 'history entries')} read from ${filePath}`);

    if (history.skipped > 0) {
      console.log(chalk.yellow(`  ${plural(history.skipped, 'record')} could not be parsed and will be dropped.`));
    }

    // 2 ── Duplicates ────────────────────────────────────────────────────────
    let duplicatesRemoved = 0;
    if (!options.keepDuplicates) {
      duplicatesRemoved = history.deduplicate();
      console.log(`  ${chalk.green('✔')} Duplicates: ${chalk.bold(duplicatesRemoved)} removed`);
    }

    // 3 ── Date range ────────────────────────────────────────────────────────
    let dateRangeRemoved = 0;
    if (options.removeRange) {
      const { start, end } = options.removeRange;
      dateRangeRemoved = history.removeInDateRange(start, end);
      console.log(
        `  ${chalk.green('✔')} Between ${formatLocalDate(start)} and ${formatLocalDate(end)}: ${chalk.bold(dateRangeRemoved)} removed`,
      );
    }

    // 4 ── Filter words ──────────────────────────────────────────────────────
    let filteredRemoved = 0;
    if (options.filter && options.filter.length > 0) {
      filteredRemoved = history.removeMatching(options.filter, options.ignoreCase);
      console.log(
        `  ${chalk.green('✔')} Matching ${options.filter.map((w) => `'${w}'`).join(', ')}: ${chalk.bold(filteredRemoved)} removed`,
      );
    }

    const summary: CleanSummary = {
      historyFile: filePath,
      loaded,
      skipped: history.skipped,
      duplicatesRemoved,
      dateRangeRemoved,
      filteredRemoved,
      remaining: history.size,
      written: false,
      backupPath: null,
    };

    const removed = loaded - history.size;
    console.log('');
    console.log(chalk.bold(`${plural(removed, 'command')} will be removed, ${history.size.toLocaleString()} kept.`));

    // 5 ── Write back ────────────────────────────────────────────────────────
    if (removed === 0 && history.skipped === 0) {
      console.log(chalk.dim('Nothing to change, the history file is left as is.'));
      return summary;
    }

    if (options.dryRun) {
      console.log(chalk.cyan('Dry run: the history file was not modified.'));
      return summary;
    }

    const writer = ora(options.backup ? 'Backing up and rewriting history…' : 'Rewriting history…').start();
    try {
      summary.backupPath = await history.write({ backup: options.backup });
    } catch (error) {
      writer.fail('History file left unchanged');
      throw error;
    }
    summary.written = true;

    if (summary.backupPath) {
      writer.succeed(`History rewritten (backup: ${summary.backupPath})`);
    } else {
      writer.succeed('History rewritten');
    }

    return summary;
  } catch (error) {
    spinner.fail('Cleaning failed');
    console.error(chalk.red(`\nError: ${describeCause(error)}`));
    process.exit(1);
  }
}
