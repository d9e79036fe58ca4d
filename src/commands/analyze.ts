/**
 * `zhc analyze` command implementation.
 *
 * Orchestrates: history path resolution → file loading → frequency
 * analysis → formatted output.
 */

import { getHistoryPath } from '../utils/history-paths.js';
import { fileExists } from '../utils/file-operations.js';
import { describeCause } from '../utils/errors.js';
import { HistoryCollection } from '../history/collection.js';
import { analyzeHistory } from '../analyzers/frequency.js';
import { formatAnalysisTable } from '../formatters/table.js';
import { formatAnalysisJson } from '../formatters/json.js';
import type { AnalyzeOptions, AnalysisResult } from '../types/index.js';

/**
 * Run the `analyze` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The structured analysis result (also printed to stdout).
 */
export async function runAnalyze(options: AnalyzeOptions): Promise<AnalysisResult> {
  // Dynamic imports for ESM-only packages (project is CJS under NodeNext).
  const { default: ora } = await import('ora');
  const { default: chalk } = await import('chalk');

  const spinner = ora('Resolving history file…').start();

  try {
    // 1 ── Resolve history file path ─────────────────────────────────────────
    const { filePath, source } = getHistoryPath(options.historyFile);
    spinner.text = `Reading history from ${filePath}…`;

    // 2 ── Verify file exists ────────────────────────────────────────────────
    if (!(await fileExists(filePath))) {
      spinner.fail(`History file not found: ${filePath}`);
      if (source === 'default') {
        console.error(
          chalk.yellow('\nTip: Pass the history file path as an argument or set $HISTFILE.'),
        );
      }
      process.exit(1);
    }

    // 3 ── Load entries ──────────────────────────────────────────────────────
    spinner.text = 'Parsing history entries…';
    const history = await HistoryCollection.load(filePath);

    // 4 ── Analyse ───────────────────────────────────────────────────────────
    spinner.text = 'Analyzing command frequency…';
    const result = analyzeHistory(history, options.top);

    spinner.succeed(`Analyzed ${result.size.toLocaleString()} history entries`);
    console.log('');

    // 5 ── Formatted output ──────────────────────────────────────────────────
    switch (options.format) {
      case 'json':
        console.log(formatAnalysisJson(result));
        break;
      default:
        console.log(await formatAnalysisTable(result));
        break;
    }

    return result;
  } catch (error) {
    spinner.fail('Analysis failed');
    console.error(chalk.red(`\nError: ${describeCause(error)}`));
    process.exit(1);
  }
}
