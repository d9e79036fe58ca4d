/**
 * Table formatter for the analyze command.
 *
 * Uses chalk for colours, boxen for the bordered stats box.
 */

import type { AnalysisResult, RankedItem } from '../types/index.js';
import { daysBetween, formatLocalDate } from '../utils/dates.js';
import { plural, singleLine, truncate, truncateLeft } from '../utils/strings.js';

/** Longest command/executable shown in a table cell. */
export const MAX_CELL_TEXT_LENGTH = 40;

/** Medal for the podium, plain number afterwards. */
export function formatRankIcon(rank: number): string {
  switch (rank) {
    case 1:
      return '🥇';
    case 2:
      return '🥈';
    case 3:
      return '🥉';
    default:
      return String(rank);
  }
}

/**
 * Format analysis results as a styled terminal report.
 *
 * @returns A multi-line string ready for `console.log`.
 */
export async function formatAnalysisTable(result: AnalysisResult): Promise<string> {
  // Dynamic imports for ESM-only packages.
  const { default: chalk } = await import('chalk');
  const { default: boxen } = await import('boxen');

  const output: string[] = [];

  // ── Header box ─────────────────────────────────────────────────────────────
  const title = `📊 History Analysis for ${chalk.cyan.bold(truncateLeft(result.historyFile, MAX_CELL_TEXT_LENGTH + 20))}`;

  let dates: string;
  if (result.dateRange) {
    const { start, end } = result.dateRange;
    const span = plural(daysBetween(start, end), 'day');
    dates = `${chalk.green.bold(formatLocalDate(start))} → ${chalk.green.bold(formatLocalDate(end))} ${chalk.dim.italic(`(${span})`)}`;
  } else {
    dates = chalk.dim('no dated entries');
  }

  const percentage =
    result.size > 0 ? ((result.duplicateCount / result.size) * 100).toFixed(2) : '0.00';

  const stats = [
    `🗓️  ${dates}`,
    `📝 Total Commands: ${chalk.yellow.bold(result.size.toLocaleString())}`,
    `♻️  Duplicate Commands: ${chalk.yellow.bold(result.duplicateCount.toLocaleString())} ${chalk.dim.italic(`(${percentage}%)`)}`,
  ];
  if (result.skipped > 0) {
    stats.push(`⚠️  Unparsable records skipped: ${chalk.red.bold(result.skipped.toLocaleString())}`);
  }

  output.push(
    boxen(`${title}\n\n${stats.join('\n')}`, {
      padding: { left: 1, right: 1, top: 0, bottom: 0 },
      borderStyle: 'round',
      borderColor: 'blue',
    }),
  );

  output.push('');

  // ── Rankings ───────────────────────────────────────────────────────────────
  output.push(chalk.magenta.bold(`🔥 Top ${result.topN} Most Used:`));
  output.push('');

  const rows = Math.max(result.topCommands.length, result.topExecutables.length);
  if (rows === 0) {
    output.push(chalk.dim('  No commands to rank.'));
    return output.join('\n');
  }

  const cellWidth = MAX_CELL_TEXT_LENGTH + 14;
  output.push(
    `${chalk.dim('Rank'.padStart(4))}  ${chalk.cyan.bold('Commands'.padEnd(cellWidth))}  ${chalk.cyan.bold('Executables')}`,
  );
  output.push(chalk.dim('─'.repeat(cellWidth * 2 + 6)));

  for (let i = 0; i < rows; i++) {
    const rank = formatRankIcon(i + 1).padStart(4);
    const command = formatCell(result.topCommands[i]);
    const executable = formatCell(result.topExecutables[i]);
    output.push(`${chalk.yellow(rank)}  ${command.padEnd(cellWidth)}  ${executable}`);
  }

  return output.join('\n');
}

/** `text (N times)`, with long or multi-line text shortened. */
export function formatCell(item: RankedItem | undefined): string {
  if (!item) return '';
  const text = truncate(singleLine(item.value), MAX_CELL_TEXT_LENGTH);
  return `${text} (${item.count} times)`;
}
