/**
 * `zhc parse-line` command implementation.
 *
 * Diagnostic entry point: parses a single history record given on the command
 * line. Unlike a file load, a record that does not parse is a hard error.
 */

import { describeEntry, parseEntry } from '../parsers/entry.js';
import { describeCause } from '../utils/errors.js';
import type { HistoryEntry } from '../types/index.js';

/**
 * Run the `parse-line` command.
 *
 * @returns The parsed entry (also printed to stdout).
 */
export async function runParseLine(record: string): Promise<HistoryEntry> {
  const { default: chalk } = await import('chalk');

  try {
    const entry = parseEntry(record);
    console.log(describeEntry(entry));
    return entry;
  } catch (error) {
    console.error(chalk.red(`Error: ${describeCause(error)}`));
    process.exit(1);
  }
}
