/**
 * JSON formatter for the analyze command.
 *
 * Serialises the AnalysisResult to pretty-printed JSON for piping
 * or downstream consumption by other tools. Dates become `YYYY-MM-DD`.
 */

import type { AnalysisResult } from '../types/index.js';
import { formatLocalDate } from '../utils/dates.js';

/**
 * Format analysis results as pretty-printed JSON.
 *
 * @returns A JSON string (2-space indented).
 */
export function formatAnalysisJson(result: AnalysisResult): string {
  const { dateRange, ...rest } = result;
  return JSON.stringify(
    {
      ...rest,
      dateRange: dateRange
        ? { start: formatLocalDate(dateRange.start), end: formatLocalDate(dateRange.end) }
        : null,
    },
    null,
    2,
  );
}
