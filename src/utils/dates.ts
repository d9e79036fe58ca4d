/**
 * Local-calendar date helpers.
 *
 * Timestamps in the history file are epoch seconds; every date-based
 * operation works on the calendar date those seconds fall on in the local
 * time zone.
 */

import type { LocalDate } from '../types/index.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Convert epoch seconds to the local calendar date.
 * Returns `undefined` when the value is outside the range `Date` can represent.
 */
export function timestampToLocalDate(timestamp: number): LocalDate | undefined {
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) return undefined;
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

/** Negative, zero or positive, like a sort comparator. */
export function compareLocalDates(a: LocalDate, b: LocalDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

/** `YYYY-MM-DD` */
export function formatLocalDate(date: LocalDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a strict `YYYY-MM-DD` string.
 * Returns `undefined` for anything else, including impossible dates like `2023-02-30`.
 */
export function parseLocalDate(text: string): LocalDate | undefined {
  const match = ISO_DATE_RE.exec(text.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const probe = new Date(2000, 0, 1);
  probe.setFullYear(year, month - 1, day);
  // Date rolls invalid days over into the next month.
  if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) {
    return undefined;
  }
  return { year, month, day };
}

/** Whole days from `start` to `end` (calendar days, DST-proof). */
export function daysBetween(start: LocalDate, end: LocalDate): number {
  const startUtc = Date.UTC(start.year, start.month - 1, start.day);
  const endUtc = Date.UTC(end.year, end.month - 1, end.day);
  return Math.round((endUtc - startUtc) / 86_400_000);
}

/**
 * Format a local date-time for humans: `YYYY-MM-DD HH:MM:SS`.
 * Falls back to the raw number when the timestamp does not convert.
 */
export function formatTimestamp(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) return String(timestamp);
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
  const day = formatLocalDate({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  });
  return `${day} ${time}`;
}
