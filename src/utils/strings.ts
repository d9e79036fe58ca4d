/**
 * Shared string utility helpers.
 */

/** Truncate a string to `max` characters, appending `...` if truncated. */
export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + '...';
}

/** Truncate from the left, keeping the end (useful for long paths). */
export function truncateLeft(s: string, max: number): string {
  if (s.length <= max) return s;
  return '...' + s.slice(s.length - (max - 3));
}

/** Collapse a multi-line command onto one line for table cells. */
export function singleLine(s: string): string {
  return s.replace(/\s*\n\s*/g, ' ');
}

/** `n` followed by `word`, or by its plural form unless `n` is 1. */
export function plural(n: number, word: string, pluralWord = `${word}s`): string {
  return `${n.toLocaleString()} ${n === 1 ? word : pluralWord}`;
}
