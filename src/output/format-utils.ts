/**
 * Shared formatting utilities for terminal output renderers.
 */

const ANSI_RE = /\x1b\[[0-9;]*m/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_RE, '');
}

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const padding = Math.max(0, len - stripAnsi(str).length);
  return str + ' '.repeat(padding);
}

/** Escape a value for CSV output (quote if it contains commas or quotes) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Fixed-decimal number, or '--' when missing */
export function formatFixed(value: number | null | undefined, digits: number, suffix = ''): string {
  if (value === null || value === undefined) return '--';
  return value.toFixed(digits) + suffix;
}
