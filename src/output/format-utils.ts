/**
 * Shared formatting utilities for text and terminal output renderers.
 */

const NUMBER_FORMAT = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Escape a value for CSV output (quote if it contains commas or quotes) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Thousands separators and 2 decimals (1234.5 → "1,234.50"); null → "n/d" */
export function formatNumber(value: number | null): string {
  if (value === null) return 'n/d';
  return NUMBER_FORMAT.format(value);
}

/** Signed percentage with 2 decimals (12.3 → "+12.30%"); null → "n/d" */
export function formatPct(value: number | null): string {
  if (value === null) return 'n/d';
  return (value > 0 ? '+' : '') + NUMBER_FORMAT.format(value) + '%';
}
