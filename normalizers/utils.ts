/**
 * Normalization utility functions
 *
 * Common helpers for converting provider date and text fields.
 */

const DATE_ONLY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a provider timestamp into a Date
 *
 * Handles:
 * - Date only (YYYY-MM-DD): local midnight of that day
 * - Full RFC3339 with Z or an offset
 *
 * @returns Date, or null when the input cannot be parsed
 */
export function parseTimestamp(timestamp: string): Date | null {
  const dateOnly = DATE_ONLY_REGEX.exec(timestamp);
  if (dateOnly) {
    const [, year, month, day] = dateOnly;
    return new Date(Number(year), Number(month) - 1, Number(day));
  }

  const date = new Date(timestamp);
  if (isNaN(date.getTime())) {
    return null;
  }

  return date;
}

/**
 * Format a Date as YYYY-MM-DD in local time
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Truncate a string to a maximum length
 *
 * @returns Truncated text or undefined if empty
 */
export function truncateText(text: string | undefined | null, maxLength: number = 200): string | undefined {
  if (!text) {
    return undefined;
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  if (trimmed.length <= maxLength) {
    return trimmed;
  }

  return trimmed.slice(0, maxLength);
}

/**
 * Extract first line from multiline text
 */
export function extractFirstLine(text: string | undefined | null, maxLength: number = 100): string | undefined {
  if (!text) {
    return undefined;
  }

  const firstLine = text.split('\n')[0].trim();
  if (firstLine.length === 0) {
    return undefined;
  }

  if (firstLine.length <= maxLength) {
    return firstLine;
  }

  return firstLine.slice(0, maxLength);
}
