/**
 * Value parsing for the site's single locale (nl-BE):
 * dates as DD/MM/YYYY, amounts with a decimal comma, "geen" for none.
 */

const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const NONE_MARKERS = new Set(['geen']);

/**
 * Parse a DD/MM/YYYY date into an ISO calendar date (YYYY-MM-DD).
 * Returns null for anything that is not a real calendar date.
 */
export function parseDate(text: string): string | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${match[3]}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse a currency amount such as "3,20", "€ 3,20" or "1.234,50 EUR".
 * The none marker ("geen") is a confirmed 0; unparsable input gives null.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (NONE_MARKERS.has(text.toLowerCase())) {
    return 0;
  }

  // drop currency symbol and unit words, keep sign, digits and separators
  let cleaned = text.replace(/[^\d,.-]/g, '');
  if (cleaned.includes(',')) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  }
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }

  return Number(cleaned);
}

/**
 * Parse an item counter. Integers pass through, the none marker is 0,
 * anything else is unknown (null).
 */
export function parseCount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (NONE_MARKERS.has(text.toLowerCase())) {
    return 0;
  }
  if (/^\d+$/.test(text)) {
    return Number(text);
  }
  return null;
}
