/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Collapse runs of whitespace (including newlines from pretty-printed markup)
 * into single spaces and trim the result.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Return the substring between the first `start` and the last `end`.
 * A missing marker falls back to the corresponding string edge.
 */
export function findBetween(text: string, start: string, end: string): string {
  const startIndex = text.indexOf(start);
  const from = startIndex === -1 ? 0 : startIndex + start.length;
  const endIndex = text.lastIndexOf(end);
  const to = endIndex === -1 ? text.length : endIndex;
  return text.substring(from, to);
}
