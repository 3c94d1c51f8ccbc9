/**
 * Normalization utility functions
 *
 * Fixed-width text helpers for the event line formatter.
 */

/**
 * Left-justify text in a column, padding with spaces. Longer text is kept
 * whole.
 */
export function padColumn(text: string, width: number): string {
  const length = Array.from(text).length;
  return length >= width ? text : text + ' '.repeat(width - length);
}

/**
 * Fit text to exactly `width` code points: truncate, then pad with spaces
 */
export function fitColumn(text: string, width: number): string {
  return padColumn(Array.from(text).slice(0, width).join(''), width);
}
