/**
 * Visible text length utilities
 *
 * Lengths are counted in characters (Unicode code points) after styling
 * sequences are removed.
 */

/** SGR control sequences (ESC [ ... m) as emitted by chalk */
const ANSI_SGR_PATTERN = /\x1b\[[0-9;]*m/g;

/** Remove all SGR styling sequences from text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_SGR_PATTERN, '');
}

/**
 * Number of characters left once styling sequences are removed.
 * Styling sequences never count toward column alignment.
 */
export function getVisibleLength(text: string): number {
  return Array.from(stripAnsi(text)).length;
}

/**
 * Truncate plain text to at most maxLength characters.
 * Text that already fits is returned unchanged; otherwise the first
 * maxLength - 1 characters are kept and followed by '…'.
 */
export function truncateText(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return chars.slice(0, maxLength - 1).join('') + '…';
}
