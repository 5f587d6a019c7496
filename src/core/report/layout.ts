/**
 * Column layout for styled entries
 */

import type { StyledEntry } from '../models/index.js';

/** Minimum spacing between columns */
export const COLUMN_GUTTER = 4;

export function computeColumnWidth(maxVisibleLength: number): number {
  return maxVisibleLength + COLUMN_GUTTER;
}

/** Never less than one column, even when a single column does not fit. */
export function computeColumnCount(maxVisibleLength: number, outputWidth: number): number {
  return Math.max(1, Math.floor(outputWidth / computeColumnWidth(maxVisibleLength)));
}

/**
 * Lay entries out row-major in input order.
 *
 * Every cell but the last of a row is padded to the column width using
 * the entry's visible length, so styling sequences do not shift the
 * columns. Rows carry no trailing whitespace and end with a newline.
 */
export function layoutColumns(
  entries: readonly StyledEntry[],
  maxVisibleLength: number,
  outputWidth: number,
): string {
  const visible = entries.filter((entry) => !entry.suppressed);
  const columnWidth = computeColumnWidth(maxVisibleLength);
  const columnCount = computeColumnCount(maxVisibleLength, outputWidth);

  let output = '';
  for (let start = 0; start < visible.length; start += columnCount) {
    const row = visible.slice(start, start + columnCount);
    const cells = row.map((entry, index) => {
      if (index === row.length - 1) {
        return entry.displayText;
      }
      const padding = Math.max(0, columnWidth - entry.visibleLength);
      return entry.displayText + ' '.repeat(padding);
    });
    output += cells.join('') + '\n';
  }
  return output;
}
