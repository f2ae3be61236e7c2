// CHANGE: Fixed-width column layout and scrolling window for the table.

import { truncate } from "../utils/format.js";

export const COLUMN_WIDTHS: readonly number[] = [24, 40, 12, 6, 6, 10];

/**
 * Lay cells out as fixed-width columns separated by a space.
 */
export function formatCells(cells: readonly string[], widths: readonly number[] = COLUMN_WIDTHS): string {
  return cells
    .map((cell, index) => {
      const width = widths[index] ?? cell.length;
      return truncate(cell, width).padEnd(width);
    })
    .join(" ")
    .trimEnd();
}

/**
 * First visible row index so that `selected` stays inside a window of `size` rows.
 */
export function windowStart(selected: number | undefined, total: number, size: number): number {
  if (selected === undefined || total <= size) {
    return 0;
  }
  const centred = selected - Math.floor(size / 2);
  return Math.min(Math.max(centred, 0), total - size);
}
