import type { Point } from './panels.js';

export const PLOT_GLYPH = '•';

function toCell(v: number, [lo, hi]: readonly [number, number], cells: number) {
  if (cells <= 1 || hi === lo) return 0;
  return Math.round(((v - lo) / (hi - lo)) * (cells - 1));
}

/**
 * Draws consecutive points as connected segments on a `width` x `height`
 * character grid. Row 0 is the top; points outside the bounds are clipped.
 */
export function plotLines(
  points: readonly Point[],
  xBounds: readonly [number, number],
  yBounds: readonly [number, number],
  width: number,
  height: number,
): string[] {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  const grid: string[][] = Array.from({ length: h }, () => Array<string>(w).fill(' '));
  const plot = (col: number, row: number) => {
    if (col >= 0 && col < w && row >= 0 && row < h) grid[row][col] = PLOT_GLYPH;
  };
  const cells = points.map(([x, y]) => [toCell(x, xBounds, w), h - 1 - toCell(y, yBounds, h)] as const);
  if (cells.length === 1) plot(cells[0][0], cells[0][1]);
  for (let i = 1; i < cells.length; i++) {
    const [c0, r0] = cells[i - 1];
    const [c1, r1] = cells[i];
    const steps = Math.max(Math.abs(c1 - c0), Math.abs(r1 - r0));
    if (steps === 0) { plot(c0, r0); continue; }
    for (let s = 0; s <= steps; s++) {
      plot(Math.round(c0 + ((c1 - c0) * s) / steps), Math.round(r0 + ((r1 - r0) * s) / steps));
    }
  }
  return grid.map(r => r.join(''));
}
