export type Size = { width: number; height: number };

/** Space left inside a bordered panel once the border and title row are drawn. */
export function panelInterior(size: Size): Size {
  return { width: Math.max(0, size.width - 2), height: Math.max(0, size.height - 3) };
}

/** Splits `total` cells by percentages; the last child takes the rounding remainder. */
export function splitSizes(total: number, percents: number[]): number[] {
  const sizes = percents.map(p => Math.floor((total * p) / 100));
  if (sizes.length) {
    const used = sizes.slice(0, -1).reduce((a, b) => a + b, 0);
    sizes[sizes.length - 1] = Math.max(0, total - used);
  }
  return sizes;
}
