// Declarative panel tree produced by the layout and drawn by the terminal frame.

export type Direction = 'vertical' | 'horizontal';

export type Point = readonly [x: number, y: number];

export type PanelNode =
  | { kind: 'split'; direction: Direction; margin?: number; children: Array<{ percent: number; node: PanelNode }> }
  | { kind: 'text'; title: string; lines: string[] }
  | { kind: 'table'; title: string; header: string[]; widths: number[]; rows: string[][] }
  | { kind: 'chart'; title: string; points: Point[]; xBounds: [number, number]; yBounds: [number, number]; color: string };

export type PanelTree = PanelNode;

export function split(direction: Direction, children: Array<[number, PanelNode]>, margin?: number): PanelNode {
  return {
    kind: 'split',
    direction,
    ...(margin !== undefined ? { margin } : {}),
    children: children.map(([percent, node]) => ({ percent, node })),
  };
}
