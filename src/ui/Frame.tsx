import type { ReactElement, ReactNode } from 'react';
import { Box, Text } from 'ink';
import type { PanelNode } from '../render/panels.js';
import { plotLines } from '../render/chart.js';
import { padCell } from '../utils/format.js';
import { panelInterior, splitSizes, type Size } from './sizing.js';

function Bordered({ title, size, children }: { title: string; size: Size; children?: ReactNode }) {
  return (
    <Box borderStyle="single" flexDirection="column" width={size.width} height={size.height}>
      <Text bold wrap="truncate-end">{title}</Text>
      {children}
    </Box>
  );
}

function Lines({ lines, size, color }: { lines: string[]; size: Size; color?: string }) {
  return (
    <>
      {lines.slice(0, size.height).map((l, i) => (
        <Text key={i} color={color} wrap="truncate-end">{l === '' ? ' ' : l}</Text>
      ))}
    </>
  );
}

export function PanelView({ node, size }: { node: PanelNode; size: Size }): ReactElement {
  switch (node.kind) {
    case 'split': {
      const margin = node.margin ?? 0;
      const inner = { width: Math.max(0, size.width - 2 * margin), height: Math.max(0, size.height - 2 * margin) };
      const vertical = node.direction === 'vertical';
      const sizes = splitSizes(vertical ? inner.height : inner.width, node.children.map(c => c.percent));
      return (
        <Box flexDirection={vertical ? 'column' : 'row'} padding={margin} width={size.width} height={size.height}>
          {node.children.map((c, i) => (
            <PanelView
              key={i}
              node={c.node}
              size={vertical ? { width: inner.width, height: sizes[i] } : { width: sizes[i], height: inner.height }}
            />
          ))}
        </Box>
      );
    }
    case 'text': {
      return (
        <Bordered title={node.title} size={size}>
          <Lines lines={node.lines} size={panelInterior(size)} />
        </Bordered>
      );
    }
    case 'table': {
      const row = (cells: string[]) => cells.map((c, i) => padCell(c, node.widths[i] ?? c.length)).join(' ');
      // Header, a spacer row, then data rows
      const lines = [row(node.header), '', ...node.rows.map(row)];
      return (
        <Bordered title={node.title} size={size}>
          <Lines lines={lines} size={panelInterior(size)} />
        </Bordered>
      );
    }
    case 'chart': {
      const inner = panelInterior(size);
      const lines = plotLines(node.points, node.xBounds, node.yBounds, inner.width, inner.height);
      return (
        <Bordered title={node.title} size={size}>
          <Lines lines={lines} size={inner} color={node.color} />
        </Bordered>
      );
    }
  }
}

export function Frame({ tree, size }: { tree: PanelNode | null; size: Size }) {
  if (!tree) return <Box width={size.width} height={size.height} />;
  return <PanelView node={tree} size={size} />;
}
