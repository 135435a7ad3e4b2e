/**
 * ELK-backed external layout tool.
 *
 * Translates the flow graph into an ELK graph (one leaf node per shape,
 * one edge per connector), runs the layered algorithm and reads back the
 * node positions.  ELK reports pixels with Y growing downward, so the
 * normaliser needs neither a flip nor a scale.
 */

import type { ElkExtendedEdge, ElkNode } from 'elkjs';
import { DEFAULT_ELEMENT_SIZE, ELK_NODE_SPACING } from '../constants';
import { LayoutToolError, errorMessage } from '../errors';
import { pointBounds } from '../geometry';
import type { ExternalLayoutTool, LayoutRequest, RawLayout } from '../layout/types';
import type { Point } from '../types';
import { ELK_DIRECTIONS, ELK_LAYOUT_OPTIONS } from './constants';

export const ELK_TOOL_NAME = 'elk';

export class ElkLayoutTool implements ExternalLayoutTool {
  readonly name = ELK_TOOL_NAME;

  async layout(request: LayoutRequest): Promise<RawLayout> {
    const { graph, sizes, direction } = request;

    let result: ElkNode;
    try {
      // Dynamic import: a missing elkjs surfaces as a tool failure
      const ELK = (await import('elkjs')).default;
      const elk = new ELK();
      const children: ElkNode[] = graph.nodes.map((id) => {
        const size = sizes.get(id) ?? DEFAULT_ELEMENT_SIZE;
        return { id, width: size.width, height: size.height };
      });
      const edges: ElkExtendedEdge[] = graph.edges.map((c) => ({
        id: c.id,
        sources: [c.source],
        targets: [c.target],
      }));
      result = await elk.layout({
        id: 'root',
        layoutOptions: { ...ELK_LAYOUT_OPTIONS, 'elk.direction': ELK_DIRECTIONS[direction] },
        children,
        edges,
      });
    } catch (err) {
      throw new LayoutToolError(ELK_TOOL_NAME, errorMessage(err), { cause: err });
    }

    const positions = new Map<string, Point>();
    for (const child of result.children ?? []) {
      if (child.x === undefined || child.y === undefined) continue;
      positions.set(child.id, { x: child.x, y: child.y });
    }

    placeMissingNodes(graph.nodes, positions, sizes);
    return { positions, flipY: false, applyScale: false };
  }
}

/**
 * Nodes ELK left without a position go in a column right of ELK's own
 * bounding box, stacked downward from its top.  With nothing positioned
 * the column starts at the origin.
 */
export function placeMissingNodes(
  nodes: readonly string[],
  positions: Map<string, Point>,
  sizes: LayoutRequest['sizes']
): void {
  const missing = nodes.filter((id) => !positions.has(id));
  if (missing.length === 0) return;

  let right = 0;
  let top = 0;
  const bounds = pointBounds(positions.values());
  if (bounds) {
    top = bounds.minY;
    for (const [id, p] of positions) {
      const width = sizes.get(id)?.width ?? DEFAULT_ELEMENT_SIZE.width;
      right = Math.max(right, p.x + width);
    }
    right += ELK_NODE_SPACING;
  }

  let y = top;
  for (const id of missing) {
    positions.set(id, { x: right, y });
    y += (sizes.get(id)?.height ?? DEFAULT_ELEMENT_SIZE.height) + ELK_NODE_SPACING;
  }
}
