/**
 * In-process rank-based flow layout, used when no external layout tool is
 * available or the tool fails.
 *
 * Ranks advance a primary-axis cursor (X for horizontal directions, Y for
 * vertical ones) by the widest extent in the rank plus a rank separation;
 * nodes inside a rank advance a secondary-axis cursor by their own
 * cross extent plus a fixed node gap.  Output is already in final pixel
 * convention.
 */

import {
  DEFAULT_ELEMENT_SIZE,
  DIAGRAM_MARGIN,
  GRID_COLUMNS,
  NODE_HORIZONTAL_GAP,
  NODE_VERTICAL_GAP,
  RANK_SEPARATION,
  type Size,
} from '../constants';
import type { LayoutDirection, Point } from '../types';
import { groupByRank } from './ranks';
import type { FlowGraph, RankMap, RawLayout } from './types';

export function isHorizontal(direction: LayoutDirection): boolean {
  return direction === 'left-to-right' || direction === 'right-to-left';
}

function isReversed(direction: LayoutDirection): boolean {
  return direction === 'right-to-left' || direction === 'bottom-to-top';
}

export interface FallbackLayoutInput {
  /** Every shape id that needs a position, in model order. */
  ids: readonly string[];
  graph: FlowGraph;
  ranks: RankMap;
  sizes: Map<string, Size>;
  direction: LayoutDirection;
}

export function fallbackFlowLayout(input: FallbackLayoutInput): RawLayout {
  const { graph, ranks, sizes, direction } = input;
  const horizontal = isHorizontal(direction);
  const sizeOf = (id: string): Size => sizes.get(id) ?? DEFAULT_ELEMENT_SIZE;
  const positions = new Map<string, Point>();

  const inGraph = new Set(graph.nodes);
  const ranked = input.ids.filter((id) => inGraph.has(id));
  const groups = groupByRank(ranked, ranks);
  if (isReversed(direction)) groups.reverse();

  const crossGap = horizontal ? NODE_VERTICAL_GAP : NODE_HORIZONTAL_GAP;
  let primary = DIAGRAM_MARGIN;
  let crossMax = DIAGRAM_MARGIN;

  for (const group of groups) {
    let secondary = DIAGRAM_MARGIN;
    let extent = 0;
    for (const id of group) {
      const size = sizeOf(id);
      const along = horizontal ? size.width : size.height;
      const across = horizontal ? size.height : size.width;
      positions.set(id, horizontal ? { x: primary, y: secondary } : { x: secondary, y: primary });
      extent = Math.max(extent, along);
      crossMax = Math.max(crossMax, secondary + across);
      secondary += across + crossGap;
    }
    primary += extent + RANK_SEPARATION;
  }

  const leftovers = input.ids.filter((id) => !inGraph.has(id));
  if (leftovers.length > 0) {
    // Below (or right of) the ranked block; at the margin when nothing was ranked
    const start = positions.size > 0 ? crossMax + crossGap : DIAGRAM_MARGIN;
    const grid = gridLayout(leftovers, sizeOf, horizontal ? DIAGRAM_MARGIN : start, horizontal ? start : DIAGRAM_MARGIN);
    for (const [id, point] of grid) positions.set(id, point);
  }

  return { positions, flipY: false, applyScale: false };
}

/**
 * Row-wrapping grid: left to right, a new row every {@link GRID_COLUMNS}
 * shapes, rows separated by the tallest shape of the row plus a gap.
 */
export function gridLayout(
  ids: readonly string[],
  sizeOf: (id: string) => Size,
  originX = DIAGRAM_MARGIN,
  originY = DIAGRAM_MARGIN
): Map<string, Point> {
  const positions = new Map<string, Point>();
  let x = originX;
  let y = originY;
  let rowHeight = 0;

  ids.forEach((id, i) => {
    const size = sizeOf(id);
    positions.set(id, { x, y });
    x += size.width + NODE_HORIZONTAL_GAP;
    rowHeight = Math.max(rowHeight, size.height);
    if ((i + 1) % GRID_COLUMNS === 0) {
      x = originX;
      y += rowHeight + NODE_VERTICAL_GAP;
      rowHeight = 0;
    }
  });

  return positions;
}
