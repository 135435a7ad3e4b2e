/**
 * Whole-graph layout: external tool first, rank-based fallback on any
 * failure.  Returns normalised pixel positions keyed by shape id.
 */

import type { Size } from '../constants';
import { errorMessage } from '../errors';
import { shapeSize } from '../model';
import type { LayoutDirection, Point, Shape } from '../types';
import { fallbackFlowLayout } from './fallback-layout';
import type { LayoutLogger } from './layout-logger';
import { normalizeLayout } from './normalizer';
import { assignRanks } from './ranks';
import type { ExternalLayoutTool, FlowGraph, RawLayout } from './types';

export interface CalculateLayoutInput {
  shapes: readonly Shape[];
  graph: FlowGraph;
  direction: LayoutDirection;
  /** `null` forces the fallback layout. */
  tool: ExternalLayoutTool | null;
  log: LayoutLogger;
}

/** Width/height per shape id, falling back to the type default. */
export function shapeSizes(shapes: readonly Shape[]): Map<string, Size> {
  const sizes = new Map<string, Size>();
  for (const shape of shapes) {
    sizes.set(shape.id, shapeSize(shape));
  }
  return sizes;
}

export async function calculateLayout(input: CalculateLayoutInput): Promise<Map<string, Point>> {
  const { shapes, graph, direction, tool, log } = input;
  if (shapes.length === 0) return new Map();

  const sizes = shapeSizes(shapes);
  let raw: RawLayout | undefined;

  if (tool) {
    try {
      raw = await tool.layout({ graph, sizes, direction });
      log.note('layout', `${tool.name} positioned ${raw.positions.size} shapes`);
    } catch (err) {
      log.warn(`External layout tool '${tool.name}' failed, using fallback layout: ${errorMessage(err)}`);
    }
  }

  if (!raw) {
    const ranks = assignRanks(graph, log);
    raw = fallbackFlowLayout({ ids: shapes.map((s) => s.id), graph, ranks, sizes, direction });
  }

  return normalizeLayout(raw);
}
