/**
 * Absolute placement steps: dimension defaults, whole-model layout,
 * neighbour placement, disconnected shapes and the final fallback row.
 *
 * All coordinates handled here are absolute canvas coordinates;
 * containment resolution converts them afterwards.
 */

import {
  ATTACHED_TYPE,
  DEFAULT_BOUNDS,
  DEFAULT_ELEMENT_SIZE,
  DIAGRAM_MARGIN,
  DISCONNECTED_ROW_OFFSET,
  FALLBACK_ROW_OFFSET,
  NODE_HORIZONTAL_GAP,
  NODE_VERTICAL_GAP,
  SIDEBAR_STACK_GAP,
  getElementSize,
} from '../constants';
import type { Rect } from '../geometry';
import { gridLayout } from '../layout/fallback-layout';
import { isConnected } from '../layout/graph-builder';
import { calculateLayout, shapeSizes } from '../layout/layout-engine';
import { computeDiagramBounds, hasPosition, isDataShape, shapeRect, shapeSize } from '../model';
import type { Point, Shape } from '../types';
import type { ResolverContext } from './context';
import { avoidOverlap } from './overlap';

/** Fill unset coordinates only; a value already present is never replaced. */
function applyPosition(shape: Shape, p: Point): void {
  shape.x ??= p.x;
  shape.y ??= p.y;
}

// ── Dimensions ─────────────────────────────────────────────────────────────

export function assignDimensions(ctx: ResolverContext): void {
  for (const shape of ctx.model.shapes) {
    const def = getElementSize(shape.type);
    shape.width ??= def.width;
    shape.height ??= def.height;
  }
}

// ── Whole-model layout ─────────────────────────────────────────────────────

/** Runs only when nothing in the model carries a position. */
export function needsWholeLayout(ctx: ResolverContext): boolean {
  return (
    ctx.mode === 'use-external-tool' &&
    ctx.model.shapes.length > 0 &&
    !ctx.model.shapes.some(hasPosition)
  );
}

export async function layoutUnpositioned(ctx: ResolverContext): Promise<void> {
  const positions = await calculateLayout({
    shapes: ctx.model.shapes,
    graph: ctx.graph,
    direction: ctx.direction,
    tool: ctx.tool,
    log: ctx.log,
  });
  for (const shape of ctx.model.shapes) {
    const p = positions.get(shape.id);
    if (p) applyPosition(shape, p);
  }
}

// ── Neighbour placement ────────────────────────────────────────────────────

/**
 * Shapes a candidate must not overlap: every positioned shape except the
 * shape itself, attached shapes, its own container and its own children.
 */
function obstaclesFor(shape: Shape, shapes: readonly Shape[]): Rect[] {
  const obstacles: Rect[] = [];
  for (const other of shapes) {
    if (other === shape || !hasPosition(other)) continue;
    if (other.type === ATTACHED_TYPE) continue;
    if (other.id === shape.subContainer || other.id === shape.parent) continue;
    if (other.subContainer === shape.id || other.parent === shape.id) continue;
    obstacles.push(shapeRect(other));
  }
  return obstacles;
}

function firstPositioned(ids: readonly string[], ctx: ResolverContext): Rect | undefined {
  for (const id of ids) {
    const shape = ctx.index.shapes.get(id);
    if (shape && hasPosition(shape)) return shapeRect(shape);
  }
  return undefined;
}

/**
 * Right of the first positioned predecessor (wrapping below past the
 * right bound), else left of the first positioned successor (wrapping
 * above past the left bound).  Vertically centred on the neighbour.
 */
function neighborCandidate(
  shape: Shape,
  ctx: ResolverContext,
  limits: { left: number; right: number }
): Rect | undefined {
  const { width, height } = shapeSize(shape);

  const pred = firstPositioned(ctx.graph.predecessors.get(shape.id) ?? [], ctx);
  if (pred) {
    const x = pred.x + pred.width + NODE_HORIZONTAL_GAP;
    if (x + width > limits.right) {
      return { x: pred.x, y: pred.y + pred.height + NODE_VERTICAL_GAP, width, height };
    }
    return { x, y: pred.y + (pred.height - height) / 2, width, height };
  }

  const succ = firstPositioned(ctx.graph.successors.get(shape.id) ?? [], ctx);
  if (succ) {
    const x = succ.x - width - NODE_HORIZONTAL_GAP;
    if (x < limits.left) {
      return { x: succ.x, y: succ.y - height - NODE_VERTICAL_GAP, width, height };
    }
    return { x, y: succ.y + (succ.height - height) / 2, width, height };
  }

  return undefined;
}

export function placeNeighbors(ctx: ResolverContext): void {
  const { model, graph } = ctx;
  const pending = model.shapes.filter((s) => !hasPosition(s) && isConnected(graph, s.id));
  if (pending.length === 0) return;

  const bounds = computeDiagramBounds(model);
  const limits = {
    left: Math.min(bounds.minX, DEFAULT_BOUNDS.minX),
    right: Math.max(bounds.maxX, DEFAULT_BOUNDS.maxX),
  };

  const maxPasses = 2 * model.shapes.length;
  let placed = 0;
  for (let pass = 0; pass < maxPasses && pending.length > 0; pass++) {
    let progress = false;
    for (let i = 0; i < pending.length; ) {
      const shape = pending[i];
      const candidate = neighborCandidate(shape, ctx, limits);
      if (!candidate) {
        i++;
        continue;
      }
      applyPosition(shape, avoidOverlap(candidate, obstaclesFor(shape, model.shapes)));
      pending.splice(i, 1);
      progress = true;
      placed++;
    }
    if (!progress) break;
  }

  ctx.log.note('neighbors', `placed ${placed}, ${pending.length} left without a positioned neighbour`);
}

// ── Disconnected shapes ────────────────────────────────────────────────────

/**
 * Shapes with no flow edge at all: data-like shapes stack in a sidebar
 * left of the diagram (no further left than the margin), everything else
 * goes in a wrapping row below it.
 */
export function placeDisconnected(ctx: ResolverContext): void {
  const { model, graph } = ctx;
  const pending = model.shapes.filter((s) => !hasPosition(s) && !isConnected(graph, s.id));
  if (pending.length === 0) return;

  const bounds = computeDiagramBounds(model);
  let sidebarY = bounds.minY;
  let rowX = bounds.minX;
  let rowY = bounds.maxY + DISCONNECTED_ROW_OFFSET;
  let rowHeight = 0;

  for (const shape of pending) {
    const { width, height } = shapeSize(shape);
    if (isDataShape(shape)) {
      // The sidebar never starts left of the margin; clamped entries step clear of the flow
      const x = Math.max(bounds.minX - width - NODE_HORIZONTAL_GAP, DIAGRAM_MARGIN);
      const p = avoidOverlap({ x, y: sidebarY, width, height }, obstaclesFor(shape, model.shapes));
      applyPosition(shape, p);
      sidebarY = p.y + height + SIDEBAR_STACK_GAP;
      continue;
    }
    if (rowX > bounds.minX && rowX + width > bounds.maxX) {
      rowX = bounds.minX;
      rowY += rowHeight + NODE_VERTICAL_GAP;
      rowHeight = 0;
    }
    applyPosition(shape, { x: rowX, y: rowY });
    rowX += width + NODE_HORIZONTAL_GAP;
    rowHeight = Math.max(rowHeight, height);
  }
}

// ── Final fallback ─────────────────────────────────────────────────────────

/** Anything still unpositioned goes in a wrapping grid below the diagram. */
export function assignFallbackPositions(ctx: ResolverContext): void {
  const pending = ctx.model.shapes.filter((s) => !hasPosition(s));
  if (pending.length === 0) return;

  const bounds = computeDiagramBounds(ctx.model);
  const sizes = shapeSizes(pending);
  const grid = gridLayout(
    pending.map((s) => s.id),
    (id) => sizes.get(id) ?? DEFAULT_ELEMENT_SIZE,
    bounds.minX,
    bounds.maxY + FALLBACK_ROW_OFFSET
  );
  for (const shape of pending) {
    const p = grid.get(shape.id);
    if (p) applyPosition(shape, p);
  }
  ctx.log.note('fallback', `${pending.length} shapes placed in the fallback row`);
}
