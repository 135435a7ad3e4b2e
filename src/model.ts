/**
 * Model helpers: construction, cloning, per-call lookup tables and
 * explicit-coordinate bounds.
 */

import { DATA_TYPES, DEFAULT_BOUNDS, getElementSize, type Size } from './constants';
import { boundsOf, type Bounds, type Rect } from './geometry';
import type { DiagramModel, Lane, Pool, PositionedShape, Shape } from './types';

/** Build a model, deriving `hasExplicitCoordinates` from the shapes when omitted. */
export function createDiagramModel(parts: Partial<DiagramModel> = {}): DiagramModel {
  const shapes = parts.shapes ?? [];
  return {
    shapes,
    connectors: parts.connectors ?? [],
    pools: parts.pools ?? [],
    lanes: parts.lanes ?? [],
    hasExplicitCoordinates: parts.hasExplicitCoordinates ?? shapes.some(hasPosition),
    ...(parts.name !== undefined ? { name: parts.name } : {}),
  };
}

/** Private working copy; the caller's model is never touched. */
export function cloneModel(model: DiagramModel): DiagramModel {
  return structuredClone(model);
}

// ── Predicates ─────────────────────────────────────────────────────────────

export function hasPosition(shape: Shape): shape is Shape & { x: number; y: number } {
  return shape.x !== undefined && shape.y !== undefined;
}

export function isPositioned(shape: Shape): shape is PositionedShape {
  return hasPosition(shape) && shape.width !== undefined && shape.height !== undefined;
}

export function isDataShape(shape: Shape): boolean {
  return DATA_TYPES.has(shape.type);
}

export function laneHasRect(lane: Lane): lane is Lane & Rect {
  return (
    lane.x !== undefined && lane.y !== undefined && lane.width !== undefined && lane.height !== undefined
  );
}

/** Size of a shape, using its type's default for missing dimensions. */
export function shapeSize(shape: Shape): Size {
  const def = getElementSize(shape.type);
  return { width: shape.width ?? def.width, height: shape.height ?? def.height };
}

export function shapeRect(shape: Shape & { x: number; y: number }): Rect {
  return { x: shape.x, y: shape.y, ...shapeSize(shape) };
}

// ── Lookup tables ──────────────────────────────────────────────────────────

export interface ModelIndex {
  shapes: Map<string, Shape>;
  pools: Map<string, Pool>;
  lanes: Map<string, Lane>;
  /** Lanes per pool id, in declared order. */
  lanesByPool: Map<string, Lane[]>;
}

/** Fresh id lookups over the working copy. */
export function indexModel(model: DiagramModel): ModelIndex {
  const lanesByPool = new Map<string, Lane[]>();
  for (const lane of model.lanes) {
    const group = lanesByPool.get(lane.poolId);
    if (group) group.push(lane);
    else lanesByPool.set(lane.poolId, [lane]);
  }
  return {
    shapes: new Map(model.shapes.map((s) => [s.id, s])),
    pools: new Map(model.pools.map((p) => [p.id, p])),
    lanes: new Map(model.lanes.map((l) => [l.id, l])),
    lanesByPool,
  };
}

// ── Bounds ─────────────────────────────────────────────────────────────────

/**
 * Bounding box over positioned shapes, pools and lanes.  Falls back to
 * {@link DEFAULT_BOUNDS} when nothing carries coordinates.
 */
export function computeDiagramBounds(model: DiagramModel): Bounds {
  const rects: Rect[] = [];
  for (const shape of model.shapes) {
    if (hasPosition(shape)) rects.push(shapeRect(shape));
  }
  for (const item of [...model.pools, ...model.lanes]) {
    if (item.x === undefined || item.y === undefined) continue;
    rects.push({ x: item.x, y: item.y, width: item.width ?? 0, height: item.height ?? 0 });
  }
  return boundsOf(rects) ?? { ...DEFAULT_BOUNDS };
}

// ── Position snapshots ─────────────────────────────────────────────────────

/** Current x/y of every positioned shape. */
export function snapshotPositions(model: DiagramModel): Map<string, { x: number; y: number }> {
  const snap = new Map<string, { x: number; y: number }>();
  for (const shape of model.shapes) {
    if (hasPosition(shape)) snap.set(shape.id, { x: shape.x, y: shape.y });
  }
  return snap;
}

/** Shapes that gained a position or moved by more than 1px since `before`. */
export function countMoved(model: DiagramModel, before: Map<string, { x: number; y: number }>): number {
  let moved = 0;
  for (const shape of model.shapes) {
    if (!hasPosition(shape)) continue;
    const prev = before.get(shape.id);
    if (!prev || Math.abs(prev.x - shape.x) > 1 || Math.abs(prev.y - shape.y) > 1) moved++;
  }
  return moved;
}
