/**
 * Swimlane organisation: lane stacking, lane- and pool-relative shape
 * coordinates, and the preserve-mode coordinate-space conversion.
 */

import {
  DEFAULT_EXTENT,
  LANE_PADDING,
  MIN_LANE_HEIGHT,
  POOL_HEADER_WIDTH,
} from '../constants';
import { shapeSize } from '../model';
import type { Lane, Shape } from '../types';
import type { ResolverContext } from './context';
import { calculateLaneSizes } from './swimlane-sizer';

// ── Membership ─────────────────────────────────────────────────────────────

export interface Extent {
  minX: number;
  maxX: number;
}

function membersOf(ctx: ResolverContext, kind: 'lane' | 'pool', id: string): Shape[] {
  return ctx.model.shapes.filter((s) => {
    const ref = ctx.parents.get(s.id);
    return ref?.kind === kind && ref.id === id;
  });
}

/**
 * Horizontal extent of every shape still in absolute canvas space (root,
 * lane and pool children).  Lanes share it, so lanes of a pool share one
 * width.
 */
export function horizontalExtent(ctx: ResolverContext): Extent {
  let minX = Infinity;
  let maxX = -Infinity;
  for (const shape of ctx.model.shapes) {
    const kind = ctx.parents.get(shape.id)?.kind ?? 'none';
    if (kind !== 'none' && kind !== 'lane' && kind !== 'pool') continue;
    if (shape.x === undefined) continue;
    minX = Math.min(minX, shape.x);
    maxX = Math.max(maxX, shape.x + shapeSize(shape).width);
  }
  return minX === Infinity ? { ...DEFAULT_EXTENT } : { minX, maxX };
}

// ── Preserve mode ──────────────────────────────────────────────────────────

/**
 * Explicit coordinates are kept (and only converted) when preservation is
 * requested, the input carried coordinates and every lane has a position.
 */
export function shouldPreserve(ctx: ResolverContext): boolean {
  return (
    ctx.mode === 'preserve' &&
    ctx.model.hasExplicitCoordinates &&
    ctx.model.lanes.every((l) => l.x !== undefined && l.y !== undefined)
  );
}

/**
 * Pure coordinate-space conversion: lanes become pool-relative, lane
 * members lane-relative and laneless-pool members pool-relative.
 */
export function preserveCoordinates(ctx: ResolverContext): void {
  for (const pool of ctx.model.pools) {
    if (pool.x === undefined || pool.y === undefined) continue;
    const lanes = ctx.index.lanesByPool.get(pool.id) ?? [];

    if (lanes.length === 0) {
      for (const shape of membersOf(ctx, 'pool', pool.id)) {
        if (shape.x !== undefined) shape.x -= pool.x;
        if (shape.y !== undefined) shape.y -= pool.y;
      }
      continue;
    }

    const sizes = calculateLaneSizes(pool, lanes);
    for (const lane of lanes) {
      if (lane.x === undefined || lane.y === undefined) continue;
      const absX = lane.x;
      const absY = lane.y;
      lane.x = absX - pool.x;
      lane.y = absY - pool.y;
      const size = sizes.get(lane.id);
      lane.width ??= size?.width;
      lane.height ??= size?.height;

      for (const shape of membersOf(ctx, 'lane', lane.id)) {
        if (shape.x !== undefined) shape.x -= absX;
        if (shape.y !== undefined) shape.y -= absY;
      }
    }
  }
}

// ── Layout mode ────────────────────────────────────────────────────────────

function laneHeight(members: readonly Shape[]): number {
  if (members.length === 0) return MIN_LANE_HEIGHT;
  const maxHeight = Math.max(...members.map((s) => shapeSize(s).height));
  return Math.max(MIN_LANE_HEIGHT, maxHeight + LANE_PADDING * 3);
}

/**
 * Lane-relative coordinates: X translated by the shared extent, Y
 * remapped linearly from the members' Y range into the lane's usable
 * band.  Members sharing a single Y are centred instead.
 */
function positionInLane(members: readonly Shape[], height: number, minX: number): void {
  const ys = members.flatMap((s) => (s.y === undefined ? [] : [s.y]));
  const minY = Math.min(...ys);
  const range = Math.max(...ys) - minY;
  const maxHeight = Math.max(...members.map((s) => shapeSize(s).height));
  const usable = Math.max(height - LANE_PADDING * 2 - maxHeight, 0);

  for (const shape of members) {
    if (shape.x !== undefined) shape.x = shape.x - minX + LANE_PADDING;
    if (shape.y === undefined) continue;
    shape.y =
      range > 0
        ? LANE_PADDING + ((shape.y - minY) / range) * usable
        : (height - shapeSize(shape).height) / 2;
  }
}

/**
 * Stack lanes inside their pools in declared order, size them, convert
 * their members, and fit each lane pool around its lanes.
 */
function organizeLanes(ctx: ResolverContext, extent: Extent): void {
  const laneWidth = extent.maxX - extent.minX + LANE_PADDING * 2;

  const heights = new Map<string, number>();
  const members = new Map<string, Shape[]>();
  for (const lane of ctx.model.lanes) {
    const inLane = membersOf(ctx, 'lane', lane.id);
    members.set(lane.id, inLane);
    heights.set(lane.id, laneHeight(inLane));
  }

  for (const [poolId, lanes] of ctx.index.lanesByPool) {
    const total = stackLanes(lanes, heights, laneWidth);
    const pool = ctx.index.pools.get(poolId);
    if (pool) {
      pool.width = laneWidth + POOL_HEADER_WIDTH;
      pool.height = total;
    }
  }

  for (const lane of ctx.model.lanes) {
    const inLane = members.get(lane.id) ?? [];
    if (inLane.length > 0) positionInLane(inLane, lane.height ?? MIN_LANE_HEIGHT, extent.minX);
  }

  ctx.log.note('lanes', `${ctx.model.lanes.length} lanes, width ${laneWidth}`);
}

function stackLanes(lanes: readonly Lane[], heights: Map<string, number>, width: number): number {
  let y = 0;
  for (const lane of lanes) {
    const height = heights.get(lane.id) ?? MIN_LANE_HEIGHT;
    lane.x = POOL_HEADER_WIDTH;
    lane.y = y;
    lane.width = width;
    lane.height = height;
    y += height;
  }
  return y;
}

/**
 * Members of laneless pools: X translated pool-relative past the header,
 * the group centred vertically.  The pool grows to fit when needed.
 */
function layoutLanelessPools(ctx: ResolverContext, extent: Extent): void {
  for (const pool of ctx.model.pools) {
    if ((ctx.index.lanesByPool.get(pool.id)?.length ?? 0) > 0) continue;
    const inPool = membersOf(ctx, 'pool', pool.id);
    if (inPool.length === 0) continue;

    const top = Math.min(...inPool.map((s) => s.y ?? 0));
    const bottom = Math.max(...inPool.map((s) => (s.y ?? 0) + shapeSize(s).height));
    const groupHeight = bottom - top;

    pool.width = Math.max(
      pool.width ?? 0,
      extent.maxX - extent.minX + LANE_PADDING * 2 + POOL_HEADER_WIDTH
    );
    pool.height = Math.max(pool.height ?? 0, groupHeight + LANE_PADDING * 2);
    const offsetY = (pool.height - groupHeight) / 2;

    for (const shape of inPool) {
      if (shape.x !== undefined) shape.x = shape.x - extent.minX + LANE_PADDING + POOL_HEADER_WIDTH;
      shape.y = offsetY + ((shape.y ?? top) - top);
    }
  }
}

/**
 * Layout-mode swimlane pass.  The shared extent is measured once, before
 * any member leaves canvas space.
 */
export function organizeSwimlanes(ctx: ResolverContext): void {
  const extent = horizontalExtent(ctx);
  if (ctx.model.lanes.length > 0) organizeLanes(ctx, extent);
  layoutLanelessPools(ctx, extent);
}
