/**
 * Pool rectangles: sizing on entry, derivation from positioned lanes and
 * vertical stacking of pools without a position.
 */

import { POOL_GAP, POOL_HEADER_WIDTH, POOL_TOP_MARGIN } from '../constants';
import { laneHasRect } from '../model';
import type { Pool, Shape } from '../types';
import type { ResolverContext } from './context';
import { calculatePoolSize } from './swimlane-sizer';

/** Shapes that belong to a pool directly or through one of its lanes. */
export function poolMembers(ctx: ResolverContext, pool: Pool): Shape[] {
  const lanes = ctx.index.lanesByPool.get(pool.id) ?? [];
  const laneIds = new Set(lanes.map((l) => l.id));
  const listed = new Set(lanes.flatMap((l) => l.memberIds));
  return ctx.model.shapes.filter(
    (s) =>
      listed.has(s.id) ||
      s.parent === pool.id ||
      (s.parent !== undefined && laneIds.has(s.parent))
  );
}

/**
 * Pool position resolution, run before any shape is placed.
 *
 * - A pool without position whose lanes all carry rectangles takes its
 *   rectangle from those lanes.
 * - Missing dimensions come from the swimlane sizer.
 * - Remaining pools are stacked below the lowest positioned pool and
 *   recorded in `ctx.computedPools`.
 */
export function resolvePoolPositions(ctx: ResolverContext): void {
  for (const pool of ctx.model.pools) {
    if (pool.x === undefined || pool.y === undefined) deriveFromLanes(ctx, pool);
    if (pool.width === undefined || pool.height === undefined) {
      const size = calculatePoolSize(pool, poolMembers(ctx, pool));
      pool.width ??= size.width;
      pool.height ??= size.height;
    }
  }

  const fixed = ctx.model.pools.filter((p) => p.x !== undefined && p.y !== undefined);
  for (const pool of ctx.model.pools) {
    if (fixed.includes(pool)) continue;
    ctx.computedPools.add(pool.id);
  }
  stackPools(ctx.model.pools, ctx.computedPools);
  if (ctx.computedPools.size > 0) ctx.log.note('pools', `stacked ${ctx.computedPools.size} pools`);
}

function deriveFromLanes(ctx: ResolverContext, pool: Pool): void {
  const lanes = ctx.index.lanesByPool.get(pool.id) ?? [];
  if (lanes.length === 0 || !lanes.every(laneHasRect)) return;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const lane of lanes) {
    if (!laneHasRect(lane)) continue;
    minX = Math.min(minX, lane.x);
    minY = Math.min(minY, lane.y);
    maxX = Math.max(maxX, lane.x + lane.width);
    maxY = Math.max(maxY, lane.y + lane.height);
  }
  pool.x = minX - POOL_HEADER_WIDTH;
  pool.y = minY;
  pool.width ??= maxX - pool.x;
  pool.height ??= maxY - minY;
}

/**
 * Stack the pools named in `movable` below every other pool, in model
 * order: same x as the lowest pool so far, separated by {@link POOL_GAP}.
 * With nothing above them they start at {@link POOL_TOP_MARGIN}.
 */
export function stackPools(pools: readonly Pool[], movable: ReadonlySet<string>): void {
  let lowest: { x: number; bottom: number } | undefined;
  for (const pool of pools) {
    if (movable.has(pool.id) || pool.x === undefined || pool.y === undefined) continue;
    const bottom = pool.y + (pool.height ?? 0);
    if (!lowest || bottom > lowest.bottom) lowest = { x: pool.x, bottom };
  }

  for (const pool of pools) {
    if (!movable.has(pool.id)) continue;
    pool.x = lowest?.x ?? POOL_TOP_MARGIN;
    pool.y = lowest ? lowest.bottom + POOL_GAP : POOL_TOP_MARGIN;
    lowest = { x: pool.x, bottom: pool.y + (pool.height ?? 0) };
  }
}

/** Re-stack computed pools with their final heights. */
export function restackComputedPools(ctx: ResolverContext): void {
  stackPools(ctx.model.pools, ctx.computedPools);
}
