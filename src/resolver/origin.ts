/**
 * Origin normalisation for computed root-level items.
 *
 * Only root shapes that arrived without coordinates and pools whose
 * position was computed by stacking are moved; explicit input positions
 * stay where the caller put them.
 */

import { DIAGRAM_MARGIN } from '../constants';
import type { ResolverContext } from './context';

interface Positioned {
  x?: number;
  y?: number;
}

function computedRootItems(ctx: ResolverContext): Positioned[] {
  const shapes = ctx.model.shapes.filter(
    (s) => (ctx.parents.get(s.id)?.kind ?? 'none') === 'none' && !ctx.explicitShapes.has(s.id)
  );
  const pools = ctx.model.pools.filter((p) => ctx.computedPools.has(p.id));
  return [...shapes, ...pools];
}

/** True when a computed root-level item ended with a negative coordinate.  Never in preserve mode. */
export function hasNegativeOrigin(ctx: ResolverContext): boolean {
  if (ctx.mode === 'preserve') return false;
  return computedRootItems(ctx).some((item) => (item.x ?? 0) < 0 || (item.y ?? 0) < 0);
}

/**
 * Shift the computed root-level items by the same delta so that, on each
 * axis that went negative, their minimum sits at the diagram margin.
 */
export function normaliseOrigin(ctx: ResolverContext): void {
  const items = computedRootItems(ctx);
  const minX = Math.min(...items.map((i) => i.x ?? 0));
  const minY = Math.min(...items.map((i) => i.y ?? 0));
  const dx = minX < 0 ? DIAGRAM_MARGIN - minX : 0;
  const dy = minY < 0 ? DIAGRAM_MARGIN - minY : 0;

  for (const item of items) {
    if (item.x !== undefined) item.x += dx;
    if (item.y !== undefined) item.y += dy;
  }
  ctx.log.note('origin', `shifted ${items.length} computed root items by (${dx}, ${dy})`);
}
