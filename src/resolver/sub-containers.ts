/**
 * Sub-container children: absolute to container-relative conversion.
 *
 * Relative coordinates exclude the container's header band and are
 * clamped to `[0, width - childWidth] × [0, height - header - childHeight]`.
 * Containers smaller than a child are grown first so the clamp range is
 * never negative.
 */

import { CONTAINER_HEADER_OFFSET, SEPARATION_STEP, type Size } from '../constants';
import { clamp, rectKey } from '../geometry';
import { shapeSize } from '../model';
import type { Point, Shape } from '../types';
import type { ResolverContext } from './context';

interface ChildOf {
  child: Shape;
  container: Shape;
}

function collectChildren(ctx: ResolverContext): ChildOf[] {
  const result: ChildOf[] = [];
  for (const child of ctx.model.shapes) {
    const ref = ctx.parents.get(child.id);
    if (ref?.kind !== 'subContainer') continue;
    const container = ctx.index.shapes.get(ref.id);
    if (container) result.push({ child, container });
  }
  return result;
}

/** Grow containers until every child fits; repeats for nested containers. */
function growContainers(pairs: readonly ChildOf[], ctx: ResolverContext): void {
  let changed = true;
  for (let pass = 0; changed && pass <= pairs.length; pass++) {
    changed = false;
    for (const { child, container } of pairs) {
      const c = shapeSize(container);
      const s = shapeSize(child);
      const width = Math.max(c.width, s.width);
      const height = Math.max(c.height, s.height + CONTAINER_HEADER_OFFSET);
      if (width === c.width && height === c.height) continue;
      container.width = width;
      container.height = height;
      changed = true;
      ctx.log.note('containers', `grew '${container.id}' to ${width}x${height} for '${child.id}'`);
    }
  }
}

export function convertSubContainers(ctx: ResolverContext): void {
  const pairs = collectChildren(ctx);
  if (pairs.length === 0) return;

  growContainers(pairs, ctx);

  // Absolute origins, captured before any container is itself converted
  const origins = new Map<string, Point>();
  for (const { container } of pairs) {
    origins.set(container.id, { x: container.x ?? 0, y: container.y ?? 0 });
  }

  for (const { child, container } of pairs) {
    const origin = origins.get(container.id) ?? { x: 0, y: 0 };
    const c = shapeSize(container);
    const s = shapeSize(child);
    child.x = clamp((child.x ?? origin.x) - origin.x, 0, c.width - s.width);
    child.y = clamp(
      (child.y ?? origin.y) - origin.y - CONTAINER_HEADER_OFFSET,
      0,
      c.height - CONTAINER_HEADER_OFFSET - s.height
    );
  }

  separateInContainers(pairs);
}

/**
 * Children clamped onto the same box move to the first free
 * {@link SEPARATION_STEP} grid slot inside the container; when the grid
 * is full the container grows by one step and the child takes the new row.
 */
function separateInContainers(pairs: readonly ChildOf[]): void {
  const seen = new Map<string, Set<string>>();

  for (const { child, container } of pairs) {
    let keys = seen.get(container.id);
    if (!keys) {
      keys = new Set();
      seen.set(container.id, keys);
    }

    const s = shapeSize(child);
    const box = { x: child.x ?? 0, y: child.y ?? 0, ...s };
    if (keys.has(rectKey(box))) {
      const slot = freeSlot(container, s, keys) ?? growForRow(container, s);
      box.x = slot.x;
      box.y = slot.y;
      child.x = slot.x;
      child.y = slot.y;
    }
    keys.add(rectKey(box));
  }
}

function freeSlot(container: Shape, size: Size, taken: ReadonlySet<string>): Point | undefined {
  const c = shapeSize(container);
  const maxX = c.width - size.width;
  const maxY = c.height - CONTAINER_HEADER_OFFSET - size.height;
  for (let y = 0; y <= maxY; y += SEPARATION_STEP) {
    for (let x = 0; x <= maxX; x += SEPARATION_STEP) {
      if (!taken.has(rectKey({ x, y, ...size }))) return { x, y };
    }
  }
  return undefined;
}

function growForRow(container: Shape, size: Size): Point {
  const c = shapeSize(container);
  container.height = c.height + SEPARATION_STEP;
  return { x: 0, y: c.height - CONTAINER_HEADER_OFFSET - size.height + SEPARATION_STEP };
}
