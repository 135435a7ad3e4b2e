/**
 * Attached (boundary) shapes sit on the bottom edge of their host,
 * spread laterally by a per-host running index.  Coordinates are
 * host-relative.
 */

import { ATTACHED_FIRST_OFFSET, ATTACHED_SPACING } from '../constants';
import { shapeSize } from '../model';
import type { ResolverContext } from './context';

export function positionAttached(ctx: ResolverContext): void {
  const counts = new Map<string, number>();

  for (const shape of ctx.model.shapes) {
    const ref = ctx.parents.get(shape.id);
    if (ref?.kind !== 'host') continue;
    const host = ctx.index.shapes.get(ref.id);
    if (!host) continue;

    const index = counts.get(host.id) ?? 0;
    counts.set(host.id, index + 1);

    shape.parent = host.id;
    shape.x = ATTACHED_FIRST_OFFSET + index * ATTACHED_SPACING;
    shape.y = shapeSize(host).height - shapeSize(shape).height / 2;
  }
}
