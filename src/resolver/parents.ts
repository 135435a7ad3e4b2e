/**
 * Parent analysis: resolve every shape's container once per resolve call.
 *
 * Precedence: host of an attached shape, then sub-container, then lane
 * membership, then the declared parent.  A parent naming nothing known is
 * dropped with a warning and the shape stays at the root.
 */

import { ATTACHABLE_HOST_TYPES, ATTACHED_TYPE } from '../constants';
import type { ParentRef, Shape } from '../types';
import type { ResolverContext } from './context';

/** Map key shared by all shapes with the same container. */
export function parentKey(ref: ParentRef | undefined): string {
  return !ref || ref.kind === 'none' ? '' : `${ref.kind}:${ref.id}`;
}

/**
 * Host of an attached shape: the `attachedToRef` property, else the first
 * attachable shape whose id is contained in the attached shape's id (or
 * contains it once `Boundary` is stripped).
 */
export function findHost(shape: Shape, ctx: ResolverContext): Shape | undefined {
  const ref = shape.properties['attachedToRef'];
  if (typeof ref === 'string' && ref !== '') return ctx.index.shapes.get(ref);

  const stripped = shape.id.replaceAll('Boundary', '');
  return ctx.model.shapes.find(
    (other) =>
      other !== shape &&
      ATTACHABLE_HOST_TYPES.has(other.type) &&
      (shape.id.includes(other.id) || other.id.includes(stripped))
  );
}

function invalidParent(ctx: ResolverContext, parent: string, shape: Shape): ParentRef {
  ctx.log.warn(`Invalid parent '${parent}' for shape '${shape.id}', placing at root`);
  return { kind: 'none' };
}

function resolveParent(shape: Shape, ctx: ResolverContext, laneOf: Map<string, string>): ParentRef {
  const { index } = ctx;

  if (shape.type === ATTACHED_TYPE) {
    const host = findHost(shape, ctx);
    if (host && host !== shape) return { kind: 'host', id: host.id };
  }

  if (shape.subContainer !== undefined) {
    const container = index.shapes.get(shape.subContainer);
    if (container && container !== shape) return { kind: 'subContainer', id: container.id };
    const ref = invalidParent(ctx, shape.subContainer, shape);
    delete shape.subContainer;
    return ref;
  }

  const lane = laneOf.get(shape.id);
  if (lane !== undefined) return { kind: 'lane', id: lane };

  const parent = shape.parent;
  if (parent === undefined) return { kind: 'none' };
  if (index.lanes.has(parent)) return { kind: 'lane', id: parent };
  if (index.pools.has(parent)) {
    // A pool with lanes holds its shapes through its first lane
    const first = index.lanesByPool.get(parent)?.[0];
    return first ? { kind: 'lane', id: first.id } : { kind: 'pool', id: parent };
  }
  const container = index.shapes.get(parent);
  if (container && container !== shape) return { kind: 'subContainer', id: container.id };
  return invalidParent(ctx, parent, shape);
}

export function analyzeParents(ctx: ResolverContext): void {
  const laneOf = new Map<string, string>();
  for (const lane of ctx.model.lanes) {
    for (const member of lane.memberIds) {
      if (!laneOf.has(member)) laneOf.set(member, lane.id);
    }
  }

  for (const shape of ctx.model.shapes) {
    ctx.parents.set(shape.id, resolveParent(shape, ctx, laneOf));
  }

  assignLanelessPoolParents(ctx);

  for (const shape of ctx.model.shapes) {
    const ref = ctx.parents.get(shape.id);
    if (ref && ref.kind !== 'none') shape.parent = ref.id;
    else delete shape.parent;
  }
}

/**
 * With exactly one laneless pool that references a sub-model, every
 * root shape becomes a child of that pool.
 */
function assignLanelessPoolParents(ctx: ResolverContext): void {
  const laneless = ctx.model.pools.filter((p) => (ctx.index.lanesByPool.get(p.id)?.length ?? 0) === 0);
  if (laneless.length !== 1 || !laneless[0].subModel) return;

  const pool = laneless[0];
  let assigned = 0;
  for (const [id, ref] of ctx.parents) {
    if (ref.kind !== 'none') continue;
    ctx.parents.set(id, { kind: 'pool', id: pool.id });
    assigned++;
  }
  if (assigned > 0) ctx.log.note('parents', `${assigned} root shapes assigned to pool '${pool.id}'`);
}
