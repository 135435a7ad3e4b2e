/**
 * Containment resolution: converts the fully positioned absolute
 * coordinates into parent-relative form.
 *
 * Runs as a nested pipeline sharing the resolver's logger, so each
 * sub-step is timed and attributable on failure.
 */

import { SEPARATION_STEP } from '../constants';
import { rectKey } from '../geometry';
import { PipelineRunner } from '../layout/pipeline-runner';
import type { PipelineStep } from '../layout/types';
import { countMoved, hasPosition, shapeRect, snapshotPositions } from '../model';
import type { Shape } from '../types';
import { positionAttached } from './attached';
import type { ResolverContext } from './context';
import { organizeSwimlanes, preserveCoordinates, shouldPreserve } from './lanes';
import { analyzeParents, parentKey } from './parents';
import { convertSubContainers } from './sub-containers';

/**
 * Nudge identical sibling boxes apart along X while coordinates are still
 * absolute.  Sub-container children and attached shapes are handled by
 * their own steps.
 */
export function separateSiblings(ctx: ResolverContext): void {
  const groups = new Map<string, Shape[]>();
  for (const shape of ctx.model.shapes) {
    const ref = ctx.parents.get(shape.id);
    if (ref?.kind === 'subContainer' || ref?.kind === 'host') continue;
    const key = parentKey(ref);
    const group = groups.get(key);
    if (group) group.push(shape);
    else groups.set(key, [shape]);
  }

  let nudged = 0;
  for (const group of groups.values()) {
    const seen = new Set<string>();
    for (const shape of group) {
      if (!hasPosition(shape)) continue;
      while (seen.has(rectKey(shapeRect(shape)))) {
        shape.x += SEPARATION_STEP;
        nudged++;
      }
      seen.add(rectKey(shapeRect(shape)));
    }
  }
  if (nudged > 0) ctx.log.note('siblings', `${nudged} separation nudges`);
}

export const CONTAINMENT_STEPS: PipelineStep<ResolverContext>[] = [
  { name: 'analyzeParents', run: analyzeParents },
  { name: 'separateSiblings', run: separateSiblings, trackDelta: true },
  { name: 'convertSubContainers', run: convertSubContainers, trackDelta: true },
  { name: 'preserveCoordinates', run: preserveCoordinates, skip: (ctx) => !shouldPreserve(ctx) },
  { name: 'organizeSwimlanes', run: organizeSwimlanes, skip: shouldPreserve, trackDelta: true },
  { name: 'positionAttached', run: positionAttached },
];

export async function resolveContainment(ctx: ResolverContext): Promise<void> {
  const runner = new PipelineRunner(CONTAINMENT_STEPS, {
    snap: () => snapshotPositions(ctx.model),
    count: (before) => countMoved(ctx.model, before),
  });
  await runner.run(ctx);
}
