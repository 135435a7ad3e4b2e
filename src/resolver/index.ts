/**
 * Position resolution entry point.
 *
 * Clones the caller's model, then runs the pipeline:
 *
 * 1. resolvePoolPositions: size pools, derive them from lanes, stack the rest
 * 2. assignDimensions: type defaults for missing width/height
 * 3. layoutUnpositioned: whole-model layout, only when nothing is positioned
 * 4. placeNeighbors: incremental placement next to positioned flow neighbours
 * 5. placeDisconnected: data sidebar and the row below the diagram
 * 6. assignFallbackPositions: anything left, in a row further below
 * 7. resolveContainment: parent analysis, sub-containers, swimlanes, attached shapes
 * 8. restackComputedPools: stack computed pools with their final heights
 * 9. normaliseOrigin: shift computed root items when any went negative
 */

import { ElkLayoutTool } from '../elk/elk-layout-tool';
import { buildFlowGraph } from '../layout/graph-builder';
import { createLayoutLogger, type LayoutLogger } from '../layout/layout-logger';
import { PipelineRunner } from '../layout/pipeline-runner';
import type { ExternalLayoutTool, PipelineStep } from '../layout/types';
import { cloneModel, countMoved, indexModel, snapshotPositions } from '../model';
import type { DiagramModel, LayoutDirection, LayoutMode } from '../types';
import { resolveContainment } from './containment';
import type { ResolverContext } from './context';
import { hasNegativeOrigin, normaliseOrigin } from './origin';
import {
  assignDimensions,
  assignFallbackPositions,
  layoutUnpositioned,
  needsWholeLayout,
  placeDisconnected,
  placeNeighbors,
} from './placement';
import { resolvePoolPositions, restackComputedPools } from './pools';

export interface ResolveOptions {
  mode?: LayoutMode;
  direction?: LayoutDirection;
  /** Layout tool for whole-model layout; `null` forces the fallback layout.  Defaults to ELK. */
  externalTool?: ExternalLayoutTool | null;
  logger?: LayoutLogger;
  /** Debug output for the default logger. */
  debug?: boolean;
}

export interface ResolveResult {
  /** Fully positioned working copy. */
  model: DiagramModel;
  /** Warnings emitted during this call. */
  warnings: string[];
  /** Names of the executed pipeline steps, nested ones included. */
  steps: string[];
}

export const RESOLVE_STEPS: PipelineStep<ResolverContext>[] = [
  { name: 'resolvePoolPositions', run: resolvePoolPositions },
  { name: 'assignDimensions', run: assignDimensions },
  {
    name: 'layoutUnpositioned',
    run: layoutUnpositioned,
    skip: (ctx) => !needsWholeLayout(ctx),
    trackDelta: true,
  },
  { name: 'placeNeighbors', run: placeNeighbors, trackDelta: true },
  { name: 'placeDisconnected', run: placeDisconnected, trackDelta: true },
  { name: 'assignFallbackPositions', run: assignFallbackPositions, trackDelta: true },
  { name: 'resolveContainment', run: resolveContainment },
  {
    name: 'restackComputedPools',
    run: restackComputedPools,
    skip: (ctx) => ctx.computedPools.size === 0,
  },
  { name: 'normaliseOrigin', run: normaliseOrigin, skip: (ctx) => !hasNegativeOrigin(ctx) },
];

/**
 * Compute a complete, container-relative position for every shape.
 * The input model is never mutated.
 */
export async function resolvePositions(
  input: DiagramModel,
  options: ResolveOptions = {}
): Promise<ResolveResult> {
  const log = options.logger ?? createLayoutLogger('resolve', { debug: options.debug });
  const warningsBefore = log.warnings.length;
  const stepsBefore = log.stepNames().length;

  const model = cloneModel(input);
  const mode = options.mode ?? 'use-external-tool';
  if (mode === 'preserve' && !model.hasExplicitCoordinates) {
    log.warn("No explicit coordinates found, but mode 'preserve' was specified; computing fallback positions");
  }

  const ctx: ResolverContext = {
    model,
    index: indexModel(model),
    graph: buildFlowGraph(model.shapes, model.connectors, log),
    mode,
    direction: options.direction ?? 'left-to-right',
    tool: options.externalTool === undefined ? new ElkLayoutTool() : options.externalTool,
    log,
    computedPools: new Set(),
    explicitShapes: new Set(
      model.shapes.filter((s) => s.x !== undefined || s.y !== undefined).map((s) => s.id)
    ),
    parents: new Map(),
  };
  log.note(
    'init',
    `${model.shapes.length} shapes, ${model.connectors.length} connectors, ` +
      `${model.pools.length} pools, ${model.lanes.length} lanes, mode=${ctx.mode}, direction=${ctx.direction}`
  );

  const runner = new PipelineRunner(RESOLVE_STEPS, {
    snap: () => snapshotPositions(model),
    count: (before) => countMoved(model, before),
  });
  await runner.run(ctx);
  log.finish();

  return {
    model,
    warnings: log.warnings.slice(warningsBefore),
    steps: log.stepNames().slice(stepsBefore),
  };
}

export { calculatePoolSize, calculateLaneSizes } from './swimlane-sizer';
