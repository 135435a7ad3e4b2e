/**
 * Model builders and shared fixtures for unit tests.
 */

import { createLayoutLogger, silentSink, type LayoutLogger } from '../src/layout/layout-logger';
import { buildFlowGraph } from '../src/layout/graph-builder';
import type { FlowGraph } from '../src/layout/types';
import { createDiagramModel, indexModel } from '../src/model';
import type { ResolverContext } from '../src/resolver/context';
import type { Connector, DiagramModel, Lane, Pool, Shape } from '../src/types';

/** Logger that records warnings without writing anything. */
export function quietLogger(): LayoutLogger {
  return createLayoutLogger('test', { sink: silentSink });
}

export function makeShape(id: string, type = 'task', extra: Partial<Shape> = {}): Shape {
  return { id, type, properties: {}, ...extra };
}

export function makeConnector(source: string, target: string, id = `${source}_${target}`): Connector {
  return { id, kind: 'sequenceFlow', source, target, waypoints: [] };
}

export function makePool(id: string, extra: Partial<Pool> = {}): Pool {
  return { id, ...extra };
}

export function makeLane(id: string, poolId: string, memberIds: string[] = [], extra: Partial<Lane> = {}): Lane {
  return { id, poolId, memberIds, ...extra };
}

export function makeModel(parts: Partial<DiagramModel> = {}): DiagramModel {
  return createDiagramModel(parts);
}

/** Connectors linking the given ids in order. */
export function chain(...ids: string[]): Connector[] {
  return ids.slice(1).map((id, i) => makeConnector(ids[i], id));
}

export function graphOf(shapes: Shape[], connectors: Connector[] = []): FlowGraph {
  return buildFlowGraph(shapes, connectors, quietLogger());
}

/** Resolver context over `model` (mutated in place), for step-level tests. */
export function makeContext(model: DiagramModel, extra: Partial<ResolverContext> = {}): ResolverContext {
  const log = extra.log ?? quietLogger();
  return {
    model,
    index: indexModel(model),
    graph: buildFlowGraph(model.shapes, model.connectors, log),
    mode: 'use-external-tool',
    direction: 'left-to-right',
    tool: null,
    log,
    computedPools: new Set(),
    explicitShapes: new Set(),
    parents: new Map(),
    ...extra,
  };
}

/** Look up a shape and fail loudly when it is missing. */
export function shapeById(model: DiagramModel, id: string): Shape {
  const shape = model.shapes.find((s) => s.id === id);
  if (!shape) throw new Error(`Shape '${id}' not found`);
  return shape;
}

export function poolById(model: DiagramModel, id: string): Pool {
  const pool = model.pools.find((p) => p.id === id);
  if (!pool) throw new Error(`Pool '${id}' not found`);
  return pool;
}

export function laneById(model: DiagramModel, id: string): Lane {
  const lane = model.lanes.find((l) => l.id === id);
  if (!lane) throw new Error(`Lane '${id}' not found`);
  return lane;
}

/** Parse the JSON payload of a tool result. */
export function parseResult(result: { content: Array<{ text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}
