/**
 * Flow graph construction from the model's shapes and connectors.
 *
 * One node per shape, one edge per connector whose endpoints both exist.
 * Connectors naming an unknown shape are dropped with a warning.
 */

import type { Connector, Shape } from '../types';
import type { LayoutLogger } from './layout-logger';
import type { FlowGraph } from './types';

export function buildFlowGraph(
  shapes: readonly Shape[],
  connectors: readonly Connector[],
  log: LayoutLogger
): FlowGraph {
  const nodes: string[] = [];
  const successors = new Map<string, string[]>();
  const predecessors = new Map<string, string[]>();

  for (const shape of shapes) {
    if (successors.has(shape.id)) continue;
    nodes.push(shape.id);
    successors.set(shape.id, []);
    predecessors.set(shape.id, []);
  }

  const edges: Connector[] = [];
  for (const connector of connectors) {
    const out = successors.get(connector.source);
    const inc = predecessors.get(connector.target);
    if (!out || !inc) {
      const missing = out ? connector.target : connector.source;
      log.warn(`Dropping connector '${connector.id}': unknown shape '${missing}'`);
      continue;
    }
    // Parallel connectors collapse to one edge
    if (!out.includes(connector.target)) out.push(connector.target);
    if (!inc.includes(connector.source)) inc.push(connector.source);
    edges.push(connector);
  }

  log.note('graph', `${nodes.length} nodes, ${edges.length} edges`);
  return { nodes, successors, predecessors, edges };
}

/** True when the node has at least one incoming or outgoing edge. */
export function isConnected(graph: FlowGraph, id: string): boolean {
  return (graph.successors.get(id)?.length ?? 0) > 0 || (graph.predecessors.get(id)?.length ?? 0) > 0;
}

/** Nodes with no incoming edge. */
export function sourceNodes(graph: FlowGraph): string[] {
  return graph.nodes.filter((id) => (graph.predecessors.get(id)?.length ?? 0) === 0);
}
