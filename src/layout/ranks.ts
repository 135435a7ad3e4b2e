/**
 * Topological rank assignment (longest path from a source), tolerant of
 * cycles.
 *
 * A bounded fixpoint over a mutable rank map driven by a FIFO work queue:
 * a node's rank only ever grows, successor candidates are capped at
 * `nodeCount - 1`, and the loop stops after `nodeCount²` pops even if the
 * queue is not yet empty.
 */

import { sourceNodes } from './graph-builder';
import type { LayoutLogger } from './layout-logger';
import type { FlowGraph, RankMap } from './types';

const UNRANKED = -1;

export function assignRanks(graph: FlowGraph, log: LayoutLogger): RankMap {
  const nodeCount = graph.nodes.length;
  const ranks: RankMap = new Map();
  if (nodeCount === 0) return ranks;

  for (const id of graph.nodes) ranks.set(id, UNRANKED);

  let sources = sourceNodes(graph);
  if (sources.length === 0) {
    // Fully cyclic: every node is a candidate source
    sources = [...graph.nodes];
  }

  const maxRank = nodeCount - 1;
  const iterationCap = nodeCount * nodeCount;
  const queue: Array<[string, number]> = sources.map((id) => [id, 0]);
  let head = 0;
  let iterations = 0;

  while (head < queue.length && iterations < iterationCap) {
    const [id, candidate] = queue[head++];
    iterations++;
    if (candidate <= (ranks.get(id) ?? UNRANKED)) continue;
    ranks.set(id, candidate);
    const next = Math.min(candidate + 1, maxRank);
    for (const succ of graph.successors.get(id) ?? []) {
      queue.push([succ, next]);
    }
  }

  if (head < queue.length) {
    log.warn(
      `Rank assignment stopped after ${iterationCap} iterations; ` +
        `${queue.length - head} queued updates discarded`
    );
  }

  for (const [id, rank] of ranks) {
    if (rank === UNRANKED) ranks.set(id, 0);
  }

  log.note('ranks', `${nodeCount} nodes over ${Math.max(...ranks.values()) + 1} ranks`);
  return ranks;
}

/** Group node ids by rank, ascending, keeping encounter order inside a rank. */
export function groupByRank(nodes: readonly string[], ranks: RankMap): string[][] {
  const groups = new Map<number, string[]>();
  for (const id of nodes) {
    const rank = ranks.get(id) ?? 0;
    const group = groups.get(rank);
    if (group) group.push(id);
    else groups.set(rank, [id]);
  }
  return [...groups.keys()].sort((a, b) => a - b).map((rank) => groups.get(rank) ?? []);
}
