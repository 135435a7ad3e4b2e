/**
 * Shared context threaded through the resolver pipeline steps.
 */

import type { LayoutLogger } from '../layout/layout-logger';
import type { ExternalLayoutTool, FlowGraph, PipelineContext } from '../layout/types';
import type { ModelIndex } from '../model';
import type { DiagramModel, LayoutDirection, LayoutMode, ParentRef } from '../types';

export interface ResolverContext extends PipelineContext {
  /** Private working copy; mutated in place by the steps. */
  model: DiagramModel;
  index: ModelIndex;
  graph: FlowGraph;
  mode: LayoutMode;
  direction: LayoutDirection;
  tool: ExternalLayoutTool | null;
  log: LayoutLogger;
  /** Pools whose position was computed by stacking rather than given or derived from lanes. */
  computedPools: Set<string>;
  /** Shapes that arrived with an x or y; their coordinates are never recomputed. */
  explicitShapes: Set<string>;
  /** Resolved container per shape id, filled by containment analysis. */
  parents: Map<string, ParentRef>;
}
