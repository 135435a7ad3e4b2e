/**
 * Shared types for the layout engine.
 */

import type { Connector, LayoutDirection, Point } from '../types';
import type { Size } from '../constants';
import type { LayoutLogger, PositionSnapshot } from './layout-logger';

// ── Flow graph ─────────────────────────────────────────────────────────────

/** Directed graph of shape ids, rebuilt for every resolve call. */
export interface FlowGraph {
  /** Node ids in shape order. */
  nodes: string[];
  successors: Map<string, string[]>;
  predecessors: Map<string, string[]>;
  /** Connectors whose endpoints both exist. */
  edges: Connector[];
}

/** Rank per node id. */
export type RankMap = Map<string, number>;

// ── External layout tool ───────────────────────────────────────────────────

export interface LayoutRequest {
  graph: FlowGraph;
  sizes: Map<string, Size>;
  direction: LayoutDirection;
}

/**
 * Raw positions from a layout tool, together with the coordinate
 * conventions they are expressed in.
 */
export interface RawLayout {
  positions: Map<string, Point>;
  /** Y grows upward in the tool's output. */
  flipY: boolean;
  /** Positions are in tool units rather than pixels. */
  applyScale: boolean;
}

/** A hierarchical layout tool that runs in process. */
export interface ExternalLayoutTool {
  readonly name: string;
  layout(request: LayoutRequest): Promise<RawLayout>;
}

// ── Pipeline ───────────────────────────────────────────────────────────────

/** Minimal context every pipeline step receives. */
export interface PipelineContext {
  log: LayoutLogger;
}

/**
 * A single step in a layout pipeline.
 */
export interface PipelineStep<C extends PipelineContext> {
  /** Human-readable step name for logging. */
  name: string;
  run: (ctx: C) => void | Promise<void>;
  /** Return true to skip this step for the given context. */
  skip?: (ctx: C) => boolean;
  /** When true, capture shape positions before the step and report how many moved. */
  trackDelta?: boolean;
}

/** Callbacks for position-delta tracking across pipeline steps. */
export interface DeltaCallbacks {
  snap: () => PositionSnapshot;
  count: (before: PositionSnapshot) => number;
}
