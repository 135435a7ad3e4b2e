/**
 * Shared types for the diagram model consumed and produced by the resolver.
 *
 * The model is built by an upstream parser and handed to a downstream
 * serializer.  Coordinates are optional on the way in; after
 * `resolvePositions()` every shape carries x, y, width and height,
 * expressed relative to its immediate container.
 */

// ── Model ──────────────────────────────────────────────────────────────────

/** Free-form per-shape properties (e.g. `attachedToRef` on boundary events). */
export type ShapeProperties = Record<string, unknown>;

export interface Shape {
  id: string;
  /** Type tag, e.g. `startEvent`, `userTask`, `exclusiveGateway`. */
  type: string;
  name?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  /** Lane, pool or sub-container id this shape belongs to. */
  parent?: string;
  /** Id of the enclosing sub-container shape (e.g. an expanded subProcess). */
  subContainer?: string;
  properties: ShapeProperties;
}

export interface Point {
  x: number;
  y: number;
}

export interface Connector {
  id: string;
  /** `sequenceFlow`, `messageFlow`, `association`, … */
  kind: string;
  source: string;
  target: string;
  name?: string;
  waypoints: Point[];
}

export interface Pool {
  id: string;
  name?: string;
  /** Reference to the sub-model (process) this pool contains. */
  subModel?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}

export interface Lane {
  id: string;
  name?: string;
  poolId: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  /** Ordered member shape ids. */
  memberIds: string[];
}

export interface DiagramModel {
  shapes: Shape[];
  connectors: Connector[];
  pools: Pool[];
  lanes: Lane[];
  /** True when the upstream source carried coordinates for any shape. */
  hasExplicitCoordinates: boolean;
  name?: string;
}

/** A shape whose geometry has been fully resolved. */
export type PositionedShape = Shape & { x: number; y: number; width: number; height: number };

// ── Options ────────────────────────────────────────────────────────────────

export type LayoutMode = 'use-external-tool' | 'preserve';

export type LayoutDirection = 'left-to-right' | 'top-to-bottom' | 'right-to-left' | 'bottom-to-top';

export const LAYOUT_MODES: readonly LayoutMode[] = ['use-external-tool', 'preserve'];

export const LAYOUT_DIRECTIONS: readonly LayoutDirection[] = [
  'left-to-right',
  'top-to-bottom',
  'right-to-left',
  'bottom-to-top',
];

// ── Containment ────────────────────────────────────────────────────────────

/**
 * Resolved container of a shape.  Computed once per resolve call and
 * matched exhaustively wherever a parent-relative offset is needed.
 */
export type ParentRef =
  | { kind: 'none' }
  | { kind: 'lane'; id: string }
  | { kind: 'pool'; id: string }
  | { kind: 'subContainer'; id: string }
  /** Boundary-attached shape sitting on its host's border. */
  | { kind: 'host'; id: string };

// ── MCP tool result ────────────────────────────────────────────────────────

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};
