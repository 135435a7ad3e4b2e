/**
 * Centralised magic numbers, element-size constants, and type categories.
 *
 * Keeps layout-related values in one place so changes propagate
 * consistently across the layout engine, the placement steps and the
 * containment resolver.
 */

// ── Element type categories ────────────────────────────────────────────────

export const EVENT_TYPES: ReadonlySet<string> = new Set([
  'startEvent',
  'endEvent',
  'intermediateCatchEvent',
  'intermediateThrowEvent',
  'boundaryEvent',
]);

export const TASK_TYPES: ReadonlySet<string> = new Set([
  'task',
  'userTask',
  'serviceTask',
  'scriptTask',
  'sendTask',
  'receiveTask',
  'businessRuleTask',
  'manualTask',
  'callActivity',
  'subProcess',
]);

export const GATEWAY_TYPES: ReadonlySet<string> = new Set([
  'exclusiveGateway',
  'parallelGateway',
  'inclusiveGateway',
  'eventBasedGateway',
  'complexGateway',
]);

/** Data-like types: parked in the left sidebar when disconnected. */
export const DATA_TYPES: ReadonlySet<string> = new Set([
  'dataObject',
  'dataObjectReference',
  'dataStore',
  'dataStoreReference',
]);

/** Shapes of this type sit on the border of a host shape. */
export const ATTACHED_TYPE = 'boundaryEvent';

/** Host types considered when an attached shape has no explicit reference. */
export const ATTACHABLE_HOST_TYPES: ReadonlySet<string> = new Set([
  'subProcess',
  'task',
  'userTask',
  'serviceTask',
  'scriptTask',
  'callActivity',
]);

/** Types that must carry a label. */
export const LABELED_TYPES: ReadonlySet<string> = new Set(
  [...TASK_TYPES].filter((type) => type !== 'subProcess')
);

// ── Element sizes ──────────────────────────────────────────────────────────

export interface Size {
  width: number;
  height: number;
}

const EVENT_SIZE: Size = { width: 36, height: 36 };
const TASK_SIZE: Size = { width: 120, height: 80 };
const GATEWAY_SIZE: Size = { width: 50, height: 50 };
const CONTAINER_SIZE: Size = { width: 200, height: 150 };

/** Default width/height per type tag. */
export const ELEMENT_SIZES: Readonly<Record<string, Size>> = {
  ...Object.fromEntries([...EVENT_TYPES].map((type) => [type, EVENT_SIZE])),
  ...Object.fromEntries([...TASK_TYPES].map((type) => [type, TASK_SIZE])),
  ...Object.fromEntries([...GATEWAY_TYPES].map((type) => [type, GATEWAY_SIZE])),
  subProcess: CONTAINER_SIZE,
  dataObject: { width: 40, height: 50 },
  dataObjectReference: { width: 40, height: 50 },
  dataStore: { width: 50, height: 50 },
  dataStoreReference: { width: 50, height: 50 },
  textAnnotation: { width: 100, height: 40 },
  group: CONTAINER_SIZE,
};

/** Size used for type tags missing from {@link ELEMENT_SIZES}. */
export const DEFAULT_ELEMENT_SIZE: Size = TASK_SIZE;

/** Look up the default size for a type tag. */
export function getElementSize(type: string): Size {
  return ELEMENT_SIZES[type] ?? DEFAULT_ELEMENT_SIZE;
}

// ── Diagram margins and spacing ────────────────────────────────────────────

/** Margin (px) between the canvas origin and the first shape. */
export const DIAGRAM_MARGIN = 50;

/** Edge-to-edge horizontal gap (px) between neighbouring shapes. */
export const NODE_HORIZONTAL_GAP = 60;

/** Edge-to-edge vertical gap (px) between neighbouring shapes. */
export const NODE_VERTICAL_GAP = 80;

/** Gap (px) between consecutive ranks in the fallback flow layout. */
export const RANK_SEPARATION = 120;

/** The row-wrapping grid starts a new row after this many shapes. */
export const GRID_COLUMNS = 5;

/** Pixels per external-tool unit, applied only to tools that report another unit. */
export const LAYOUT_SCALE_X = 100;
export const LAYOUT_SCALE_Y = 100;

// ── ELK spacing ────────────────────────────────────────────────────────────

/** Spacing (px) between nodes of the same layer. */
export const ELK_NODE_SPACING = 50;

/** Spacing (px) between consecutive layers. */
export const ELK_LAYER_SPACING = 60;

export const ELK_EDGE_NODE_SPACING = 15;

/**
 * ELK crossing minimisation thoroughness.
 * Higher values produce fewer edge crossings at the cost of layout time.
 */
export const ELK_CROSSING_THOROUGHNESS = '30';

// ── Explicit-coordinate bounds ─────────────────────────────────────────────

/** Bounds assumed when nothing in the model carries coordinates. */
export const DEFAULT_BOUNDS = { minX: 50, minY: 50, maxX: 800, maxY: 600 } as const;

// ── Neighbour placement and overlap avoidance ──────────────────────────────

/** Vertical step (px) applied to a colliding candidate. */
export const OVERLAP_STEP_Y = 100;

/** Vertical shifts tried before moving one column to the right. */
export const OVERLAP_MAX_VERTICAL_SHIFTS = 5;

/** Candidates evaluated before the least-overlapping one is accepted. */
export const OVERLAP_MAX_ATTEMPTS = 30;

// ── Disconnected and leftover shapes ───────────────────────────────────────

/** Distance (px) below the diagram for the disconnected-shape row. */
export const DISCONNECTED_ROW_OFFSET = 50;

/** Vertical gap (px) between stacked sidebar data shapes. */
export const SIDEBAR_STACK_GAP = 30;

/** Distance (px) below the diagram for the final fallback row. */
export const FALLBACK_ROW_OFFSET = 100;

// ── Swimlanes ──────────────────────────────────────────────────────────────

/** Width (px) of the pool's vertical label band; lanes start after it. */
export const POOL_HEADER_WIDTH = 40;

/** Padding (px) between a lane or pool border and its content. */
export const LANE_PADDING = 20;

export const MIN_LANE_HEIGHT = 120;

export const MIN_POOL_WIDTH = 400;
export const MIN_POOL_HEIGHT = 150;

/** Size given to pools with no positioned content. */
export const DEFAULT_POOL_WIDTH = 600;
export const DEFAULT_POOL_HEIGHT = 200;

/** Vertical gap (px) between stacked pools. */
export const POOL_GAP = 50;

/** Top/left margin (px) for the first computed pool. */
export const POOL_TOP_MARGIN = 50;

/** Horizontal extent assumed for lanes when no shape is positioned. */
export const DEFAULT_EXTENT = { minX: 50, maxX: 800 } as const;

// ── Sub-containers and attached shapes ─────────────────────────────────────

/** Height (px) of a collapsible container's header band. */
export const CONTAINER_HEADER_OFFSET = 26;

/** X offset (px) of the first attached shape on a host. */
export const ATTACHED_FIRST_OFFSET = 20;

/** Lateral spacing (px) between attached shapes on the same host. */
export const ATTACHED_SPACING = 50;

// ── Sibling separation ─────────────────────────────────────────────────────

/** Step (px) used to nudge apart identical sibling boxes. */
export const SEPARATION_STEP = 10;
