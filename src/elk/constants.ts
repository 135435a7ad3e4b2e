/**
 * ELK options for the hierarchical layout tool.
 */

import type { LayoutDirection } from '../types';
import {
  ELK_CROSSING_THOROUGHNESS,
  ELK_EDGE_NODE_SPACING,
  ELK_LAYER_SPACING,
  ELK_NODE_SPACING,
} from '../constants';
import type { ElkDirection, ElkOptions } from './types';

/** Default ELK layout options; `elk.direction` is overridden per call. */
export const ELK_LAYOUT_OPTIONS = {
  'elk.algorithm': 'layered',
  'elk.direction': 'RIGHT',
  'elk.edgeRouting': 'ORTHOGONAL',
  'elk.spacing.nodeNode': String(ELK_NODE_SPACING),
  'elk.layered.spacing.nodeNodeBetweenLayers': String(ELK_LAYER_SPACING),
  'elk.spacing.edgeNode': String(ELK_EDGE_NODE_SPACING),
  'elk.layered.nodePlacement.strategy': 'NETWORK_SIMPLEX',
  'elk.layered.crossingMinimization.strategy': 'LAYER_SWEEP',
  'elk.layered.crossingMinimization.thoroughness': ELK_CROSSING_THOROUGHNESS,
  'elk.layered.cycleBreaking.strategy': 'DEPTH_FIRST',
  'elk.layered.considerModelOrder.strategy': 'NODES_AND_EDGES',
  'elk.separateConnectedComponents': 'true',
  'elk.spacing.componentComponent': String(ELK_NODE_SPACING),
  'elk.randomSeed': '1',
} satisfies ElkOptions;

export const ELK_DIRECTIONS: Readonly<Record<LayoutDirection, ElkDirection>> = {
  'left-to-right': 'RIGHT',
  'top-to-bottom': 'DOWN',
  'right-to-left': 'LEFT',
  'bottom-to-top': 'UP',
};
