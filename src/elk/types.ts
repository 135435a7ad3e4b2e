/**
 * Typed ELK layout options.
 *
 * ELK accepts all layout options as `Record<string, string>`.  This type
 * documents every option key the layout tool sets, with its accepted
 * values.  Numeric values are passed as `String(n)`, booleans as
 * `'true'` / `'false'`.
 */

export type ElkDirection = 'RIGHT' | 'DOWN' | 'LEFT' | 'UP';

export type ElkOptions = {
  'elk.algorithm'?: 'layered';
  'elk.direction'?: ElkDirection;
  'elk.edgeRouting'?: 'ORTHOGONAL' | 'SPLINES' | 'POLYLINE';
  'elk.spacing.nodeNode'?: string;
  'elk.spacing.edgeNode'?: string;
  'elk.spacing.componentComponent'?: string;
  'elk.layered.spacing.nodeNodeBetweenLayers'?: string;
  'elk.layered.nodePlacement.strategy'?: 'NETWORK_SIMPLEX' | 'BRANDES_KOEPF' | 'LINEAR_SEGMENTS' | 'SIMPLE';
  'elk.layered.crossingMinimization.strategy'?: 'LAYER_SWEEP' | 'INTERACTIVE' | 'NONE';
  'elk.layered.crossingMinimization.thoroughness'?: string;
  'elk.layered.cycleBreaking.strategy'?: 'DEPTH_FIRST' | 'GREEDY' | 'MODEL_ORDER';
  'elk.layered.considerModelOrder.strategy'?: 'NODES_AND_EDGES' | 'NODES_ONLY' | 'NONE';
  'elk.separateConnectedComponents'?: 'true' | 'false';
  'elk.randomSeed'?: string;
};
