/**
 * Handler for resolve_diagram_layout tool.
 *
 * Resolves every shape of the given model to a container-relative
 * position and returns the resolved model with the run's warnings.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { DEFAULT_LAYOUT_CONFIG, parseLayoutDirection, parseLayoutMode, type LayoutConfig } from '../config';
import { resolvePositions, type ResolveOptions } from '../resolver';
import type { ToolResult } from '../types';
import { decodeDiagramModel } from './decode';
import { argsObject, jsonResult, optionalStringArg } from './helpers';

export async function handleResolveLayout(
  args: unknown,
  defaults: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
  overrides: Pick<ResolveOptions, 'externalTool' | 'logger'> = {}
): Promise<ToolResult> {
  const input = argsObject(args);
  const model = decodeDiagramModel(input.model);
  const mode = optionalStringArg(input, 'mode');
  const direction = optionalStringArg(input, 'direction');

  const result = await resolvePositions(model, {
    mode: mode !== undefined ? parseLayoutMode(mode) : defaults.mode,
    direction: direction !== undefined ? parseLayoutDirection(direction) : defaults.direction,
    debug: defaults.debug,
    ...overrides,
  });

  return jsonResult({
    success: true,
    model: result.model,
    warnings: result.warnings,
    steps: result.steps,
  });
}

export const TOOL_DEFINITION = {
  name: 'resolve_diagram_layout',
  description:
    'Compute a complete, non-overlapping position for every shape of a diagram model. ' +
    'Shapes that already carry coordinates keep them; the rest are laid out by rank, placed next to ' +
    'positioned neighbours, or parked beside the diagram. Returns the model with every shape ' +
    'positioned relative to its container (lane, pool, sub-container or host), lanes and pools sized ' +
    'to their content, plus any warnings raised along the way.',
  inputSchema: {
    type: 'object',
    properties: {
      model: {
        type: 'object',
        description:
          'Diagram model: { shapes, connectors, pools, lanes, hasExplicitCoordinates? }. ' +
          'Shapes need id and type; coordinates and sizes are optional.',
      },
      mode: {
        type: 'string',
        enum: ['use-external-tool', 'preserve'],
        description:
          "'use-external-tool' (default) lays out unpositioned models with ELK; 'preserve' keeps explicit " +
          'coordinates and only converts them into container-relative form.',
      },
      direction: {
        type: 'string',
        enum: ['left-to-right', 'top-to-bottom', 'right-to-left', 'bottom-to-top', 'LR', 'TB', 'RL', 'BT'],
        description: 'Flow direction for computed layout. Default: left-to-right.',
      },
    },
    required: ['model'],
  },
} satisfies Tool;
