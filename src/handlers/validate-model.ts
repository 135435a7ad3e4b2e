/**
 * Handler for validate_diagram_model tool.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from '../config';
import { resolvePositions, type ResolveOptions } from '../resolver';
import type { ToolResult } from '../types';
import { validateModel } from '../validation/model-validator';
import { decodeDiagramModel } from './decode';
import { argsObject, jsonResult, optionalBooleanArg } from './helpers';

export async function handleValidateModel(
  args: unknown,
  defaults: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
  overrides: Pick<ResolveOptions, 'externalTool' | 'logger'> = {}
): Promise<ToolResult> {
  const input = argsObject(args);
  let model = decodeDiagramModel(input.model);

  if (optionalBooleanArg(input, 'resolveFirst')) {
    const resolved = await resolvePositions(model, { ...defaults, ...overrides });
    model = resolved.model;
  }

  const warnings = validateModel(model);
  return jsonResult({
    success: true,
    valid: !warnings.some((w) => w.level === 'error'),
    errorCount: warnings.filter((w) => w.level === 'error').length,
    warningCount: warnings.filter((w) => w.level === 'warning').length,
    warnings,
  });
}

export const TOOL_DEFINITION = {
  name: 'validate_diagram_model',
  description:
    'Check a diagram model for structural problems: missing start or end events, connectors that ' +
    'reference unknown shapes, shapes unreachable from a start event, overlapping sibling shapes and ' +
    'unlabelled tasks. Set resolveFirst to run layout resolution before checking overlaps.',
  inputSchema: {
    type: 'object',
    properties: {
      model: { type: 'object', description: 'Diagram model, same shape as for resolve_diagram_layout.' },
      resolveFirst: {
        type: 'boolean',
        description: 'Resolve positions before validating. Default: false.',
      },
    },
    required: ['model'],
  },
} satisfies Tool;
