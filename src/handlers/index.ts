/**
 * Tool registry and dispatch for the MCP server.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from '../config';
import { unknownToolError } from '../errors';
import type { ToolResult } from '../types';
import { TOOL_DEFINITION as RESOLVE_TOOL, handleResolveLayout } from './resolve-layout';
import { TOOL_DEFINITION as VALIDATE_TOOL, handleValidateModel } from './validate-model';

export const TOOL_DEFINITIONS: Tool[] = [RESOLVE_TOOL, VALIDATE_TOOL];

export async function dispatchToolCall(
  name: string,
  args: unknown,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG
): Promise<ToolResult> {
  switch (name) {
    case RESOLVE_TOOL.name:
      return handleResolveLayout(args, config);
    case VALIDATE_TOOL.name:
      return handleValidateModel(args, config);
    default:
      throw unknownToolError(name);
  }
}

export { decodeDiagramModel } from './decode';
