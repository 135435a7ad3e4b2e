/**
 * Shared helpers for MCP tool handlers.
 */

import { ModelValidationError } from '../errors';
import type { ToolResult } from '../types';

/** Wrap a plain object into the MCP tool-result envelope. */
export function jsonResult(data: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/** Tool arguments as an object; a missing argument object counts as empty. */
export function argsObject(args: unknown): Record<string, unknown> {
  if (args === undefined || args === null) return {};
  if (typeof args !== 'object' || Array.isArray(args)) {
    throw new ModelValidationError('arguments', 'expected an object');
  }
  return { ...args };
}

export function optionalStringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ModelValidationError(key, 'expected a string');
  return value;
}

export function optionalBooleanArg(args: Record<string, unknown>, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new ModelValidationError(key, 'expected a boolean');
  return value;
}
