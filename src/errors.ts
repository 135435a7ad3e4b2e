/**
 * Error classes and MCP error helpers.
 *
 * Domain errors carry a stable `code` so callers can branch without
 * matching on message text.  The MCP layer converts them with
 * {@link toMcpError}.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

// ── Error codes ────────────────────────────────────────────────────────────

export const ERR_INVALID_MODEL = 'INVALID_MODEL';
export const ERR_INVALID_CONFIG = 'INVALID_CONFIG';
export const ERR_LAYOUT_TOOL = 'LAYOUT_TOOL_FAILED';

export type ErrorCodeName =
  | typeof ERR_INVALID_MODEL
  | typeof ERR_INVALID_CONFIG
  | typeof ERR_LAYOUT_TOOL;

// ── Domain errors ──────────────────────────────────────────────────────────

export class LayoutResolverError extends Error {
  readonly code: ErrorCodeName;

  constructor(code: ErrorCodeName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LayoutResolverError';
    this.code = code;
  }
}

/** An external layout tool could not produce positions. */
export class LayoutToolError extends LayoutResolverError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super(ERR_LAYOUT_TOOL, `${tool}: ${message}`, options);
    this.name = 'LayoutToolError';
    this.tool = tool;
  }
}

/** Input that does not decode to a diagram model. */
export class ModelValidationError extends LayoutResolverError {
  /** JSON path of the offending field, e.g. `model.shapes[2].x`. */
  readonly path: string;

  constructor(path: string, message: string) {
    super(ERR_INVALID_MODEL, `${path}: ${message}`);
    this.name = 'ModelValidationError';
    this.path = path;
  }
}

export class ConfigurationError extends LayoutResolverError {
  constructor(message: string) {
    super(ERR_INVALID_CONFIG, message);
    this.name = 'ConfigurationError';
  }
}

// ── MCP conversion ─────────────────────────────────────────────────────────

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function unknownToolError(name: string): McpError {
  return new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
}

/** Map a thrown value onto the MCP error space. */
export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof ModelValidationError || err instanceof ConfigurationError) {
    return new McpError(ErrorCode.InvalidParams, err.message);
  }
  return new McpError(ErrorCode.InternalError, errorMessage(err));
}
