import { describe, test, expect } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ConfigurationError, ModelValidationError } from '../../src/errors';
import { TOOL_DEFINITIONS, dispatchToolCall } from '../../src/handlers';
import { handleResolveLayout } from '../../src/handlers/resolve-layout';
import { handleValidateModel } from '../../src/handlers/validate-model';
import { DEFAULT_LAYOUT_CONFIG } from '../../src/config';
import { parseResult, quietLogger } from '../helpers';

const rawModel = {
  shapes: [
    { id: 'start', type: 'startEvent' },
    { id: 'work', type: 'task', name: 'Work' },
    { id: 'end', type: 'endEvent' },
  ],
  connectors: [
    { id: 'f1', source: 'start', target: 'work' },
    { id: 'f2', source: 'work', target: 'end' },
  ],
};

const offline = () => ({ externalTool: null, logger: quietLogger() });

describe('tool definitions', () => {
  test('registers both tools with a required model', () => {
    expect(TOOL_DEFINITIONS.map((t) => t.name)).toEqual(['resolve_diagram_layout', 'validate_diagram_model']);
    for (const tool of TOOL_DEFINITIONS) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema.required).toEqual(['model']);
    }
  });
});

describe('handleResolveLayout', () => {
  test('returns the resolved model with warnings and steps', async () => {
    const res = await handleResolveLayout({ model: rawModel }, DEFAULT_LAYOUT_CONFIG, offline());
    const data = parseResult(res);
    expect(data).toMatchObject({
      success: true,
      warnings: [],
      model: {
        shapes: [
          { id: 'start', x: 50, y: 50, width: 36, height: 36 },
          { id: 'work', x: 206, y: 50, width: 120, height: 80 },
          { id: 'end', x: 446, y: 50, width: 36, height: 36 },
        ],
      },
    });
  });

  test('accepts direction codes', async () => {
    const res = await handleResolveLayout({ model: rawModel, direction: 'TB' }, DEFAULT_LAYOUT_CONFIG, offline());
    expect(parseResult(res)).toMatchObject({
      model: { shapes: [{ id: 'start', x: 50, y: 50 }, { id: 'work', x: 50, y: 206 }, { id: 'end', x: 50, y: 406 }] },
    });
  });

  test('rejects an unknown mode', async () => {
    await expect(
      handleResolveLayout({ model: rawModel, mode: 'sideways' }, DEFAULT_LAYOUT_CONFIG, offline())
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  test('rejects a missing model', async () => {
    await expect(handleResolveLayout({}, DEFAULT_LAYOUT_CONFIG, offline())).rejects.toThrow(
      'model: expected an object'
    );
  });

  test('rejects non-object arguments', async () => {
    await expect(handleResolveLayout('model', DEFAULT_LAYOUT_CONFIG, offline())).rejects.toBeInstanceOf(
      ModelValidationError
    );
  });
});

describe('handleValidateModel', () => {
  test('summarises findings by level', async () => {
    const model = {
      ...rawModel,
      connectors: [...rawModel.connectors, { id: 'f3', source: 'work', target: 'missing' }],
    };
    const data = parseResult(await handleValidateModel({ model }, DEFAULT_LAYOUT_CONFIG, offline()));
    expect(data).toEqual({
      success: true,
      valid: false,
      errorCount: 1,
      warningCount: 0,
      warnings: [{ level: 'error', elementId: 'f3', message: "Connector 'f3' has invalid target reference: 'missing'" }],
    });
  });

  test('can resolve positions before checking', async () => {
    const data = parseResult(
      await handleValidateModel({ model: rawModel, resolveFirst: true }, DEFAULT_LAYOUT_CONFIG, offline())
    );
    expect(data).toMatchObject({ valid: true, errorCount: 0, warnings: [] });
  });
});

describe('dispatchToolCall', () => {
  test('routes to the validate handler', async () => {
    const data = parseResult(await dispatchToolCall('validate_diagram_model', { model: rawModel }));
    expect(data).toMatchObject({ success: true, valid: true });
  });

  test('rejects unknown tools with MethodNotFound', async () => {
    const err: unknown = await dispatchToolCall('draw_picture', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(McpError);
    expect(err instanceof McpError && err.code).toBe(ErrorCode.MethodNotFound);
  });
});
