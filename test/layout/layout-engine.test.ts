import { describe, test, expect } from 'vitest';
import { calculateLayout, shapeSizes } from '../../src/layout/layout-engine';
import type { ExternalLayoutTool, LayoutRequest, RawLayout } from '../../src/layout/types';
import { chain, graphOf, makeShape, quietLogger } from '../helpers';

const shapes = [makeShape('a'), makeShape('b')];
const graph = graphOf(shapes, chain('a', 'b'));

class FixedTool implements ExternalLayoutTool {
  readonly name = 'fixed';
  requests: LayoutRequest[] = [];

  async layout(request: LayoutRequest): Promise<RawLayout> {
    this.requests.push(request);
    return {
      positions: new Map([
        ['a', { x: 0, y: 0 }],
        ['b', { x: 100, y: -20 }],
      ]),
      flipY: false,
      applyScale: false,
    };
  }
}

const brokenTool: ExternalLayoutTool = {
  name: 'broken',
  layout: async () => {
    throw new Error('kaput');
  },
};

describe('shapeSizes', () => {
  test('uses explicit sizes and type defaults', () => {
    const sizes = shapeSizes([makeShape('e', 'startEvent'), makeShape('t', 'task', { width: 200 })]);
    expect(sizes.get('e')).toEqual({ width: 36, height: 36 });
    expect(sizes.get('t')).toEqual({ width: 200, height: 80 });
  });
});

describe('calculateLayout', () => {
  test('returns nothing for an empty model', async () => {
    const result = await calculateLayout({
      shapes: [],
      graph: graphOf([]),
      direction: 'left-to-right',
      tool: new FixedTool(),
      log: quietLogger(),
    });
    expect(result.size).toBe(0);
  });

  test('normalises the external tool output', async () => {
    const tool = new FixedTool();
    const result = await calculateLayout({ shapes, graph, direction: 'top-to-bottom', tool, log: quietLogger() });
    expect(result.get('a')).toEqual({ x: 50, y: 70 });
    expect(result.get('b')).toEqual({ x: 150, y: 50 });
    expect(tool.requests).toHaveLength(1);
    expect(tool.requests[0].direction).toBe('top-to-bottom');
    expect(tool.requests[0].sizes.get('a')).toEqual({ width: 120, height: 80 });
  });

  test('falls back to the rank layout when the tool fails', async () => {
    const log = quietLogger();
    const result = await calculateLayout({ shapes, graph, direction: 'left-to-right', tool: brokenTool, log });
    expect(log.warnings).toEqual(["External layout tool 'broken' failed, using fallback layout: kaput"]);
    expect(result.get('a')).toEqual({ x: 50, y: 50 });
    expect(result.get('b')).toEqual({ x: 290, y: 50 });
  });

  test('uses the rank layout directly without a tool', async () => {
    const log = quietLogger();
    const result = await calculateLayout({ shapes, graph, direction: 'left-to-right', tool: null, log });
    expect(log.warnings).toEqual([]);
    expect(result.get('b')).toEqual({ x: 290, y: 50 });
  });
});
