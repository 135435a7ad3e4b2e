import { describe, test, expect } from 'vitest';
import { poolMembers, resolvePoolPositions, stackPools } from '../../src/resolver/pools';
import { makeContext, makeLane, makeModel, makePool, makeShape } from '../helpers';

describe('poolMembers', () => {
  test('collects listed lane members and declared children', () => {
    const model = makeModel({
      shapes: [
        makeShape('a'),
        makeShape('b', 'task', { parent: 'l1' }),
        makeShape('c', 'task', { parent: 'p' }),
        makeShape('d'),
      ],
      pools: [makePool('p')],
      lanes: [makeLane('l1', 'p', ['a'])],
    });
    const ctx = makeContext(model);
    expect(poolMembers(ctx, model.pools[0]).map((s) => s.id)).toEqual(['a', 'b', 'c']);
  });
});

describe('resolvePoolPositions', () => {
  test('sizes and stacks a pool without position', () => {
    const model = makeModel({ pools: [makePool('p')] });
    const ctx = makeContext(model);
    resolvePoolPositions(ctx);
    expect(model.pools[0]).toEqual({ id: 'p', x: 50, y: 50, width: 600, height: 200 });
    expect([...ctx.computedPools]).toEqual(['p']);
  });

  test('stacks computed pools below positioned ones', () => {
    const model = makeModel({
      pools: [makePool('p1', { x: 100, y: 80, width: 500, height: 200 }), makePool('p2')],
    });
    const ctx = makeContext(model);
    resolvePoolPositions(ctx);
    expect(model.pools[1]).toMatchObject({ x: 100, y: 330, width: 600, height: 200 });
    expect(ctx.computedPools.has('p1')).toBe(false);
  });

  test('derives the pool rectangle from positioned lanes', () => {
    const model = makeModel({
      pools: [makePool('p')],
      lanes: [
        makeLane('l1', 'p', [], { x: 90, y: 50, width: 600, height: 150 }),
        makeLane('l2', 'p', [], { x: 90, y: 200, width: 600, height: 120 }),
      ],
    });
    const ctx = makeContext(model);
    resolvePoolPositions(ctx);
    expect(model.pools[0]).toEqual({ id: 'p', x: 50, y: 50, width: 640, height: 270 });
    expect(ctx.computedPools.size).toBe(0);
  });
});

describe('stackPools', () => {
  test('chains several movable pools with a gap', () => {
    const pools = [makePool('a', { height: 100 }), makePool('b', { height: 200 })];
    stackPools(pools, new Set(['a', 'b']));
    expect(pools.map((p) => [p.x, p.y])).toEqual([
      [50, 50],
      [50, 200],
    ]);
  });
});
