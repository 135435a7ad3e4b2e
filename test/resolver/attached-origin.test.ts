import { describe, test, expect } from 'vitest';
import { positionAttached } from '../../src/resolver/attached';
import { separateSiblings } from '../../src/resolver/containment';
import { hasNegativeOrigin, normaliseOrigin } from '../../src/resolver/origin';
import { analyzeParents } from '../../src/resolver/parents';
import { makeContext, makeLane, makeModel, makePool, makeShape, poolById, shapeById } from '../helpers';

describe('positionAttached', () => {
  test('spreads attached shapes along the bottom edge of the host', () => {
    const model = makeModel({
      shapes: [
        makeShape('review', 'userTask', { x: 300, y: 100, width: 120, height: 80 }),
        makeShape('timer', 'boundaryEvent', { x: 0, y: 0, properties: { attachedToRef: 'review' } }),
        makeShape('error', 'boundaryEvent', { x: 0, y: 0, properties: { attachedToRef: 'review' } }),
      ],
    });
    const ctx = makeContext(model);
    analyzeParents(ctx);
    positionAttached(ctx);

    expect(shapeById(model, 'timer')).toMatchObject({ x: 20, y: 62, parent: 'review' });
    expect(shapeById(model, 'error')).toMatchObject({ x: 70, y: 62, parent: 'review' });
  });

  test('a boundary event without a host stays where it is', () => {
    const model = makeModel({ shapes: [makeShape('orphan', 'boundaryEvent', { x: 5, y: 6 })] });
    const ctx = makeContext(model);
    analyzeParents(ctx);
    positionAttached(ctx);
    expect(shapeById(model, 'orphan')).toMatchObject({ x: 5, y: 6 });
  });
});

describe('separateSiblings', () => {
  test('nudges identical sibling boxes apart along X', () => {
    const model = makeModel({
      shapes: ['a', 'b', 'c'].map((id) => makeShape(id, 'task', { x: 100, y: 100, width: 120, height: 80 })),
    });
    const ctx = makeContext(model);
    analyzeParents(ctx);
    separateSiblings(ctx);
    expect(model.shapes.map((s) => s.x)).toEqual([100, 110, 120]);
  });

  test('boxes in different containers may coincide', () => {
    const model = makeModel({
      shapes: [
        makeShape('a', 'task', { x: 100, y: 100, width: 120, height: 80 }),
        makeShape('b', 'task', { x: 100, y: 100, width: 120, height: 80, parent: 'l1' }),
      ],
      pools: [makePool('p')],
      lanes: [makeLane('l1', 'p')],
    });
    const ctx = makeContext(model);
    analyzeParents(ctx);
    separateSiblings(ctx);
    expect(model.shapes.map((s) => s.x)).toEqual([100, 100]);
  });
});

describe('origin normalisation', () => {
  test('shifts root items on every negative axis', () => {
    const model = makeModel({
      shapes: [makeShape('a', 'task', { x: -100, y: 20 }), makeShape('b', 'task', { x: 10, y: 10, parent: 'p' })],
      pools: [makePool('p', { x: 0, y: -30, width: 400, height: 200 })],
    });
    const ctx = makeContext(model, { computedPools: new Set(['p']) });
    analyzeParents(ctx);
    expect(hasNegativeOrigin(ctx)).toBe(true);

    normaliseOrigin(ctx);
    expect(shapeById(model, 'a')).toMatchObject({ x: 50, y: 100 });
    expect(poolById(model, 'p')).toMatchObject({ x: 150, y: 50 });
    expect(shapeById(model, 'b')).toMatchObject({ x: 10, y: 10 });
  });

  test('explicit shapes and given pools stay put', () => {
    const model = makeModel({
      shapes: [makeShape('a', 'task', { x: -100, y: 20 }), makeShape('c', 'task', { x: -20, y: 60 })],
      pools: [makePool('p', { x: 0, y: -30, width: 400, height: 200 })],
    });
    const ctx = makeContext(model, { explicitShapes: new Set(['a']) });
    analyzeParents(ctx);
    normaliseOrigin(ctx);
    expect(shapeById(model, 'a')).toMatchObject({ x: -100, y: 20 });
    expect(poolById(model, 'p')).toMatchObject({ x: 0, y: -30 });
    expect(shapeById(model, 'c')).toMatchObject({ x: 50, y: 60 });
  });

  test('never applies in preserve mode', () => {
    const model = makeModel({ shapes: [makeShape('a', 'task', { x: -100, y: 20 })] });
    const ctx = makeContext(model, { mode: 'preserve' });
    analyzeParents(ctx);
    expect(hasNegativeOrigin(ctx)).toBe(false);
  });

  test('non-negative layouts need no shift', () => {
    const model = makeModel({ shapes: [makeShape('a', 'task', { x: 0, y: 0 })] });
    const ctx = makeContext(model);
    analyzeParents(ctx);
    expect(hasNegativeOrigin(ctx)).toBe(false);
  });
});
