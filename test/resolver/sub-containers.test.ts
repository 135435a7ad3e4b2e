import { describe, test, expect } from 'vitest';
import { analyzeParents } from '../../src/resolver/parents';
import { convertSubContainers } from '../../src/resolver/sub-containers';
import { assertInsideContainer } from '../scenarios/layout-invariants';
import { makeContext, makeModel, makeShape, shapeById } from '../helpers';
import type { Shape } from '../../src/types';

function convert(shapes: Shape[]) {
  const model = makeModel({ shapes });
  const ctx = makeContext(model);
  analyzeParents(ctx);
  convertSubContainers(ctx);
  return model;
}

describe('convertSubContainers', () => {
  test('converts to container-relative coordinates below the header', () => {
    const model = convert([
      makeShape('sp', 'subProcess', { x: 200, y: 200, width: 200, height: 150 }),
      makeShape('c', 'task', { x: 250, y: 260, width: 120, height: 80, subContainer: 'sp' }),
    ]);
    const child = shapeById(model, 'c');
    expect({ x: child.x, y: child.y }).toEqual({ x: 50, y: 34 });
    expect(child.parent).toBe('sp');
    expect(shapeById(model, 'sp')).toMatchObject({ x: 200, y: 200 });
  });

  test('clamps children into the content area', () => {
    const model = convert([
      makeShape('sp', 'subProcess', { x: 200, y: 200, width: 200, height: 150 }),
      makeShape('c', 'task', { x: 900, y: 900, width: 120, height: 80, subContainer: 'sp' }),
    ]);
    expect(shapeById(model, 'c')).toMatchObject({ x: 80, y: 44 });
    assertInsideContainer(shapeById(model, 'c'), shapeById(model, 'sp'));
  });

  test('grows a container smaller than its child', () => {
    const model = convert([
      makeShape('sp', 'subProcess', { x: 0, y: 0, width: 100, height: 100 }),
      makeShape('c', 'task', { x: 0, y: 0, width: 120, height: 80, subContainer: 'sp' }),
    ]);
    expect(shapeById(model, 'sp')).toMatchObject({ width: 120, height: 106 });
    expect(shapeById(model, 'c')).toMatchObject({ x: 0, y: 0 });
  });

  test('moves a child clamped onto a sibling to the first free slot', () => {
    const model = convert([
      makeShape('sp', 'subProcess', { x: 200, y: 200, width: 200, height: 150 }),
      makeShape('c1', 'task', { x: 900, y: 900, width: 120, height: 80, subContainer: 'sp' }),
      makeShape('c2', 'task', { x: 950, y: 950, width: 120, height: 80, subContainer: 'sp' }),
    ]);
    expect(shapeById(model, 'c1')).toMatchObject({ x: 80, y: 44 });
    expect(shapeById(model, 'c2')).toMatchObject({ x: 0, y: 0 });
  });

  test('nested containers use absolute origins', () => {
    const model = convert([
      makeShape('outer', 'subProcess', { x: 100, y: 100, width: 500, height: 400 }),
      makeShape('inner', 'subProcess', { x: 150, y: 200, width: 300, height: 200, subContainer: 'outer' }),
      makeShape('leaf', 'task', { x: 200, y: 250, width: 120, height: 80, subContainer: 'inner' }),
    ]);
    expect(shapeById(model, 'inner')).toMatchObject({ x: 50, y: 74 });
    expect(shapeById(model, 'leaf')).toMatchObject({ x: 50, y: 24 });
  });
});
