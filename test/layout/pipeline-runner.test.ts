import { describe, test, expect } from 'vitest';
import { PipelineRunner } from '../../src/layout/pipeline-runner';
import type { PipelineContext, PipelineStep } from '../../src/layout/types';
import { quietLogger } from '../helpers';

interface TestContext extends PipelineContext {
  order: string[];
  flag: boolean;
}

function makeCtx(flag = false): TestContext {
  return { log: quietLogger(), order: [], flag };
}

describe('PipelineRunner', () => {
  test('runs steps in order, sync and async alike', async () => {
    const steps: PipelineStep<TestContext>[] = [
      { name: 'a', run: (ctx) => void ctx.order.push('a') },
      {
        name: 'b',
        run: async (ctx) => {
          await Promise.resolve();
          ctx.order.push('b');
        },
      },
      { name: 'c', run: (ctx) => void ctx.order.push('c') },
    ];
    const ctx = makeCtx();
    await new PipelineRunner(steps).run(ctx);
    expect(ctx.order).toEqual(['a', 'b', 'c']);
    expect(ctx.log.stepNames()).toEqual(['a', 'b', 'c']);
  });

  test('skips steps whose predicate holds', async () => {
    const steps: PipelineStep<TestContext>[] = [
      { name: 'always', run: (ctx) => void ctx.order.push('always') },
      { name: 'flagged', run: (ctx) => void ctx.order.push('flagged'), skip: (ctx) => !ctx.flag },
    ];
    const off = makeCtx(false);
    await new PipelineRunner(steps).run(off);
    expect(off.order).toEqual(['always']);
    expect(off.log.stepNames()).toEqual(['always']);

    const on = makeCtx(true);
    await new PipelineRunner(steps).run(on);
    expect(on.order).toEqual(['always', 'flagged']);
  });

  test('wraps failures with the step name and keeps the cause', async () => {
    const original = new Error('bad input');
    const steps: PipelineStep<TestContext>[] = [
      {
        name: 'explode',
        run: () => {
          throw original;
        },
      },
      { name: 'never', run: (ctx) => void ctx.order.push('never') },
    ];
    const ctx = makeCtx();
    const err: unknown = await new PipelineRunner(steps).run(ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(Error);
    expect(err instanceof Error && err.message).toBe('Pipeline step "explode" failed: bad input');
    expect(err instanceof Error && err.cause).toBe(original);
    expect(ctx.order).toEqual([]);
  });

  test('calls the delta callbacks only for tracked steps', async () => {
    let snaps = 0;
    const steps: PipelineStep<TestContext>[] = [
      { name: 'tracked', run: () => {}, trackDelta: true },
      { name: 'untracked', run: () => {} },
    ];
    await new PipelineRunner(steps, {
      snap: () => {
        snaps++;
        return new Map();
      },
      count: () => 0,
    }).run(makeCtx());
    expect(snaps).toBe(1);
  });

  test('getStepNames lists every step, skipped or not', () => {
    const runner = new PipelineRunner<TestContext>([
      { name: 'x', run: () => {} },
      { name: 'y', run: () => {}, skip: () => true },
    ]);
    expect(runner.getStepNames()).toEqual(['x', 'y']);
  });
});
