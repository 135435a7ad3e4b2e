/**
 * PipelineRunner: sequential executor for layout pipeline steps.
 *
 * Each step is logged with timing (and a moved-shape count when
 * `trackDelta` is set and delta callbacks were supplied), skipped when its
 * `skip` predicate holds, and has its errors re-thrown with the step name
 * prepended.
 *
 * ```typescript
 * const runner = new PipelineRunner(steps, log, { snap, count });
 * await runner.run(ctx);
 * ```
 */

import { errorMessage } from '../errors';
import type { DeltaCallbacks, PipelineContext, PipelineStep } from './types';

export class PipelineRunner<C extends PipelineContext> {
  readonly steps: readonly PipelineStep<C>[];

  private readonly delta: DeltaCallbacks | undefined;

  constructor(steps: PipelineStep<C>[], delta?: DeltaCallbacks) {
    this.steps = steps;
    this.delta = delta;
  }

  /**
   * Execute all steps in order against the given context.
   *
   * On failure the error is re-thrown as `Pipeline step "<name>" failed: <message>`
   * with the original error as `cause`.
   */
  async run(ctx: C): Promise<void> {
    for (const step of this.steps) {
      if (step.skip?.(ctx)) {
        ctx.log.note('skip', step.name);
        continue;
      }

      try {
        const body = async (): Promise<void> => {
          await step.run(ctx);
        };
        if (step.trackDelta && this.delta) {
          await ctx.log.stepAsyncWithDelta(step.name, body, this.delta.snap, this.delta.count);
        } else {
          await ctx.log.stepAsync(step.name, body);
        }
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err));
        throw new Error(`Pipeline step "${step.name}" failed: ${errorMessage(err)}`, { cause });
      }
    }
  }

  /** Names of all steps in execution order. */
  getStepNames(): string[] {
    return this.steps.map((s) => s.name);
  }
}
