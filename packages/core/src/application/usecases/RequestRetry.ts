import type { RetryPlan, RetryStrategy } from '../../domain/services/RetryPolicy.js';
import { ImportPhase, phaseLabel } from '../../domain/model/ImportPhase.js';
import { ImportFlowError } from '../../domain/errors/ImportFlowError.js';
import { buildRetryPlan } from '../../domain/services/RetryPolicy.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

export type RetryRequestResult =
  | { readonly ok: true; readonly plan: RetryPlan }
  | { readonly ok: false; readonly error: ImportFlowError };

/**
 * Use case: plan a retry of a finished batch and announce it with `retry:requested`.
 *
 * The session stays in `COMPLETE`; the UI decides when to restart with the
 * planned files.
 */
export class RequestRetry {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(strategy: RetryStrategy, specificFile?: string): RetryRequestResult {
    const ctx = this.ctx;
    if (ctx.phase !== ImportPhase.COMPLETE) {
      return {
        ok: false,
        error: new ImportFlowError('INVALID_PHASE', `Cannot retry from phase ${phaseLabel(ctx.phase)}`),
      };
    }

    let plan = buildRetryPlan(ctx.results, strategy, specificFile);

    if (ctx.worker.createRecoveryJobs) {
      const wanted = new Set(plan.files);
      const jobs = ctx.results.map((result) => result.job).filter((job) => wanted.has(job.keystorePath));
      plan = { ...plan, jobs: ctx.worker.createRecoveryJobs(jobs, strategy) };
    }

    ctx.eventBus.emit({ type: 'retry:requested', plan, timestamp: Date.now() });
    return { ok: true, plan };
  }
}
