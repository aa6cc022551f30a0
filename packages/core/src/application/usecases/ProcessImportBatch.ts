import type { BatchCompletedEvent } from '../../domain/events/DomainEvents.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** A batch run that has been prepared but not started. */
export type ImportBatchTask = () => Promise<BatchCompletedEvent>;

/**
 * Use case: prepare the worker run for the current job list.
 *
 * The job list and channel handles are captured now; the worker only starts
 * when the returned task is called, normally on its own async task.
 */
export class ProcessImportBatch {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(): ImportBatchTask {
    const ctx = this.ctx;
    const jobs = [...ctx.jobs];
    const channels = ctx.workerChannels();

    return async () => {
      const results = await ctx.worker.importBatch(jobs, channels);
      const event: BatchCompletedEvent = { type: 'batch:completed', results, timestamp: Date.now() };
      ctx.eventBus.emit(event);
      return event;
    };
  }
}
