import type { ImportProgress } from '../../domain/model/ImportProgress.js';
import { validateProgressUpdate } from '../../domain/services/ProgressValidator.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/**
 * Use case: apply a progress snapshot from the worker.
 *
 * Invalid snapshots are dropped with a warning and a `progress:rejected`
 * event. The phase is never changed here.
 */
export class UpdateProgress {
  constructor(private readonly ctx: ImportFlowContext) {}

  /** Returns `true` when the snapshot was applied. */
  execute(progress: ImportProgress): boolean {
    const validation = validateProgressUpdate(progress, this.ctx.currentProgress);

    if (!validation.valid) {
      this.ctx.logger.warn('Invalid import progress update', {
        reason: validation.reason,
        processedFiles: progress.processedFiles,
        totalFiles: progress.totalFiles,
      });
      this.ctx.eventBus.emit({
        type: 'progress:rejected',
        progress,
        reason: validation.reason,
        timestamp: Date.now(),
      });
      return false;
    }

    this.ctx.currentProgress = progress;
    this.ctx.progressDisplay.apply(progress);
    this.ctx.eventBus.emit({ type: 'progress:updated', progress, timestamp: Date.now() });
    return true;
  }
}
