import type { ImportJob } from '../../domain/model/ImportJob.js';
import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase, phaseLabel } from '../../domain/model/ImportPhase.js';
import { fail } from '../../domain/errors/ImportFlowError.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';
import { describeError } from '../ImportFlowContext.js';

/**
 * Use case: turn the current selection into a validated job list and enter `IMPORTING`.
 *
 * The worker calls are awaited, so the session may move on meanwhile. If the
 * phase or the selection changed by the time they settle, nothing is applied.
 */
export class StartImport {
  constructor(private readonly ctx: ImportFlowContext) {}

  async execute(): Promise<OperationResult> {
    const ctx = this.ctx;

    if (ctx.startInFlight) {
      return fail('START_IN_PROGRESS', 'An import is already being started');
    }
    if (ctx.phase !== ImportPhase.FILE_SELECTION) {
      return fail('INVALID_PHASE', `Cannot start import from phase ${phaseLabel(ctx.phase)}`);
    }
    if (ctx.selectedFiles.length === 0 && ctx.selectedDirectory === '') {
      return fail('NO_SELECTION', 'No files or directory selected for import');
    }

    const files = [...ctx.selectedFiles];
    const directory = ctx.selectedDirectory;
    const selectionVersion = ctx.selectionVersion;

    ctx.startInFlight = true;
    try {
      let jobs: readonly ImportJob[];
      try {
        jobs =
          directory !== ''
            ? await ctx.worker.createImportJobsFromDirectory(directory)
            : await ctx.worker.createImportJobsFromFiles(files);
      } catch (error) {
        return this.reject('JOB_CREATION_FAILED', `Failed to create import jobs: ${describeError(error)}`, error);
      }

      try {
        const adjusted = await ctx.worker.validateImportJobs(jobs);
        if (adjusted) jobs = adjusted;
      } catch (error) {
        return this.reject('JOB_VALIDATION_FAILED', `Import job validation failed: ${describeError(error)}`, error);
      }

      if (ctx.phase !== ImportPhase.FILE_SELECTION || ctx.selectionVersion !== selectionVersion) {
        return fail('STATE_CHANGED', 'The import session changed while jobs were being prepared');
      }

      ctx.jobs = [...jobs];
      const result = ctx.transitionTo(ImportPhase.IMPORTING);
      if (!result.ok) {
        ctx.jobs = [];
      }
      return result;
    } finally {
      ctx.startInFlight = false;
    }
  }

  private reject(code: 'JOB_CREATION_FAILED' | 'JOB_VALIDATION_FAILED', message: string, cause: unknown): OperationResult {
    this.ctx.errorMessage = message;
    this.ctx.logger.error(message, { code });
    return fail(code, message, cause);
  }
}
