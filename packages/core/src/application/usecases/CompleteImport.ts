import type { ImportResult } from '../../domain/model/ImportJob.js';
import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase } from '../../domain/model/ImportPhase.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** Use case: store the worker's results and enter `COMPLETE`. */
export class CompleteImport {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(results: readonly ImportResult[]): OperationResult {
    const previous = this.ctx.results;
    this.ctx.results = [...results];

    const result = this.ctx.transitionTo(ImportPhase.COMPLETE);
    if (!result.ok) {
      this.ctx.results = previous;
    }
    return result;
  }
}
