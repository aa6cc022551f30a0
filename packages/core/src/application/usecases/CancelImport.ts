import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase } from '../../domain/model/ImportPhase.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/**
 * Use case: cancel the session from any phase.
 *
 * Aborts the running batch, closes the password response channel and runs the
 * registered cleanup callbacks.
 */
export class CancelImport {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(): OperationResult {
    return this.ctx.transitionTo(ImportPhase.CANCELLED);
  }
}
