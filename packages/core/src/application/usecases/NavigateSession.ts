import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase } from '../../domain/model/ImportPhase.js';
import { OK } from '../../domain/errors/ImportFlowError.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** Use case: leave a finished or cancelled session for file selection or the menu. */
export class NavigateSession {
  constructor(private readonly ctx: ImportFlowContext) {}

  /** Go back to `FILE_SELECTION`, then announce it with `selection:returned`. */
  returnToSelection(): OperationResult {
    const result = this.ctx.transitionTo(ImportPhase.FILE_SELECTION);
    if (result.ok) {
      this.ctx.eventBus.emit({ type: 'selection:returned', timestamp: Date.now() });
    }
    return result;
  }

  /** Go back to `FILE_SELECTION` with `files` already selected. */
  restartWithFiles(files: readonly string[]): OperationResult {
    const result = this.ctx.transitionTo(ImportPhase.FILE_SELECTION);
    if (result.ok) {
      this.ctx.setSelection(files, '');
    }
    return result;
  }

  /** Announce that the user left the import flow. The phase is left as it is. */
  returnToMenu(): OperationResult {
    this.ctx.eventBus.emit({ type: 'menu:returned', timestamp: Date.now() });
    return OK;
  }
}
