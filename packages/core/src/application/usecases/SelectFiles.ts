import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase, phaseLabel } from '../../domain/model/ImportPhase.js';
import { OK, fail } from '../../domain/errors/ImportFlowError.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** Use case: record what will be imported. Files and a directory are mutually exclusive. */
export class SelectFiles {
  constructor(private readonly ctx: ImportFlowContext) {}

  files(paths: readonly string[]): OperationResult {
    return this.apply(paths, '');
  }

  directory(path: string): OperationResult {
    return this.apply([], path);
  }

  /** Copy the selection from the configured `FileSelector`. A no-op without one. */
  sync(): OperationResult {
    const selector = this.ctx.fileSelector;
    if (!selector) return OK;

    const selection = selector.getSelection();
    return this.apply(selection.directory === '' ? selection.files : [], selection.directory);
  }

  private apply(files: readonly string[], directory: string): OperationResult {
    if (this.ctx.phase !== ImportPhase.FILE_SELECTION) {
      return fail('INVALID_PHASE', `Cannot change the selection in phase ${phaseLabel(this.ctx.phase)}`);
    }
    this.ctx.setSelection(files, directory);
    return OK;
  }
}
