import type { ImportPhase } from '../../domain/model/ImportPhase.js';
import { phaseLabel } from '../../domain/model/ImportPhase.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** Plain diagnostic snapshot of a session, for logging and tests. */
export interface StateInfo {
  readonly phase: ImportPhase;
  readonly selectedFiles: number;
  readonly selectedDirectory: string;
  readonly importJobs: number;
  readonly results: number;
  readonly showingPopup: boolean;
  readonly pendingPassword: boolean;
  readonly completed: boolean;
  readonly cancelled: boolean;
  readonly errorMessage: string;
}

/** One-line rendering of a `StateInfo`. */
export function describeStateInfo(info: StateInfo): string {
  return (
    `Phase: ${phaseLabel(info.phase)}, Files: ${info.selectedFiles}, Dir: ${info.selectedDirectory}, ` +
    `Jobs: ${info.importJobs}, Results: ${info.results}, Popup: ${info.showingPopup}, ` +
    `Pending: ${info.pendingPassword}, Complete: ${info.completed}, Cancelled: ${info.cancelled}`
  );
}

/** Use case: read a consistent snapshot of the session state. */
export class GetImportStatus {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(): StateInfo {
    const ctx = this.ctx;
    return {
      phase: ctx.phase,
      selectedFiles: ctx.selectedFiles.length,
      selectedDirectory: ctx.selectedDirectory,
      importJobs: ctx.jobs.length,
      results: ctx.results.length,
      showingPopup: ctx.showingPopup,
      pendingPassword: ctx.pendingPassword !== null,
      completed: ctx.completed,
      cancelled: ctx.cancelled,
      errorMessage: ctx.errorMessage,
    };
  }
}
