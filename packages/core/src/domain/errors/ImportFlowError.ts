/** Machine-readable reason an orchestration operation was refused. */
export type ImportFlowErrorCode =
  | 'INVALID_TRANSITION'
  | 'INVALID_PHASE'
  | 'NO_SELECTION'
  | 'JOB_CREATION_FAILED'
  | 'JOB_VALIDATION_FAILED'
  | 'CHANNEL_UNAVAILABLE'
  | 'START_IN_PROGRESS'
  | 'STATE_CHANGED';

/**
 * Error returned (never thrown) by orchestrator operations.
 *
 * Delegate failures keep the original error as `cause`.
 */
export class ImportFlowError extends Error {
  readonly code: ImportFlowErrorCode;

  constructor(code: ImportFlowErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImportFlowError';
    this.code = code;
  }
}

/** Outcome of a mutating orchestrator operation. */
export type OperationResult = { readonly ok: true } | { readonly ok: false; readonly error: ImportFlowError };

export const OK: OperationResult = { ok: true };

export function fail(code: ImportFlowErrorCode, message: string, cause?: unknown): OperationResult {
  return { ok: false, error: new ImportFlowError(code, message, cause === undefined ? undefined : { cause }) };
}
