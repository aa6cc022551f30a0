/**
 * Finite state machine for an import session.
 *
 * Valid transitions:
 * - `FILE_SELECTION` → `IMPORTING` | `CANCELLED`
 * - `IMPORTING` → `PASSWORD_INPUT` | `COMPLETE` | `CANCELLED`
 * - `PASSWORD_INPUT` → `IMPORTING` | `COMPLETE` | `CANCELLED`
 * - `COMPLETE` → `FILE_SELECTION` | `CANCELLED`
 * - `CANCELLED` → `FILE_SELECTION`
 *
 * Transitioning a phase to itself is always allowed and re-runs its setup.
 */
export const ImportPhase = {
  FILE_SELECTION: 'FILE_SELECTION',
  IMPORTING: 'IMPORTING',
  PASSWORD_INPUT: 'PASSWORD_INPUT',
  COMPLETE: 'COMPLETE',
  CANCELLED: 'CANCELLED',
} as const;

export type ImportPhase = (typeof ImportPhase)[keyof typeof ImportPhase];

const VALID_TRANSITIONS: Record<ImportPhase, readonly ImportPhase[]> = {
  [ImportPhase.FILE_SELECTION]: [ImportPhase.IMPORTING, ImportPhase.CANCELLED],
  [ImportPhase.IMPORTING]: [ImportPhase.PASSWORD_INPUT, ImportPhase.COMPLETE, ImportPhase.CANCELLED],
  [ImportPhase.PASSWORD_INPUT]: [ImportPhase.IMPORTING, ImportPhase.COMPLETE, ImportPhase.CANCELLED],
  [ImportPhase.COMPLETE]: [ImportPhase.FILE_SELECTION, ImportPhase.CANCELLED],
  [ImportPhase.CANCELLED]: [ImportPhase.FILE_SELECTION],
};

const PHASE_LABELS: Record<ImportPhase, string> = {
  [ImportPhase.FILE_SELECTION]: 'File Selection',
  [ImportPhase.IMPORTING]: 'Importing',
  [ImportPhase.PASSWORD_INPUT]: 'Password Input',
  [ImportPhase.COMPLETE]: 'Complete',
  [ImportPhase.CANCELLED]: 'Cancelled',
};

/** All phases, in declaration order. */
export const ALL_PHASES: readonly ImportPhase[] = Object.values(ImportPhase);

/** Check whether a phase transition is valid according to the session FSM. */
export function canTransition(from: ImportPhase, to: ImportPhase): boolean {
  if (from === to) return true;
  return VALID_TRANSITIONS[from].includes(to);
}

/** Human-readable phase name, e.g. `'Password Input'`. */
export function phaseLabel(phase: ImportPhase): string {
  return PHASE_LABELS[phase];
}
