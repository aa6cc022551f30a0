import { describe, it, expect, vi } from 'vitest';
import { ImportOrchestrator } from '../../src/ImportOrchestrator.js';
import { ALL_PHASES, ImportPhase } from '../../src/domain/model/ImportPhase.js';
import type { FileSelector } from '../../src/domain/ports/FileSelector.js';
import { silentLogger } from '../../src/infrastructure/logging/consoleLogger.js';
import { FakeWorker } from '../fake-worker.js';

const PATH_TO: Record<ImportPhase, readonly ImportPhase[]> = {
  FILE_SELECTION: [],
  IMPORTING: ['IMPORTING'],
  PASSWORD_INPUT: ['IMPORTING', 'PASSWORD_INPUT'],
  COMPLETE: ['IMPORTING', 'COMPLETE'],
  CANCELLED: ['CANCELLED'],
};

const ALLOWED: Record<ImportPhase, readonly ImportPhase[]> = {
  FILE_SELECTION: ['IMPORTING', 'CANCELLED'],
  IMPORTING: ['PASSWORD_INPUT', 'COMPLETE', 'CANCELLED'],
  PASSWORD_INPUT: ['IMPORTING', 'COMPLETE', 'CANCELLED'],
  COMPLETE: ['FILE_SELECTION', 'CANCELLED'],
  CANCELLED: ['FILE_SELECTION'],
};

function orchestratorIn(phase: ImportPhase, fileSelector?: FileSelector): ImportOrchestrator {
  const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger: silentLogger, fileSelector });
  for (const step of PATH_TO[phase]) {
    const result = orchestrator.transitionToPhase(step);
    if (!result.ok) throw result.error;
  }
  return orchestrator;
}

describe('Phase transitions', () => {
  it('should start in FILE_SELECTION', () => {
    expect(orchestratorIn(ImportPhase.FILE_SELECTION).getCurrentPhase()).toBe('FILE_SELECTION');
  });

  for (const from of ALL_PHASES) {
    for (const to of ALL_PHASES) {
      const allowed = from === to || ALLOWED[from].includes(to);

      it(`${from} -> ${to} ${allowed ? 'succeeds' : 'fails and keeps the phase'}`, () => {
        const orchestrator = orchestratorIn(from);
        const result = orchestrator.transitionToPhase(to);

        expect(result.ok).toBe(allowed);
        expect(orchestrator.getCurrentPhase()).toBe(allowed ? to : from);
        if (!result.ok) {
          expect(result.error.code).toBe('INVALID_TRANSITION');
        }
      });
    }
  }

  it('should emit phase:changed for every applied transition, including re-entry', () => {
    const orchestrator = orchestratorIn(ImportPhase.FILE_SELECTION);
    const handler = vi.fn();
    orchestrator.on('phase:changed', handler);

    orchestrator.transitionToPhase(ImportPhase.IMPORTING);
    orchestrator.transitionToPhase(ImportPhase.IMPORTING);
    orchestrator.transitionToPhase(ImportPhase.FILE_SELECTION);

    expect(handler.mock.calls.map(([event]) => [event.from, event.to])).toEqual([
      ['FILE_SELECTION', 'IMPORTING'],
      ['IMPORTING', 'IMPORTING'],
    ]);
  });

  it('should reset the selection and the file selector when entering FILE_SELECTION', () => {
    const selector: FileSelector = { getSelection: () => ({ files: [], directory: '' }), clearAll: vi.fn() };
    const orchestrator = orchestratorIn(ImportPhase.COMPLETE, selector);
    orchestrator.completeImport([]);

    const result = orchestrator.transitionToPhase(ImportPhase.FILE_SELECTION);

    expect(result.ok).toBe(true);
    expect(selector.clearAll).toHaveBeenCalledOnce();
    expect(orchestrator.isCompleted()).toBe(false);
    expect(orchestrator.getStateInfo()).toMatchObject({ selectedFiles: 0, selectedDirectory: '', importJobs: 0, results: 0 });
  });

  it('should mark the session completed and finalize the display on COMPLETE', () => {
    const orchestrator = orchestratorIn(ImportPhase.COMPLETE);

    expect(orchestrator.isCompleted()).toBe(true);
    expect(orchestrator.getProgressDisplay().isCompleted()).toBe(true);
    expect(orchestrator.getCompletionReport()).toBeNull();
  });

  it('should show the popup in PASSWORD_INPUT and hide it again in IMPORTING', () => {
    const orchestrator = orchestratorIn(ImportPhase.PASSWORD_INPUT);
    expect(orchestrator.getStateInfo().showingPopup).toBe(true);

    orchestrator.transitionToPhase(ImportPhase.IMPORTING);
    expect(orchestrator.getStateInfo().showingPopup).toBe(false);
  });
});
