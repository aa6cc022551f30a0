import { describe, it, expect, vi } from 'vitest';
import { ImportOrchestrator } from '../../src/ImportOrchestrator.js';
import { silentLogger } from '../../src/infrastructure/logging/consoleLogger.js';
import { FakeWorker, makeProgress } from '../fake-worker.js';

async function importing(count: number, logger = silentLogger) {
  const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger });
  orchestrator.selectFiles(Array.from({ length: count }, (_, i) => `/k/w${i}.json`));
  await orchestrator.startImport();
  return orchestrator;
}

describe('Progress updates', () => {
  it('should accept monotonic snapshots and reject a regression', async () => {
    const orchestrator = await importing(3);

    expect([0, 1, 2, 3].map((processed) => orchestrator.updateProgress(makeProgress(processed, 3)))).toEqual([
      true,
      true,
      true,
      true,
    ]);
    expect(orchestrator.updateProgress(makeProgress(1, 3))).toBe(false);

    expect(orchestrator.getCurrentProgress().processedFiles).toBe(3);
    expect(orchestrator.getCurrentPhase()).toBe('IMPORTING');
  });

  it('should reject more processed files than total and leave progress unchanged', async () => {
    const orchestrator = await importing(3);
    const before = orchestrator.getCurrentProgress();

    expect(orchestrator.updateProgress(makeProgress(5, 3, { percentage: 100 }))).toBe(false);

    expect(orchestrator.getCurrentProgress()).toBe(before);
    expect(orchestrator.getProgressDisplay().getProcessedFiles()).toBe(0);
  });

  it('should log and announce a rejected snapshot', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const orchestrator = await importing(3, logger);
    const rejected = vi.fn();
    orchestrator.on('progress:rejected', rejected);
    const bad = makeProgress(2, 4);

    orchestrator.updateProgress(bad);

    expect(logger.warn).toHaveBeenCalledWith('Invalid import progress update', {
      reason: 'total files changed mid-import: 3 -> 4',
      processedFiles: 2,
      totalFiles: 4,
    });
    expect(rejected).toHaveBeenCalledWith(
      expect.objectContaining({ progress: bad, reason: 'total files changed mid-import: 3 -> 4' }),
    );
  });

  it('should reject a percentage that does not match the counts', async () => {
    const orchestrator = await importing(4);
    const rejected = vi.fn();
    orchestrator.on('progress:rejected', rejected);

    orchestrator.updateProgress(makeProgress(1, 4, { percentage: 50 }));

    expect(rejected.mock.calls[0]?.[0].reason).toBe('percentage mismatch: got 50.00, expected 25.00');
  });

  it('should mirror accepted snapshots in the display and emit progress:updated', async () => {
    const orchestrator = await importing(2);
    const updated = vi.fn();
    orchestrator.on('progress:updated', updated);
    const snapshot = makeProgress(1, 2, { currentFile: 'w0' });

    orchestrator.updateProgress(snapshot);

    const display = orchestrator.getProgressDisplay();
    expect(display.getProcessedFiles()).toBe(1);
    expect(display.getCurrentFile()).toBe('w0');
    expect(display.getPercentage()).toBe(50);
    expect(updated).toHaveBeenCalledWith(expect.objectContaining({ progress: snapshot }));
  });
});
