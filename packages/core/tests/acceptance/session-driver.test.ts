import { describe, it, expect, vi } from 'vitest';
import { ImportOrchestrator } from '../../src/ImportOrchestrator.js';
import { ImportSessionDriver } from '../../src/ImportSessionDriver.js';
import type { ImportJob, ImportResult } from '../../src/domain/model/ImportJob.js';
import type { ImportPhase } from '../../src/domain/model/ImportPhase.js';
import type { ImportBatchChannels } from '../../src/domain/ports/BatchImportWorker.js';
import type { PasswordPrompter } from '../../src/domain/ports/PasswordPrompter.js';
import { silentLogger } from '../../src/infrastructure/logging/consoleLogger.js';
import { FakeWorker } from '../fake-worker.js';

const FILES = ['/k/one.json', '/k/two.json', '/k/three.json'];

function session(worker: FakeWorker) {
  const orchestrator = new ImportOrchestrator({
    worker,
    logger: silentLogger,
    progressPollTimeoutMs: 10,
    passwordPollTimeoutMs: 10,
  });
  const phases: ImportPhase[] = [];
  orchestrator.on('phase:changed', (event) => phases.push(event.to));
  orchestrator.selectFiles(FILES);
  return { orchestrator, phases };
}

function lockedWorker(): FakeWorker {
  const worker = new FakeWorker();
  worker.passwords.set('/k/two.json', 'pw');
  return worker;
}

describe('ImportSessionDriver', () => {
  it('should run a batch with one password prompt to completion', async () => {
    const worker = lockedWorker();
    const { orchestrator, phases } = session(worker);
    const prompter = vi.fn<PasswordPrompter>(async () => ({ action: 'submit', password: 'pw' }));

    const outcome = await new ImportSessionDriver(orchestrator, prompter, silentLogger).run();

    expect(phases).toEqual(['IMPORTING', 'PASSWORD_INPUT', 'IMPORTING', 'COMPLETE']);
    expect(prompter).toHaveBeenCalledOnce();
    expect(prompter).toHaveBeenCalledWith({ keystoreFile: '/k/two.json', attemptCount: 1, isRetry: false });
    expect(outcome.cancelled).toBe(false);
    expect(outcome.summary).toMatchObject({ totalFiles: 3, successfulImports: 3, failedImports: 0, skippedImports: 0 });
    expect(outcome.results.map((r) => r.wallet?.address)).toEqual(['0x0', '0x1', '0x2']);
    expect(orchestrator.getCompletionReport()?.outcome).toBe('all_successful');
  });

  it('should record a wrong password as a failure', async () => {
    const { orchestrator } = session(lockedWorker());

    const outcome = await new ImportSessionDriver(
      orchestrator,
      async () => ({ action: 'submit', password: 'nope' }),
      silentLogger,
    ).run();

    const { summary } = outcome;
    expect(summary.successfulImports + summary.failedImports + summary.skippedImports).toBe(3);
    expect(summary.failedImports).toBe(1);
    expect(summary.errors[0]?.file).toBe('/k/two.json');
    expect(summary.errors[0]?.error.message).toBe('incorrect password');
  });

  it('should record a skipped prompt as skipped', async () => {
    const { orchestrator } = session(lockedWorker());

    const { summary } = await new ImportSessionDriver(orchestrator, async () => ({ action: 'skip' }), silentLogger).run();

    expect(summary).toMatchObject({ successfulImports: 2, skippedImports: 1 });
    expect(orchestrator.getCurrentPhase()).toBe('COMPLETE');
  });

  it('should treat a failing prompter as a cancelled prompt', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { orchestrator } = session(lockedWorker());

    const { summary } = await new ImportSessionDriver(
      orchestrator,
      async () => {
        throw new Error('terminal closed');
      },
      logger,
    ).run();

    expect(summary).toMatchObject({ successfulImports: 2, skippedImports: 1 });
    expect(summary.errors[0]?.error.message).toBe('password input cancelled');
    expect(logger.warn).toHaveBeenCalledWith('Password prompt failed, cancelling input', { error: 'terminal closed' });
  });

  it('should stop with the session cancelled when the user cancels during a prompt', async () => {
    const { orchestrator } = session(lockedWorker());
    const cleanup = vi.fn();
    orchestrator.addCleanupCallback(cleanup);

    const outcome = await new ImportSessionDriver(
      orchestrator,
      async () => {
        orchestrator.cancelImport();
        return { action: 'cancel' };
      },
      silentLogger,
    ).run();

    expect(outcome.cancelled).toBe(true);
    expect(outcome.summary).toMatchObject({ totalFiles: 3, successfulImports: 1, skippedImports: 2 });
    expect(orchestrator.getCurrentPhase()).toBe('CANCELLED');
    expect(cleanup).toHaveBeenCalledOnce();
  });

  it('should throw the start error when nothing is selected', async () => {
    const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger: silentLogger });
    const driver = new ImportSessionDriver(orchestrator, async () => ({ action: 'skip' }), silentLogger);

    await expect(driver.run()).rejects.toMatchObject({ code: 'NO_SELECTION' });
  });

  it('should cancel the session and rethrow when the worker fails', async () => {
    class BrokenWorker extends FakeWorker {
      override async importBatch(_jobs: readonly ImportJob[], _channels: ImportBatchChannels): Promise<ImportResult[]> {
        throw new Error('disk full');
      }
    }
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { orchestrator } = session(new BrokenWorker());

    await expect(
      new ImportSessionDriver(orchestrator, async () => ({ action: 'skip' }), logger).run(),
    ).rejects.toThrow('disk full');

    expect(orchestrator.getCurrentPhase()).toBe('CANCELLED');
    expect(logger.error).toHaveBeenCalledWith('Batch import failed', { error: 'disk full' });
  });
});
