import { describe, it, expect, vi } from 'vitest';
import { ImportOrchestrator } from '../../src/ImportOrchestrator.js';
import type { ImportResult } from '../../src/domain/model/ImportJob.js';
import { failedResult, skippedResult, successResult } from '../../src/domain/model/ImportJob.js';
import { RetryStrategy } from '../../src/domain/services/RetryPolicy.js';
import { describeStateInfo } from '../../src/application/usecases/GetImportStatus.js';
import { silentLogger } from '../../src/infrastructure/logging/consoleLogger.js';
import { FakeWorker, RecoveringWorker, makeJob } from '../fake-worker.js';

const results: ImportResult[] = [
  successResult(makeJob('/k/a.json'), { name: 'a', address: '0x0' }),
  failedResult(makeJob('/k/b.json'), new Error('incorrect password')),
  skippedResult(makeJob('/k/c.json', true), new Error('skipped by user')),
  failedResult(makeJob('/k/d.json'), new Error('corrupt keystore')),
];

async function completed(worker = new FakeWorker()) {
  const orchestrator = new ImportOrchestrator({ worker, logger: silentLogger });
  orchestrator.selectFiles(results.map((r) => r.job.keystorePath));
  await orchestrator.startImport();
  orchestrator.completeImport(results);
  return orchestrator;
}

describe('Completion', () => {
  it('should store the results and summarize them', async () => {
    const orchestrator = await completed();

    expect(orchestrator.getCurrentPhase()).toBe('COMPLETE');
    expect(orchestrator.getResults()).toEqual(results);
    expect(orchestrator.getSummary()).toMatchObject({
      totalFiles: 4,
      successfulImports: 1,
      failedImports: 2,
      skippedImports: 1,
    });
  });

  it('should build the completion report', async () => {
    const report = (await completed()).getCompletionReport();

    expect(report?.outcome).toBe('partial_success');
    expect(report?.successRate).toBe(25);
    expect(report?.failedFiles).toEqual(['/k/b.json', '/k/d.json']);
    expect(report?.skippedFiles).toEqual(['/k/c.json']);
    expect(report?.retryableFiles).toEqual(['/k/b.json']);
    expect(report?.actions).toEqual([
      'return_to_menu',
      'retry_failed',
      'retry_with_manual_passwords',
      'view_error_details',
      'select_different_files',
    ]);
  });

  it('should refuse to complete from FILE_SELECTION and keep no results', () => {
    const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger: silentLogger });

    const result = orchestrator.completeImport(results);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_TRANSITION');
    expect(orchestrator.getResults()).toEqual([]);
  });

  it('should describe the state on one line', async () => {
    const orchestrator = await completed();

    expect(describeStateInfo(orchestrator.getStateInfo())).toBe(
      'Phase: Complete, Files: 4, Dir: , Jobs: 4, Results: 4, Popup: false, Pending: false, Complete: true, Cancelled: false',
    );
  });
});

describe('Retry and navigation', () => {
  it('should refuse a retry before completion', () => {
    const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger: silentLogger });

    const result = orchestrator.requestRetry(RetryStrategy.RETRY_FAILED);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_PHASE');
  });

  it('should plan each strategy and announce it', async () => {
    const orchestrator = await completed();
    const requested = vi.fn();
    orchestrator.on('retry:requested', requested);

    const failed = orchestrator.requestRetry(RetryStrategy.RETRY_FAILED);
    const skipped = orchestrator.requestRetry(RetryStrategy.RETRY_SKIPPED);
    const all = orchestrator.requestRetry(RetryStrategy.RETRY_ALL);
    const manual = orchestrator.requestRetry(RetryStrategy.MANUAL_PASSWORDS);
    const specific = orchestrator.retrySpecificFile('/k/d.json');

    expect(failed).toEqual({ ok: true, plan: { strategy: 'retry_failed', files: ['/k/b.json', '/k/d.json'], forceManualPassword: false } });
    expect(skipped.ok && skipped.plan.files).toEqual(['/k/c.json']);
    expect(all.ok && all.plan.files).toEqual(['/k/b.json', '/k/c.json', '/k/d.json']);
    expect(manual).toEqual({ ok: true, plan: { strategy: 'manual_passwords', files: ['/k/b.json', '/k/d.json'], forceManualPassword: true } });
    expect(specific.ok && specific.plan.files).toEqual(['/k/d.json']);
    expect(requested).toHaveBeenCalledTimes(5);
    expect(orchestrator.getCurrentPhase()).toBe('COMPLETE');
  });

  it('should attach recovery jobs when the worker builds them', async () => {
    const orchestrator = await completed(new RecoveringWorker());

    const result = orchestrator.requestRetry(RetryStrategy.MANUAL_PASSWORDS);

    expect(result.ok && result.plan.jobs).toEqual([
      { keystorePath: '/k/b.json', walletName: 'b', requiresInput: true },
      { keystorePath: '/k/d.json', walletName: 'd', requiresInput: true },
    ]);
  });

  it('should restart with the planned files selected', async () => {
    const orchestrator = await completed();
    const retry = orchestrator.requestRetry(RetryStrategy.RETRY_FAILED);
    if (!retry.ok) throw retry.error;

    const result = orchestrator.restartWithFiles(retry.plan.files);

    expect(result.ok).toBe(true);
    expect(orchestrator.getCurrentPhase()).toBe('FILE_SELECTION');
    expect(orchestrator.getStateInfo()).toMatchObject({ selectedFiles: 2, results: 0, completed: false });
    expect((await orchestrator.startImport()).ok).toBe(true);
  });

  it('should announce a return to selection after the phase has changed', async () => {
    const orchestrator = await completed();
    const seen: string[] = [];
    orchestrator.onAny((event) => seen.push(event.type));

    orchestrator.returnToSelection();

    expect(seen).toEqual(['phase:changed', 'selection:returned']);
    expect(orchestrator.getCurrentPhase()).toBe('FILE_SELECTION');
  });

  it('should refuse to return to selection while importing', async () => {
    const orchestrator = new ImportOrchestrator({ worker: new FakeWorker(), logger: silentLogger });
    orchestrator.selectFiles(['/k/a.json']);
    await orchestrator.startImport();
    const returned = vi.fn();
    orchestrator.on('selection:returned', returned);

    const result = orchestrator.returnToSelection();

    expect(result.ok).toBe(false);
    expect(returned).not.toHaveBeenCalled();
  });

  it('should announce a return to the menu without changing phase', async () => {
    const orchestrator = await completed();
    const menu = vi.fn();
    orchestrator.on('menu:returned', menu);

    expect(orchestrator.returnToMenu().ok).toBe(true);

    expect(menu).toHaveBeenCalledOnce();
    expect(orchestrator.getCurrentPhase()).toBe('COMPLETE');
  });
});
