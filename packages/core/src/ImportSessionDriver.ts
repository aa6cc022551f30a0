import type { BatchCompletedEvent } from './domain/events/DomainEvents.js';
import type { ImportResult } from './domain/model/ImportJob.js';
import type { ImportSummary } from './domain/model/ImportSummary.js';
import type { PasswordRequest } from './domain/model/PasswordHandshake.js';
import type { OperationResult } from './domain/errors/ImportFlowError.js';
import type { Logger } from './domain/ports/Logger.js';
import type { PasswordAnswer, PasswordPrompter } from './domain/ports/PasswordPrompter.js';
import type { ImportOrchestrator } from './ImportOrchestrator.js';
import { describeError } from './application/ImportFlowContext.js';
import { consoleLogger } from './infrastructure/logging/consoleLogger.js';

/** How a driven session ended. */
export interface ImportSessionOutcome {
  readonly summary: ImportSummary;
  readonly results: readonly ImportResult[];
  /** `true` when the session was cancelled while the batch ran; the phase is then `CANCELLED`. */
  readonly cancelled: boolean;
}

/**
 * Reference UI loop for an orchestrator whose selection is already set.
 *
 * Starts the import, runs the worker task alongside a progress loop and a
 * password loop, answers every password request through the prompter, and
 * completes the session once the worker returns.
 *
 * @example
 * ```typescript
 * orchestrator.selectDirectory('/keys');
 * const driver = new ImportSessionDriver(orchestrator, async (req) => ({ action: 'submit', password: await ask(req) }));
 * const { summary } = await driver.run();
 * ```
 */
export class ImportSessionDriver {
  constructor(
    private readonly orchestrator: ImportOrchestrator,
    private readonly prompter: PasswordPrompter,
    private readonly logger: Logger = consoleLogger,
  ) {}

  /** Rejects with the start error, or with the worker's error after cancelling the session. */
  async run(): Promise<ImportSessionOutcome> {
    const started = await this.orchestrator.startImport();
    if (!started.ok) throw started.error;

    const listener = this.orchestrator.getListener();
    let batchDone = false;
    const batch = this.orchestrator
      .processImportBatch()()
      .finally(() => {
        batchDone = true;
      });
    const keepListening = (): boolean => !batchDone && listener.shouldKeepListening();

    const loops = Promise.all([this.pumpProgress(keepListening), this.pumpPasswords(keepListening)]);

    let completed: BatchCompletedEvent;
    try {
      completed = await batch;
    } catch (error) {
      this.logger.error('Batch import failed', { error: describeError(error) });
      this.orchestrator.cancelImport();
      await loops;
      throw error;
    }
    await loops;
    this.drainProgress();

    const results = completed.results;
    if (this.orchestrator.isCancelled()) {
      return { summary: this.orchestrator.summarize(results), results, cancelled: true };
    }

    const finished = this.orchestrator.completeImport(results);
    if (!finished.ok) throw finished.error;

    return { summary: this.orchestrator.getSummary(), results, cancelled: false };
  }

  private async pumpProgress(keepListening: () => boolean): Promise<void> {
    const listener = this.orchestrator.getListener();
    while (keepListening()) {
      const polled = await listener.listenForProgressUpdates();
      if (polled.kind === 'listen:closed') return;
      if (polled.kind === 'progress:update') {
        this.orchestrator.updateProgress(polled.progress);
      }
    }
  }

  private async pumpPasswords(keepListening: () => boolean): Promise<void> {
    const listener = this.orchestrator.getListener();
    while (keepListening()) {
      const polled = await listener.listenForPasswordRequests();
      if (polled.kind === 'listen:closed') return;
      if (polled.kind === 'password:request') {
        await this.answer(polled.request);
      }
    }
  }

  private async answer(request: PasswordRequest): Promise<void> {
    const handled = this.orchestrator.handlePasswordRequest(request);
    if (!handled.ok) {
      this.logger.warn('Password request ignored', { file: request.keystoreFile, reason: handled.error.message });
      return;
    }

    let answer: PasswordAnswer;
    try {
      answer = await this.prompter(request);
    } catch (error) {
      this.logger.warn('Password prompt failed, cancelling input', { error: describeError(error) });
      answer = { action: 'cancel' };
    }

    const responded = this.respond(answer);
    if (!responded.ok) {
      this.logger.warn('Password response not delivered', { file: request.keystoreFile, code: responded.error.code });
    }
  }

  private respond(answer: PasswordAnswer): OperationResult {
    switch (answer.action) {
      case 'submit':
        return this.orchestrator.submitPassword(answer.password);
      case 'skip':
        return this.orchestrator.skipPasswordInput();
      case 'cancel':
        return this.orchestrator.cancelPasswordInput();
    }
  }

  private drainProgress(): void {
    const channel = this.orchestrator.getProgressChannel();
    for (let next = channel.tryReceive(); next.kind === 'value'; next = channel.tryReceive()) {
      this.orchestrator.updateProgress(next.value);
    }
  }
}
