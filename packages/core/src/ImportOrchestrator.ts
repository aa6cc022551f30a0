import type { ImportPhase } from './domain/model/ImportPhase.js';
import type { ImportResult } from './domain/model/ImportJob.js';
import type { ImportProgress } from './domain/model/ImportProgress.js';
import type { ImportSummary } from './domain/model/ImportSummary.js';
import type { PasswordRequest } from './domain/model/PasswordHandshake.js';
import type { OperationResult } from './domain/errors/ImportFlowError.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { BatchImportWorker } from './domain/ports/BatchImportWorker.js';
import type { Receiver } from './domain/ports/Channel.js';
import type { FileSelector } from './domain/ports/FileSelector.js';
import type { Logger } from './domain/ports/Logger.js';
import type { CompletionReport } from './domain/services/CompletionReport.js';
import type { CleanupCallback } from './application/ImportFlowContext.js';
import type { PasswordPrompt } from './application/PasswordPrompt.js';
import type { ProgressDisplay } from './application/ProgressDisplay.js';
import type { ImportBatchTask } from './application/usecases/ProcessImportBatch.js';
import type { RetryRequestResult } from './application/usecases/RequestRetry.js';
import type { StateInfo } from './application/usecases/GetImportStatus.js';
import { cancelResponse, skipResponse, submitResponse } from './domain/model/PasswordHandshake.js';
import { RetryStrategy } from './domain/services/RetryPolicy.js';
import { ImportFlowContext } from './application/ImportFlowContext.js';
import { ImportListener } from './application/ImportListener.js';
import { StartImport } from './application/usecases/StartImport.js';
import { ProcessImportBatch } from './application/usecases/ProcessImportBatch.js';
import { HandlePasswordRequest } from './application/usecases/HandlePasswordRequest.js';
import { RespondToPassword } from './application/usecases/RespondToPassword.js';
import { CompleteImport } from './application/usecases/CompleteImport.js';
import { CancelImport } from './application/usecases/CancelImport.js';
import { UpdateProgress } from './application/usecases/UpdateProgress.js';
import { GetImportStatus } from './application/usecases/GetImportStatus.js';
import { RequestRetry } from './application/usecases/RequestRetry.js';
import { NavigateSession } from './application/usecases/NavigateSession.js';
import { SelectFiles } from './application/usecases/SelectFiles.js';
import { consoleLogger } from './infrastructure/logging/consoleLogger.js';

/** Smallest accepted progress channel capacity. */
export const MIN_PROGRESS_CHANNEL_CAPACITY = 100;

/** Configuration for an import session. */
export interface ImportOrchestratorConfig {
  /** Creates, validates and imports the jobs. */
  readonly worker: BatchImportWorker;
  /** Diagnostic output. Default: `consoleLogger`. */
  readonly logger?: Logger;
  /** Source for `syncSelection()`; cleared whenever the session returns to file selection. */
  readonly fileSelector?: FileSelector;
  /** Buffered progress snapshots. Default: `500`, minimum `100`. */
  readonly progressChannelCapacity?: number;
  /** How long one progress poll waits. Default: `1000`. */
  readonly progressPollTimeoutMs?: number;
  /** How long one password-request poll waits. Default: `100`. */
  readonly passwordPollTimeoutMs?: number;
  /** Retry limit shown by the password prompt. Default: `3`. */
  readonly maxPasswordRetries?: number;
}

/**
 * Facade over one keystore import session: phase state machine, worker
 * channels and completion policy.
 *
 * Each operation delegates to a use case in `application/usecases/`, all
 * sharing one `ImportFlowContext`. Mutating operations return an
 * `OperationResult` instead of throwing.
 *
 * @example
 * ```typescript
 * const orchestrator = new ImportOrchestrator({ worker: new BatchImportService({ decryptor }) });
 * orchestrator.selectFiles(['/keys/alice.json']);
 * const started = await orchestrator.startImport();
 * if (started.ok) {
 *   const { results } = await orchestrator.processImportBatch()();
 *   orchestrator.completeImport(results);
 * }
 * ```
 */
export class ImportOrchestrator {
  private readonly ctx: ImportFlowContext;
  private readonly listener: ImportListener;

  constructor(config: ImportOrchestratorConfig) {
    this.ctx = new ImportFlowContext({
      worker: config.worker,
      logger: config.logger ?? consoleLogger,
      fileSelector: config.fileSelector ?? null,
      progressChannelCapacity: Math.max(MIN_PROGRESS_CHANNEL_CAPACITY, config.progressChannelCapacity ?? 500),
      maxPasswordRetries: config.maxPasswordRetries ?? 3,
    });
    this.listener = new ImportListener(
      this.ctx,
      config.progressPollTimeoutMs ?? 1000,
      config.passwordPollTimeoutMs ?? 100,
    );
  }

  /** Subscribe to a session event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  getCurrentPhase(): ImportPhase {
    return this.ctx.phase;
  }

  transitionToPhase(phase: ImportPhase): OperationResult {
    return this.ctx.transitionTo(phase);
  }

  selectFiles(paths: readonly string[]): OperationResult {
    return new SelectFiles(this.ctx).files(paths);
  }

  selectDirectory(path: string): OperationResult {
    return new SelectFiles(this.ctx).directory(path);
  }

  syncSelection(): OperationResult {
    return new SelectFiles(this.ctx).sync();
  }

  /**
   * Create and validate jobs for the current selection, then enter `IMPORTING`.
   *
   * A directory selection wins over a file selection. On failure the phase is
   * unchanged and the worker's error, if any, is the returned error's `cause`.
   */
  async startImport(): Promise<OperationResult> {
    return new StartImport(this.ctx).execute();
  }

  /** Prepare the worker run. Call the returned task to start it. */
  processImportBatch(): ImportBatchTask {
    return new ProcessImportBatch(this.ctx).execute();
  }

  handlePasswordRequest(request: PasswordRequest): OperationResult {
    return new HandlePasswordRequest(this.ctx).execute(request);
  }

  submitPassword(password: string): OperationResult {
    return new RespondToPassword(this.ctx).execute(submitResponse(password));
  }

  /** Answer the prompt with "cancelled". The worker records the file as skipped; the session continues. */
  cancelPasswordInput(): OperationResult {
    return new RespondToPassword(this.ctx).execute(cancelResponse());
  }

  skipPasswordInput(): OperationResult {
    return new RespondToPassword(this.ctx).execute(skipResponse());
  }

  completeImport(results: readonly ImportResult[]): OperationResult {
    return new CompleteImport(this.ctx).execute(results);
  }

  /** Cancel the whole session. Always succeeds. */
  cancelImport(): OperationResult {
    return new CancelImport(this.ctx).execute();
  }

  /** Apply a snapshot if it passes validation. Returns `true` when applied. */
  updateProgress(progress: ImportProgress): boolean {
    return new UpdateProgress(this.ctx).execute(progress);
  }

  /** Register a callback to run when the session is cancelled. */
  addCleanupCallback(callback: CleanupCallback): void {
    this.ctx.cleanupCallbacks.push(callback);
  }

  /** Run the registered cleanup callbacks now, without changing phase. */
  cleanup(): void {
    this.ctx.runCleanup();
  }

  requestRetry(strategy: RetryStrategy): RetryRequestResult {
    return new RequestRetry(this.ctx).execute(strategy);
  }

  retrySpecificFile(path: string): RetryRequestResult {
    return new RequestRetry(this.ctx).execute(RetryStrategy.RETRY_SPECIFIC, path);
  }

  restartWithFiles(files: readonly string[]): OperationResult {
    return new NavigateSession(this.ctx).restartWithFiles(files);
  }

  returnToSelection(): OperationResult {
    return new NavigateSession(this.ctx).returnToSelection();
  }

  returnToMenu(): OperationResult {
    return new NavigateSession(this.ctx).returnToMenu();
  }

  getProgressChannel(): Receiver<ImportProgress> {
    return this.ctx.progressChannel;
  }

  getPasswordRequestChannel(): Receiver<PasswordRequest> {
    return this.ctx.passwordRequestChannel;
  }

  /** Polling helpers for a UI loop. */
  getListener(): ImportListener {
    return this.listener;
  }

  getResults(): ImportResult[] {
    return [...this.ctx.results];
  }

  getSummary(): ImportSummary {
    return this.ctx.buildSummary();
  }

  /** Summary of an arbitrary result list, computed by the worker. */
  summarize(results: readonly ImportResult[]): ImportSummary {
    return this.ctx.buildSummary(results);
  }

  /** `null` until the session completes with at least one result. */
  getCompletionReport(): CompletionReport | null {
    return this.ctx.completion;
  }

  getStateInfo(): StateInfo {
    return new GetImportStatus(this.ctx).execute();
  }

  getCurrentProgress(): ImportProgress {
    return this.ctx.currentProgress;
  }

  getPendingPassword(): PasswordRequest | null {
    return this.ctx.pendingPassword;
  }

  getProgressDisplay(): ProgressDisplay {
    return this.ctx.progressDisplay;
  }

  /** `null` unless the session is in `PASSWORD_INPUT`. */
  getPasswordPrompt(): PasswordPrompt | null {
    return this.ctx.passwordPrompt;
  }

  isCompleted(): boolean {
    return this.ctx.completed;
  }

  isCancelled(): boolean {
    return this.ctx.cancelled;
  }
}
