import type { ImportJob, ImportResult } from '../domain/model/ImportJob.js';
import type { ImportProgress } from '../domain/model/ImportProgress.js';
import type { ImportSummary } from '../domain/model/ImportSummary.js';
import type { PasswordRequest, PasswordResponse } from '../domain/model/PasswordHandshake.js';
import type { BatchImportWorker, ImportBatchChannels } from '../domain/ports/BatchImportWorker.js';
import type { FileSelector } from '../domain/ports/FileSelector.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { CompletionReport } from '../domain/services/CompletionReport.js';
import type { OperationResult } from '../domain/errors/ImportFlowError.js';
import { ImportPhase, canTransition, phaseLabel } from '../domain/model/ImportPhase.js';
import { createInitialProgress } from '../domain/model/ImportProgress.js';
import { buildCompletionReport } from '../domain/services/CompletionReport.js';
import { OK, fail } from '../domain/errors/ImportFlowError.js';
import { Channel } from './Channel.js';
import { EventBus } from './EventBus.js';
import { PasswordPrompt } from './PasswordPrompt.js';
import { PASSWORD_PAUSE_REASON, ProgressDisplay } from './ProgressDisplay.js';

/** Called once when the session is cancelled. */
export type CleanupCallback = () => void;

/** Settings resolved by `ImportOrchestrator` before the context is built. */
export interface ImportFlowSettings {
  readonly worker: BatchImportWorker;
  readonly logger: Logger;
  readonly fileSelector: FileSelector | null;
  readonly progressChannelCapacity: number;
  readonly maxPasswordRetries: number;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Mutable state of one import session, shared by all use cases.
 *
 * Every phase change goes through `transitionTo()`, which validates the move,
 * runs the target phase's setup and then emits `phase:changed`. Those steps
 * run synchronously, so no caller ever observes a half-applied transition.
 */
export class ImportFlowContext {
  readonly eventBus: EventBus;
  readonly worker: BatchImportWorker;
  readonly logger: Logger;
  readonly fileSelector: FileSelector | null;
  readonly progressChannelCapacity: number;
  readonly maxPasswordRetries: number;

  phase: ImportPhase = ImportPhase.FILE_SELECTION;
  selectedFiles: string[] = [];
  selectedDirectory = '';
  /** Bumped on every selection change, so an in-flight start can detect one. */
  selectionVersion = 0;
  jobs: ImportJob[] = [];
  results: ImportResult[] = [];
  currentProgress: ImportProgress = createInitialProgress(0, Date.now());
  readonly progressDisplay = new ProgressDisplay();
  passwordPrompt: PasswordPrompt | null = null;
  pendingPassword: PasswordRequest | null = null;
  showingPopup = false;
  completion: CompletionReport | null = null;
  /** When the current `IMPORTING` phase was entered. */
  startedAt = Date.now();
  /** When the batch left `FILE_SELECTION`. */
  batchStartedAt = Date.now();
  completed = false;
  cancelled = false;
  errorMessage = '';
  startInFlight = false;

  cleanupCallbacks: CleanupCallback[] = [];
  abortController: AbortController | null = null;
  progressChannel: Channel<ImportProgress>;
  passwordRequestChannel: Channel<PasswordRequest>;
  passwordResponseChannel: Channel<PasswordResponse>;

  constructor(settings: ImportFlowSettings) {
    this.worker = settings.worker;
    this.logger = settings.logger;
    this.fileSelector = settings.fileSelector;
    this.progressChannelCapacity = settings.progressChannelCapacity;
    this.maxPasswordRetries = settings.maxPasswordRetries;
    this.eventBus = new EventBus((error, event) => {
      this.logger.error('Event handler failed', { event: event.type, error: describeError(error) });
    });

    this.progressChannel = new Channel<ImportProgress>(this.progressChannelCapacity);
    this.passwordRequestChannel = new Channel<PasswordRequest>(1);
    this.passwordResponseChannel = new Channel<PasswordResponse>(1);
  }

  transitionTo(next: ImportPhase): OperationResult {
    const from = this.phase;
    if (!canTransition(from, next)) {
      return fail('INVALID_TRANSITION', `Invalid phase transition: ${phaseLabel(from)} -> ${phaseLabel(next)}`);
    }

    this.phase = next;
    this.setupPhase(next, from);

    this.eventBus.emit({ type: 'phase:changed', from, to: next, timestamp: Date.now() });
    return OK;
  }

  setSelection(files: readonly string[], directory: string): void {
    this.selectedFiles = [...files];
    this.selectedDirectory = directory;
    this.selectionVersion++;
  }

  /** Channel handles for the worker, bound to this batch's abort signal. */
  workerChannels(): ImportBatchChannels {
    this.abortController = this.abortController ?? new AbortController();
    return {
      progress: this.progressChannel,
      passwordRequests: this.passwordRequestChannel,
      passwordResponses: this.passwordResponseChannel,
      signal: this.abortController.signal,
    };
  }

  buildSummary(results: readonly ImportResult[] = this.results): ImportSummary {
    return this.worker.getImportSummary(results);
  }

  /** Run every registered cleanup callback once, then forget them. */
  runCleanup(): void {
    const callbacks = this.cleanupCallbacks;
    this.cleanupCallbacks = [];

    for (const callback of callbacks) {
      try {
        callback();
      } catch (error) {
        this.logger.error('Cleanup callback failed', { error: describeError(error) });
      }
    }
  }

  private setupPhase(phase: ImportPhase, from: ImportPhase): void {
    switch (phase) {
      case ImportPhase.FILE_SELECTION:
        this.setupFileSelection();
        break;
      case ImportPhase.IMPORTING:
        this.setupImporting(from);
        break;
      case ImportPhase.PASSWORD_INPUT:
        this.setupPasswordInput();
        break;
      case ImportPhase.COMPLETE:
        this.setupComplete();
        break;
      case ImportPhase.CANCELLED:
        this.setupCancelled();
        break;
    }
  }

  private setupFileSelection(): void {
    this.setSelection([], '');
    this.jobs = [];
    this.results = [];
    this.completion = null;
    this.completed = false;
    this.cancelled = false;
    this.errorMessage = '';
    this.showingPopup = false;
    this.pendingPassword = null;
    this.passwordPrompt = null;
    this.currentProgress = createInitialProgress(0, Date.now());
    this.progressDisplay.reset(0);
    this.fileSelector?.clearAll();
    this.replaceChannels();
  }

  private setupImporting(from: ImportPhase): void {
    const now = Date.now();
    if (from === ImportPhase.FILE_SELECTION) {
      this.abortController = new AbortController();
      this.batchStartedAt = now;
    }

    this.startedAt = now;
    this.showingPopup = false;
    this.passwordPrompt = null;
    this.progressDisplay.reset(this.jobs.length, now);
    this.currentProgress = createInitialProgress(this.jobs.length, now);
  }

  private setupPasswordInput(): void {
    this.showingPopup = true;
    if (this.pendingPassword) {
      this.passwordPrompt = PasswordPrompt.fromRequest(this.pendingPassword, this.maxPasswordRetries);
      this.progressDisplay.pause(PASSWORD_PAUSE_REASON);
    }
  }

  private setupComplete(): void {
    this.completed = true;
    this.showingPopup = false;
    this.pendingPassword = null;
    this.passwordPrompt = null;
    this.progressDisplay.complete();

    if (this.results.length > 0) {
      this.completion = buildCompletionReport(this.buildSummary(), this.batchStartedAt, Date.now());
    }
  }

  private setupCancelled(): void {
    this.cancelled = true;
    this.showingPopup = false;
    this.pendingPassword = null;
    this.passwordPrompt = null;

    this.abortController?.abort();
    this.passwordResponseChannel.close();
    this.runCleanup();
  }

  private replaceChannels(): void {
    this.progressChannel.close();
    this.passwordRequestChannel.close();
    this.passwordResponseChannel.close();

    this.progressChannel = new Channel<ImportProgress>(this.progressChannelCapacity);
    this.passwordRequestChannel = new Channel<PasswordRequest>(1);
    this.passwordResponseChannel = new Channel<PasswordResponse>(1);
    this.abortController = null;
  }
}
