// Main entry points
export { ImportOrchestrator, MIN_PROGRESS_CHANNEL_CAPACITY } from './ImportOrchestrator.js';
export type { ImportOrchestratorConfig } from './ImportOrchestrator.js';
export { ImportSessionDriver } from './ImportSessionDriver.js';
export type { ImportSessionOutcome } from './ImportSessionDriver.js';

// Domain model
export { ImportPhase, ALL_PHASES, canTransition, phaseLabel } from './domain/model/ImportPhase.js';
export type { ImportJob, ImportResult, ImportedWallet } from './domain/model/ImportJob.js';
export { successResult, failedResult, skippedResult } from './domain/model/ImportJob.js';
export type { ImportProgress, ImportError } from './domain/model/ImportProgress.js';
export { createInitialProgress, expectedPercentage } from './domain/model/ImportProgress.js';
export type { ImportSummary } from './domain/model/ImportSummary.js';
export { buildImportSummary } from './domain/model/ImportSummary.js';
export type { PasswordRequest, PasswordResponse } from './domain/model/PasswordHandshake.js';
export { submitResponse, cancelResponse, skipResponse } from './domain/model/PasswordHandshake.js';

// Errors
export { ImportFlowError, OK, fail } from './domain/errors/ImportFlowError.js';
export type { ImportFlowErrorCode, OperationResult } from './domain/errors/ImportFlowError.js';

// Domain services
export { validateProgressUpdate, PERCENTAGE_TOLERANCE } from './domain/services/ProgressValidator.js';
export type { ProgressValidation } from './domain/services/ProgressValidator.js';
export {
  RetryStrategy,
  classifyRetryCategory,
  isRetryableError,
  isRetryableResult,
  classifyResults,
  getRetryFiles,
  buildRetryPlan,
} from './domain/services/RetryPolicy.js';
export type { RetryCategory, RetryPlan, ClassifiedResults } from './domain/services/RetryPolicy.js';
export {
  CompletionAction,
  completionActionLabel,
  buildCompletionReport,
  formatSummaryLine,
  shortErrorMessage,
  getSkipReason,
  getRecoverySuggestions,
} from './domain/services/CompletionReport.js';
export type { CompletionOutcome, CompletionReport } from './domain/services/CompletionReport.js';

// Application
export { Channel } from './application/Channel.js';
export { EventBus } from './application/EventBus.js';
export { ImportListener } from './application/ImportListener.js';
export type { ProgressListenResult, PasswordListenResult } from './application/ImportListener.js';
export { ProgressDisplay, PASSWORD_PAUSE_REASON } from './application/ProgressDisplay.js';
export { PasswordPrompt } from './application/PasswordPrompt.js';
export type { CleanupCallback } from './application/ImportFlowContext.js';
export type { ImportBatchTask } from './application/usecases/ProcessImportBatch.js';
export type { RetryRequestResult } from './application/usecases/RequestRetry.js';
export type { StateInfo } from './application/usecases/GetImportStatus.js';
export { describeStateInfo } from './application/usecases/GetImportStatus.js';

// Ports (for custom implementations)
export type { BatchImportWorker, ImportBatchChannels } from './domain/ports/BatchImportWorker.js';
export type { Sender, Receiver, ReceiveResult, TryReceiveResult } from './domain/ports/Channel.js';
export type { FileSelector, FileSelection } from './domain/ports/FileSelector.js';
export type { Logger, LogContext } from './domain/ports/Logger.js';
export type { PasswordPrompter, PasswordAnswer } from './domain/ports/PasswordPrompter.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  PhaseChangedEvent,
  BatchCompletedEvent,
  ProgressUpdatedEvent,
  ProgressRejectedEvent,
  PasswordRequestedEvent,
  SelectionReturnedEvent,
  MenuReturnedEvent,
  RetryRequestedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure
export { consoleLogger, silentLogger } from './infrastructure/logging/consoleLogger.js';
