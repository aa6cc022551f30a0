import type { ImportJob, ImportResult } from '../model/ImportJob.js';
import type { ImportProgress } from '../model/ImportProgress.js';
import type { ImportSummary } from '../model/ImportSummary.js';
import type { PasswordRequest, PasswordResponse } from '../model/PasswordHandshake.js';
import type { RetryStrategy } from '../services/RetryPolicy.js';
import type { Receiver, Sender } from './Channel.js';

/**
 * The worker's half of the three batch channels.
 *
 * The worker writes progress and password requests, reads password responses,
 * and never touches orchestrator state directly.
 */
export interface ImportBatchChannels {
  /** Progress snapshots. The worker closes it when the batch ends. */
  readonly progress: Sender<ImportProgress>;
  /** Capacity 1. Exactly one request is pushed before each wait on `passwordResponses`. */
  readonly passwordRequests: Sender<PasswordRequest>;
  /** Capacity 1. Closed when the session is cancelled. */
  readonly passwordResponses: Receiver<PasswordResponse>;
  /** Aborted when the session is cancelled. */
  readonly signal: AbortSignal;
}

/**
 * Port for the component that turns keystore files into wallets.
 *
 * Implementations run `importBatch()` as an independent task and must return
 * exactly one `ImportResult` per job, in job order. Every `PasswordRequest`
 * they push is answered by exactly one response, or by the response channel
 * closing.
 */
export interface BatchImportWorker {
  /** Rejects when no job can be created. */
  createImportJobsFromFiles(paths: readonly string[]): Promise<ImportJob[]>;
  /** Rejects when the directory holds no importable keystore. */
  createImportJobsFromDirectory(directory: string): Promise<ImportJob[]>;
  /**
   * Rejects when the list cannot be imported. May resolve with an adjusted
   * list (for example a job downgraded to manual password entry), which then
   * replaces the original.
   */
  validateImportJobs(jobs: readonly ImportJob[]): Promise<readonly ImportJob[] | void>;
  importBatch(jobs: readonly ImportJob[], channels: ImportBatchChannels): Promise<ImportResult[]>;
  getImportSummary(results: readonly ImportResult[]): ImportSummary;
  /**
   * Optional capability: rebuild jobs for a retry. May be absent; callers
   * then fall back to the plain file list of the retry plan.
   */
  createRecoveryJobs?(jobs: readonly ImportJob[], strategy: RetryStrategy): ImportJob[];
}
