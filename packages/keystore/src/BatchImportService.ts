import { readFile, readdir, stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { basename, extname, join } from 'node:path';
import {
  RetryStrategy,
  buildImportSummary,
  consoleLogger,
  createInitialProgress,
  failedResult,
  skippedResult,
  successResult,
  type BatchImportWorker,
  type ImportBatchChannels,
  type ImportError,
  type ImportJob,
  type ImportProgress,
  type ImportResult,
  type ImportSummary,
  type Logger,
  type PasswordRequest,
} from '@keybatch/core';
import type { KeystoreV3 } from './domain/model/KeystoreV3.js';
import type {
  DirectoryScanError,
  DirectoryScanResult,
  KeystoreDiscoveryReport,
} from './domain/model/DiscoveryReport.js';
import type { DecryptedKey, KeystoreDecryptor } from './domain/ports/KeystoreDecryptor.js';
import type { WalletStore } from './domain/ports/WalletStore.js';
import type { ErrorReport, ErrorSummary, RetryRecommendation } from './domain/services/ErrorAggregator.js';
import { ScanErrorType } from './domain/model/DiscoveryReport.js';
import { KeystoreErrorType, KeystoreImportError } from './domain/errors/KeystoreImportError.js';
import { PasswordFileError } from './domain/errors/PasswordFileError.js';
import { PasswordInputError, PasswordInputErrorType } from './domain/errors/PasswordInputError.js';
import { ErrorAggregator, UserAction, retryStrategyFor } from './domain/services/ErrorAggregator.js';
import { KeystoreValidator } from './domain/services/KeystoreValidator.js';
import { InMemoryWalletStore } from './infrastructure/InMemoryWalletStore.js';
import { PasswordFileManager } from './infrastructure/PasswordFileManager.js';

export const INCORRECT_PASSWORD_MESSAGE = 'Incorrect password. Please try again.';
export const EMPTY_PASSWORD_MESSAGE = 'Password cannot be empty. Please enter a valid password.';

/** Configuration for the keystore batch worker. */
export interface BatchImportServiceConfig {
  /** Opens keystores. Cryptography is not part of this package. */
  readonly decryptor: KeystoreDecryptor;
  /** Where imported wallets go. Default: `InMemoryWalletStore`. */
  readonly walletStore?: WalletStore;
  readonly passwordFiles?: PasswordFileManager;
  readonly validator?: KeystoreValidator;
  /** Default: `consoleLogger`. */
  readonly logger?: Logger;
  /** Interactive attempts per keystore. Default: `3`. */
  readonly maxPasswordAttempts?: number;
  /** How long to wait for one password answer. Default: `300000` (5 minutes). */
  readonly passwordTimeoutMs?: number;
  /** How long a progress snapshot may wait for room before it is dropped. Default: `500`. */
  readonly progressSendTimeoutMs?: number;
}

type PasswordOutcome =
  | { readonly ok: true; readonly key: DecryptedKey }
  | { readonly ok: false; readonly error: PasswordInputError };

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function normalizeAddress(address: string): string {
  const lower = address.toLowerCase();
  return lower.startsWith('0x') ? lower : `0x${lower}`;
}

/** `"300s"`, or `"50ms"` below one second. */
function formatTimeout(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;
}

function walletNameFor(keystorePath: string): string {
  const base = basename(keystorePath);
  return base.slice(0, base.length - extname(base).length);
}

/**
 * Keystore implementation of the batch import worker.
 *
 * Turns files or a directory into jobs, then imports them one at a time:
 * the password comes from the job, its `.pwd` file, or the interactive
 * handshake with the orchestrator. Each batch gets a fresh `ErrorAggregator`
 * whose report stays available until the next batch starts.
 *
 * @example
 * ```typescript
 * const worker = new BatchImportService({ decryptor, walletStore: new SequelizeWalletStore(sequelize) });
 * const orchestrator = new ImportOrchestrator({ worker });
 * ```
 */
export class BatchImportService implements BatchImportWorker {
  private readonly decryptor: KeystoreDecryptor;
  private readonly walletStore: WalletStore;
  private readonly passwordFiles: PasswordFileManager;
  private readonly validator: KeystoreValidator;
  private readonly logger: Logger;
  private readonly maxPasswordAttempts: number;
  private readonly passwordTimeoutMs: number;
  private readonly progressSendTimeoutMs: number;
  private aggregator: ErrorAggregator | null = null;

  constructor(config: BatchImportServiceConfig) {
    this.decryptor = config.decryptor;
    this.walletStore = config.walletStore ?? new InMemoryWalletStore();
    this.passwordFiles = config.passwordFiles ?? new PasswordFileManager();
    this.validator = config.validator ?? new KeystoreValidator();
    this.logger = config.logger ?? consoleLogger;
    this.maxPasswordAttempts = config.maxPasswordAttempts ?? 3;
    this.passwordTimeoutMs = config.passwordTimeoutMs ?? 300_000;
    this.progressSendTimeoutMs = config.progressSendTimeoutMs ?? 500;
  }

  async createImportJobsFromFiles(paths: readonly string[]): Promise<ImportJob[]> {
    if (paths.length === 0) {
      throw new KeystoreImportError(KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED, 'no keystore files provided', {
        recoveryHint: 'select_files_or_directory',
      });
    }

    const jobs: ImportJob[] = [];
    for (const keystorePath of paths) {
      try {
        await stat(keystorePath);
      } catch (error) {
        const message = isMissing(error)
          ? `keystore file not found: ${keystorePath}`
          : `cannot access keystore file ${keystorePath}: ${asError(error).message}`;
        throw new KeystoreImportError(KeystoreErrorType.FILE_NOT_FOUND, message, { file: keystorePath, cause: error });
      }

      const passwordPath = await this.findPasswordFile(keystorePath);
      jobs.push({
        keystorePath,
        walletName: walletNameFor(keystorePath),
        ...(passwordPath === null ? {} : { passwordPath }),
        requiresInput: passwordPath === null,
      });
    }
    return jobs;
  }

  async createImportJobsFromDirectory(directory: string): Promise<ImportJob[]> {
    await this.requireDirectory(directory);

    const { keystores, errors } = await this.scanDirectoryForKeystores(directory);
    if (keystores.length === 0) {
      const suffix = errors.length > 0 ? ` (found ${errors.length} invalid files)` : '';
      throw new KeystoreImportError(
        KeystoreErrorType.DIRECTORY_SCAN_FAILED,
        `no valid keystore files found in directory: ${directory}${suffix}`,
        { file: directory },
      );
    }
    return this.createImportJobsFromFiles(keystores);
  }

  /**
   * Walk `directory` recursively in name order. Every `.json` file is read and
   * validated; unreadable paths and invalid keystores are reported, not thrown.
   */
  async scanDirectoryForKeystores(directory: string): Promise<DirectoryScanResult> {
    const keystores: string[] = [];
    const errors: DirectoryScanError[] = [];

    try {
      await this.walk(directory, keystores, errors, true);
    } catch (error) {
      throw new KeystoreImportError(KeystoreErrorType.DIRECTORY_SCAN_FAILED, `directory walk failed: ${directory}`, {
        file: directory,
        cause: error,
      });
    }
    return { keystores, errors };
  }

  async getKeystoreDiscoveryReport(directory: string): Promise<KeystoreDiscoveryReport> {
    const { keystores, errors } = await this.scanDirectoryForKeystores(directory);

    let passwordFilesFound = 0;
    for (const keystorePath of keystores) {
      if ((await this.findPasswordFile(keystorePath)) !== null) passwordFilesFound++;
    }

    return {
      directoryPath: directory,
      validKeystores: keystores,
      scanErrors: errors,
      totalFilesFound: keystores.length + errors.length,
      validFilesCount: keystores.length,
      errorFilesCount: errors.length,
      passwordFilesFound,
    };
  }

  /**
   * Rejects on the first unusable job. A job whose password file fails
   * validation is not an error: it comes back downgraded to manual input.
   */
  async validateImportJobs(jobs: readonly ImportJob[]): Promise<ImportJob[]> {
    if (jobs.length === 0) {
      throw new KeystoreImportError(KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED, 'no import jobs provided', {
        recoveryHint: 'select_files_or_directory',
      });
    }

    const validated: ImportJob[] = [];
    for (const [index, job] of jobs.entries()) {
      if (job.keystorePath === '') {
        throw new KeystoreImportError(
          KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED,
          `job ${index}: keystore path cannot be empty`,
          { recoveryHint: 'provide_valid_keystore_path' },
        );
      }

      try {
        await stat(job.keystorePath);
      } catch (error) {
        const message = isMissing(error)
          ? `job ${index}: keystore file not found: ${job.keystorePath}`
          : `job ${index}: cannot access keystore file ${job.keystorePath}: ${asError(error).message}`;
        throw new KeystoreImportError(KeystoreErrorType.FILE_NOT_FOUND, message, {
          file: job.keystorePath,
          recoveryHint: isMissing(error) ? 'select_existing_keystore_file' : 'fix_file_permissions',
          cause: error,
        });
      }

      if (job.walletName === '') {
        throw new KeystoreImportError(
          KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED,
          `job ${index}: wallet name cannot be empty`,
          { file: job.keystorePath, recoveryHint: 'provide_wallet_name' },
        );
      }

      validated.push(await this.checkPasswordFile(job));
    }
    return validated;
  }

  async importBatch(jobs: readonly ImportJob[], channels: ImportBatchChannels): Promise<ImportResult[]> {
    const startTime = Date.now();
    const aggregator = new ErrorAggregator(jobs.length, startTime);
    this.aggregator = aggregator;

    if (jobs.length === 0) {
      channels.progress.close();
      return [];
    }

    const total = jobs.length;
    const results: ImportResult[] = [];
    const errors: ImportError[] = [];
    let progress: ImportProgress = createInitialProgress(total, startTime);
    await this.sendProgress(channels, progress);

    for (const [index, job] of jobs.entries()) {
      progress = {
        ...progress,
        currentFile: basename(job.keystorePath),
        processedFiles: index,
        percentage: (index / total) * 100,
        elapsedMs: Date.now() - startTime,
      };
      await this.sendProgress(channels, progress);

      const result = await this.importJob(job, channels, progress);
      results.push(result);

      if (result.success) {
        aggregator.addSuccess();
      } else {
        const error = result.error ?? new Error('Unknown error');
        aggregator.addError(error, job.keystorePath, result.skipped ? UserAction.SKIP : UserAction.NONE);
        errors.push({ file: job.keystorePath, error, skipped: result.skipped });
        progress = { ...progress, errors: [...errors] };
      }
    }

    await this.sendProgress(channels, {
      ...progress,
      currentFile: '',
      processedFiles: total,
      percentage: 100,
      pendingPassword: false,
      pendingFile: '',
      elapsedMs: Date.now() - startTime,
    });
    channels.progress.close();
    return results;
  }

  getImportSummary(results: readonly ImportResult[]): ImportSummary {
    return buildImportSummary(results);
  }

  /** Report for the last batch, or `null` before the first one. */
  getErrorReport(): ErrorReport | null {
    return this.aggregator?.generateErrorReport() ?? null;
  }

  getErrorSummary(): ErrorSummary | null {
    return this.aggregator?.getErrorSummary() ?? null;
  }

  getRetryRecommendations(): RetryRecommendation[] {
    return this.aggregator?.getRetryRecommendations() ?? [];
  }

  hasRecoverableErrors(): boolean {
    return (this.aggregator?.getRecoverableErrors().length ?? 0) > 0;
  }

  /**
   * Rebuild jobs for a retry. `manual_passwords` always prompts; otherwise a
   * job prompts when its last error is one that manual input fixes.
   */
  createRecoveryJobs(jobs: readonly ImportJob[], strategy: RetryStrategy): ImportJob[] {
    const manualFiles = new Set(
      (this.aggregator?.getRecoverableErrors() ?? [])
        .filter((entry) => retryStrategyFor(entry.errorType) === 'manual_password_input')
        .map((entry) => entry.file),
    );

    return jobs.map((job) => {
      if (strategy === RetryStrategy.MANUAL_PASSWORDS || manualFiles.has(job.keystorePath)) {
        return { keystorePath: job.keystorePath, walletName: job.walletName, requiresInput: true };
      }
      return job;
    });
  }

  private async requireDirectory(directory: string): Promise<void> {
    if (directory === '') {
      throw new KeystoreImportError(KeystoreErrorType.DIRECTORY_SCAN_FAILED, 'directory path cannot be empty');
    }

    let info: Stats;
    try {
      info = await stat(directory);
    } catch (error) {
      const message = isMissing(error)
        ? `directory not found: ${directory}`
        : `cannot access directory ${directory}: ${asError(error).message}`;
      throw new KeystoreImportError(KeystoreErrorType.DIRECTORY_SCAN_FAILED, message, { file: directory, cause: error });
    }

    if (!info.isDirectory()) {
      throw new KeystoreImportError(KeystoreErrorType.DIRECTORY_SCAN_FAILED, `path is not a directory: ${directory}`, {
        file: directory,
      });
    }
  }

  private async walk(dir: string, keystores: string[], errors: DirectoryScanError[], root: boolean): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (root) throw error;
      errors.push({ path: dir, type: ScanErrorType.ACCESS_ERROR, error: new Error('access error', { cause: error }) });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(path, keystores, errors, false);
        continue;
      }
      if (!entry.isFile() || extname(entry.name).toLowerCase() !== '.json') continue;

      let text: string;
      try {
        text = await readFile(path, 'utf-8');
      } catch (error) {
        errors.push({ path, type: ScanErrorType.READ_FAILURE, error: asError(error) });
        continue;
      }

      try {
        this.validator.validateKeystoreV3(text);
        keystores.push(path);
      } catch (error) {
        errors.push({
          path,
          type: ScanErrorType.INVALID_KEYSTORE,
          error: new Error('invalid keystore format', { cause: error }),
        });
      }
    }
  }

  /** Path of the keystore's `.pwd` file, or `null` when it has none. */
  private async findPasswordFile(keystorePath: string): Promise<string | null> {
    try {
      return await this.passwordFiles.findPasswordFile(keystorePath);
    } catch (error) {
      if (error instanceof PasswordFileError) return null;
      throw error;
    }
  }

  private async checkPasswordFile(job: ImportJob): Promise<ImportJob> {
    if (job.passwordPath === undefined || job.passwordPath === '') return job;

    try {
      await this.passwordFiles.validatePasswordFile(job.passwordPath);
      return job;
    } catch (error) {
      if (!(error instanceof PasswordFileError)) throw error;
      this.logger.warn('Password file unusable, falling back to manual input', {
        file: job.passwordPath,
        reason: error.type,
      });
      return { ...job, passwordPath: undefined, requiresInput: true };
    }
  }

  private async importJob(job: ImportJob, channels: ImportBatchChannels, progress: ImportProgress): Promise<ImportResult> {
    if (channels.signal.aborted) {
      return skippedResult(
        job,
        new PasswordInputError(PasswordInputErrorType.CANCELLED, 'import cancelled', job.keystorePath),
      );
    }

    let keystore: KeystoreV3;
    try {
      keystore = this.validator.validateKeystoreV3(await readFile(job.keystorePath, 'utf-8'));
    } catch (error) {
      if (error instanceof KeystoreImportError) return failedResult(job, error);
      return failedResult(
        job,
        new KeystoreImportError(KeystoreErrorType.FILE_NOT_FOUND, `cannot read keystore file: ${job.keystorePath}`, {
          file: job.keystorePath,
          cause: error,
        }),
      );
    }

    const known = await this.knownPassword(job);
    let key: DecryptedKey;
    if (known !== null) {
      try {
        key = await this.decryptor.decrypt(keystore, known);
      } catch (error) {
        return failedResult(
          job,
          new KeystoreImportError(KeystoreErrorType.INCORRECT_PASSWORD, 'keystore import failed: incorrect password', {
            file: job.keystorePath,
            cause: error,
          }),
        );
      }
    } else {
      const outcome = await this.requestPassword(job, keystore, channels, progress);
      if (!outcome.ok) {
        return outcome.error.isUserAction() ? skippedResult(job, outcome.error) : failedResult(job, outcome.error);
      }
      key = outcome.key;
    }

    return this.storeWallet(job, keystore, key);
  }

  /** The job's own password, else its `.pwd` file's; `null` means ask the user. */
  private async knownPassword(job: ImportJob): Promise<string | null> {
    if (job.manualPassword !== undefined && job.manualPassword !== '') return job.manualPassword;
    if (job.passwordPath === undefined || job.passwordPath === '') return null;

    try {
      return await this.passwordFiles.readPasswordFile(job.passwordPath);
    } catch (error) {
      if (!(error instanceof PasswordFileError)) throw error;
      this.logger.debug('Password file unreadable, asking for the password', {
        file: job.passwordPath,
        reason: error.type,
      });
      return null;
    }
  }

  /** Drop answers left in the response slot after an earlier request timed out. */
  private discardStaleAnswers(channels: ImportBatchChannels, file: string): void {
    let stale = channels.passwordResponses.tryReceive();
    while (stale.kind === 'value') {
      this.logger.debug('Discarded a password answer given after its request timed out', { file });
      stale = channels.passwordResponses.tryReceive();
    }
  }

  private async requestPassword(
    job: ImportJob,
    keystore: KeystoreV3,
    channels: ImportBatchChannels,
    progress: ImportProgress,
  ): Promise<PasswordOutcome> {
    const file = job.keystorePath;
    const failure = (type: PasswordInputErrorType, message: string): PasswordOutcome => ({
      ok: false,
      error: new PasswordInputError(type, message, file),
    });

    let previous: string | undefined;
    for (let attempt = 1; attempt <= this.maxPasswordAttempts; attempt++) {
      await this.sendProgress(channels, { ...progress, pendingPassword: true, pendingFile: basename(file) });

      const request: PasswordRequest = {
        keystoreFile: file,
        attemptCount: attempt,
        isRetry: attempt > 1,
        ...(previous === undefined ? {} : { errorMessage: previous }),
      };
      this.discardStaleAnswers(channels, file);
      if (!channels.passwordRequests.trySend(request)) {
        return failure(PasswordInputErrorType.TIMEOUT, 'failed to send password request - communication error');
      }

      const received = await channels.passwordResponses.receive(this.passwordTimeoutMs);
      await this.sendProgress(channels, { ...progress, pendingPassword: false, pendingFile: '' });

      if (received.kind === 'timeout') {
        return failure(
          PasswordInputErrorType.TIMEOUT,
          `password input timeout after ${formatTimeout(this.passwordTimeoutMs)}`,
        );
      }
      if (received.kind === 'closed' || received.value.cancelled) {
        return failure(PasswordInputErrorType.CANCELLED, 'password input cancelled by user');
      }
      if (received.value.skip) {
        return failure(PasswordInputErrorType.SKIPPED, 'import skipped by user');
      }

      const password = received.value.password;
      if (password === '') {
        if (attempt === this.maxPasswordAttempts) {
          return failure(PasswordInputErrorType.INVALID, 'empty password provided');
        }
        previous = EMPTY_PASSWORD_MESSAGE;
        continue;
      }

      try {
        return { ok: true, key: await this.decryptor.decrypt(keystore, password) };
      } catch (error) {
        this.logger.debug('Password attempt rejected', { file, attempt, error: asError(error).message });
        previous = INCORRECT_PASSWORD_MESSAGE;
      }
    }

    return failure(
      PasswordInputErrorType.MAX_ATTEMPTS_EXCEEDED,
      `incorrect password after ${this.maxPasswordAttempts} attempts`,
    );
  }

  private async storeWallet(job: ImportJob, keystore: KeystoreV3, key: DecryptedKey): Promise<ImportResult> {
    const address = normalizeAddress(key.address);
    if (address !== normalizeAddress(keystore.address)) {
      return failedResult(
        job,
        new KeystoreImportError(
          KeystoreErrorType.ADDRESS_MISMATCH,
          `decrypted address ${address} does not match keystore address ${normalizeAddress(keystore.address)}`,
          { file: job.keystorePath },
        ),
      );
    }

    if ((await this.walletStore.findByAddress(address)) !== null) {
      return failedResult(
        job,
        new KeystoreImportError(KeystoreErrorType.DUPLICATE_WALLET, `wallet already exists: ${address}`, {
          file: job.keystorePath,
        }),
      );
    }

    try {
      await this.walletStore.saveWallet({
        address,
        name: job.walletName,
        keystorePath: job.keystorePath,
        importedAt: Date.now(),
      });
    } catch (error) {
      return failedResult(
        job,
        new KeystoreImportError(KeystoreErrorType.BATCH_IMPORT_FAILED, `failed to save wallet: ${asError(error).message}`, {
          file: job.keystorePath,
          cause: error,
        }),
      );
    }

    return successResult(job, { name: job.walletName, address });
  }

  private async sendProgress(channels: ImportBatchChannels, progress: ImportProgress): Promise<void> {
    const delivered = await channels.progress.send(progress, this.progressSendTimeoutMs);
    if (!delivered) {
      this.logger.warn('Progress update dropped', {
        file: progress.currentFile,
        percentage: Number(progress.percentage.toFixed(1)),
      });
    }
  }
}
