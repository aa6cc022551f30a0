// Main entry point
export { BatchImportService, INCORRECT_PASSWORD_MESSAGE, EMPTY_PASSWORD_MESSAGE } from './BatchImportService.js';
export type { BatchImportServiceConfig } from './BatchImportService.js';

// Domain model
export type { KeystoreV3, KeystoreV3Crypto, KdfParams, ScryptParams, Pbkdf2Params } from './domain/model/KeystoreV3.js';
export { ScanErrorType } from './domain/model/DiscoveryReport.js';
export type { DirectoryScanError, DirectoryScanResult, KeystoreDiscoveryReport } from './domain/model/DiscoveryReport.js';

// Errors
export {
  KeystoreErrorType,
  KeystoreImportError,
  isRecoverableErrorType,
  defaultRecoveryHint,
} from './domain/errors/KeystoreImportError.js';
export type { KeystoreImportErrorOptions } from './domain/errors/KeystoreImportError.js';
export { PasswordFileError, PasswordFileErrorType, isPasswordFileErrorRecoverable } from './domain/errors/PasswordFileError.js';
export { PasswordInputError, PasswordInputErrorType } from './domain/errors/PasswordInputError.js';

// Domain services
export { KeystoreValidator } from './domain/services/KeystoreValidator.js';
export {
  ErrorAggregator,
  ErrorCategory,
  UserAction,
  categorizeErrorType,
  retryPriority,
  retryStrategyFor,
  retryDescription,
  successRate,
  failureRate,
  skipRate,
  mostCommonCategory,
  formatErrorReportSummary,
} from './domain/services/ErrorAggregator.js';
export type { AggregatedError, ErrorSummary, ErrorReport, RetryRecommendation } from './domain/services/ErrorAggregator.js';

// Domain ports
export type { KeystoreDecryptor, DecryptedKey } from './domain/ports/KeystoreDecryptor.js';
export type { WalletStore, StoredWallet } from './domain/ports/WalletStore.js';

// Infrastructure adapters
export { InMemoryWalletStore } from './infrastructure/InMemoryWalletStore.js';
export {
  PasswordFileManager,
  passwordFilePathFor,
  MAX_PASSWORD_FILE_BYTES,
  MAX_PASSWORD_LENGTH,
} from './infrastructure/PasswordFileManager.js';
export { formatErrorReportCsv, ERROR_REPORT_COLUMNS } from './infrastructure/formatErrorReportCsv.js';
