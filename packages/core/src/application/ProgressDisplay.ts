import type { ImportError, ImportProgress } from '../domain/model/ImportProgress.js';

/** Pause reason shown while the worker waits on the password handshake. */
export const PASSWORD_PAUSE_REASON = 'Waiting for password input';

/**
 * View model behind a progress bar. Holds what a renderer needs and nothing
 * about how it is drawn.
 */
export class ProgressDisplay {
  private totalFiles = 0;
  private processedFiles = 0;
  private currentFile = '';
  private errors: ImportError[] = [];
  private completed = false;
  private paused = false;
  private pauseReason = '';
  private startedAt: number;

  constructor(totalFiles = 0, now: number = Date.now()) {
    this.totalFiles = totalFiles;
    this.startedAt = now;
  }

  reset(totalFiles: number, now: number = Date.now()): void {
    this.totalFiles = totalFiles;
    this.processedFiles = 0;
    this.currentFile = '';
    this.errors = [];
    this.completed = false;
    this.paused = false;
    this.pauseReason = '';
    this.startedAt = now;
  }

  /** Mirror an accepted snapshot. */
  apply(progress: ImportProgress): void {
    this.currentFile = progress.currentFile;
    this.processedFiles = progress.processedFiles;
    this.totalFiles = progress.totalFiles;
    this.completed = progress.processedFiles >= progress.totalFiles;
    this.errors = [...progress.errors];

    if (progress.pendingPassword) {
      this.pause(PASSWORD_PAUSE_REASON);
    } else {
      this.resume();
    }
  }

  pause(reason: string): void {
    this.paused = true;
    this.pauseReason = reason;
  }

  resume(): void {
    this.paused = false;
    this.pauseReason = '';
  }

  complete(): void {
    this.completed = true;
    this.paused = false;
    this.pauseReason = '';
    this.currentFile = '';
  }

  getTotalFiles(): number {
    return this.totalFiles;
  }

  getProcessedFiles(): number {
    return this.processedFiles;
  }

  getCurrentFile(): string {
    return this.currentFile;
  }

  /** 0–100. */
  getPercentage(): number {
    if (this.totalFiles === 0) return 0;
    return (this.processedFiles / this.totalFiles) * 100;
  }

  isCompleted(): boolean {
    return this.completed;
  }

  isPaused(): boolean {
    return this.paused;
  }

  getPauseReason(): string {
    return this.pauseReason;
  }

  getErrors(): readonly ImportError[] {
    return [...this.errors];
  }

  getFailedErrors(): readonly ImportError[] {
    return this.errors.filter((e) => !e.skipped);
  }

  getSkippedErrors(): readonly ImportError[] {
    return this.errors.filter((e) => e.skipped);
  }

  /** Multi-line summary, `''` until the display is completed. */
  getSummaryText(now: number = Date.now()): string {
    if (!this.completed) return '';

    const failed = this.getFailedErrors().length;
    const skipped = this.getSkippedErrors().length;
    const seconds = Math.round(Math.max(0, now - this.startedAt) / 1000);

    const lines = [
      `Import completed in ${seconds}s`,
      `Total files: ${this.totalFiles}`,
      `Successful: ${Math.max(0, this.processedFiles - this.errors.length)}`,
    ];
    if (failed > 0) lines.push(`Failed: ${failed}`);
    if (skipped > 0) lines.push(`Skipped: ${skipped}`);
    return lines.join('\n');
  }
}
