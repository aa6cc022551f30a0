import { describe, it, expect } from 'vitest';
import { ProgressDisplay, PASSWORD_PAUSE_REASON } from '../../../src/application/ProgressDisplay.js';
import { makeProgress } from '../../fake-worker.js';

describe('ProgressDisplay', () => {
  it('should mirror an accepted snapshot', () => {
    const display = new ProgressDisplay(4, 0);
    display.apply(makeProgress(1, 4, { currentFile: 'alice' }));

    expect(display.getCurrentFile()).toBe('alice');
    expect(display.getProcessedFiles()).toBe(1);
    expect(display.getPercentage()).toBe(25);
    expect(display.isCompleted()).toBe(false);
    expect(display.isPaused()).toBe(false);
  });

  it('should pause while a snapshot waits for a password and resume afterwards', () => {
    const display = new ProgressDisplay(2, 0);

    display.apply(makeProgress(0, 2, { pendingPassword: true, pendingFile: 'bob' }));
    expect(display.isPaused()).toBe(true);
    expect(display.getPauseReason()).toBe(PASSWORD_PAUSE_REASON);

    display.apply(makeProgress(1, 2));
    expect(display.isPaused()).toBe(false);
    expect(display.getPauseReason()).toBe('');
  });

  it('should separate failed and skipped errors', () => {
    const display = new ProgressDisplay(3, 0);
    display.apply(
      makeProgress(2, 3, {
        errors: [
          { file: '/k/a.json', error: new Error('incorrect password'), skipped: false },
          { file: '/k/b.json', error: new Error('skipped by user'), skipped: true },
        ],
      }),
    );

    expect(display.getErrors()).toHaveLength(2);
    expect(display.getFailedErrors().map((e) => e.file)).toEqual(['/k/a.json']);
    expect(display.getSkippedErrors().map((e) => e.file)).toEqual(['/k/b.json']);
  });

  it('should produce a summary only once completed', () => {
    const display = new ProgressDisplay(3, 0);
    display.apply(
      makeProgress(3, 3, {
        errors: [{ file: '/k/a.json', error: new Error('incorrect password'), skipped: false }],
      }),
    );
    display.complete();

    expect(display.getSummaryText(2_400)).toBe(
      ['Import completed in 2s', 'Total files: 3', 'Successful: 2', 'Failed: 1'].join('\n'),
    );

    display.reset(5, 0);
    expect(display.getSummaryText(0)).toBe('');
    expect(display.getTotalFiles()).toBe(5);
    expect(display.getErrors()).toEqual([]);
  });

  it('should report zero percent with no files', () => {
    expect(new ProgressDisplay().getPercentage()).toBe(0);
  });
});
