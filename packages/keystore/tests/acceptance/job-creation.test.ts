import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BatchImportService } from '../../src/BatchImportService.js';
import { KeystoreErrorType, KeystoreImportError } from '../../src/domain/errors/KeystoreImportError.js';
import { ScanErrorType } from '../../src/domain/model/DiscoveryReport.js';
import { ALICE, BOB, CAROL, FakeDecryptor, makeTempDir, removeDir, writeKeystore } from '../fixtures.js';

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function rejectionOf(promise: Promise<unknown>): Promise<KeystoreImportError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof KeystoreImportError) return error;
    throw error;
  }
  throw new Error('expected a KeystoreImportError');
}

describe('Job creation', () => {
  let dir: string;
  let alice: string;
  let bob: string;
  let carol: string;
  let logger: ReturnType<typeof createLogger>;
  let service: BatchImportService;

  beforeEach(async () => {
    dir = await makeTempDir();
    alice = await writeKeystore(dir, 'alice', ALICE, 'test-password');
    bob = await writeKeystore(dir, 'bob', BOB);
    await writeFile(join(dir, 'broken.json'), '{');
    await writeFile(join(dir, 'notes.txt'), 'not a keystore');
    await mkdir(join(dir, 'nested'));
    carol = await writeKeystore(join(dir, 'nested'), 'carol', CAROL);

    logger = createLogger();
    service = new BatchImportService({ decryptor: new FakeDecryptor(), logger });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('from files', () => {
    it('should create one job per file and pick up password files', async () => {
      const jobs = await service.createImportJobsFromFiles([alice, bob]);

      expect(jobs).toEqual([
        { keystorePath: alice, walletName: 'alice', passwordPath: join(dir, 'alice.pwd'), requiresInput: false },
        { keystorePath: bob, walletName: 'bob', requiresInput: true },
      ]);
    });

    it('should reject an empty list', async () => {
      const error = await rejectionOf(service.createImportJobsFromFiles([]));

      expect(error.type).toBe(KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED);
      expect(error.message).toBe('no keystore files provided');
    });

    it('should reject a missing file', async () => {
      const missing = join(dir, 'missing.json');
      const error = await rejectionOf(service.createImportJobsFromFiles([alice, missing]));

      expect(error.type).toBe(KeystoreErrorType.FILE_NOT_FOUND);
      expect(error.message).toBe(`keystore file not found: ${missing}`);
      expect(error.file).toBe(missing);
    });
  });

  describe('from a directory', () => {
    it('should scan recursively in name order and report invalid files', async () => {
      const scan = await service.scanDirectoryForKeystores(dir);

      expect(scan.keystores).toEqual([alice, bob, carol]);
      expect(scan.errors).toHaveLength(1);
      expect(scan.errors[0]?.path).toBe(join(dir, 'broken.json'));
      expect(scan.errors[0]?.type).toBe(ScanErrorType.INVALID_KEYSTORE);
      expect(scan.errors[0]?.error.message).toBe('invalid keystore format');
    });

    it('should create jobs for every valid keystore', async () => {
      const jobs = await service.createImportJobsFromDirectory(dir);

      expect(jobs.map((job) => job.walletName)).toEqual(['alice', 'bob', 'carol']);
      expect(jobs.map((job) => job.requiresInput)).toEqual([false, true, true]);
    });

    it('should describe the directory before importing', async () => {
      const report = await service.getKeystoreDiscoveryReport(dir);

      expect(report).toMatchObject({
        directoryPath: dir,
        validKeystores: [alice, bob, carol],
        totalFilesFound: 4,
        validFilesCount: 3,
        errorFilesCount: 1,
        passwordFilesFound: 1,
      });
    });

    it('should reject a directory without valid keystores', async () => {
      const empty = join(dir, 'empty');
      await mkdir(empty);
      await writeFile(join(empty, 'broken.json'), '[]');

      const error = await rejectionOf(service.createImportJobsFromDirectory(empty));
      expect(error.type).toBe(KeystoreErrorType.DIRECTORY_SCAN_FAILED);
      expect(error.message).toBe(`no valid keystore files found in directory: ${empty} (found 1 invalid files)`);
    });

    it('should leave out the invalid count when there were none', async () => {
      const empty = join(dir, 'empty');
      await mkdir(empty);

      await expect(service.createImportJobsFromDirectory(empty)).rejects.toThrow(
        `no valid keystore files found in directory: ${empty}`,
      );
    });

    it('should reject unusable directory paths', async () => {
      await expect(service.createImportJobsFromDirectory('')).rejects.toThrow('directory path cannot be empty');
      await expect(service.createImportJobsFromDirectory(join(dir, 'nope'))).rejects.toThrow(
        `directory not found: ${join(dir, 'nope')}`,
      );
      await expect(service.createImportJobsFromDirectory(alice)).rejects.toThrow(`path is not a directory: ${alice}`);
    });
  });

  describe('validation', () => {
    it('should return valid jobs unchanged', async () => {
      const jobs = await service.createImportJobsFromFiles([alice, bob]);

      await expect(service.validateImportJobs(jobs)).resolves.toEqual(jobs);
    });

    it('should reject an empty list', async () => {
      await expect(service.validateImportJobs([])).rejects.toThrow('no import jobs provided');
    });

    it('should name the offending job', async () => {
      const missing = join(dir, 'gone.json');

      await expect(
        service.validateImportJobs([{ keystorePath: '', walletName: 'x', requiresInput: true }]),
      ).rejects.toThrow('job 0: keystore path cannot be empty');
      await expect(
        service.validateImportJobs([
          { keystorePath: alice, walletName: 'alice', requiresInput: true },
          { keystorePath: missing, walletName: 'gone', requiresInput: true },
        ]),
      ).rejects.toThrow(`job 1: keystore file not found: ${missing}`);
      await expect(
        service.validateImportJobs([{ keystorePath: alice, walletName: '', requiresInput: true }]),
      ).rejects.toThrow('job 0: wallet name cannot be empty');
    });

    it('should downgrade a job whose password file is unusable', async () => {
      const passwordPath = join(dir, 'alice.pwd');
      await writeFile(passwordPath, 'x'.repeat(2048));

      const validated = await service.validateImportJobs([
        { keystorePath: alice, walletName: 'alice', passwordPath, requiresInput: false },
      ]);

      expect(validated).toEqual([{ keystorePath: alice, walletName: 'alice', requiresInput: true }]);
      expect(logger.warn).toHaveBeenCalledWith('Password file unusable, falling back to manual input', {
        file: passwordPath,
        reason: 'PASSWORD_FILE_OVERSIZED',
      });
    });
  });
});
