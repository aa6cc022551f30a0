import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { PasswordFileError, PasswordFileErrorType } from '../domain/errors/PasswordFileError.js';

/** Upper bound for a `.pwd` file on disk. */
export const MAX_PASSWORD_FILE_BYTES = 1024;
/** Upper bound for a password, in characters. */
export const MAX_PASSWORD_LENGTH = 256;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/** `<dir>/<name>.json` → `<dir>/<name>.pwd`. */
export function passwordFilePathFor(keystorePath: string): string {
  const base = basename(keystorePath);
  return join(dirname(keystorePath), `${base.slice(0, base.length - extname(base).length)}.pwd`);
}

/**
 * Finds and reads the `.pwd` file stored next to a keystore.
 *
 * A password file holds a single UTF-8 password; surrounding whitespace,
 * including the trailing newline, is ignored.
 */
export class PasswordFileManager {
  /** Resolve the password file path for a keystore. Rejects when there is none. */
  async findPasswordFile(keystorePath: string): Promise<string> {
    if (keystorePath === '') {
      throw new PasswordFileError(PasswordFileErrorType.INVALID, '', 'Keystore path cannot be empty', {
        recoverable: true,
        recoveryHint: 'provide_valid_keystore_path',
      });
    }

    const passwordPath = passwordFilePathFor(keystorePath);
    try {
      await stat(passwordPath);
    } catch (error) {
      if (isMissing(error)) {
        throw new PasswordFileError(
          PasswordFileErrorType.NOT_FOUND,
          passwordPath,
          `Password file not found: ${passwordPath}`,
          { recoveryHint: 'create_password_file_or_manual_input', cause: error },
        );
      }
      throw new PasswordFileError(
        PasswordFileErrorType.UNREADABLE,
        passwordPath,
        `Cannot access password file: ${passwordPath}`,
        { recoveryHint: 'fix_file_permissions', cause: error },
      );
    }
    return passwordPath;
  }

  /** A regular file of 1 to `MAX_PASSWORD_FILE_BYTES` bytes. */
  async validatePasswordFile(passwordPath: string): Promise<void> {
    if (passwordPath === '') {
      throw new PasswordFileError(PasswordFileErrorType.INVALID, '', 'Password file path cannot be empty');
    }

    let info: Stats;
    try {
      info = await stat(passwordPath);
    } catch (error) {
      if (isMissing(error)) {
        throw new PasswordFileError(PasswordFileErrorType.NOT_FOUND, passwordPath, `Password file not found: ${passwordPath}`, {
          cause: error,
        });
      }
      throw new PasswordFileError(
        PasswordFileErrorType.UNREADABLE,
        passwordPath,
        `Cannot access password file: ${passwordPath}`,
        { cause: error },
      );
    }

    if (!info.isFile()) {
      throw new PasswordFileError(
        PasswordFileErrorType.INVALID,
        passwordPath,
        `Password file is not a regular file: ${passwordPath}`,
      );
    }
    if (info.size > MAX_PASSWORD_FILE_BYTES) {
      throw new PasswordFileError(
        PasswordFileErrorType.OVERSIZED,
        passwordPath,
        `Password file is too large (max ${MAX_PASSWORD_FILE_BYTES} bytes): ${passwordPath}`,
      );
    }
    if (info.size === 0) {
      throw new PasswordFileError(PasswordFileErrorType.EMPTY, passwordPath, `Password file is empty: ${passwordPath}`);
    }
  }

  async readPasswordFile(passwordPath: string): Promise<string> {
    if (passwordPath === '') {
      throw new PasswordFileError(PasswordFileErrorType.INVALID, '', 'Password file path cannot be empty', {
        recoverable: true,
        recoveryHint: 'provide_valid_password_file_path',
      });
    }

    await this.validatePasswordFile(passwordPath);

    let content: Buffer;
    try {
      content = await readFile(passwordPath);
    } catch (error) {
      throw new PasswordFileError(
        PasswordFileErrorType.UNREADABLE,
        passwordPath,
        `Failed to read password file: ${passwordPath}`,
        { recoverable: true, recoveryHint: 'fix_file_permissions_or_manual_input', cause: error },
      );
    }

    let text: string;
    try {
      text = utf8.decode(content);
    } catch (error) {
      throw new PasswordFileError(
        PasswordFileErrorType.CORRUPTED,
        passwordPath,
        `Password file contains invalid UTF-8 encoding: ${passwordPath}`,
        { recoverable: false, recoveryHint: 'recreate_password_file', cause: error },
      );
    }

    const password = text.trim();
    if (password === '') {
      throw new PasswordFileError(PasswordFileErrorType.EMPTY, passwordPath, `Password file is empty: ${passwordPath}`, {
        recoverable: true,
        recoveryHint: 'add_password_to_file_or_manual_input',
      });
    }
    return password;
  }

  async getPasswordForKeystore(keystorePath: string): Promise<string> {
    return this.readPasswordFile(await this.findPasswordFile(keystorePath));
  }

  /** `true` unless a readable, non-empty password file sits next to the keystore. */
  async requiresManualPassword(keystorePath: string): Promise<boolean> {
    try {
      await this.getPasswordForKeystore(keystorePath);
      return false;
    } catch (error) {
      if (error instanceof PasswordFileError) return true;
      throw error;
    }
  }

  validatePasswordLength(password: string): void {
    if ([...password].length > MAX_PASSWORD_LENGTH) {
      throw new PasswordFileError(
        PasswordFileErrorType.INVALID,
        '',
        `Password is too long (max ${MAX_PASSWORD_LENGTH} characters)`,
      );
    }
  }
}
