import Database from 'better-sqlite3';

type Callback = (this: unknown, error: Error | null, rows?: unknown[]) => void;

interface RunContext {
  readonly lastID: number;
  readonly changes: number;
}

function isCallback(value: unknown): value is Callback {
  return typeof value === 'function';
}

function isBindRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return !(value instanceof Date) && !(value instanceof Uint8Array);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function sanitize(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  return value;
}

/** Strip the trailing callback and make the bind values acceptable to better-sqlite3. */
function splitArgs(params: unknown[]): { args: unknown[]; callback: Callback | undefined } {
  const last = params[params.length - 1];
  const callback = isCallback(last) ? last : undefined;
  const values = callback ? params.slice(0, -1) : params;

  const args = values.map((value) => {
    if (!isBindRecord(value)) return sanitize(value);
    const named: Record<string, unknown> = {};
    for (const [key, bound] of Object.entries(value)) {
      named[/^[$:@]/.test(key) ? key.slice(1) : key] = sanitize(bound);
    }
    return named;
  });
  return { args, callback };
}

/**
 * The slice of the `sqlite3` Database API that Sequelize's sqlite dialect
 * uses, backed by better-sqlite3. Passed as `dialectModule` in tests.
 */
export class SQLite3Wrapper {
  private readonly db: Database.Database;

  constructor(filename: string, mode?: number | Callback, callback?: Callback) {
    const done = isCallback(mode) ? mode : callback;
    this.db = new Database(filename);
    if (done) {
      setTimeout(() => {
        done.call(this, null);
      }, 0);
    }
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);

    let context: RunContext;
    try {
      const info = this.db.prepare(sql).run(...args);
      context = { lastID: Number(info.lastInsertRowid), changes: info.changes };
    } catch (error) {
      if (!callback) throw error;
      callback.call(undefined, toError(error));
      return this;
    }
    callback?.call(context, null);
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);

    let rows: unknown[];
    try {
      const statement = this.db.prepare(sql);
      if (statement.reader) {
        rows = statement.all(...args);
      } else {
        statement.run(...args);
        rows = [];
      }
    } catch (error) {
      if (!callback) throw error;
      callback.call(undefined, toError(error));
      return this;
    }
    callback?.call(undefined, null, rows);
    return this;
  }

  exec(sql: string, callback?: Callback): this {
    let failure: Error | null = null;
    try {
      this.db.exec(sql);
    } catch (error) {
      failure = toError(error);
    }
    callback?.call(undefined, failure);
    return this;
  }

  close(callback?: Callback): void {
    let failure: Error | null = null;
    try {
      if (this.db.open) this.db.close();
    } catch (error) {
      failure = toError(error);
    }
    callback?.call(undefined, failure);
  }

  serialize(callback?: () => void): void {
    callback?.();
  }

  parallelize(callback?: () => void): void {
    callback?.();
  }
}
