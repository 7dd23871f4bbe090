import Database from 'better-sqlite3';
import { join } from 'node:path';

import { debug, notice } from '../shared/debug.js';
import { err, ok, pipelineError, type Result } from '../shared/result.js';
import {
  ConnectionConfigSchema,
  type ConnectionConfig,
  type ConnectionConfigInput,
} from '../shared/types.js';

/**
 * Busy timeout in milliseconds applied to every connection.
 * Must be >= 5000ms to ride out a concurrent writer holding the lock.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

export const IN_MEMORY_ENDPOINT = ':memory:';

/**
 * A single open session against the taxonomy store.
 *
 * The caller that obtained it from `connect` owns it and must call `close()`
 * once the pipeline has finished or failed.
 */
export interface Connection {
  db: Database.Database;
  readonly path: string;
  readonly inTransaction: boolean;
  close(): void;
}

/**
 * Resolves the database file for a configuration: `<ENDPOINT>/<DBNAME>.db`,
 * or an in-memory database when ENDPOINT is ':memory:'.
 */
export function resolveDbPath(config: ConnectionConfig): string {
  if (config.ENDPOINT === IN_MEMORY_ENDPOINT) {
    return IN_MEMORY_ENDPOINT;
  }
  return join(config.ENDPOINT, `${config.DBNAME}.db`);
}

/**
 * Opens the database file without creating it.
 */
function openFile(path: string): Result<Database.Database> {
  try {
    return ok(new Database(path, { fileMustExist: path !== IN_MEMORY_ENDPOINT }));
  } catch (cause) {
    const error = pipelineError(
      'ConnectionError',
      `Error connecting to the database at ${path}`,
      cause,
    );
    notice('db', error.message);
    return err(error);
  }
}

/**
 * Opens a connection to the store described by `config`.
 *
 * Never throws. Invalid configuration and connection failures are logged and
 * returned as a ConnectionError. The database file must already exist --
 * creating the taxonomy schema is not this tool's job.
 */
export function connect(config: ConnectionConfigInput): Result<Connection> {
  const parsed = ConnectionConfigSchema.safeParse(config);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    const error = pipelineError(
      'ConnectionError',
      'Invalid connection configuration',
      fields,
    );
    notice('db', error.message);
    return err(error);
  }

  const path = resolveDbPath(parsed.data);

  const opened = openFile(path);
  if (!opened.ok) {
    return opened;
  }
  const db = opened.value;

  try {
    // busy_timeout and foreign_keys are per-connection, must set every time
    db.pragma(`busy_timeout = ${DEFAULT_BUSY_TIMEOUT}`);
    db.pragma('foreign_keys = ON');
  } catch (cause) {
    db.close();
    const error = pipelineError('ConnectionError', `Error configuring ${path}`, cause);
    notice('db', error.message);
    return err(error);
  }

  debug('db', 'Database connection established', {
    path,
    user: parsed.data.USER,
    port: parsed.data.PORT,
  });

  return ok({
    db,
    path,

    get inTransaction(): boolean {
      return db.open && db.inTransaction;
    },

    close(): void {
      if (!db.open) {
        return;
      }
      // SQLite discards any transaction still open at close
      db.close();
      debug('db', 'Database connection closed', { path });
    },
  });
}

/**
 * Aborts the connection's open transaction, if any.
 *
 * Best effort: a failure is logged, not raised.
 */
export function rollback(connection: Connection): void {
  if (!connection.inTransaction) {
    debug('db', 'Rollback skipped, no open transaction');
    return;
  }

  try {
    connection.db.exec('ROLLBACK');
    debug('db', 'Transaction rolled back');
  } catch (cause) {
    const error = pipelineError('QueryError', 'Error rolling back the database', cause);
    notice('db', error.message);
  }
}
