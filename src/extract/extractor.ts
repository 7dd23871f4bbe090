/**
 * Read-only queries against the taxonomy store.
 *
 * Every function takes an open Connection and returns a Result; a failing
 * query is logged at the call site and handed back as a QueryError.
 */

import { z } from 'zod';

import { debug, debugTimed, notice } from '../shared/debug.js';
import { err, ok, pipelineError, type Result } from '../shared/result.js';
import { TaxonomyRowSchema, type Table, type TaxonomyRow } from '../shared/types.js';
import type { Connection } from '../storage/connection.js';

const LIST_TABLES_SQL = `
  SELECT name FROM sqlite_master
  WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
  ORDER BY name
`;

const SERVER_VERSION_SQL = 'SELECT sqlite_version()';

/**
 * Active sub-topics with their topic and macro-topic. A row is returned only
 * when all three records are active (Status = 0).
 *
 * Always a full extraction; there is no watermark for incremental pulls.
 */
export const PULL_TAXONOMY_SQL = `
  SELECT
    s.name AS SubTopic,
    t.name AS Topic,
    m.name AS MacroTopic
  FROM qnaSubtopic s
  JOIN Topic t ON s.topicid = t.id
  JOIN Macrotopic m ON t.macrotopicid = m.id
  WHERE s.Status = 0 AND t.Status = 0 AND m.Status = 0
  ORDER BY m.id, t.id, s.id
`;

function queryFailed(context: string, cause: unknown): Result<never> {
  const error = pipelineError('QueryError', context, cause);
  notice('extract', error.message);
  return err(error);
}

/**
 * Lists the user tables in the store, sorted by name.
 */
export function listTables(connection: Connection): Result<string[]> {
  try {
    const names = connection.db.prepare(LIST_TABLES_SQL).pluck().all();
    return ok(z.array(z.string()).parse(names));
  } catch (cause) {
    return queryFailed('Error listing tables', cause);
  }
}

/**
 * Returns the database engine's version string, e.g. "SQLite 3.46.1".
 */
export function serverVersion(connection: Connection): Result<string> {
  try {
    const version = connection.db.prepare(SERVER_VERSION_SQL).pluck().get();
    return ok(`SQLite ${z.string().parse(version)}`);
  } catch (cause) {
    return queryFailed('Error reading the server version', cause);
  }
}

/**
 * Pulls every active (sub-topic, topic, macro-topic) triple.
 *
 * No matching rows is not an error: the result is an empty table and an
 * informational log line.
 */
export function pullTaxonomy(connection: Connection): Result<Table<TaxonomyRow>> {
  let rows: TaxonomyRow[];
  try {
    rows = debugTimed('extract', 'Pulled taxonomy', () =>
      z.array(TaxonomyRowSchema).parse(connection.db.prepare(PULL_TAXONOMY_SQL).all()),
    );
  } catch (cause) {
    return queryFailed('Error fetching the taxonomy', cause);
  }

  if (rows.length > 0) {
    debug('extract', 'Data fetched successfully', { rows: rows.length });
  } else {
    notice('extract', 'No data in the taxonomy tables');
  }

  return ok(rows);
}

/**
 * Logs each row of a result, one debug line per row.
 */
export function logRows(rows: Table<object>): void {
  for (const row of rows) {
    debug('extract', 'Row', { row });
  }
}
