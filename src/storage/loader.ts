import type BetterSqlite3 from 'better-sqlite3';

import { debug, notice } from '../shared/debug.js';
import { err, ok, pipelineError, type Result } from '../shared/result.js';
import type { EdgeRecord, NodeRecord, Table } from '../shared/types.js';
import type { Connection } from './connection.js';

/**
 * Rows per INSERT statement. Keeps the bound-parameter count of the widest
 * statement (edges, three columns) under SQLite's legacy 999 limit.
 */
export const INSERT_BATCH_SIZE = 250;

export interface PushSummary {
  nodes: number;
  edges: number;
}

/**
 * Destination table and the column values each row contributes, in
 * column order.
 */
interface InsertTarget<Row> {
  table: string;
  columns: readonly string[];
  values: (row: Row) => unknown[];
}

const NODE_TARGET: InsertTarget<NodeRecord> = {
  table: 'GephiNode',
  columns: ['nodeLabel'],
  values: (row) => [row.nodeLabel],
};

const EDGE_TARGET: InsertTarget<EdgeRecord> = {
  table: 'GephiEdges',
  columns: ['source', 'target', 'type'],
  values: (row) => [row.source, row.target, row.type],
};

function buildInsertSql(table: string, columns: readonly string[], rowCount: number): string {
  const tuple = `(${columns.map(() => '?').join(', ')})`;
  const tuples = Array.from({ length: rowCount }, () => tuple).join(', ');
  return `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${tuples}`;
}

/**
 * Writes `rows` in multi-row INSERT statements of at most INSERT_BATCH_SIZE
 * rows. The full-size statement is prepared once and reused.
 */
function insertBatched<Row>(
  db: BetterSqlite3.Database,
  target: InsertTarget<Row>,
  rows: Table<Row>,
): number {
  let fullBatch: BetterSqlite3.Statement | null = null;
  let inserted = 0;

  for (let start = 0; start < rows.length; start += INSERT_BATCH_SIZE) {
    const batch = rows.slice(start, start + INSERT_BATCH_SIZE);

    let stmt: BetterSqlite3.Statement;
    if (batch.length === INSERT_BATCH_SIZE) {
      if (fullBatch === null) {
        fullBatch = db.prepare(buildInsertSql(target.table, target.columns, INSERT_BATCH_SIZE));
      }
      stmt = fullBatch;
    } else {
      stmt = db.prepare(buildInsertSql(target.table, target.columns, batch.length));
    }

    inserted += stmt.run(...batch.flatMap(target.values)).changes;
  }

  return inserted;
}

/**
 * Inserts nodes into GephiNode and edges into GephiEdges inside a single
 * transaction and commits.
 *
 * On any database error nothing is committed: the failure is logged and
 * returned as an InsertError with the transaction still open, and the caller
 * is expected to `rollback` the connection.
 *
 * Refuses to start while a transaction is already open, since committing it
 * would also commit whatever was written before.
 */
export function push(
  connection: Connection,
  nodes: Table<NodeRecord>,
  edges: Table<EdgeRecord>,
): Result<PushSummary> {
  const { db } = connection;

  if (connection.inTransaction) {
    const error = pipelineError(
      'InsertError',
      'Error pushing data to the database',
      'transaction already open; roll back first',
    );
    notice('load', error.message);
    return err(error);
  }

  let summary: PushSummary;
  try {
    db.exec('BEGIN');

    summary = {
      nodes: insertBatched(db, NODE_TARGET, nodes),
      edges: insertBatched(db, EDGE_TARGET, edges),
    };

    db.exec('COMMIT');
  } catch (cause) {
    const error = pipelineError('InsertError', 'Error pushing data to the database', cause);
    notice('load', error.message, { inTransaction: connection.inTransaction });
    return err(error);
  }

  debug('load', 'Data pushed successfully', { ...summary });
  return ok(summary);
}
