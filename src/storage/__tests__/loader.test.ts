import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { push, INSERT_BATCH_SIZE } from '../loader.js';
import { connect, rollback } from '../connection.js';
import type { Connection } from '../connection.js';
import type { EdgeRecord, NodeRecord } from '../../shared/types.js';
import {
  countRows,
  createTempStore,
  rejectEdgesTo,
  withStore,
} from '../../__tests__/test-utils.js';

const NODES: NodeRecord[] = [
  { nodeLabel: 'A' },
  { nodeLabel: 'D' },
  { nodeLabel: 'B' },
  { nodeLabel: 'C' },
];

const EDGES: EdgeRecord[] = [
  { source: 'C', target: 'B', type: 'undirected' },
  { source: 'B', target: 'A', type: 'undirected' },
  { source: 'C', target: 'B', type: 'undirected' },
  { source: 'B', target: 'D', type: 'undirected' },
];

describe('push', () => {
  let dbPath: string;
  let cleanup: () => void;
  let connection: Connection;

  beforeEach(() => {
    const store = createTempStore();
    ({ dbPath, cleanup } = store);
    const result = connect(store.config);
    if (!result.ok) throw new Error(result.error.message);
    connection = result.value;
  });

  afterEach(() => {
    connection.close();
    cleanup();
  });

  it('writes nodes and edges and commits', () => {
    const result = push(connection, NODES, EDGES);

    expect(result).toEqual({ ok: true, value: { nodes: 4, edges: 4 } });
    expect(connection.inTransaction).toBe(false);

    const stored = withStore(dbPath, (db) => ({
      nodes: db.prepare('SELECT nodeLabel FROM GephiNode ORDER BY rowid').pluck().all(),
      edges: db.prepare('SELECT source, target, type FROM GephiEdges ORDER BY rowid').all(),
    }));
    expect(stored.nodes).toEqual(['A', 'D', 'B', 'C']);
    expect(stored.edges).toEqual(EDGES);
  });

  it('commits empty tables without error', () => {
    expect(push(connection, [], [])).toEqual({ ok: true, value: { nodes: 0, edges: 0 } });
    expect(connection.inTransaction).toBe(false);
  });

  it('splits large tables across batches', () => {
    const count = INSERT_BATCH_SIZE * 2 + 7;
    const nodes = Array.from({ length: count }, (_, i) => ({ nodeLabel: `node-${i}` }));
    const edges = nodes.map(
      (n): EdgeRecord => ({ source: 'root', target: n.nodeLabel, type: 'undirected' }),
    );

    const result = push(connection, nodes, edges);

    expect(result).toEqual({ ok: true, value: { nodes: count, edges: count } });
    expect(countRows(dbPath, 'GephiNode')).toBe(count);
    expect(countRows(dbPath, 'GephiEdges')).toBe(count);
    const last = withStore(dbPath, (db) =>
      db.prepare('SELECT target FROM GephiEdges ORDER BY rowid DESC LIMIT 1').pluck().get(),
    );
    expect(last).toBe(`node-${count - 1}`);
  });

  it('returns an InsertError and commits nothing when the second edge fails', () => {
    rejectEdgesTo(dbPath, 'A');

    const result = push(connection, NODES, EDGES);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InsertError');
      expect(result.error.message).toBe('Error pushing data to the database: edge rejected');
    }

    // Left open for the caller to roll back
    expect(connection.inTransaction).toBe(true);

    rollback(connection);

    expect(connection.inTransaction).toBe(false);
    expect(countRows(dbPath, 'GephiNode')).toBe(0);
    expect(countRows(dbPath, 'GephiEdges')).toBe(0);
  });

  it('loses the uncommitted rows when the connection closes without rollback', () => {
    rejectEdgesTo(dbPath, 'A');

    expect(push(connection, NODES, EDGES).ok).toBe(false);
    connection.close();

    expect(countRows(dbPath, 'GephiNode')).toBe(0);
  });

  it('refuses to run over a failed push that was not rolled back', () => {
    rejectEdgesTo(dbPath, 'A');
    expect(push(connection, NODES, EDGES).ok).toBe(false);

    const result = push(connection, [{ nodeLabel: 'Z' }], []);

    expect(result).toMatchObject({
      ok: false,
      error: {
        kind: 'InsertError',
        message:
          'Error pushing data to the database: transaction already open; roll back first',
      },
    });
    expect(connection.inTransaction).toBe(true);

    connection.close();
    expect(countRows(dbPath, 'GephiNode')).toBe(0);
  });

  it('runs again once the failed push is rolled back', () => {
    rejectEdgesTo(dbPath, 'A');
    expect(push(connection, NODES, EDGES).ok).toBe(false);
    rollback(connection);

    expect(push(connection, [{ nodeLabel: 'Z' }], [])).toEqual({
      ok: true,
      value: { nodes: 1, edges: 0 },
    });
    expect(
      withStore(dbPath, (db) => db.prepare('SELECT nodeLabel FROM GephiNode').pluck().all()),
    ).toEqual(['Z']);
  });

  it('returns an InsertError when a destination table is missing', () => {
    connection.db.exec('DROP TABLE GephiEdges');

    const result = push(connection, NODES, EDGES);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Error pushing data to the database: no such table: GephiEdges',
      );
    }
    rollback(connection);
    expect(countRows(dbPath, 'GephiNode')).toBe(0);
  });
});
