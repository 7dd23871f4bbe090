/**
 * Flattens taxonomy rows into the node and edge tables a graph
 * visualization tool imports.
 *
 * Pure -- no I/O.
 */

import type {
  EdgeRecord,
  GephiGraph,
  NodeRecord,
  Table,
  TaxonomyRow,
} from '../shared/types.js';

/**
 * Columns scanned for node labels, in canonical order.
 */
const NODE_COLUMNS: ReadonlyArray<keyof TaxonomyRow> = ['SubTopic', 'Topic', 'MacroTopic'];

/**
 * Distinct labels across the three taxonomy columns.
 *
 * Order is first-seen: every SubTopic value, then every Topic, then every
 * MacroTopic, each column in row order.
 */
export function collectNodes(rows: Table<TaxonomyRow>): NodeRecord[] {
  const labels = new Set<string>();
  for (const column of NODE_COLUMNS) {
    for (const row of rows) {
      labels.add(row[column]);
    }
  }
  return Array.from(labels, (nodeLabel) => ({ nodeLabel }));
}

/**
 * Two edges per row, macro-topic -> topic then topic -> sub-topic.
 * Repeated pairs are kept.
 */
export function generateEdges(rows: Table<TaxonomyRow>): EdgeRecord[] {
  return rows.flatMap((row): EdgeRecord[] => [
    { source: row.MacroTopic, target: row.Topic, type: 'undirected' },
    { source: row.Topic, target: row.SubTopic, type: 'undirected' },
  ]);
}

export function restructure(rows: Table<TaxonomyRow>): GephiGraph {
  return { nodes: collectNodes(rows), edges: generateEdges(rows) };
}
