import { pullTaxonomy } from './extract/extractor.js';
import { restructure } from './graph/restructure.js';
import { debug } from './shared/debug.js';
import { ok, type Result } from './shared/result.js';
import type { ConnectionConfigInput } from './shared/types.js';
import { connect, rollback } from './storage/connection.js';
import { push } from './storage/loader.js';

export interface PipelineSummary {
  taxonomyRows: number;
  nodes: number;
  edges: number;
}

/**
 * Runs one extract -> restructure -> load pass against the configured store.
 *
 * Owns the connection for the duration of the run: a failed load is rolled
 * back and the connection is closed on every path.
 */
export function runPipeline(config: ConnectionConfigInput): Result<PipelineSummary> {
  const connected = connect(config);
  if (!connected.ok) {
    return connected;
  }
  const connection = connected.value;

  try {
    const pulled = pullTaxonomy(connection);
    if (!pulled.ok) {
      return pulled;
    }

    const { nodes, edges } = restructure(pulled.value);
    debug('graph', 'Restructured taxonomy', {
      rows: pulled.value.length,
      nodes: nodes.length,
      edges: edges.length,
    });

    const pushed = push(connection, nodes, edges);
    if (!pushed.ok) {
      rollback(connection);
      return pushed;
    }

    const summary: PipelineSummary = {
      taxonomyRows: pulled.value.length,
      nodes: pushed.value.nodes,
      edges: pushed.value.edges,
    };
    debug('pipeline', 'Pipeline complete', { ...summary });
    return ok(summary);
  } finally {
    connection.close();
  }
}
