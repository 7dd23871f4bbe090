// ---------------------------------------------------------------------------
// taxograph run -- Taxonomy to Gephi Graph Export
// ---------------------------------------------------------------------------
// Pulls the active taxonomy, restructures it into nodes and edges, and
// writes both into the GephiNode / GephiEdges tables in one transaction.
// ---------------------------------------------------------------------------

import { runPipeline } from '../pipeline.js';
import { debug } from '../shared/debug.js';
import type { ConnectionConfigInput } from '../shared/types.js';
import type { CommandResult } from './types.js';

export function handleRunCommand(config: ConnectionConfigInput): CommandResult {
  debug('cmd', 'handleRunCommand');

  const result = runPipeline(config);
  if (!result.ok) {
    return {
      success: false,
      message: `${result.error.kind}: ${result.error.message}`,
    };
  }

  const { taxonomyRows, nodes, edges } = result.value;
  return {
    success: true,
    message: `Exported ${taxonomyRows} taxonomy rows as ${nodes} nodes and ${edges} edges.`,
  };
}
