// taxograph library entry point

export { connect, rollback, resolveDbPath, DEFAULT_BUSY_TIMEOUT } from './storage/connection.js';
export type { Connection } from './storage/connection.js';
export { push, INSERT_BATCH_SIZE } from './storage/loader.js';
export type { PushSummary } from './storage/loader.js';
export { listTables, serverVersion, pullTaxonomy, logRows } from './extract/extractor.js';
export { restructure, collectNodes, generateEdges } from './graph/restructure.js';
export { runPipeline } from './pipeline.js';
export type { PipelineSummary } from './pipeline.js';

export type { Result, PipelineError, PipelineErrorKind } from './shared/result.js';
export { ok, err } from './shared/result.js';
export type {
  ConnectionConfig,
  ConnectionConfigInput,
  TaxonomyRow,
  NodeRecord,
  EdgeRecord,
  EdgeType,
  GephiGraph,
  Table,
} from './shared/types.js';
export { ConnectionConfigSchema, TaxonomyRowSchema, EDGE_TYPES } from './shared/types.js';
export { loadConnectionConfig, getConfigDir, isDebugEnabled } from './shared/config.js';
export { debug, debugTimed } from './shared/debug.js';
