import { z } from 'zod';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * ConnectionConfig -- the connection mapping for the relational store.
 *
 * Keys keep their upper-case names so the same mapping can be read from the
 * config file or the TAXOGRAPH_* environment variables unchanged.
 *
 * - ENDPOINT: directory holding the database file, or ':memory:'
 * - DBNAME: database file stem (opened as `<DBNAME>.db`)
 */
export const ConnectionConfigSchema = z.object({
  ENDPOINT: z.string().min(1),
  PORT: z
    .union([z.number(), z.string()])
    .pipe(z.coerce.number().int().min(1).max(65535)),
  DBNAME: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'DBNAME must be a file stem, not a path'),
  USER: z.string().min(1),
  PASSWORD: z.string().min(1),
});

export type ConnectionConfig = z.output<typeof ConnectionConfigSchema>;
export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;

// =============================================================================
// Taxonomy Types (matches the aliased SELECT columns)
// =============================================================================

/**
 * TaxonomyRow -- one active sub-topic joined to its topic and macro-topic.
 */
export const TaxonomyRowSchema = z.object({
  SubTopic: z.string(),
  Topic: z.string(),
  MacroTopic: z.string(),
});

export type TaxonomyRow = z.infer<typeof TaxonomyRowSchema>;

// =============================================================================
// Graph Types
// =============================================================================

export const EDGE_TYPES = ['undirected'] as const;

export type EdgeType = (typeof EDGE_TYPES)[number];

export interface NodeRecord {
  nodeLabel: string;
}

export interface EdgeRecord {
  source: string;
  target: string;
  type: EdgeType;
}

/**
 * Tabular interchange between extractor, transformer and loader:
 * rows with named columns.
 */
export type Table<Row> = readonly Row[];

export interface GephiGraph {
  nodes: Table<NodeRecord>;
  edges: Table<EdgeRecord>;
}
