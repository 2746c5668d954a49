/**
 * API types.
 * Shapes crossing the core's boundaries. Callers hand in source specs and
 * filters and get back outcomes, views and exports.
 */

import type {
  CanonicalRecord,
  RelationshipEdge,
  RelationshipKind,
  SourceType,
} from './models.js';

// ── Source specs ──

export interface SqliteSourceSpec {
  kind: 'sqlite';
  path: string;
  sourceId?: string;
}

export interface PostgresSourceSpec {
  kind: 'postgres';
  connectionString: string;
  /** Defaults to "public". */
  schema?: string;
  sourceId?: string;
}

export interface ApiSourceSpec {
  kind: 'api';
  url: string;
  headers?: Record<string, string>;
  method?: 'GET' | 'POST';
  sourceId?: string;
}

export interface FileSourceSpec {
  kind: 'file';
  paths: string[];
  sourceId?: string;
}

export type SourceSpec =
  | SqliteSourceSpec
  | PostgresSourceSpec
  | ApiSourceSpec
  | FileSourceSpec;

export type SourceKind = SourceSpec['kind'];

export const SOURCE_KINDS: readonly SourceKind[] = ['sqlite', 'postgres', 'api', 'file'];

// ── Catalog ──

export interface QueryFilter {
  sourceType?: SourceType;
  /** Case-insensitive substring of the container name. */
  container?: string;
  /** Case-insensitive substring of the field name. */
  field?: string;
}

export interface InferenceReport {
  explicitEdges: number;
  heuristicEdges: number;
  /** Declared foreign keys whose target is not in the catalog yet. */
  droppedForeignKeys: number;
}

export interface IngestResult {
  added: number;
  replaced: number;
  inference: InferenceReport;
}

export interface CatalogStatistics {
  bySourceType: Record<SourceType, number>;
  totalRecords: number;
  totalRelationships: number;
  relationshipsByKind: Record<RelationshipKind, number>;
  totalSources: number;
  totalContainers: number;
  dictionaryEntries: number;
}

export interface SourceSummary {
  sourceId: string;
  sourceType: SourceType;
  recordCount: number;
  containerCount: number;
  ingestedAt: string;
}

export interface DictionaryRow {
  key: string;
  /** `container.field`, the entry name reports show. */
  entry: string;
  source: string;
  sourceType: SourceType;
  container: string;
  field: string;
  dataType: string;
  nullable: boolean;
  primaryKey: boolean;
  foreignKey: boolean;
  /** Entries this field points at through outgoing edges. */
  references: string[];
  sampleValue: string | null;
}

export interface LineageNode {
  id: string;
  container: string;
  sourceType: SourceType;
  sourceId: string;
}

export interface LineageLink {
  from: string;
  to: string;
  relationship: RelationshipKind;
}

export interface LineageView {
  nodes: LineageNode[];
  edges: LineageLink[];
}

export interface CatalogExport {
  generatedAt: string;
  records: CanonicalRecord[];
  relationships: RelationshipEdge[];
  statistics: CatalogStatistics;
  dictionary: DictionaryRow[];
  lineage: LineageView;
}

// ── Crawls ──

export type CrawlState = 'pending' | 'running' | 'succeeded' | 'failed';

export type CrawlStatus = 'success' | 'partial' | 'failed';

export interface ContainerOutcome {
  name: string;
  status: 'succeeded' | 'failed' | 'skipped';
  recordCount: number;
  rejectedFields: number;
  error?: { code: string; message: string };
}

export interface CrawlOutcome {
  sourceId: string;
  sourceType: SourceType;
  status: CrawlStatus;
  message: string;
  recordCount: number;
  rejectedFields: number;
  containers: ContainerOutcome[];
  cancelled: boolean;
  ingest?: IngestResult;
  startedAt: string;
  finishedAt: string;
}

export interface CrawlTotals {
  containersDone: number;
  containersTotal: number;
  records: number;
  rejectedFields: number;
}

export type CrawlProgressEvent =
  | { type: 'crawl-started'; sourceId: string; totals: CrawlTotals }
  | { type: 'container-started'; sourceId: string; container: string; totals: CrawlTotals }
  | {
      type: 'container-finished';
      sourceId: string;
      container: string;
      recordCount: number;
      rejectedFields: number;
      totals: CrawlTotals;
    }
  | {
      type: 'container-failed';
      sourceId: string;
      container: string;
      code: string;
      message: string;
      totals: CrawlTotals;
    }
  | { type: 'crawl-finished'; sourceId: string; outcome: CrawlOutcome; totals: CrawlTotals };

export interface CrawlTaskStatus {
  taskId: string;
  sourceId: string;
  state: CrawlState;
  totals: CrawlTotals;
  outcome?: CrawlOutcome;
}

// ── HTTP ──

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  /** Set by the error handler; matches the request's log event. */
  requestId?: string;
}
