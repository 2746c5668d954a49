/**
 * Catalog store interface.
 * The single source of truth for records and relationships. Writes replace
 * a whole source at once; reads see one complete generation.
 */

import type { CanonicalRecord, RelationshipEdge } from '../types/models.js';
import type {
  CatalogStatistics,
  IngestResult,
  QueryFilter,
  SourceSummary,
} from '../types/api.js';

/** Records, edges and statistics come out frozen. */
export interface CatalogSnapshot {
  generation: number;
  records: Readonly<CanonicalRecord>[];
  relationships: Readonly<RelationshipEdge>[];
  statistics: Readonly<CatalogStatistics>;
}

export interface ICatalogStore {
  /**
   * Replace every record of `sourceId` with `records` and recompute edges.
   * Readers never observe the source half-replaced. The store keeps its own
   * copies, so later changes to `records` do not reach the catalog.
   */
  ingest(sourceId: string, records: readonly CanonicalRecord[]): Promise<IngestResult>;

  /** Remove a source and every edge touching it. Returns the records removed. */
  removeSource(sourceId: string): Promise<number>;

  /** Remove all records and edges. */
  clear(): Promise<void>;

  /** Lazy, restartable: each call iterates the generation current at call time. */
  query(filter?: QueryFilter): IterableIterator<Readonly<CanonicalRecord>>;

  get(key: string): Readonly<CanonicalRecord> | undefined;

  statistics(): Readonly<CatalogStatistics>;

  sources(): Readonly<SourceSummary>[];

  relationships(): Readonly<RelationshipEdge>[];

  /** Edges with either endpoint in a container of this name. */
  relationshipsFor(containerName: string): Readonly<RelationshipEdge>[];

  upstream(key: string, maxDepth?: number): Readonly<CanonicalRecord>[];

  downstream(key: string, maxDepth?: number): Readonly<CanonicalRecord>[];

  snapshot(): CatalogSnapshot;
}
