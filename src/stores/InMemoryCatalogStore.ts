/**
 * In-memory catalog store.
 * Each write builds a new immutable generation (records, lineage graph,
 * counts) and swaps it in with one assignment. Writes are queued so only
 * one runs at a time; reads take whatever generation is current.
 */

import type {
  CanonicalRecord,
  RelationshipEdge,
  RelationshipKind,
  SourceType,
} from '../types/models.js';
import type {
  CatalogStatistics,
  IngestResult,
  QueryFilter,
  SourceSummary,
} from '../types/api.js';
import type { CatalogSnapshot, ICatalogStore } from './ICatalogStore.js';
import { LineageGraph } from '../lineage/LineageGraph.js';
import { containerKeyOf, keyString } from '../lineage/keys.js';
import { RelationshipInferencer } from '../services/RelationshipInferencer.js';
import { CatalogWriteError, ValidationError, errorMessage } from '../errors.js';

interface Generation {
  readonly number: number;
  /** Sorted by record key. Frozen, like everything else a generation hands out. */
  readonly records: readonly Readonly<CanonicalRecord>[];
  readonly graph: LineageGraph;
  readonly statistics: Readonly<CatalogStatistics>;
  readonly sources: ReadonlyMap<string, Readonly<SourceSummary>>;
}

function emptyGeneration(number: number): Generation {
  return {
    number,
    records: [],
    graph: new LineageGraph(),
    statistics: computeStatistics([], []),
    sources: new Map(),
  };
}

export class InMemoryCatalogStore implements ICatalogStore {
  private current: Generation = emptyGeneration(0);
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly inferencer: RelationshipInferencer = new RelationshipInferencer(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async ingest(sourceId: string, records: readonly CanonicalRecord[]): Promise<IngestResult> {
    this.validateBatch(sourceId, records);
    return this.exclusive(() => this.replaceSource(sourceId, records));
  }

  async removeSource(sourceId: string): Promise<number> {
    const result = await this.exclusive(() => this.replaceSource(sourceId, []));
    return result.replaced;
  }

  async clear(): Promise<void> {
    await this.exclusive(() => {
      this.current = emptyGeneration(this.current.number + 1);
    });
  }

  query(filter: QueryFilter = {}): IterableIterator<Readonly<CanonicalRecord>> {
    return filterRecords(this.current.records, filter);
  }

  get(key: string): Readonly<CanonicalRecord> | undefined {
    return this.current.graph.getRecord(key);
  }

  statistics(): Readonly<CatalogStatistics> {
    return this.current.statistics;
  }

  sources(): Readonly<SourceSummary>[] {
    return Array.from(this.current.sources.values());
  }

  relationships(): Readonly<RelationshipEdge>[] {
    return this.current.graph.edges();
  }

  relationshipsFor(containerName: string): Readonly<RelationshipEdge>[] {
    return this.current.graph.edgesFor(containerName);
  }

  upstream(key: string, maxDepth?: number): Readonly<CanonicalRecord>[] {
    return this.current.graph.upstream(key, maxDepth);
  }

  downstream(key: string, maxDepth?: number): Readonly<CanonicalRecord>[] {
    return this.current.graph.downstream(key, maxDepth);
  }

  snapshot(): CatalogSnapshot {
    const generation = this.current;
    return {
      generation: generation.number,
      records: [...generation.records],
      relationships: generation.graph.edges(),
      statistics: generation.statistics,
    };
  }

  // ── Private ──

  /** Run writes one at a time, in call order. */
  private exclusive<T>(write: () => T): Promise<T> {
    const run = this.writeQueue.then(write);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private validateBatch(sourceId: string, records: readonly CanonicalRecord[]): void {
    if (!sourceId.trim()) {
      throw new ValidationError('sourceId is required');
    }

    const keys = new Set<string>();
    for (const record of records) {
      if (record.sourceId !== sourceId) {
        throw new ValidationError(
          `Record "${record.containerName}.${record.fieldName}" belongs to source "${record.sourceId}", not "${sourceId}"`
        );
      }
      const key = keyString(record);
      if (keys.has(key)) {
        throw new ValidationError(`Duplicate record "${key}" in ingest batch`);
      }
      keys.add(key);
    }
  }

  /** Build the next generation off to the side, then publish it. */
  private replaceSource(sourceId: string, incoming: readonly CanonicalRecord[]): IngestResult {
    const previous = this.current;

    try {
      const kept = previous.records.filter((r) => r.sourceId !== sourceId);
      const replaced = previous.records.length - kept.length;
      const records = [...kept, ...incoming.map(freezeRecord)].sort(compareRecords);

      const { edges, report } = this.inferencer.infer(records);
      const graph = LineageGraph.build(records, edges);
      const number = previous.number + 1;

      const sources = new Map(previous.sources);
      sources.delete(sourceId);
      if (incoming.length > 0) {
        sources.set(sourceId, Object.freeze(summarizeSource(sourceId, incoming, this.now())));
      }

      this.current = {
        number,
        records,
        graph,
        statistics: computeStatistics(records, graph.edges()),
        sources,
      };

      return { added: incoming.length, replaced, inference: report };
    } catch (err) {
      throw new CatalogWriteError(`Catalog write failed: ${errorMessage(err)}`, err);
    }
  }
}

/** A private, frozen copy; callers keep no handle on stored state. */
function freezeRecord(record: CanonicalRecord): Readonly<CanonicalRecord> {
  return Object.freeze({
    ...record,
    fkTarget: record.fkTarget ? Object.freeze({ ...record.fkTarget }) : null,
  });
}

function compareRecords(a: CanonicalRecord, b: CanonicalRecord): number {
  const ka = keyString(a);
  const kb = keyString(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

function* filterRecords(
  records: readonly Readonly<CanonicalRecord>[],
  filter: QueryFilter
): IterableIterator<Readonly<CanonicalRecord>> {
  const container = filter.container?.toLowerCase();
  const field = filter.field?.toLowerCase();

  for (const record of records) {
    if (filter.sourceType && record.sourceType !== filter.sourceType) continue;
    if (container && !record.containerName.toLowerCase().includes(container)) continue;
    if (field && !record.fieldName.toLowerCase().includes(field)) continue;
    yield record;
  }
}

function summarizeSource(
  sourceId: string,
  records: readonly CanonicalRecord[],
  ingestedAt: Date
): SourceSummary {
  return {
    sourceId,
    sourceType: records[0].sourceType,
    recordCount: records.length,
    containerCount: new Set(records.map((r) => containerKeyOf(r))).size,
    ingestedAt: ingestedAt.toISOString(),
  };
}

function computeStatistics(
  records: readonly CanonicalRecord[],
  edges: readonly RelationshipEdge[]
): Readonly<CatalogStatistics> {
  const bySourceType: Record<SourceType, number> = { database: 0, api: 0, file: 0 };
  for (const record of records) {
    bySourceType[record.sourceType]++;
  }

  const relationshipsByKind: Record<RelationshipKind, number> = {
    foreign_key: 0,
    heuristic_name_match: 0,
  };
  for (const edge of edges) {
    relationshipsByKind[edge.kind]++;
  }

  return Object.freeze({
    bySourceType: Object.freeze(bySourceType),
    totalRecords: records.length,
    totalRelationships: edges.length,
    relationshipsByKind: Object.freeze(relationshipsByKind),
    totalSources: new Set(records.map((r) => r.sourceId)).size,
    totalContainers: new Set(records.map((r) => containerKeyOf(r))).size,
    dictionaryEntries: records.length,
  });
}
