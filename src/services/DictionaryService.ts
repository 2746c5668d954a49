/**
 * Read-only views over the catalog: the data dictionary, the
 * container-level lineage map and the full export snapshot.
 * Presentation formats (spreadsheets, reports) are built from these elsewhere.
 */

import type { ICatalogStore } from '../stores/ICatalogStore.js';
import type { CanonicalRecord, RelationshipEdge } from '../types/models.js';
import type {
  CatalogExport,
  DictionaryRow,
  LineageLink,
  LineageNode,
  LineageView,
  QueryFilter,
} from '../types/api.js';
import { containerKeyOf, keyString } from '../lineage/keys.js';

export class DictionaryService {
  constructor(
    private readonly store: ICatalogStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Rows for the records matching `filter`; references may point outside it. */
  dictionary(filter?: QueryFilter): DictionaryRow[] {
    const snapshot = this.store.snapshot();
    const wanted = new Set(Array.from(this.store.query(filter), keyString));
    return this.buildDictionary(
      snapshot.records.filter((record) => wanted.has(keyString(record))),
      snapshot.records,
      snapshot.relationships
    );
  }

  lineage(): LineageView {
    const snapshot = this.store.snapshot();
    return this.buildLineage(snapshot.records, snapshot.relationships);
  }

  /** Everything from one generation, so the parts agree with each other. */
  export(): CatalogExport {
    const snapshot = this.store.snapshot();
    return {
      generatedAt: this.now().toISOString(),
      records: snapshot.records,
      relationships: snapshot.relationships,
      statistics: snapshot.statistics,
      dictionary: this.buildDictionary(snapshot.records, snapshot.records, snapshot.relationships),
      lineage: this.buildLineage(snapshot.records, snapshot.relationships),
    };
  }

  // ── Private ──

  private buildDictionary(
    records: readonly CanonicalRecord[],
    all: readonly CanonicalRecord[],
    edges: readonly RelationshipEdge[]
  ): DictionaryRow[] {
    const entries = new Map<string, string>();
    for (const record of all) {
      entries.set(keyString(record), entryName(record));
    }

    const references = new Map<string, string[]>();
    for (const edge of edges) {
      const target = entries.get(edge.to);
      if (!target) continue;
      const list = references.get(edge.from) ?? [];
      list.push(target);
      references.set(edge.from, list);
    }

    return records.map((record) => {
      const key = keyString(record);
      return {
        key,
        entry: entryName(record),
        source: record.sourceId,
        sourceType: record.sourceType,
        container: record.containerName,
        field: record.fieldName,
        dataType: record.declaredType,
        nullable: record.nullable,
        primaryKey: record.isPrimaryKey,
        foreignKey: record.isForeignKey,
        references: references.get(key) ?? [],
        sampleValue: record.sampleValue,
      };
    });
  }

  private buildLineage(
    records: readonly CanonicalRecord[],
    edges: readonly RelationshipEdge[]
  ): LineageView {
    const nodes = new Map<string, LineageNode>();
    const containerOf = new Map<string, string>();

    for (const record of records) {
      const id = containerKeyOf(record);
      containerOf.set(keyString(record), id);
      if (!nodes.has(id)) {
        nodes.set(id, {
          id,
          container: record.containerName,
          sourceType: record.sourceType,
          sourceId: record.sourceId,
        });
      }
    }

    const links = new Map<string, LineageLink>();
    for (const edge of edges) {
      const from = containerOf.get(edge.from);
      const to = containerOf.get(edge.to);
      if (!from || !to) continue;
      const id = `${from}\u0000${to}\u0000${edge.kind}`;
      if (!links.has(id)) {
        links.set(id, { from, to, relationship: edge.kind });
      }
    }

    return {
      nodes: Array.from(nodes.values()).sort((a, b) => compare(a.id, b.id)),
      edges: Array.from(links.values()).sort(
        (a, b) =>
          compare(a.from, b.from) || compare(a.to, b.to) || compare(a.relationship, b.relationship)
      ),
    };
  }
}

/** `orders.customer_id`, the name a dictionary reader looks for. */
function entryName(record: CanonicalRecord): string {
  return `${record.containerName}.${record.fieldName}`;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
