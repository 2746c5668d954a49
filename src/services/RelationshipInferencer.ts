/**
 * Relationship inference.
 * Proposes directed edges over the whole record set: declared foreign keys
 * first, then naming-convention matches for fields without a declared edge.
 *
 * The naming heuristic is approximate. Coincidental names (`paid` reads as
 * `pa` + `id`) produce false positives and unconventional names are missed;
 * both are known limitations.
 */

import type { CanonicalRecord, RelationshipEdge } from '../types/models.js';
import type { InferenceReport } from '../types/api.js';
import { compareEdges } from '../lineage/LineageGraph.js';
import { containerKeyOf, keyString } from '../lineage/keys.js';
import {
  compactName,
  containerMatchesPrefix,
  containerStem,
  editDistance,
  extractKeyPrefix,
} from '../naming/heuristics.js';

export const DEFAULT_HEURISTIC_THRESHOLD = 0.4;

/** Target container is named after the field's prefix. */
const CONTAINER_MATCH_CONFIDENCE = 1.0;
/** Same-named key field, container name unrelated. */
const FIELD_MATCH_CONFIDENCE = 0.5;

export interface InferenceResult {
  edges: RelationshipEdge[];
  report: InferenceReport;
}

interface Candidate {
  target: CanonicalRecord;
  confidence: number;
  distance: number;
}

export class RelationshipInferencer {
  readonly threshold: number;

  constructor(options?: { threshold?: number }) {
    this.threshold = options?.threshold ?? DEFAULT_HEURISTIC_THRESHOLD;
  }

  infer(records: readonly CanonicalRecord[]): InferenceResult {
    const byField = this.indexByField(records);
    const primaryKeys = records.filter((r) => r.isPrimaryKey);
    const edges = new Map<string, RelationshipEdge>();
    const explicitSources = new Set<string>();
    let droppedForeignKeys = 0;

    // Declared foreign keys
    for (const record of records) {
      if (!record.isForeignKey || !record.fkTarget) continue;

      const target = this.resolveTarget(byField, record);
      const from = keyString(record);
      if (!target || keyString(target) === from) {
        droppedForeignKeys++;
        continue;
      }

      explicitSources.add(from);
      this.keep(edges, { from, to: keyString(target), kind: 'foreign_key', confidence: 1 });
    }
    const explicitEdges = edges.size;

    // Naming convention
    for (const record of records) {
      const from = keyString(record);
      if (explicitSources.has(from)) continue;

      const best = this.bestCandidate(record, primaryKeys);
      if (!best) continue;

      this.keep(edges, {
        from,
        to: keyString(best.target),
        kind: 'heuristic_name_match',
        confidence: best.confidence,
      });
    }

    return {
      edges: Array.from(edges.values()).sort(compareEdges),
      report: {
        explicitEdges,
        heuristicEdges: edges.size - explicitEdges,
        droppedForeignKeys,
      },
    };
  }

  // ── Private ──

  /** Lookup of `source → container → field`, exact names. */
  private indexByField(records: readonly CanonicalRecord[]): Map<string, CanonicalRecord> {
    const index = new Map<string, CanonicalRecord>();
    for (const record of records) {
      index.set(this.fieldLookupKey(record, record.containerName, record.fieldName), record);
    }
    return index;
  }

  private fieldLookupKey(source: CanonicalRecord, container: string, field: string): string {
    return containerKeyOf({
      sourceType: source.sourceType,
      sourceId: source.sourceId,
      containerName: container,
    }) + '/' + encodeURIComponent(field);
  }

  /** Declared targets live in the same source as the referencing field. */
  private resolveTarget(
    byField: Map<string, CanonicalRecord>,
    record: CanonicalRecord
  ): CanonicalRecord | undefined {
    if (!record.fkTarget) return undefined;
    return byField.get(
      this.fieldLookupKey(record, record.fkTarget.container, record.fkTarget.field)
    );
  }

  private bestCandidate(
    record: CanonicalRecord,
    primaryKeys: readonly CanonicalRecord[]
  ): Candidate | null {
    const prefix = extractKeyPrefix(record.fieldName);
    if (!prefix) return null;

    const ownContainer = containerKeyOf(record);
    const sameNamedKey = compactName(prefix) + 'id';
    let best: Candidate | null = null;

    for (const target of primaryKeys) {
      if (containerKeyOf(target) === ownContainer) continue;

      const targetName = compactName(target.fieldName);
      const containerMatch = containerMatchesPrefix(target.containerName, prefix);

      let confidence: number;
      if (targetName === 'id') {
        if (!containerMatch) continue;
        confidence = CONTAINER_MATCH_CONFIDENCE;
      } else if (targetName === sameNamedKey) {
        confidence = containerMatch ? CONTAINER_MATCH_CONFIDENCE : FIELD_MATCH_CONFIDENCE;
      } else {
        continue;
      }

      if (confidence < this.threshold) continue;

      const candidate: Candidate = {
        target,
        confidence,
        distance: editDistance(containerStem(target.containerName), prefix),
      };
      if (!best || this.outranks(candidate, best)) {
        best = candidate;
      }
    }

    return best;
  }

  /** Higher confidence, then closer container name, then name order. */
  private outranks(a: Candidate, b: Candidate): boolean {
    if (a.confidence !== b.confidence) return a.confidence > b.confidence;
    if (a.distance !== b.distance) return a.distance < b.distance;
    if (a.target.containerName !== b.target.containerName) {
      return a.target.containerName < b.target.containerName;
    }
    return keyString(a.target) < keyString(b.target);
  }

  private keep(edges: Map<string, RelationshipEdge>, edge: RelationshipEdge): void {
    const id = `${edge.from}|${edge.to}|${edge.kind}`;
    const existing = edges.get(id);
    if (!existing || existing.confidence < edge.confidence) {
      edges.set(id, edge);
    }
  }
}
