/**
 * Lineage graph.
 * Records are nodes, relationship edges are directed links between them.
 * An edge points from the referencing field to the referenced one, so
 * upstream follows edges forward (what a field depends on) and downstream
 * walks them backwards (what depends on it).
 */

import type { CanonicalRecord, RelationshipEdge } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { keyString } from './keys.js';

function edgeId(edge: Pick<RelationshipEdge, 'from' | 'to' | 'kind'>): string {
  return `${edge.from}|${edge.to}|${edge.kind}`;
}

export function compareEdges(a: RelationshipEdge, b: RelationshipEdge): number {
  if (a.from !== b.from) return a.from < b.from ? -1 : 1;
  if (a.to !== b.to) return a.to < b.to ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return 0;
}

export class LineageGraph {
  private readonly nodes = new Map<string, CanonicalRecord>();
  private readonly edgeIndex = new Map<string, Readonly<RelationshipEdge>>();
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();

  static build(
    records: Iterable<CanonicalRecord>,
    edges: Iterable<RelationshipEdge>
  ): LineageGraph {
    const graph = new LineageGraph();
    for (const record of records) graph.addRecord(record);
    for (const edge of edges) graph.addEdge(edge);
    return graph;
  }

  get edgeCount(): number {
    return this.edgeIndex.size;
  }

  addRecord(record: CanonicalRecord): void {
    this.nodes.set(keyString(record), record);
  }

  /**
   * Add an edge. Self-loops are dropped, and of two edges with the same
   * ordered pair and kind only the more confident survives.
   * Returns whether the graph changed.
   */
  addEdge(edge: RelationshipEdge): boolean {
    if (edge.from === edge.to) return false;
    if (!this.nodes.has(edge.from)) {
      throw new NotFoundError(`Edge source "${edge.from}" is not in the graph`);
    }
    if (!this.nodes.has(edge.to)) {
      throw new NotFoundError(`Edge target "${edge.to}" is not in the graph`);
    }

    const id = edgeId(edge);
    const existing = this.edgeIndex.get(id);
    if (existing && existing.confidence >= edge.confidence) return false;

    this.edgeIndex.set(id, Object.freeze({ ...edge }));
    link(this.outgoing, edge.from, edge.to);
    link(this.incoming, edge.to, edge.from);
    return true;
  }

  getRecord(key: string): CanonicalRecord | undefined {
    return this.nodes.get(key);
  }

  /** All edges, ordered by (from, to, kind). */
  edges(): Readonly<RelationshipEdge>[] {
    return Array.from(this.edgeIndex.values()).sort(compareEdges);
  }

  /** Edges with either endpoint in a container of this name. */
  edgesFor(containerName: string): Readonly<RelationshipEdge>[] {
    return this.edges().filter(
      (edge) =>
        this.nodes.get(edge.from)?.containerName === containerName ||
        this.nodes.get(edge.to)?.containerName === containerName
    );
  }

  upstream(key: string, maxDepth?: number): CanonicalRecord[] {
    return this.walk(key, this.outgoing, maxDepth);
  }

  downstream(key: string, maxDepth?: number): CanonicalRecord[] {
    return this.walk(key, this.incoming, maxDepth);
  }

  // ── Private ──

  /** Breadth-first, closest first, key order within a level. */
  private walk(
    start: string,
    adjacency: Map<string, Set<string>>,
    maxDepth?: number
  ): CanonicalRecord[] {
    if (!this.nodes.has(start)) {
      throw new NotFoundError(`Record "${start}" not found`);
    }
    if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
      throw new ValidationError('maxDepth must be a non-negative integer');
    }

    const limit = maxDepth ?? Number.POSITIVE_INFINITY;
    const visited = new Set<string>([start]);
    const result: CanonicalRecord[] = [];
    let frontier = [start];
    let depth = 0;

    while (frontier.length > 0 && depth < limit) {
      const next: string[] = [];
      for (const key of frontier) {
        for (const neighbour of adjacency.get(key) ?? []) {
          if (visited.has(neighbour)) continue;
          visited.add(neighbour);
          next.push(neighbour);
        }
      }

      next.sort();
      for (const key of next) {
        const record = this.nodes.get(key);
        if (record) result.push(record);
      }

      frontier = next;
      depth++;
    }

    return result;
  }
}

function link(index: Map<string, Set<string>>, from: string, to: string): void {
  const targets = index.get(from);
  if (targets) {
    targets.add(to);
  } else {
    index.set(from, new Set([to]));
  }
}
