/**
 * Domain models: the canonical shapes every source is mapped into.
 * Decoupled from adapter output and from HTTP payloads.
 */

// ── Sources ──

export type SourceType = 'database' | 'api' | 'file';

export const SOURCE_TYPES: readonly SourceType[] = ['database', 'api', 'file'];

// ── Raw adapter output ──

/** Where a declared foreign key points, within the same source. */
export interface ForeignKeyTarget {
  container: string;
  field: string;
}

/**
 * One field as an adapter sees it. Only `name` is guaranteed;
 * everything else depends on what the source can tell us.
 */
export interface RawFieldDescriptor {
  name: string;
  typeHint?: string;
  nullable?: boolean;
  isPrimaryKey?: boolean;
  isForeignKey?: boolean;
  fkTarget?: ForeignKeyTarget;
  sampleValue?: unknown;
  /** Observed values in row order. Used for primitive classification. */
  samples?: unknown[];
  description?: string;
}

// ── Canonical entities ──

export interface CanonicalRecord {
  sourceType: SourceType;
  sourceId: string;
  containerName: string;
  fieldName: string;
  declaredType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  /** Declared target, resolved against the store at inference time. */
  fkTarget: ForeignKeyTarget | null;
  /** Display only. Never read by relationship inference. */
  sampleValue: string | null;
  description: string | null;
}

/** Identity of a record: (sourceType, sourceId, containerName, fieldName). */
export interface RecordKey {
  sourceType: SourceType;
  sourceId: string;
  containerName: string;
  fieldName: string;
}

export type RelationshipKind = 'foreign_key' | 'heuristic_name_match';

export interface RelationshipEdge {
  /** String form of the source record's key (see formatRecordKey). */
  from: string;
  to: string;
  kind: RelationshipKind;
  /** In [0, 1]. Always 1 for foreign_key edges. */
  confidence: number;
}
