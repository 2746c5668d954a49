/**
 * Record identity helpers.
 * A record key renders as `sourceType/sourceId/container/field`, each
 * segment URI-encoded so slashes inside ids and paths survive the round trip.
 */

import { SOURCE_TYPES } from '../types/models.js';
import type { CanonicalRecord, RecordKey, SourceType } from '../types/models.js';
import { ValidationError } from '../errors.js';

export function recordKeyOf(record: CanonicalRecord): RecordKey {
  return {
    sourceType: record.sourceType,
    sourceId: record.sourceId,
    containerName: record.containerName,
    fieldName: record.fieldName,
  };
}

export function formatRecordKey(key: RecordKey): string {
  return [key.sourceType, key.sourceId, key.containerName, key.fieldName]
    .map(encodeURIComponent)
    .join('/');
}

export function keyString(record: CanonicalRecord): string {
  return formatRecordKey(recordKeyOf(record));
}

export function parseRecordKey(value: string): RecordKey {
  const parts = value.split('/');
  if (parts.length !== 4) {
    throw new ValidationError(`Malformed record key: "${value}"`);
  }

  let decoded: string[];
  try {
    decoded = parts.map(decodeURIComponent);
  } catch {
    throw new ValidationError(`Malformed record key: "${value}"`);
  }

  const [sourceType, sourceId, containerName, fieldName] = decoded;
  if (!isSourceType(sourceType)) {
    throw new ValidationError(`Unknown source type in record key: "${sourceType}"`);
  }

  return { sourceType, sourceId, containerName, fieldName };
}

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value);
}

/** Identity of the container a record belongs to. */
export function containerKeyOf(record: {
  sourceType: SourceType;
  sourceId: string;
  containerName: string;
}): string {
  return [record.sourceType, record.sourceId, record.containerName]
    .map(encodeURIComponent)
    .join('/');
}
