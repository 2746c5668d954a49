/**
 * Normalizer.
 * Maps one container's raw field descriptors onto canonical records.
 * Pure: rejects bad fields individually and never touches the catalog.
 */

import type {
  CanonicalRecord,
  ForeignKeyTarget,
  RawFieldDescriptor,
  SourceType,
} from '../types/models.js';
import { FieldRejectedError, ValidationError } from '../errors.js';
import { classifySamples, classifyValue } from '../schema/infer.js';

const DEFAULT_SAMPLE_VALUE_LENGTH = 100;

export interface NormalizeResult {
  records: CanonicalRecord[];
  rejected: FieldRejectedError[];
}

export class Normalizer {
  private readonly sampleValueLength: number;

  constructor(options?: { sampleValueLength?: number }) {
    this.sampleValueLength = options?.sampleValueLength ?? DEFAULT_SAMPLE_VALUE_LENGTH;
  }

  normalize(
    sourceType: SourceType,
    sourceId: string,
    containerName: string,
    rawFields: readonly RawFieldDescriptor[]
  ): NormalizeResult {
    if (!sourceId.trim()) {
      throw new ValidationError('sourceId is required');
    }
    if (!containerName.trim()) {
      throw new ValidationError('containerName is required');
    }

    const records: CanonicalRecord[] = [];
    const rejected: FieldRejectedError[] = [];
    const seen = new Set<string>();

    for (const raw of rawFields) {
      const name = typeof raw.name === 'string' ? raw.name.trim() : '';

      if (!name) {
        rejected.push(new FieldRejectedError(String(raw.name ?? ''), 'field name is empty'));
        continue;
      }
      if (seen.has(name)) {
        rejected.push(new FieldRejectedError(name, 'duplicate field name in container'));
        continue;
      }
      seen.add(name);

      const observed = this.observedValues(raw);
      const isForeignKey = raw.isForeignKey ?? false;

      records.push({
        sourceType,
        sourceId,
        containerName,
        fieldName: name,
        declaredType: this.declaredType(sourceType, raw, observed),
        nullable: raw.nullable ?? true,
        isPrimaryKey: raw.isPrimaryKey ?? false,
        isForeignKey,
        fkTarget: isForeignKey ? this.foreignKeyTarget(raw.fkTarget) : null,
        sampleValue: this.renderSample(observed),
        description: raw.description?.trim() || null,
      });
    }

    return { records, rejected };
  }

  // ── Private ──

  private observedValues(raw: RawFieldDescriptor): unknown[] {
    const samples = raw.samples ?? [];
    return raw.sampleValue === undefined ? samples : [...samples, raw.sampleValue];
  }

  /** Databases report a native type; APIs and files are typed by what was observed. */
  private declaredType(
    sourceType: SourceType,
    raw: RawFieldDescriptor,
    observed: unknown[]
  ): string {
    if (sourceType === 'database') {
      // verbatim, padding included; blank counts as missing
      return raw.typeHint && raw.typeHint.trim() ? raw.typeHint : 'unknown';
    }
    return classifySamples(observed);
  }

  private foreignKeyTarget(target: ForeignKeyTarget | undefined): ForeignKeyTarget | null {
    if (!target) return null;
    const container = target.container?.trim();
    const field = target.field?.trim();
    if (!container || !field) return null;
    return { container, field };
  }

  private renderSample(observed: unknown[]): string | null {
    const first = observed.find((value) => classifyValue(value) !== null);
    if (first === undefined) return null;

    let text: string;
    if (first instanceof Date) {
      text = first.toISOString();
    } else if (typeof first === 'object') {
      text = JSON.stringify(first);
    } else {
      text = String(first);
    }
    return text.slice(0, this.sampleValueLength);
  }
}
