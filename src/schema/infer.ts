/**
 * Shape inference for JSON payloads (API responses, .json files) and
 * primitive classification of observed values.
 */

import type { RawFieldDescriptor } from '../types/models.js';

export type PrimitiveType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'object'
  | 'array'
  | 'unknown';

/** Objects sampled from each array when collecting keys. */
const DEFAULT_MAX_ARRAY_ITEMS = 20;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Primitive type of one value, or null when the value carries no type. */
export function classifyValue(value: unknown): PrimitiveType | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return null;
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (Array.isArray(value)) return 'array';
  if (isPlainObject(value)) return 'object';
  return 'string';
}

/** First non-null value decides; all-null (or nothing observed) is `unknown`. */
export function classifySamples(samples: readonly unknown[]): PrimitiveType {
  for (const sample of samples) {
    const type = classifyValue(sample);
    if (type) return type;
  }
  return 'unknown';
}

/**
 * Flatten a JSON document into field descriptors.
 * Nested keys become dotted names (`address.city`). An array is a field of
 * its own; when it holds objects, their keys are collected under the
 * array's name from the first `maxArrayItems` elements. Samples keep
 * document order, so the first non-null observation wins downstream.
 */
export function inferJsonFields(
  data: unknown,
  options?: { maxArrayItems?: number }
): RawFieldDescriptor[] {
  const maxArrayItems = options?.maxArrayItems ?? DEFAULT_MAX_ARRAY_ITEMS;
  const fields = new Map<string, unknown[]>();

  const observe = (name: string, value: unknown): void => {
    const samples = fields.get(name);
    if (samples) {
      samples.push(value);
    } else {
      fields.set(name, [value]);
    }
  };

  const visit = (value: unknown, prefix: string): void => {
    if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        const name = prefix ? `${prefix}.${key}` : key;
        observe(name, child);
        if (isPlainObject(child) || Array.isArray(child)) {
          visit(child, name);
        }
      }
    } else if (Array.isArray(value)) {
      const objects = value.filter(isPlainObject).slice(0, maxArrayItems);
      for (const item of objects) {
        visit(item, prefix);
      }
    }
  };

  visit(data, '');

  return Array.from(fields.entries()).map(([name, samples]) => ({ name, samples }));
}
