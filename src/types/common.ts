/**
 * Shared utility types.
 */

export interface PaginationOptions {
  limit?: number;
  offset?: number;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  maxLength?: number;
  /** Strings only. */
  enum?: string[];
  /** Numbers only. */
  min?: number;
  max?: number;
  /** Numbers only. */
  integer?: boolean;
  /** Arrays only: the type every element must have. */
  items?: FieldType;
  /** Arrays only. */
  minItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
