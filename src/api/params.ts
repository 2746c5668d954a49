/**
 * Request parsing shared by the handlers: path parameters, query-string
 * filters and source specs from JSON bodies.
 */

import type { BodySchema, PaginationOptions } from '../types/common.js';
import { SOURCE_KINDS } from '../types/api.js';
import type { QueryFilter, SourceKind, SourceSpec } from '../types/api.js';
import { isSourceType } from '../lineage/keys.js';
import { isObject, validateFields } from '../middleware/validate-body.js';
import { ValidationError } from '../errors.js';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

/** Decoded path segment, counted from the end (0 = last). */
export function pathParam(req: Request, fromEnd = 0): string {
  const parts = new URL(req.url).pathname.split('/').filter((p) => p.length > 0);
  const raw = parts[parts.length - 1 - fromEnd] ?? '';
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new ValidationError(`Malformed path segment: "${raw}"`);
  }
}

export function parseFilter(url: URL): QueryFilter {
  const filter: QueryFilter = {};

  const sourceType = url.searchParams.get('sourceType');
  if (sourceType) {
    if (!isSourceType(sourceType)) {
      throw new ValidationError('sourceType must be one of: database, api, file');
    }
    filter.sourceType = sourceType;
  }

  const container = url.searchParams.get('container');
  if (container) filter.container = container;

  const field = url.searchParams.get('field');
  if (field) filter.field = field;

  return filter;
}

export function parsePagination(url: URL): Required<PaginationOptions> {
  return {
    limit: readIntParam(url, 'limit', { min: 1, max: MAX_LIMIT }) ?? DEFAULT_LIMIT,
    offset: readIntParam(url, 'offset', { min: 0 }) ?? 0,
  };
}

export function readIntParam(
  url: URL,
  name: string,
  bounds: { min?: number; max?: number }
): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ValidationError(`${name} must be at least ${bounds.min}`);
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ValidationError(`${name} must be at most ${bounds.max}`);
  }
  return value;
}

// ── Source specs ──

const commonSchema: BodySchema = {
  kind: { type: 'string', required: true, enum: [...SOURCE_KINDS] },
  sourceId: { type: 'string', maxLength: 2000 },
};

const kindSchemas: Record<SourceKind, BodySchema> = {
  sqlite: {
    path: { type: 'string', required: true, maxLength: 4096 },
  },
  postgres: {
    connectionString: { type: 'string', required: true, maxLength: 4096 },
    schema: { type: 'string', maxLength: 128 },
  },
  api: {
    url: { type: 'string', required: true, maxLength: 4096 },
    method: { type: 'string', enum: ['GET', 'POST'] },
    headers: { type: 'object' },
  },
  file: {
    paths: { type: 'array', required: true, items: 'string', minItems: 1 },
  },
};

/** Validate an untrusted value as a SourceSpec. */
export function parseSourceSpec(value: unknown): SourceSpec {
  if (!isObject(value)) {
    throw new ValidationError('source must be an object');
  }

  const errors = validateFields(value, commonSchema, 'source.');
  const kind = SOURCE_KINDS.find((k) => k === value.kind);
  if (kind) {
    errors.push(...validateFields(value, kindSchemas[kind], 'source.'));
  }
  if (errors.length > 0 || !kind) {
    throw new ValidationError(errors.join('; '), { fields: errors });
  }

  const sourceId = optionalString(value, 'sourceId');
  const common = sourceId ? { sourceId } : {};

  switch (kind) {
    case 'sqlite':
      return { kind, path: requiredString(value, 'path'), ...common };
    case 'postgres': {
      const schema = optionalString(value, 'schema');
      return {
        kind,
        connectionString: requiredString(value, 'connectionString'),
        ...(schema ? { schema } : {}),
        ...common,
      };
    }
    case 'api': {
      const method = value.method === 'POST' ? 'POST' : 'GET';
      return {
        kind,
        url: requiredString(value, 'url'),
        method,
        headers: readHeaders(value.headers),
        ...common,
      };
    }
    case 'file': {
      const paths = Array.isArray(value.paths)
        ? value.paths.filter((p): p is string => typeof p === 'string')
        : [];
      return { kind, paths, ...common };
    }
  }
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function requiredString(obj: Record<string, unknown>, key: string): string {
  const value = optionalString(obj, key);
  if (value === undefined) {
    throw new ValidationError(`source.${key} must not be empty`);
  }
  return value;
}

function readHeaders(value: unknown): Record<string, string> {
  if (!isObject(value)) return {};

  const headers: Record<string, string> = {};
  for (const [name, header] of Object.entries(value)) {
    if (typeof header !== 'string') {
      throw new ValidationError(`source.headers.${name} must be a string`);
    }
    headers[name] = header;
  }
  return headers;
}
