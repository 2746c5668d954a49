/**
 * Body validation middleware.
 * Parses the JSON body and validates it against a schema.
 * Returns 400 with field-level errors if validation fails.
 */

import type { BodySchema, FieldSchema, FieldType } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let body: unknown;

      try {
        body = await req.json();
      } catch {
        return errorResponse('Request body must be valid JSON');
      }

      if (!isObject(body)) {
        return errorResponse('Request body must be a JSON object');
      }

      const errors = validateFields(body, schema);

      if (errors.length > 0) {
        return errorResponse(errors.join('; '), { fields: errors });
      }

      // Re-create request with parsed body so handler can read it again
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(body),
      });

      return next(newReq, ctx);
    };
  };
}

/** Field-level errors for `body`; empty when it conforms. `prefix` names nested objects. */
export function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema,
  prefix = ''
): string[] {
  const errors: string[] = [];

  for (const [name, fieldSchema] of Object.entries(schema)) {
    const field = prefix + name;
    const value = body[name];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    // Skip optional missing fields
    if (value === undefined || value === null) {
      continue;
    }

    if (!hasType(value, fieldSchema.type)) {
      errors.push(`${field} must be ${article(fieldSchema.type)} ${fieldSchema.type}`);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isObject(value);
  }
}

function article(type: FieldType): string {
  return type === 'array' || type === 'object' ? 'an' : 'a';
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (typeof value === 'number') {
    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${field} must be an integer`);
    }
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  if (Array.isArray(value)) {
    if (schema.minItems !== undefined && value.length < schema.minItems) {
      errors.push(`${field} must have at least ${schema.minItems} items`);
    }
    const itemType = schema.items;
    if (itemType && !value.every((item) => hasType(item, itemType))) {
      errors.push(`${field} must contain only ${itemType} values`);
    }
  }

  return errors;
}

function errorResponse(message: string, details?: Record<string, unknown>): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message,
        ...(details && { details }),
      },
    }),
    { status: 400, headers: JSON_HEADERS }
  );
}
