/**
 * Error handler middleware.
 * Maps errors thrown by handlers to structured JSON responses.
 * AppError subclasses keep their code, status and details; anything else is
 * a 500 with a generic message. Every error body carries the request id so a
 * failed crawl or lookup can be found in the request log.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const error: ApiErrorResponse['error'] =
        err instanceof AppError
          ? { code: err.code, message: err.message, ...(err.details && { details: err.details }) }
          : { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' };
      const status = err instanceof AppError ? err.statusCode : 500;

      const body: ApiErrorResponse = { error, requestId: ctx.requestId };
      return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': ctx.requestId },
      });
    }
  };
}
