/**
 * Request logging middleware.
 * One event per request: method, path, status, duration and request id.
 * Query parameters (record filters, lineage keys, depths) go in `fields.query`
 * so the path stays groupable.
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import { AppError, errorMessage } from '../errors.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const url = new URL(req.url);
      const start = performance.now();
      const elapsed = () => Math.round(performance.now() - start);

      try {
        const response = await next(req, ctx);
        logProvider.log(requestEvent(req.method, url, ctx, response.status, elapsed()));
        return response;
      } catch (err) {
        const event = requestEvent(req.method, url, ctx, 500, elapsed());
        event.level = 'error';
        event.fields = {
          ...event.fields,
          error: errorMessage(err),
          ...(err instanceof AppError && { errorCode: err.code }),
        };
        logProvider.log(event);
        throw err;
      }
    };
  };
}

function requestEvent(
  method: string,
  url: URL,
  ctx: HandlerContext,
  status: number,
  durationMs: number
): RequestLogEvent {
  const query = Object.fromEntries(url.searchParams);
  return {
    level: levelForStatus(status),
    message: `${method} ${url.pathname} → ${status} (${durationMs}ms)`,
    method,
    path: url.pathname,
    status,
    durationMs,
    requestId: ctx.requestId,
    ...(Object.keys(query).length > 0 && { fields: { query } }),
  };
}
