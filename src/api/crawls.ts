/**
 * Crawl endpoints.
 * POST   /api/v1/crawls            Start a crawl (waits for the outcome unless wait=false)
 * GET    /api/v1/crawls            Crawls currently running
 * GET    /api/v1/crawls/:sourceId  State of the running or last crawl of a source
 * DELETE /api/v1/crawls/:sourceId  Cancel the running crawl of a source
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { isObject, validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { parseSourceSpec, pathParam } from './params.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

const startSchema: BodySchema = {
  source: { type: 'object', required: true },
  wait: { type: 'boolean', required: false },
  timeoutMs: { type: 'number', required: false, integer: true, min: 1, max: 600_000 },
};

export function createCrawlHandlers(container: Container) {
  const { orchestrator, logProvider } = container;

  const start: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(startSchema)
  )(async (req, ctx) => {
    const body: unknown = await req.json();
    if (!isObject(body)) {
      throw new ValidationError('Request body must be a JSON object');
    }

    const spec = parseSourceSpec(body.source);
    const timeoutMs = typeof body.timeoutMs === 'number' ? body.timeoutMs : undefined;
    const task = orchestrator.start(spec, { timeoutMs });

    if (body.wait === false) {
      void task.outcome.catch((err: unknown) => {
        logProvider.error('Background crawl failed', {
          sourceId: task.sourceId,
          taskId: task.id,
          requestId: ctx.requestId,
          error: errorMessage(err),
        });
      });

      return new Response(JSON.stringify(task.status()), {
        status: 202,
        headers: JSON_HEADERS,
      });
    }

    const outcome = await task.outcome;
    return new Response(JSON.stringify(outcome), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const list: Handler = pipeline(container.logging, errorHandler)(async () => {
    return new Response(JSON.stringify({ crawls: orchestrator.activeCrawls() }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const status: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const sourceId = pathParam(req);
    const result = orchestrator.status(sourceId);
    if (!result) {
      throw new NotFoundError(`No crawl recorded for "${sourceId}"`);
    }

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const cancel: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const sourceId = pathParam(req);
    if (!orchestrator.cancel(sourceId)) {
      throw new NotFoundError(`No crawl is running for "${sourceId}"`);
    }

    return new Response(JSON.stringify({ cancelled: true, status: orchestrator.status(sourceId) }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  return { start, list, status, cancel };
}
