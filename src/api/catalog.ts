/**
 * Catalog endpoints.
 * GET    /api/v1/records              Records, filtered and paginated
 * GET    /api/v1/sources              One summary per crawled source
 * DELETE /api/v1/sources/:sourceId    Remove a source and its edges
 * GET    /api/v1/dictionary           Data dictionary rows
 * GET    /api/v1/stats                Catalog statistics
 * GET    /api/v1/export               Read-only snapshot for report generation
 * DELETE /api/v1/catalog              Remove everything
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { CanonicalRecord } from '../types/models.js';
import type { PaginatedResult } from '../types/common.js';
import { ConcurrentCrawlError, NotFoundError } from '../errors.js';
import { parseFilter, parsePagination, pathParam } from './params.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createCatalogHandlers(container: Container) {
  const { store, orchestrator, dictionaryService } = container;

  const records: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const url = new URL(req.url);
    const filter = parseFilter(url);
    const { limit, offset } = parsePagination(url);

    const items: CanonicalRecord[] = [];
    let total = 0;
    for (const record of store.query(filter)) {
      if (total >= offset && items.length < limit) items.push(record);
      total++;
    }

    const result: PaginatedResult<CanonicalRecord> = { items, total, limit, offset };
    return new Response(JSON.stringify(result), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const sources: Handler = pipeline(container.logging, errorHandler)(async () => {
    return new Response(JSON.stringify({ sources: store.sources() }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const removeSource: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const sourceId = pathParam(req);

    const state = orchestrator.status(sourceId)?.state;
    if (state === 'pending' || state === 'running') {
      throw new ConcurrentCrawlError(sourceId);
    }

    const removed = await store.removeSource(sourceId);
    if (removed === 0) {
      throw new NotFoundError(`Source "${sourceId}" is not in the catalog`);
    }

    return new Response(JSON.stringify({ sourceId, removed }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const dictionary: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const filter = parseFilter(new URL(req.url));
    return new Response(JSON.stringify({ entries: dictionaryService.dictionary(filter) }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const stats: Handler = pipeline(container.logging, errorHandler)(async () => {
    return new Response(JSON.stringify(store.statistics()), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  const exportSnapshot: Handler = pipeline(container.logging, errorHandler)(async () => {
    return new Response(JSON.stringify(dictionaryService.export()), {
      status: 200,
      headers: {
        ...JSON_HEADERS,
        'Content-Disposition': 'attachment; filename="catalog-export.json"',
      },
    });
  });

  const clear: Handler = pipeline(container.logging, errorHandler)(async () => {
    await store.clear();
    container.logProvider.info('Catalog cleared');
    return new Response(null, { status: 204 });
  });

  return { records, sources, removeSource, dictionary, stats, exportSnapshot, clear };
}
