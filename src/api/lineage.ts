/**
 * Lineage endpoints.
 * GET /api/v1/lineage/upstream?key=&maxDepth=     Records a field depends on
 * GET /api/v1/lineage/downstream?key=&maxDepth=   Records that depend on a field
 * GET /api/v1/lineage/containers/:name/edges      Edges touching a container
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { CanonicalRecord } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { pathParam, readIntParam } from './params.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

type Direction = 'upstream' | 'downstream';

export function createLineageHandlers(container: Container) {
  const { store } = container;

  const traverse = (direction: Direction): Handler =>
    pipeline(container.logging, errorHandler)(async (req) => {
      const url = new URL(req.url);
      const key = url.searchParams.get('key');
      if (!key) {
        throw new ValidationError('key query parameter is required');
      }
      const maxDepth = readIntParam(url, 'maxDepth', { min: 0 });

      const records: CanonicalRecord[] =
        direction === 'upstream' ? store.upstream(key, maxDepth) : store.downstream(key, maxDepth);

      return new Response(
        JSON.stringify({ key, direction, maxDepth: maxDepth ?? null, records }),
        { status: 200, headers: JSON_HEADERS }
      );
    });

  const containerEdges: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const name = pathParam(req, 1);
    return new Response(JSON.stringify({ container: name, edges: store.relationshipsFor(name) }), {
      status: 200,
      headers: JSON_HEADERS,
    });
  });

  return {
    upstream: traverse('upstream'),
    downstream: traverse('downstream'),
    containerEdges,
  };
}
