/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createCrawlHandlers } from './crawls.js';
import { createCatalogHandlers } from './catalog.js';
import { createLineageHandlers } from './lineage.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const crawls = createCrawlHandlers(container);
  const catalog = createCatalogHandlers(container);
  const lineage = createLineageHandlers(container);

  const routes: Route[] = [
    // Crawls
    { method: 'POST', pattern: /^\/api\/v1\/crawls\/?$/, handler: crawls.start },
    { method: 'GET', pattern: /^\/api\/v1\/crawls\/?$/, handler: crawls.list },
    { method: 'GET', pattern: /^\/api\/v1\/crawls\/[^/]+\/?$/, handler: crawls.status },
    { method: 'DELETE', pattern: /^\/api\/v1\/crawls\/[^/]+\/?$/, handler: crawls.cancel },

    // Catalog
    { method: 'GET', pattern: /^\/api\/v1\/records\/?$/, handler: catalog.records },
    { method: 'GET', pattern: /^\/api\/v1\/sources\/?$/, handler: catalog.sources },
    { method: 'DELETE', pattern: /^\/api\/v1\/sources\/[^/]+\/?$/, handler: catalog.removeSource },
    { method: 'GET', pattern: /^\/api\/v1\/dictionary\/?$/, handler: catalog.dictionary },
    { method: 'GET', pattern: /^\/api\/v1\/stats\/?$/, handler: catalog.stats },
    { method: 'GET', pattern: /^\/api\/v1\/export\/?$/, handler: catalog.exportSnapshot },
    { method: 'DELETE', pattern: /^\/api\/v1\/catalog\/?$/, handler: catalog.clear },

    // Lineage
    { method: 'GET', pattern: /^\/api\/v1\/lineage\/upstream\/?$/, handler: lineage.upstream },
    { method: 'GET', pattern: /^\/api\/v1\/lineage\/downstream\/?$/, handler: lineage.downstream },
    {
      method: 'GET',
      pattern: /^\/api\/v1\/lineage\/containers\/[^/]+\/edges\/?$/,
      handler: lineage.containerEdges,
    },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
