/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 * The catalog lives in memory, so it is shared across warm invocations only.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

// Container is created once per cold start
const router = createRouter(getProductionContainer());

export default async (req: Request, context: Context) => {
  return router.handle(req, { requestId: context.requestId || randomUUID() });
};

export const config = {
  path: '/api/v1/*',
};
