export type { ExtractOptions, ISourceAdapter } from './ISourceAdapter.js';
export { SqliteSourceAdapter } from './SqliteSourceAdapter.js';
export { PostgresSourceAdapter, maskConnectionString } from './PostgresSourceAdapter.js';
export type { PgClientConfig, PgClientFactory, PgQueryable } from './PostgresSourceAdapter.js';
export { ApiSourceAdapter, endpointName } from './ApiSourceAdapter.js';
export { FileSourceAdapter, coerceCell, detectDelimiter } from './FileSourceAdapter.js';

import type { ISourceAdapter } from './ISourceAdapter.js';
import { SqliteSourceAdapter } from './SqliteSourceAdapter.js';
import { PostgresSourceAdapter } from './PostgresSourceAdapter.js';
import { ApiSourceAdapter } from './ApiSourceAdapter.js';
import { FileSourceAdapter } from './FileSourceAdapter.js';

/** One adapter per source kind, sampling `sampleRows` rows where the source allows. */
export function createDefaultAdapters(options: { sampleRows: number }): ISourceAdapter[] {
  return [
    new SqliteSourceAdapter(options.sampleRows),
    new PostgresSourceAdapter(),
    new ApiSourceAdapter(),
    new FileSourceAdapter(options.sampleRows),
  ];
}
