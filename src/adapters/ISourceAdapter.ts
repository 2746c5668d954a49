/**
 * Source adapter interface.
 * One adapter per source kind. Adapters are stateless: they list the
 * containers of a source and hand back raw field descriptors per container.
 * Failures must surface as SourceUnreachableError or SourceMalformedError.
 */

import type { RawFieldDescriptor, SourceType } from '../types/models.js';
import type { SourceKind, SourceSpec } from '../types/api.js';

export interface ExtractOptions {
  /** Aborted on timeout or when the caller cancels the crawl. */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface ISourceAdapter {
  readonly kind: SourceKind;
  readonly sourceType: SourceType;

  /** Stable identity of the source; re-crawls must produce the same id. */
  sourceId(spec: SourceSpec): string;

  /** Tables, endpoints or files the source exposes, in crawl order. */
  listContainers(spec: SourceSpec, options: ExtractOptions): Promise<string[]>;

  extract(
    spec: SourceSpec,
    container: string,
    options: ExtractOptions
  ): Promise<RawFieldDescriptor[]>;
}
