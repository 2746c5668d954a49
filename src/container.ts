/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes the
 * real source adapters; tests pass in-memory doubles.
 */

import type { ISourceAdapter } from './adapters/ISourceAdapter.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ICatalogStore } from './stores/ICatalogStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { DEFAULT_CONFIG, type CatalogConfig } from './config.js';
import { InMemoryCatalogStore } from './stores/InMemoryCatalogStore.js';
import { Normalizer } from './services/Normalizer.js';
import { RelationshipInferencer } from './services/RelationshipInferencer.js';
import { CrawlOrchestrator } from './services/CrawlOrchestrator.js';
import { DictionaryService } from './services/DictionaryService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: CatalogConfig;
  store: ICatalogStore;
  normalizer: Normalizer;
  inferencer: RelationshipInferencer;
  orchestrator: CrawlOrchestrator;
  dictionaryService: DictionaryService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  adapters: ISourceAdapter[];
  logProvider: ILogProvider;
  config?: Partial<CatalogConfig>;
  /** Defaults to an in-memory store using the container's inferencer. */
  store?: ICatalogStore;
  now?: () => Date;
}): Container {
  const config: CatalogConfig = { ...DEFAULT_CONFIG, ...deps.config };
  const now = deps.now ?? (() => new Date());

  const inferencer = new RelationshipInferencer({ threshold: config.heuristicThreshold });
  const store = deps.store ?? new InMemoryCatalogStore(inferencer, now);
  const normalizer = new Normalizer({ sampleValueLength: config.sampleValueLength });
  const orchestrator = new CrawlOrchestrator(store, normalizer, deps.adapters, deps.logProvider, {
    timeoutMs: config.crawlTimeoutMs,
    now,
  });
  const dictionaryService = new DictionaryService(store, now);
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    config,
    store,
    normalizer,
    inferencer,
    orchestrator,
    dictionaryService,
    logProvider: deps.logProvider,
    logging,
  };
}
