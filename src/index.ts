export * from './types/models.js';
export * from './types/api.js';
export type { BodySchema, FieldSchema, PaginatedResult, PaginationOptions } from './types/common.js';
export * from './errors.js';
export { DEFAULT_CONFIG, loadConfig } from './config.js';
export type { CatalogConfig } from './config.js';

export {
  containerKeyOf,
  formatRecordKey,
  isSourceType,
  keyString,
  parseRecordKey,
  recordKeyOf,
} from './lineage/keys.js';
export { LineageGraph } from './lineage/LineageGraph.js';
export { classifySamples, classifyValue, inferJsonFields } from './schema/infer.js';
export type { PrimitiveType } from './schema/infer.js';

export { Normalizer } from './services/Normalizer.js';
export type { NormalizeResult } from './services/Normalizer.js';
export {
  DEFAULT_HEURISTIC_THRESHOLD,
  RelationshipInferencer,
} from './services/RelationshipInferencer.js';
export type { InferenceResult } from './services/RelationshipInferencer.js';
export { CrawlOrchestrator } from './services/CrawlOrchestrator.js';
export type { CrawlOptions, CrawlTask } from './services/CrawlOrchestrator.js';
export { ALL_SOURCES, ProgressChannel } from './services/ProgressChannel.js';
export type { ProgressListener } from './services/ProgressChannel.js';
export { DictionaryService } from './services/DictionaryService.js';

export type { CatalogSnapshot, ICatalogStore } from './stores/ICatalogStore.js';
export { InMemoryCatalogStore } from './stores/InMemoryCatalogStore.js';

export * from './adapters/index.js';
export * from './providers/index.js';

export { createContainer } from './container.js';
export type { Container } from './container.js';
export { createRouter } from './api/router.js';
