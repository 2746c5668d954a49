/**
 * Production container: configuration from the environment, console
 * logging, the real source adapters. One container per process.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { createDefaultAdapters } from './adapters/index.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig(process.env);

  const logProvider = new ConsoleLogProvider({
    outputToConsole: config.logToConsole,
    minLevel: config.logLevel,
  });

  cached = createContainer({
    adapters: createDefaultAdapters({ sampleRows: config.fileSampleRows }),
    logProvider,
    config,
  });

  logProvider.info('Catalog container ready', {
    heuristicThreshold: config.heuristicThreshold,
    crawlTimeoutMs: config.crawlTimeoutMs,
  });

  return cached;
}
