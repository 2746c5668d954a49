/**
 * Crawl progress channel.
 * Advisory fan-out of progress events per source. A listener that throws,
 * or returns a promise that rejects, is logged and never affects the crawl.
 */

import type { CrawlProgressEvent } from '../types/api.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { errorMessage } from '../errors.js';

export type ProgressListener = (event: CrawlProgressEvent) => void | Promise<void>;

/** Subscribe under this id to receive events for every source. */
export const ALL_SOURCES = '*';

export class ProgressChannel {
  private readonly listeners = new Map<string, Set<ProgressListener>>();

  constructor(private readonly logProvider: ILogProvider) {}

  /** Returns the unsubscribe function. */
  subscribe(sourceId: string, listener: ProgressListener): () => void {
    let set = this.listeners.get(sourceId);
    if (!set) {
      set = new Set();
      this.listeners.set(sourceId, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(sourceId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(sourceId);
    };
  }

  publish(event: CrawlProgressEvent): void {
    const targets = [
      ...(this.listeners.get(event.sourceId) ?? []),
      ...(event.sourceId === ALL_SOURCES ? [] : (this.listeners.get(ALL_SOURCES) ?? [])),
    ];

    for (const listener of targets) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportFailure(event, err));
        }
      } catch (err) {
        this.reportFailure(event, err);
      }
    }
  }

  listenerCount(sourceId: string): number {
    return this.listeners.get(sourceId)?.size ?? 0;
  }

  private reportFailure(event: CrawlProgressEvent, err: unknown): void {
    this.logProvider.warn('Progress listener failed', {
      sourceId: event.sourceId,
      event: event.type,
      error: errorMessage(err),
    });
  }
}
