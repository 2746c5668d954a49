import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CrawlOrchestrator } from '../../src/services/CrawlOrchestrator.js';
import { Normalizer } from '../../src/services/Normalizer.js';
import { RelationshipInferencer } from '../../src/services/RelationshipInferencer.js';
import type { InferenceResult } from '../../src/services/RelationshipInferencer.js';
import { InMemoryCatalogStore } from '../../src/stores/InMemoryCatalogStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  CatalogWriteError,
  ConcurrentCrawlError,
  SourceMalformedError,
  SourceUnreachableError,
  ValidationError,
} from '../../src/errors.js';
import type { RawFieldDescriptor } from '../../src/types/models.js';
import type { CrawlProgressEvent, SourceSpec } from '../../src/types/api.js';
import { MockSourceAdapter, deferred } from '../mocks/MockSourceAdapter.js';

const SPEC: SourceSpec = { kind: 'file', paths: ['shop'], sourceId: 'shop' };

const CUSTOMERS: RawFieldDescriptor[] = [
  { name: 'id', isPrimaryKey: true, samples: [1, 2] },
  { name: 'name', samples: ['Ada'] },
];
const ORDERS: RawFieldDescriptor[] = [{ name: 'customer_id', samples: [1] }];

describe('CrawlOrchestrator', () => {
  let store: InMemoryCatalogStore;
  let logProvider: ConsoleLogProvider;
  let adapter: MockSourceAdapter;
  let orchestrator: CrawlOrchestrator;

  beforeEach(() => {
    store = new InMemoryCatalogStore();
    logProvider = new ConsoleLogProvider();
    adapter = new MockSourceAdapter();
    orchestrator = new CrawlOrchestrator(store, new Normalizer(), [adapter], logProvider);
  });

  describe('crawl', () => {
    it('should ingest every container of the source', async () => {
      adapter.script('customers.csv', CUSTOMERS).script('orders.csv', ORDERS);

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('success');
      expect(outcome.message).toBe('Crawled 3 records from 2 containers');
      expect(outcome.recordCount).toBe(3);
      expect(outcome.cancelled).toBe(false);
      expect(store.relationships()).toEqual([
        {
          from: 'file/shop/orders.csv/customer_id',
          to: 'file/shop/customers.csv/id',
          kind: 'heuristic_name_match',
          confidence: 1,
        },
      ]);
    });

    it('should succeed with zero records for a container with no fields', async () => {
      adapter.script('empty.csv', []);

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('success');
      expect(outcome.recordCount).toBe(0);
      expect(outcome.containers).toEqual([
        { name: 'empty.csv', status: 'succeeded', recordCount: 0, rejectedFields: 0 },
      ]);
    });

    it('should succeed for a source with no containers', async () => {
      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('success');
      expect(outcome.message).toBe('Crawled 0 records from 0 containers');
    });

    it('should report a partial crawl when some containers fail', async () => {
      adapter
        .script('customers.csv', CUSTOMERS)
        .script('broken.csv', new SourceMalformedError('bad header'));

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('partial');
      expect(outcome.message).toBe('Crawled 2 records from 1 of 2 containers (1 failed)');
      expect(outcome.containers[1]).toEqual({
        name: 'broken.csv',
        status: 'failed',
        recordCount: 0,
        rejectedFields: 0,
        error: { code: 'SOURCE_MALFORMED', message: 'bad header' },
      });
      expect(store.statistics().totalRecords).toBe(2);
    });

    it('should keep the previous records when every container fails', async () => {
      adapter.script('customers.csv', CUSTOMERS);
      await orchestrator.crawl(SPEC);

      adapter
        .script('customers.csv', new SourceUnreachableError('file vanished'))
        .script('orders.csv', new Error('disk error'));
      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('failed');
      expect(outcome.message).toBe('All 2 containers failed: file vanished');
      expect(outcome.containers[1].error).toEqual({ code: 'SOURCE_MALFORMED', message: 'disk error' });
      expect(store.statistics().totalRecords).toBe(2);
    });

    it('should fail without touching the catalog when listing fails', async () => {
      adapter.listError = new SourceUnreachableError('connection refused');

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('failed');
      expect(outcome.message).toBe('Could not list containers: connection refused');
      expect(outcome.containers).toEqual([]);
      expect(store.snapshot().generation).toBe(0);
    });

    it('should count rejected fields and log each one', async () => {
      adapter.script('customers.csv', [...CUSTOMERS, { name: 'id' }]);

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.rejectedFields).toBe(1);
      expect(outcome.recordCount).toBe(2);
      const rejected = logProvider.events.find((e) => e.message === 'Field rejected');
      expect(rejected?.level).toBe('warn');
      expect(rejected?.fields).toMatchObject({
        sourceId: 'shop',
        container: 'customers.csv',
        field: 'id',
        reason: 'duplicate field name in container',
      });
    });

    it('should rethrow catalog write failures', async () => {
      class FailingInferencer extends RelationshipInferencer {
        override infer(): InferenceResult {
          throw new Error('out of memory');
        }
      }
      const failing = new CrawlOrchestrator(
        new InMemoryCatalogStore(new FailingInferencer()),
        new Normalizer(),
        [adapter],
        logProvider
      );
      adapter.script('customers.csv', CUSTOMERS);

      await expect(failing.crawl(SPEC)).rejects.toThrow(CatalogWriteError);
      expect(failing.status('shop')?.state).toBe('failed');
      expect(logProvider.events.some((e) => e.message === 'Catalog write failed')).toBe(true);
    });

    it('should reject a spec no adapter handles', () => {
      expect(() => orchestrator.start({ kind: 'sqlite', path: 'x.db' })).toThrow(ValidationError);
    });
  });

  describe('concurrency', () => {
    it('should refuse a second crawl of the same source while one runs', async () => {
      const gate = deferred<RawFieldDescriptor[]>();
      adapter.script('customers.csv', () => gate.promise);

      const task = orchestrator.start(SPEC);
      expect(() => orchestrator.start(SPEC)).toThrow(ConcurrentCrawlError);
      expect(orchestrator.activeCrawls().map((s) => s.sourceId)).toEqual(['shop']);

      gate.resolve(CUSTOMERS);
      await task.outcome;

      expect(orchestrator.activeCrawls()).toEqual([]);
      await expect(orchestrator.crawl(SPEC)).resolves.toMatchObject({ status: 'success' });
    });

    it('should run crawls of different sources side by side', async () => {
      adapter.script('customers.csv', CUSTOMERS);

      const [a, b] = await Promise.all([
        orchestrator.crawl({ kind: 'file', paths: ['a'], sourceId: 'a' }),
        orchestrator.crawl({ kind: 'file', paths: ['b'], sourceId: 'b' }),
      ]);

      expect([a.status, b.status]).toEqual(['success', 'success']);
      expect(store.sources().map((s) => s.sourceId).sort()).toEqual(['a', 'b']);
    });
  });

  describe('cancel', () => {
    it('should fail a crawl cancelled before any container completed', async () => {
      const gate = deferred<RawFieldDescriptor[]>();
      adapter.script('customers.csv', () => gate.promise).script('orders.csv', ORDERS);

      const task = orchestrator.start(SPEC);
      await vi.waitFor(() => expect(adapter.extracted).toEqual(['customers.csv']));
      expect(orchestrator.cancel('shop')).toBe(true);

      const outcome = await task.outcome;
      expect(outcome.status).toBe('failed');
      expect(outcome.cancelled).toBe(true);
      expect(outcome.message).toBe('Crawl cancelled before any container completed');
      expect(outcome.containers.map((c) => c.status)).toEqual(['skipped', 'skipped']);
      expect(store.snapshot().generation).toBe(0);
    });

    it('should keep the containers finished before cancellation', async () => {
      const gate = deferred<RawFieldDescriptor[]>();
      adapter.script('customers.csv', CUSTOMERS).script('orders.csv', () => gate.promise);

      const task = orchestrator.start(SPEC);
      await vi.waitFor(() => expect(adapter.extracted).toEqual(['customers.csv', 'orders.csv']));
      task.cancel();

      const outcome = await task.outcome;
      expect(outcome.status).toBe('partial');
      expect(outcome.message).toBe('Crawled 2 records from 1 of 2 containers (cancelled)');
      expect(store.statistics().totalRecords).toBe(2);
    });

    it('should abort the signal handed to the adapter', async () => {
      let seen: AbortSignal | undefined;
      adapter.script('customers.csv', (options) => {
        seen = options.signal;
        return new Promise(() => undefined);
      });

      const task = orchestrator.start(SPEC);
      await vi.waitFor(() => expect(seen).toBeDefined());
      task.cancel();
      await task.outcome;

      expect(seen?.aborted).toBe(true);
    });

    it('should return false when nothing is running', () => {
      expect(orchestrator.cancel('shop')).toBe(false);
    });
  });

  it('should fail a container whose adapter call times out', async () => {
    adapter.script('slow.csv', () => new Promise(() => undefined));

    const outcome = await orchestrator.crawl(SPEC, { timeoutMs: 20 });

    expect(outcome.status).toBe('failed');
    expect(outcome.containers[0].error).toEqual({
      code: 'SOURCE_UNREACHABLE',
      message: 'Timed out after 20ms',
    });
  });

  describe('progress', () => {
    it('should publish events in crawl order', async () => {
      adapter.script('customers.csv', CUSTOMERS).script('broken.csv', new Error('boom'));
      const events: CrawlProgressEvent[] = [];
      orchestrator.subscribe('shop', (event) => {
        events.push(event);
      });

      await orchestrator.crawl(SPEC);

      expect(events.map((e) => e.type)).toEqual([
        'crawl-started',
        'container-started',
        'container-finished',
        'container-started',
        'container-failed',
        'crawl-finished',
      ]);
      expect(events[2].totals).toEqual({
        containersDone: 1,
        containersTotal: 2,
        records: 2,
        rejectedFields: 0,
      });
    });

    it('should not let a failing listener affect the crawl', async () => {
      adapter.script('customers.csv', CUSTOMERS);
      orchestrator.subscribe('shop', () => {
        throw new Error('listener bug');
      });

      const outcome = await orchestrator.crawl(SPEC);

      expect(outcome.status).toBe('success');
      expect(logProvider.events.filter((e) => e.message === 'Progress listener failed')).toHaveLength(4);
    });

    it('should stop delivering after unsubscribe', async () => {
      adapter.script('customers.csv', CUSTOMERS);
      const listener = vi.fn();
      const unsubscribe = orchestrator.subscribe('shop', listener);
      unsubscribe();

      await orchestrator.crawl(SPEC);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  it('should remember the last outcome per source', async () => {
    adapter.script('customers.csv', CUSTOMERS);
    await orchestrator.crawl(SPEC);

    const status = orchestrator.status('shop');
    expect(status?.state).toBe('succeeded');
    expect(status?.outcome?.recordCount).toBe(2);
    expect(orchestrator.status('other')).toBeUndefined();
  });

  it('should log the start and finish of a crawl', async () => {
    await orchestrator.crawl(SPEC);

    expect(logProvider.events.map((e) => [e.level, e.message])).toEqual([
      ['info', 'Crawl started'],
      ['info', 'Crawl finished: Crawled 0 records from 0 containers'],
    ]);
  });
});
