/**
 * Crawl orchestration: runs crawls as background tasks.
 *
 * A crawl lists the containers of one source, extracts and normalizes each
 * container in turn, and ingests everything that succeeded in one atomic
 * replace. Container failures are recorded and the crawl moves on; only a
 * catalog write failure is fatal.
 *
 * At most one crawl per source id runs at a time. Every adapter call gets
 * its own deadline and is abandoned as soon as the crawl is cancelled.
 */

import { randomUUID } from 'node:crypto';
import type { ExtractOptions, ISourceAdapter } from '../adapters/ISourceAdapter.js';
import type { ICatalogStore } from '../stores/ICatalogStore.js';
import type { ILogProvider, LogLevel } from '../providers/ILogProvider.js';
import type { CanonicalRecord, SourceType } from '../types/models.js';
import type {
  ContainerOutcome,
  CrawlOutcome,
  CrawlProgressEvent,
  CrawlState,
  CrawlStatus,
  CrawlTaskStatus,
  CrawlTotals,
  IngestResult,
  SourceKind,
  SourceSpec,
} from '../types/api.js';
import type { Normalizer } from './Normalizer.js';
import { ProgressChannel, type ProgressListener } from './ProgressChannel.js';
import {
  AppError,
  ConcurrentCrawlError,
  CrawlCancelledError,
  SourceUnreachableError,
  ValidationError,
  errorMessage,
} from '../errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface CrawlOptions {
  /** Per adapter call. Defaults to the orchestrator's timeout. */
  timeoutMs?: number;
}

export interface CrawlTask {
  readonly id: string;
  readonly sourceId: string;
  /** Resolves with the outcome; rejects only with a CatalogWriteError. */
  readonly outcome: Promise<CrawlOutcome>;
  status(): CrawlTaskStatus;
  cancel(): void;
}

/** Mutable state of one crawl while it runs. */
class CrawlRun {
  state: CrawlState = 'pending';
  outcome: CrawlOutcome | undefined;
  readonly totals: CrawlTotals = {
    containersDone: 0,
    containersTotal: 0,
    records: 0,
    rejectedFields: 0,
  };
  private readonly controller = new AbortController();

  constructor(
    readonly id: string,
    readonly sourceId: string,
    readonly sourceType: SourceType,
    readonly startedAt: Date
  ) {}

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    if (!this.cancelled) {
      this.controller.abort(new CrawlCancelledError(this.sourceId));
    }
  }

  status(): CrawlTaskStatus {
    return {
      taskId: this.id,
      sourceId: this.sourceId,
      state: this.state,
      totals: { ...this.totals },
      ...(this.outcome && { outcome: this.outcome }),
    };
  }
}

export class CrawlOrchestrator {
  private readonly adapters = new Map<SourceKind, ISourceAdapter>();
  private readonly active = new Map<string, CrawlRun>();
  private readonly finished = new Map<string, CrawlTaskStatus>();
  private readonly progress: ProgressChannel;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: ICatalogStore,
    private readonly normalizer: Normalizer,
    adapters: readonly ISourceAdapter[],
    private readonly logProvider: ILogProvider,
    options?: { timeoutMs?: number; now?: () => Date }
  ) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.kind, adapter);
    }
    this.progress = new ProgressChannel(logProvider);
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Schedule a crawl and return immediately.
   * Throws ConcurrentCrawlError when the source is already being crawled.
   */
  start(spec: SourceSpec, options?: CrawlOptions): CrawlTask {
    const adapter = this.adapterFor(spec);
    const sourceId = adapter.sourceId(spec);
    if (!sourceId.trim()) {
      throw new ValidationError('Source id must not be empty');
    }
    if (this.active.has(sourceId)) {
      throw new ConcurrentCrawlError(sourceId);
    }

    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    const run = new CrawlRun(randomUUID(), sourceId, adapter.sourceType, this.now());
    this.active.set(sourceId, run);

    const outcome = Promise.resolve()
      .then(() => this.run(run, adapter, spec, timeoutMs))
      .finally(() => {
        this.active.delete(sourceId);
        this.finished.set(sourceId, run.status());
      });

    return {
      id: run.id,
      sourceId,
      outcome,
      status: () => run.status(),
      cancel: () => run.cancel(),
    };
  }

  /** Run a crawl to completion. */
  async crawl(spec: SourceSpec, options?: CrawlOptions): Promise<CrawlOutcome> {
    return this.start(spec, options).outcome;
  }

  /** Mark the running crawl of a source cancelled. False when none is running. */
  cancel(sourceId: string): boolean {
    const run = this.active.get(sourceId);
    if (!run) return false;

    run.cancel();
    this.log('info', 'Crawl cancellation requested', run);
    return true;
  }

  /** The running crawl's status, else the last finished one for the source. */
  status(sourceId: string): CrawlTaskStatus | undefined {
    return this.active.get(sourceId)?.status() ?? this.finished.get(sourceId);
  }

  activeCrawls(): CrawlTaskStatus[] {
    return Array.from(this.active.values(), (run) => run.status());
  }

  subscribe(sourceId: string, listener: ProgressListener): () => void {
    return this.progress.subscribe(sourceId, listener);
  }

  // ── Private ──

  private adapterFor(spec: SourceSpec): ISourceAdapter {
    const adapter = this.adapters.get(spec.kind);
    if (!adapter) {
      throw new ValidationError(`No adapter registered for source kind "${spec.kind}"`);
    }
    return adapter;
  }

  private async run(
    run: CrawlRun,
    adapter: ISourceAdapter,
    spec: SourceSpec,
    timeoutMs: number
  ): Promise<CrawlOutcome> {
    run.state = 'running';
    this.log('info', 'Crawl started', run, { kind: spec.kind });
    this.publish({ type: 'crawl-started', sourceId: run.sourceId, totals: { ...run.totals } });

    let containers: string[];
    try {
      containers = await this.withDeadline(run, timeoutMs, (options) =>
        adapter.listContainers(spec, options)
      );
    } catch (err) {
      const message = run.cancelled
        ? 'Crawl cancelled before any container completed'
        : `Could not list containers: ${errorMessage(err)}`;
      return this.finish(run, 'failed', message, [], undefined);
    }

    run.totals.containersTotal = containers.length;

    const outcomes: ContainerOutcome[] = [];
    const collected: CanonicalRecord[] = [];
    for (const container of containers) {
      if (run.cancelled) {
        outcomes.push({ name: container, status: 'skipped', recordCount: 0, rejectedFields: 0 });
        continue;
      }
      const records = await this.crawlContainer(run, adapter, spec, container, timeoutMs);
      outcomes.push(records.outcome);
      collected.push(...records.records);
    }

    const succeeded = outcomes.filter((o) => o.status === 'succeeded').length;
    const failed = outcomes.filter((o) => o.status === 'failed');

    if (containers.length > 0 && succeeded === 0) {
      const message = run.cancelled
        ? 'Crawl cancelled before any container completed'
        : `All ${containers.length} containers failed: ${failed[0]?.error?.message ?? 'unknown error'}`;
      return this.finish(run, 'failed', message, outcomes, undefined);
    }

    let ingest: IngestResult;
    try {
      ingest = await this.store.ingest(run.sourceId, collected);
    } catch (err) {
      run.state = 'failed';
      this.log('error', 'Catalog write failed', run, { error: errorMessage(err) });
      throw err;
    }

    const complete = succeeded === containers.length;
    const status: CrawlStatus = complete ? 'success' : 'partial';
    let message = `Crawled ${collected.length} records from ${succeeded} containers`;
    if (!complete) {
      message = `Crawled ${collected.length} records from ${succeeded} of ${containers.length} containers`;
      message += run.cancelled ? ' (cancelled)' : ` (${failed.length} failed)`;
    }

    return this.finish(run, status, message, outcomes, ingest);
  }

  private async crawlContainer(
    run: CrawlRun,
    adapter: ISourceAdapter,
    spec: SourceSpec,
    container: string,
    timeoutMs: number
  ): Promise<{ outcome: ContainerOutcome; records: CanonicalRecord[] }> {
    this.publish({
      type: 'container-started',
      sourceId: run.sourceId,
      container,
      totals: { ...run.totals },
    });

    try {
      const raw = await this.withDeadline(run, timeoutMs, (options) =>
        adapter.extract(spec, container, options)
      );
      const { records, rejected } = this.normalizer.normalize(
        adapter.sourceType,
        run.sourceId,
        container,
        raw
      );

      for (const rejection of rejected) {
        this.log('warn', 'Field rejected', run, {
          container,
          field: rejection.fieldName,
          reason: rejection.reason,
        });
      }

      run.totals.containersDone++;
      run.totals.records += records.length;
      run.totals.rejectedFields += rejected.length;

      this.log('debug', 'Container crawled', run, { container, records: records.length });
      this.publish({
        type: 'container-finished',
        sourceId: run.sourceId,
        container,
        recordCount: records.length,
        rejectedFields: rejected.length,
        totals: { ...run.totals },
      });

      return {
        outcome: {
          name: container,
          status: 'succeeded',
          recordCount: records.length,
          rejectedFields: rejected.length,
        },
        records,
      };
    } catch (err) {
      if (run.cancelled) {
        return {
          outcome: { name: container, status: 'skipped', recordCount: 0, rejectedFields: 0 },
          records: [],
        };
      }

      const error =
        err instanceof AppError
          ? { code: err.code, message: err.message }
          : { code: 'SOURCE_MALFORMED', message: errorMessage(err) };

      run.totals.containersDone++;
      this.log('warn', 'Container failed', run, { container, code: error.code, error: error.message });
      this.publish({
        type: 'container-failed',
        sourceId: run.sourceId,
        container,
        code: error.code,
        message: error.message,
        totals: { ...run.totals },
      });

      return {
        outcome: { name: container, status: 'failed', recordCount: 0, rejectedFields: 0, error },
        records: [],
      };
    }
  }

  private finish(
    run: CrawlRun,
    status: CrawlStatus,
    message: string,
    containers: ContainerOutcome[],
    ingest: IngestResult | undefined
  ): CrawlOutcome {
    const outcome: CrawlOutcome = {
      sourceId: run.sourceId,
      sourceType: run.sourceType,
      status,
      message,
      recordCount: ingest ? ingest.added : 0,
      rejectedFields: run.totals.rejectedFields,
      containers,
      cancelled: run.cancelled,
      ...(ingest && { ingest }),
      startedAt: run.startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
    };

    run.state = status === 'failed' ? 'failed' : 'succeeded';
    run.outcome = outcome;

    const level: LogLevel = status === 'success' ? 'info' : status === 'partial' ? 'warn' : 'error';
    this.log(level, `Crawl finished: ${message}`, run, {
      status,
      records: outcome.recordCount,
      rejectedFields: outcome.rejectedFields,
      cancelled: outcome.cancelled,
    });
    this.publish({
      type: 'crawl-finished',
      sourceId: run.sourceId,
      outcome,
      totals: { ...run.totals },
    });

    return outcome;
  }

  /** Call the adapter with a signal that fires on timeout or cancellation. */
  private async withDeadline<T>(
    run: CrawlRun,
    timeoutMs: number,
    call: (options: ExtractOptions) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const onCancel = () => controller.abort(run.signal.reason);

    if (run.cancelled) {
      onCancel();
    } else {
      run.signal.addEventListener('abort', onCancel, { once: true });
    }

    const timer = setTimeout(() => {
      controller.abort(new SourceUnreachableError(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      const work = Promise.resolve().then(() => call({ signal: controller.signal, timeoutMs }));
      return await untilAborted(work, controller.signal);
    } finally {
      clearTimeout(timer);
      run.signal.removeEventListener('abort', onCancel);
    }
  }

  private publish(event: CrawlProgressEvent): void {
    this.progress.publish(event);
  }

  private log(
    level: LogLevel,
    message: string,
    run: CrawlRun,
    fields?: Record<string, unknown>
  ): void {
    this.logProvider.log({
      level,
      message,
      fields: { sourceId: run.sourceId, taskId: run.id, ...fields },
    });
  }
}

/** Settle with `work`, or reject with the abort reason as soon as `signal` fires. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new SourceUnreachableError('Adapter call aborted');
}
