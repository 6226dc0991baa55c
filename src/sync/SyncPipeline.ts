// src/sync/SyncPipeline.ts

import { EventEmitter } from 'events';
import type { RecordSource, RawRecord } from '../core/fetcher/types';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { NormalizedRow } from '../core/normalizer/types';
import type { MergeEngine } from '../core/merge/MergeEngine';
import type { DestinationLock } from '../core/lock/DestinationLock';
import { PersistentDataset, parseRowId } from '../core/dataset/RowCodec';
import type { Sink, RowWriter, WriteMode } from '../sinks/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { generateCorrelationId, withRunSpan, addSpanEvent } from '../observability/tracing';
import { SinkWriteError, errorCode, errorMessage } from '../utils/errors';
import { resolveSince } from './cursor';
import type {
  BatchError,
  FullSyncRequest,
  GapFillRequest,
  IncrementalSyncRequest,
  MergeToDestinationRequest,
  SyncProgress,
  SyncReport,
  SyncTrigger,
} from './types';

export const DEFAULT_MERGE_BATCH_SIZE = 500;
export const DEFAULT_GAP_FILL_LIMIT = 2000;

export interface SyncPipelineDeps {
  source: RecordSource;
  normalizer: Normalizer;
  mergeEngine: MergeEngine;
  lock: DestinationLock;
  logger: Logger;
  metrics: MetricsCollector;
}

export interface SyncPipelineOptions {
  mergeBatchSize?: number;
  now?: () => Date;
}

class RunContext {
  fetched = 0;
  normalized = 0;
  skipped = 0;
  written = 0;
  inserted = 0;
  updated = 0;
  batches = 0;
  batchErrors: BatchError[] = [];
  location?: string;

  constructor(
    readonly runId: string,
    readonly trigger: SyncTrigger
  ) {}
}

/**
 * Dataset being merged into under the destination lock. Rows are merged and
 * persisted a batch at a time, so an aborted run keeps every completed batch.
 */
interface MergeSession {
  sink: Sink;
  dataset: PersistentDataset | null;
  pending: NormalizedRow[];
  dirty: boolean;
}

/**
 * The synchronization triggers. Every trigger resolves to a SyncReport; a
 * failure ends the run with a terminal error in the report instead of a
 * rejection, and rows persisted before it are counted.
 */
export class SyncPipeline extends EventEmitter {
  private lastReport?: SyncReport;
  private mergeBatchSize: number;
  private now: () => Date;

  constructor(
    private deps: SyncPipelineDeps,
    options: SyncPipelineOptions = {}
  ) {
    super();
    this.mergeBatchSize = Math.max(1, options.mergeBatchSize ?? DEFAULT_MERGE_BATCH_SIZE);
    this.now = options.now ?? (() => new Date());
  }

  getLastReport(): SyncReport | undefined {
    return this.lastReport;
  }

  /**
   * Fetch every ticket and stream the rows into a new (or the same-day)
   * artifact, or republish the remote tab with overwrite.
   */
  async runFullSync(request: FullSyncRequest): Promise<SyncReport> {
    const mode = request.mode ?? 'create-new';
    return this.run('full', (ctx) =>
      this.deps.lock.runExclusive(request.sink.destinationId, () =>
        this.streamToWriter(ctx, request.sink, mode, this.deps.source.fetchTickets())
      )
    );
  }

  async runIncrementalSync(request: IncrementalSyncRequest): Promise<SyncReport> {
    const since = resolveSince(request.cursor, this.now());
    const records = () => this.deps.source.fetchTickets({ updatedSince: since });

    this.deps.logger.info('Incremental sync requested', {
      strategy: request.strategy ?? 'merge',
      since: since?.toISOString() ?? 'all',
    });

    if (request.strategy === 'append') {
      return this.run('incremental', (ctx) =>
        this.deps.lock.runExclusive(request.sink.destinationId, () =>
          this.streamToWriter(ctx, request.sink, 'append-existing', records())
        )
      );
    }

    return this.run('incremental', (ctx) =>
      this.deps.lock.runExclusive(request.sink.destinationId, async () => {
        const session = await this.openMergeSession(ctx, request.sink);
        await this.mergeRecords(ctx, session, records());
      })
    );
  }

  /**
   * Publish the source's merge dataset to the target with overwrite
   * semantics, so the target ends up equal to the source.
   */
  async runMergeToDestination(request: MergeToDestinationRequest): Promise<SyncReport> {
    return this.run('merge-to-destination', (ctx) =>
      this.deps.lock.runExclusive(request.target.destinationId, async () => {
        ctx.location = request.target.describe();

        const source = await request.source.readDataset();
        if (!source) {
          throw new SinkWriteError('Source dataset not found', { location: request.source.describe() });
        }

        const { dataset } = this.deps.mergeEngine.compact(source);
        ctx.fetched = dataset.rows.length;
        ctx.normalized = dataset.rows.length;

        const summary = await request.target.replaceDataset(dataset);
        ctx.written = summary.rowsWritten;
        ctx.batches = summary.batches;
        ctx.location = summary.location;
        this.emitProgress(ctx);
      })
    );
  }

  /**
   * Look up, one by one, ids missing from `[1, max id]` of the merge dataset
   * and merge the tickets that still exist.
   */
  async runGapFill(request: GapFillRequest): Promise<SyncReport> {
    const limit = request.maxIds ?? DEFAULT_GAP_FILL_LIMIT;

    return this.run('gap-fill', (ctx) =>
      this.deps.lock.runExclusive(request.sink.destinationId, async () => {
        const session = await this.openMergeSession(ctx, request.sink);
        const missing = this.findMissingIds(session.dataset, limit);

        this.deps.logger.info('Gap fill started', { missing: missing.length });
        await this.mergeRecords(ctx, session, this.fetchByIds(missing));
      })
    );
  }

  private async *fetchByIds(ids: number[]): AsyncGenerator<RawRecord> {
    for (const id of ids) {
      const record = await this.deps.source.getTicketById(id);
      // null: deleted or never existed
      if (record) yield record;
    }
  }

  private findMissingIds(dataset: PersistentDataset | null, limit: number): number[] {
    if (!dataset) return [];

    const present = new Set<number>();
    let maxId = 0;
    for (const row of dataset.rows) {
      const id = parseRowId(row[0]);
      if (id === null) continue;
      present.add(id);
      maxId = Math.max(maxId, id);
    }

    const missing: number[] = [];
    for (let id = 1; id <= maxId && missing.length < limit; id++) {
      if (!present.has(id)) missing.push(id);
    }
    return missing;
  }

  private async streamToWriter(
    ctx: RunContext,
    sink: Sink,
    mode: WriteMode,
    records: AsyncIterable<RawRecord>
  ): Promise<void> {
    const writer = await sink.openWriter(mode);
    ctx.location = writer.location;

    try {
      for await (const raw of records) {
        const row = this.accept(ctx, raw);
        if (row) {
          await writer.write(row);
          this.trackWriter(ctx, writer);
        }
      }
    } catch (error: unknown) {
      if (error instanceof SinkWriteError) {
        this.recordBatchError(ctx, error);
        throw error;
      }
      // Fetch failed: keep what was already fetched
      await this.closeWriter(ctx, writer);
      throw error;
    }

    await this.closeWriter(ctx, writer);
  }

  private async closeWriter(ctx: RunContext, writer: RowWriter): Promise<void> {
    try {
      const summary = await writer.close();
      this.trackWriter(ctx, writer);
      ctx.batches = Math.max(ctx.batches, summary.batches);
    } catch (error: unknown) {
      this.recordBatchError(ctx, error);
      throw error;
    }
  }

  private trackWriter(ctx: RunContext, writer: RowWriter): void {
    if (writer.rowsWritten > ctx.written) {
      ctx.written = writer.rowsWritten;
      ctx.batches++;
      this.emitProgress(ctx);
    }
  }

  private async openMergeSession(ctx: RunContext, sink: Sink): Promise<MergeSession> {
    ctx.location = sink.describe();

    // Read only after the destination lock is held
    const stored = await sink.readDataset();
    if (!stored) {
      return { sink, dataset: null, pending: [], dirty: false };
    }

    const { dataset, removed } = this.deps.mergeEngine.compact(stored);
    return { sink, dataset, pending: [], dirty: removed > 0 };
  }

  private async mergeRecords(
    ctx: RunContext,
    session: MergeSession,
    records: AsyncIterable<RawRecord>
  ): Promise<void> {
    try {
      for await (const raw of records) {
        const row = this.accept(ctx, raw);
        if (!row) continue;

        session.pending.push(row);
        if (session.pending.length >= this.mergeBatchSize) {
          await this.persistBatch(ctx, session);
        }
      }
    } catch (error: unknown) {
      if (error instanceof SinkWriteError) throw error;

      // Fetch failed: merge what was already fetched, then report the failure
      this.deps.logger.warn('Fetch aborted, persisting partial batch', {
        runId: ctx.runId,
        pending: session.pending.length,
        error: errorMessage(error),
      });
      try {
        await this.persistBatch(ctx, session);
      } catch (persistError: unknown) {
        this.deps.logger.error('Partial batch could not be persisted', {
          runId: ctx.runId,
          error: errorMessage(persistError),
        });
      }
      throw error;
    }

    await this.persistBatch(ctx, session);
  }

  private async persistBatch(ctx: RunContext, session: MergeSession): Promise<void> {
    if (session.pending.length === 0 && !session.dirty) return;

    const batch = session.pending;
    const result = this.deps.mergeEngine.merge(session.dataset, batch);

    let location: string;
    try {
      location = (await session.sink.replaceDataset(result.dataset)).location;
    } catch (error: unknown) {
      this.recordBatchError(ctx, error);
      throw error;
    }

    session.dataset = result.dataset;
    session.pending = [];
    session.dirty = false;

    ctx.inserted += result.inserted;
    ctx.skipped += result.skipped;
    ctx.updated += result.updated;
    ctx.written += result.inserted + result.updated;
    ctx.location = location;
    if (batch.length > 0) {
      ctx.batches++;
      this.emitProgress(ctx);
    }
  }

  private accept(ctx: RunContext, raw: RawRecord): NormalizedRow | null {
    ctx.fetched++;
    const row = this.deps.normalizer.tryNormalize(raw);
    if (row) {
      ctx.normalized++;
    } else {
      ctx.skipped++;
    }
    return row;
  }

  private recordBatchError(ctx: RunContext, error: unknown): void {
    ctx.batchErrors.push({
      batch: ctx.batches + 1,
      code: errorCode(error),
      message: errorMessage(error),
      rowsPersisted: ctx.written,
    });
  }

  private emitProgress(ctx: RunContext): void {
    const progress: SyncProgress = {
      runId: ctx.runId,
      trigger: ctx.trigger,
      batch: ctx.batches,
      fetched: ctx.fetched,
      written: ctx.written,
    };
    addSpanEvent('sync.batch', { batch: ctx.batches, written: ctx.written });
    this.emit('progress', progress);
  }

  private async run(trigger: SyncTrigger, body: (ctx: RunContext) => Promise<void>): Promise<SyncReport> {
    const runId = generateCorrelationId();
    const startedAt = this.now();

    return withRunSpan(trigger, runId, async () => {
      const ctx = new RunContext(runId, trigger);
      this.deps.logger.info('Sync run started', { runId, trigger });

      let terminal: unknown;
      try {
        await body(ctx);
      } catch (error: unknown) {
        terminal = error;
      }

      const finishedAt = this.now();
      const status = terminal === undefined ? 'success' : ctx.written > 0 ? 'partial' : 'failed';
      const report: SyncReport = {
        runId,
        trigger,
        status,
        fetched: ctx.fetched,
        normalized: ctx.normalized,
        skipped: ctx.skipped,
        written: ctx.written,
        inserted: ctx.inserted,
        updated: ctx.updated,
        batches: ctx.batches,
        batchErrors: ctx.batchErrors,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        location: ctx.location,
      };
      if (terminal !== undefined) {
        report.terminalError = { code: errorCode(terminal), message: errorMessage(terminal) };
      }

      this.deps.metrics.incrementCounter('sync_runs', { trigger, status });
      this.deps.metrics.recordLatency('sync_run_duration', report.durationMs, { trigger });
      this.deps.metrics.recordGauge('last_run_rows', report.written, { trigger });

      const summary = { ...report, batchErrors: report.batchErrors.length };
      if (status === 'success') {
        this.deps.logger.info('Sync run finished', summary);
      } else {
        this.deps.logger.error('Sync run ended early', summary);
      }

      this.lastReport = report;
      this.emit('completed', report);
      return report;
    });
  }
}
