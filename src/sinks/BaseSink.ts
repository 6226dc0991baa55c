// src/sinks/BaseSink.ts

import type { NormalizedRow } from '../core/normalizer/types';
import { encodeRow, PersistentDataset } from '../core/dataset/RowCodec';
import type { FlushTarget, RowWriter, Sink, SinkDeps, SinkKind, WriteMode, WriteSummary } from './types';
import { SinkWriteError, errorMessage } from '../utils/errors';
import { withSinkSpan } from '../observability/tracing';

export const DEFAULT_BATCH_SIZE = 500;

/**
 * Buffers rows and hands them to its FlushTarget `batchSize` at a time. A
 * failed flush raises SinkWriteError; earlier flushes stay where they landed.
 */
export class BatchingRowWriter implements RowWriter {
  private buffer: string[][] = [];
  private written = 0;
  private batches = 0;
  private closed = false;

  constructor(
    private target: FlushTarget,
    private mode: WriteMode,
    private kind: SinkKind,
    private batchSize: number,
    private deps: SinkDeps
  ) {}

  get location(): string {
    return this.target.location;
  }

  get rowsWritten(): number {
    return this.written;
  }

  async write(row: NormalizedRow): Promise<void> {
    await this.writeCells(encodeRow(row));
  }

  async writeCells(cells: string[]): Promise<void> {
    if (this.closed) {
      throw new SinkWriteError('Writer is closed', { location: this.location });
    }
    this.buffer.push(cells);
    if (this.buffer.length >= this.batchSize) {
      await this.flush();
    }
  }

  async close(): Promise<WriteSummary> {
    if (!this.closed) {
      await this.flush();
      this.closed = true;
      if (this.target.finish) {
        await this.guard('finish', 0, async () => {
          await this.target.finish?.();
        });
      }
    }
    return { location: this.location, mode: this.mode, rowsWritten: this.written, batches: this.batches };
  }

  private async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const rows = this.buffer;
    this.buffer = [];
    await this.guard('flush', rows.length, () => this.target.flush(rows));

    this.written += rows.length;
    this.batches++;
    this.deps.metrics.incrementCounter('sink_rows_written', { sink: this.kind }, rows.length);
    this.deps.logger.debug('Flushed batch', { location: this.location, rows: rows.length, total: this.written });
  }

  private async guard(operation: string, rows: number, task: () => Promise<void>): Promise<void> {
    const startTime = Date.now();
    try {
      await withSinkSpan(operation, this.kind, this.location, task);
      this.deps.metrics.recordLatency('sink_flush_duration', Date.now() - startTime, {
        sink: this.kind,
        status: 'success',
      });
    } catch (error: unknown) {
      this.deps.metrics.recordLatency('sink_flush_duration', Date.now() - startTime, {
        sink: this.kind,
        status: 'failed',
      });
      this.deps.metrics.incrementCounter('sink_flush_failures', { sink: this.kind });
      this.deps.logger.error('Destination write failed', {
        location: this.location,
        operation,
        rowsPersisted: this.written,
        error: errorMessage(error),
      });
      throw new SinkWriteError(`Failed to write to ${this.location}`, {
        location: this.location,
        operation,
        rowsPersisted: this.written,
        batchRows: rows,
        cause: errorMessage(error),
      });
    }
  }
}

export interface BaseSinkOptions {
  batchSize?: number;
}

export abstract class BaseSink implements Sink {
  abstract readonly kind: SinkKind;
  abstract readonly destinationId: string;
  protected readonly batchSize: number;

  constructor(
    protected deps: SinkDeps,
    options: BaseSinkOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  async openWriter(mode: WriteMode): Promise<RowWriter> {
    const target = await this.wrap('open', this.describe(), () => this.openTarget(mode));
    this.deps.logger.info('Writer opened', { sink: this.kind, mode, location: target.location });
    return new BatchingRowWriter(target, mode, this.kind, this.batchSize, this.deps);
  }

  async readDataset(): Promise<PersistentDataset | null> {
    return this.wrap('read', this.describe(), () => this.loadDataset());
  }

  async replaceDataset(dataset: PersistentDataset): Promise<WriteSummary> {
    return this.wrap('replace', this.describe(), () => this.storeDataset(dataset));
  }

  /**
   * Human-readable location of the merge dataset.
   */
  abstract describe(): string;

  protected abstract openTarget(mode: WriteMode): Promise<FlushTarget>;
  protected abstract loadDataset(): Promise<PersistentDataset | null>;
  protected abstract storeDataset(dataset: PersistentDataset): Promise<WriteSummary>;

  protected async wrap<T>(operation: string, location: string, task: () => Promise<T>): Promise<T> {
    try {
      return await withSinkSpan(operation, this.kind, location, task);
    } catch (error: unknown) {
      if (error instanceof SinkWriteError) throw error;
      this.deps.metrics.incrementCounter('sink_flush_failures', { sink: this.kind });
      throw new SinkWriteError(`Sink ${operation} failed for ${location}`, {
        location,
        operation,
        rowsPersisted: 0,
        cause: errorMessage(error),
      });
    }
  }
}
