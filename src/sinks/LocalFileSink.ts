// src/sinks/LocalFileSink.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { BaseSink } from './BaseSink';
import { HEADER, PersistentDataset } from '../core/dataset/RowCodec';
import type { FlushTarget, LocalSinkOptions, SinkDeps, WriteMode, WriteSummary } from './types';
import { formatDate, formatTimestamp } from './naming';
import { SinkWriteError } from '../utils/errors';

/**
 * Shared file handling for the CSV and XLSX sinks. Subclasses only know how to
 * create, append to, read and rewrite one file of their format.
 *
 * Files in `directory`:
 * - `{prefix}_{YYYYMMDD_HHmmss}.{ext}` per create-new run
 * - `{prefix}_{YYYYMMDD}.{ext}` accumulated by append-existing runs of a day
 * - `{prefix}_all.{ext}` the merge dataset
 */
export abstract class LocalFileSink extends BaseSink {
  abstract readonly extension: string;
  protected readonly directory: string;
  protected readonly prefix: string;
  private readonly now: () => Date;

  constructor(deps: SinkDeps, options: LocalSinkOptions) {
    super(deps, options);
    this.directory = path.resolve(options.directory);
    this.prefix = options.prefix ?? 'tickets';
    this.now = options.now ?? (() => new Date());
  }

  get destinationId(): string {
    return `${this.kind}:${path.join(this.directory, this.prefix)}`;
  }

  describe(): string {
    return this.datasetPath();
  }

  datasetPath(): string {
    return path.join(this.directory, `${this.prefix}_all.${this.extension}`);
  }

  protected abstract createFile(filePath: string, header: readonly string[]): Promise<void>;
  protected abstract appendRows(filePath: string, rows: string[][]): Promise<void>;
  protected abstract readRows(filePath: string): Promise<string[][]>;
  protected abstract writeRows(filePath: string, rows: string[][]): Promise<void>;

  protected async openTarget(mode: WriteMode): Promise<FlushTarget> {
    if (mode === 'overwrite-destination') {
      throw new SinkWriteError('overwrite-destination is only supported by the remote spreadsheet sink', {
        location: this.directory,
        mode,
      });
    }

    await fs.mkdir(this.directory, { recursive: true });
    const stamp = this.now();

    let location: string;
    if (mode === 'append-existing') {
      location = path.join(this.directory, `${this.prefix}_${formatDate(stamp)}.${this.extension}`);
      if (await exists(location)) {
        this.deps.logger.debug('Appending to existing artifact', { location });
      } else {
        await this.createFile(location, HEADER);
      }
    } else {
      location = await this.freshPath(formatTimestamp(stamp));
      await this.createFile(location, HEADER);
    }

    return {
      location,
      flush: (rows) => this.appendRows(location, rows),
    };
  }

  protected async loadDataset(): Promise<PersistentDataset | null> {
    const filePath = this.datasetPath();
    if (!(await exists(filePath))) return null;

    const [header, ...rows] = await this.readRows(filePath);
    if (!header) return null;
    return { header, rows };
  }

  /**
   * Rewrites the dataset file through a temp file and a rename, so a reader
   * sees either the old or the new dataset.
   */
  protected async storeDataset(dataset: PersistentDataset): Promise<WriteSummary> {
    const filePath = this.datasetPath();
    const tmp = `${filePath}.${process.pid}.tmp`;

    await fs.mkdir(this.directory, { recursive: true });
    await this.writeRows(tmp, [dataset.header, ...dataset.rows]);
    await fs.rename(tmp, filePath);

    this.deps.metrics.incrementCounter('sink_rows_written', { sink: this.kind }, dataset.rows.length);
    return { location: filePath, mode: 'overwrite-destination', rowsWritten: dataset.rows.length, batches: 1 };
  }

  // Two create-new runs in the same second get distinct files
  private async freshPath(stamp: string): Promise<string> {
    let candidate = path.join(this.directory, `${this.prefix}_${stamp}.${this.extension}`);
    for (let n = 2; await exists(candidate); n++) {
      candidate = path.join(this.directory, `${this.prefix}_${stamp}_${n}.${this.extension}`);
    }
    return candidate;
  }
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
