// src/sinks/types.ts

import type { NormalizedRow } from '../core/normalizer/types';
import type { PersistentDataset } from '../core/dataset/RowCodec';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export type WriteMode = 'create-new' | 'append-existing' | 'overwrite-destination';

export type SinkKind = 'csv' | 'xlsx' | 'sheets';

export interface WriteSummary {
  location: string;
  mode: WriteMode;
  rowsWritten: number;
  batches: number;
}

export interface RowWriter {
  readonly location: string;
  readonly rowsWritten: number;
  write(row: NormalizedRow): Promise<void>;
  writeCells(cells: string[]): Promise<void>;
  /**
   * Flush what is buffered and finalize the artifact.
   */
  close(): Promise<WriteSummary>;
}

export interface Sink {
  readonly kind: SinkKind;
  /**
   * Stable id of the dataset this sink merges into; the destination lock key.
   */
  readonly destinationId: string;
  describe(): string;
  openWriter(mode: WriteMode): Promise<RowWriter>;
  readDataset(): Promise<PersistentDataset | null>;
  replaceDataset(dataset: PersistentDataset): Promise<WriteSummary>;
}

export interface SinkDeps {
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Where a writer's batches land. Implemented per sink variant.
 */
export interface FlushTarget {
  readonly location: string;
  flush(rows: string[][]): Promise<void>;
  finish?(): Promise<void>;
}

export interface LocalSinkOptions {
  directory: string;
  prefix?: string; // default 'tickets'
  batchSize?: number;
  now?: () => Date;
}
