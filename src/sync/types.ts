// src/sync/types.ts

import type { Sink, WriteMode } from '../sinks/types';
import type { SyncCursor } from './cursor';

export type SyncTrigger = 'full' | 'incremental' | 'merge-to-destination' | 'gap-fill';

export type SyncStatus = 'success' | 'partial' | 'failed';

export interface BatchError {
  batch: number;
  code: string;
  message: string;
  rowsPersisted: number;
}

export interface SyncReport {
  runId: string;
  trigger: SyncTrigger;
  status: SyncStatus;
  fetched: number;
  normalized: number;
  skipped: number;
  written: number; // rows persisted at the destination
  inserted: number;
  updated: number;
  batches: number;
  batchErrors: BatchError[];
  terminalError?: { code: string; message: string };
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  location?: string;
}

export interface SyncProgress {
  runId: string;
  trigger: SyncTrigger;
  batch: number;
  fetched: number;
  written: number;
}

export interface FullSyncRequest {
  sink: Sink;
  mode?: WriteMode; // default create-new
}

export interface IncrementalSyncRequest {
  sink: Sink;
  cursor: SyncCursor;
  strategy?: 'merge' | 'append'; // default merge
}

export interface MergeToDestinationRequest {
  source: Sink;
  target: Sink;
}

export interface GapFillRequest {
  sink: Sink;
  maxIds?: number; // default 2000
}
