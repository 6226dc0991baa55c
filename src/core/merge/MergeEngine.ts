// src/core/merge/MergeEngine.ts

import type { NormalizedRow } from '../normalizer/types';
import { PersistentDataset, HEADER, emptyDataset, encodeRow, parseRowId } from '../dataset/RowCodec';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';

export interface MergeResult {
  dataset: PersistentDataset;
  inserted: number;
  updated: number;
  skipped: number;
}

export interface CompactResult {
  dataset: PersistentDataset;
  removed: number;
}

/**
 * Upsert by ticket id. An incoming row replaces the stored row with the same
 * id in place; unknown ids are appended. Stored rows for ids that are not in
 * the batch are never touched, moved or removed.
 */
export class MergeEngine {
  constructor(
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {}

  merge(current: PersistentDataset | null, incoming: Iterable<NormalizedRow>): MergeResult {
    const base = current ?? emptyDataset();
    const rows = base.rows.map((row) => [...row]);
    const positions = this.indexById(rows);

    let inserted = 0;
    let updated = 0;
    let skipped = 0;

    for (const row of incoming) {
      if (!Number.isSafeInteger(row.id) || row.id <= 0) {
        this.logger.warn('Skipping incoming row without a valid id', { id: row.id });
        skipped++;
        continue;
      }

      const cells = encodeRow(row);
      const position = positions.get(row.id);
      if (position === undefined) {
        positions.set(row.id, rows.length);
        rows.push(cells);
        inserted++;
      } else {
        rows[position] = cells;
        updated++;
      }
    }

    this.metrics?.incrementCounter('merge_rows', { outcome: 'inserted' }, inserted);
    this.metrics?.incrementCounter('merge_rows', { outcome: 'updated' }, updated);
    if (skipped > 0) {
      this.metrics?.incrementCounter('merge_rows', { outcome: 'skipped' }, skipped);
    }

    this.logger.debug('Merged batch', { inserted, updated, skipped, total: rows.length });

    return {
      dataset: { header: [...HEADER], rows },
      inserted,
      updated,
      skipped,
    };
  }

  /**
   * Collapse duplicate ids written by append-only runs: the first position
   * is kept and receives the content of the last occurrence.
   */
  compact(dataset: PersistentDataset): CompactResult {
    const rows: string[][] = [];
    const positions = new Map<number, number>();

    for (const row of dataset.rows) {
      const id = parseRowId(row[0]);
      if (id === null) {
        rows.push([...row]);
        continue;
      }

      const position = positions.get(id);
      if (position === undefined) {
        positions.set(id, rows.length);
        rows.push([...row]);
      } else {
        rows[position] = [...row];
      }
    }

    const removed = dataset.rows.length - rows.length;
    if (removed > 0) {
      this.logger.info('Compacted duplicate rows', { removed });
    }
    return { dataset: { header: [...dataset.header], rows }, removed };
  }

  private indexById(rows: string[][]): Map<number, number> {
    const positions = new Map<number, number>();
    rows.forEach((row, index) => {
      const id = parseRowId(row[0]);
      // Earliest occurrence wins if a legacy dataset still has duplicates
      if (id !== null && !positions.has(id)) {
        positions.set(id, index);
      }
    });
    return positions;
  }
}
