// src/core/merge/DatasetCompare.ts

import type { PersistentDataset } from '../dataset/RowCodec';
import type { Logger } from '../../observability/Logger';

export type CompareOperation = 'diff-left' | 'diff-right' | 'common';

export const COMPARE_OPERATIONS: readonly CompareOperation[] = ['diff-left', 'diff-right', 'common'];

export interface CompareOptions {
  /** Column holding the row key; defaults to the id column. */
  keyColumn?: number;
}

/**
 * Keyed set operations over two datasets. Keys are the trimmed cell at the
 * key column; a row shorter than that column has the empty key.
 *
 * - `diff-left`: rows of `left` whose key is absent from `right`, under `left`'s header
 * - `diff-right`: rows of `right` whose key is absent from `left`, under `right`'s header
 * - `common`: rows of `left` whose key is present in `right`, under `left`'s header
 */
export class DatasetCompare {
  constructor(private logger: Logger) {}

  compare(
    operation: CompareOperation,
    left: PersistentDataset,
    right: PersistentDataset,
    options: CompareOptions = {}
  ): PersistentDataset {
    const keyColumn = Math.max(0, Math.trunc(options.keyColumn ?? 0));

    const { base, other, keep } = plan(operation, left, right);
    const otherKeys = new Set(other.rows.map((row) => rowKey(row, keyColumn)));
    const rows = base.rows.filter((row) => otherKeys.has(rowKey(row, keyColumn)) === keep).map((row) => [...row]);

    this.logger.debug('Compared datasets', {
      operation,
      keyColumn,
      left: left.rows.length,
      right: right.rows.length,
      result: rows.length,
    });

    return { header: [...base.header], rows };
  }
}

interface ComparePlan {
  base: PersistentDataset;
  other: PersistentDataset;
  // Keep base rows whose key is in other (true) or absent from it (false)
  keep: boolean;
}

function plan(operation: CompareOperation, left: PersistentDataset, right: PersistentDataset): ComparePlan {
  switch (operation) {
    case 'diff-left':
      return { base: left, other: right, keep: false };
    case 'diff-right':
      return { base: right, other: left, keep: false };
    case 'common':
      return { base: left, other: right, keep: true };
  }
}

export function rowKey(row: readonly string[], keyColumn: number): string {
  return (row[keyColumn] ?? '').trim();
}
