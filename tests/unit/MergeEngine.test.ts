// tests/unit/MergeEngine.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { MergeEngine } from '../../src/core/merge/MergeEngine';
import { HEADER, encodeRow, type PersistentDataset } from '../../src/core/dataset/RowCodec';
import type { NormalizedRow } from '../../src/core/normalizer/types';
import { createTestLogger, createTestMetrics } from '../helpers/mocks';

function ticketRow(id: number, subject = `Ticket ${id}`): NormalizedRow {
  return {
    id,
    subject,
    status: 'open',
    priority: null,
    requester_id: null,
    assignee_id: null,
    created_at: null,
    updated_at: null,
    tags: [],
    type: null,
    channel: null,
    url: null,
    description: '',
    custom_fields: [],
  };
}

function dataset(...rows: NormalizedRow[]): PersistentDataset {
  return { header: [...HEADER], rows: rows.map(encodeRow) };
}

function ids(data: PersistentDataset): string[] {
  return data.rows.map((row) => row[0]);
}

describe('MergeEngine', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let metrics: ReturnType<typeof createTestMetrics>;
  let engine: MergeEngine;

  beforeEach(() => {
    logger = createTestLogger();
    metrics = createTestMetrics();
    engine = new MergeEngine(logger, metrics);
  });

  it('should update existing ids in place and append new ones', () => {
    const current = dataset(ticketRow(1), ticketRow(2), ticketRow(3));

    const result = engine.merge(current, [ticketRow(2, 'Ticket 2 (edited)'), ticketRow(4)]);

    expect(ids(result.dataset)).toEqual(['1', '2', '3', '4']);
    expect(result.dataset.rows[1][1]).toBe('Ticket 2 (edited)');
    expect(result.dataset.rows[0]).toEqual(current.rows[0]);
    expect(result.dataset.rows[2]).toEqual(current.rows[2]);
    expect(result).toMatchObject({ inserted: 1, updated: 1, skipped: 0 });
    expect(metrics.incrementCounter).toHaveBeenCalledWith('merge_rows', { outcome: 'inserted' }, 1);
    expect(metrics.incrementCounter).toHaveBeenCalledWith('merge_rows', { outcome: 'updated' }, 1);
  });

  it('should be idempotent', () => {
    const current = dataset(ticketRow(1), ticketRow(2));
    const batch = [ticketRow(2, 'changed'), ticketRow(5), ticketRow(3)];

    const once = engine.merge(current, batch).dataset;
    const twice = engine.merge(once, batch);

    expect(twice.dataset).toEqual(once);
    expect(twice).toMatchObject({ inserted: 0, updated: 3 });
  });

  it('should start from an empty dataset with the canonical header', () => {
    const result = engine.merge(null, [ticketRow(10), ticketRow(11)]);

    expect(result.dataset.header).toEqual(HEADER);
    expect(ids(result.dataset)).toEqual(['10', '11']);
    expect(result.inserted).toBe(2);
  });

  it('should apply the last of repeated ids within one batch', () => {
    const result = engine.merge(null, [ticketRow(7, 'first'), ticketRow(7, 'second')]);

    expect(result.dataset.rows).toHaveLength(1);
    expect(result.dataset.rows[0][1]).toBe('second');
    expect(result).toMatchObject({ inserted: 1, updated: 1 });
  });

  it('should skip incoming rows without a valid id', () => {
    const result = engine.merge(dataset(ticketRow(1)), [ticketRow(0), ticketRow(2)]);

    expect(ids(result.dataset)).toEqual(['1', '2']);
    expect(result.skipped).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Skipping incoming row without a valid id', { id: 0 });
  });

  it('should not mutate the dataset it was given', () => {
    const current = dataset(ticketRow(1));
    const before = JSON.stringify(current);

    engine.merge(current, [ticketRow(1, 'changed'), ticketRow(2)]);

    expect(JSON.stringify(current)).toBe(before);
  });

  describe('compact', () => {
    it('should keep the first position and the last content of duplicated ids', () => {
      const legacy: PersistentDataset = {
        header: [...HEADER],
        rows: [
          encodeRow(ticketRow(1, 'old')),
          encodeRow(ticketRow(2)),
          encodeRow(ticketRow(1, 'new')),
          encodeRow(ticketRow(3)),
          ['', 'row without id'],
        ],
      };

      const { dataset: compacted, removed } = engine.compact(legacy);

      expect(removed).toBe(1);
      expect(ids(compacted)).toEqual(['1', '2', '3', '']);
      expect(compacted.rows[0][1]).toBe('new');
    });

    it('should leave a clean dataset unchanged', () => {
      const clean = dataset(ticketRow(1), ticketRow(2));

      expect(engine.compact(clean)).toEqual({ dataset: clean, removed: 0 });
    });
  });
});
