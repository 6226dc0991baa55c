// tests/unit/DatasetCompare.test.ts

import { describe, it, expect } from 'vitest';
import { DatasetCompare, rowKey } from '../../src/core/merge/DatasetCompare';
import type { PersistentDataset } from '../../src/core/dataset/RowCodec';
import { createTestLogger } from '../helpers/mocks';

const left: PersistentDataset = {
  header: ['id', 'subject'],
  rows: [
    ['1', 'Printer jam'],
    ['2', 'VPN down'],
    [' 3 ', 'Refund'],
  ],
};

const right: PersistentDataset = {
  header: ['ticket', 'owner', 'team'],
  rows: [
    ['3', 'dana', 'billing'],
    ['4', 'lee', 'network'],
    ['2', 'sam', 'network'],
  ],
};

describe('DatasetCompare', () => {
  const compare = new DatasetCompare(createTestLogger());

  it('should keep left rows whose key is missing on the right', () => {
    expect(compare.compare('diff-left', left, right)).toEqual({
      header: ['id', 'subject'],
      rows: [['1', 'Printer jam']],
    });
  });

  it('should keep right rows whose key is missing on the left, under the right header', () => {
    expect(compare.compare('diff-right', left, right)).toEqual({
      header: ['ticket', 'owner', 'team'],
      rows: [['4', 'lee', 'network']],
    });
  });

  it('should keep left rows whose key exists on both sides', () => {
    expect(compare.compare('common', left, right)).toEqual({
      header: ['id', 'subject'],
      rows: [
        ['2', 'VPN down'],
        [' 3 ', 'Refund'],
      ],
    });
  });

  it('should compare on another key column', () => {
    const a: PersistentDataset = { header: ['id', 'email'], rows: [['1', 'a@x.test'], ['2', 'b@x.test']] };
    const b: PersistentDataset = { header: ['id', 'email'], rows: [['9', 'b@x.test']] };

    expect(compare.compare('diff-left', a, b, { keyColumn: 1 }).rows).toEqual([['1', 'a@x.test']]);
  });

  it('should treat rows shorter than the key column as having an empty key', () => {
    const a: PersistentDataset = { header: ['id', 'email'], rows: [['1'], ['2', 'b@x.test']] };
    const b: PersistentDataset = { header: ['id', 'email'], rows: [['7', '  ']] };

    expect(compare.compare('common', a, b, { keyColumn: 1 }).rows).toEqual([['1']]);
  });

  it('should return an empty result against an empty dataset for common', () => {
    expect(compare.compare('common', left, { header: [], rows: [] })).toEqual({ header: ['id', 'subject'], rows: [] });
  });

  it('should not share row arrays with its inputs', () => {
    const result = compare.compare('diff-left', left, right);
    result.rows[0][1] = 'changed';

    expect(left.rows[0]).toEqual(['1', 'Printer jam']);
  });
});

describe('rowKey', () => {
  it('should trim the key cell', () => {
    expect(rowKey([' 42\t', 'x'], 0)).toBe('42');
    expect(rowKey(['42'], 3)).toBe('');
  });
});
