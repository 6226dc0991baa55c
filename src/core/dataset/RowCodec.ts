// src/core/dataset/RowCodec.ts

import type { NormalizedRow } from '../normalizer/types';
import { TICKET_PRIORITIES, TICKET_STATUSES } from '../normalizer/types';
import { decodeCustomFields, encodeCustomFields } from '../normalizer/customFields';
import { MalformedRecordError } from '../../utils/errors';

export const CANONICAL_FIELDS = [
  'id',
  'subject',
  'status',
  'priority',
  'requester_id',
  'assignee_id',
  'created_at',
  'updated_at',
  'tags',
  'type',
  'channel',
  'url',
  'description',
] as const;

export const CUSTOM_FIELDS_COLUMN = 'custom_fields';

export const HEADER: readonly string[] = [...CANONICAL_FIELDS, CUSTOM_FIELDS_COLUMN];

/**
 * Flat, id-keyed row-set as stored at a destination. Column 0 holds the id.
 */
export interface PersistentDataset {
  header: string[];
  rows: string[][];
}

export function emptyDataset(): PersistentDataset {
  return { header: [...HEADER], rows: [] };
}

export function encodeRow(row: NormalizedRow): string[] {
  return [
    String(row.id),
    row.subject ?? '',
    row.status ?? '',
    row.priority ?? '',
    optionalInteger(row.requester_id),
    optionalInteger(row.assignee_id),
    row.created_at ?? '',
    row.updated_at ?? '',
    row.tags.join(','),
    row.type ?? '',
    row.channel ?? '',
    row.url ?? '',
    row.description,
    encodeCustomFields(row.custom_fields),
  ];
}

export function decodeRow(cells: readonly string[]): NormalizedRow {
  const cell = (index: number): string => cells[index] ?? '';

  const id = parseRowId(cell(0));
  if (id === null) {
    throw new MalformedRecordError('Row has no valid id', { cell: cell(0) });
  }

  try {
    return {
      id,
      subject: nullable(cell(1)),
      status: pick(TICKET_STATUSES, cell(2)),
      priority: pick(TICKET_PRIORITIES, cell(3)),
      requester_id: parseOptionalInteger(cell(4)),
      assignee_id: parseOptionalInteger(cell(5)),
      created_at: nullable(cell(6)),
      updated_at: nullable(cell(7)),
      tags: cell(8) === '' ? [] : cell(8).split(','),
      type: nullable(cell(9)),
      channel: nullable(cell(10)),
      url: nullable(cell(11)),
      description: cell(12),
      custom_fields: decodeCustomFields(cell(13)),
    };
  } catch (error: unknown) {
    if (error instanceof MalformedRecordError) throw error;
    throw new MalformedRecordError(`Row ${id} could not be decoded`, {
      id,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Id of a stored row, or null when the cell is not a positive integer.
 */
export function parseRowId(cell: string | undefined): number | null {
  if (cell === undefined || !/^\d+$/.test(cell.trim())) return null;
  const id = Number(cell.trim());
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function optionalInteger(value: number | null): string {
  return value === null ? '' : String(value);
}

function parseOptionalInteger(cell: string): number | null {
  if (cell === '') return null;
  const value = Number(cell);
  return Number.isInteger(value) ? value : null;
}

function nullable(cell: string): string | null {
  return cell === '' ? null : cell;
}

function pick<T extends string>(allowed: readonly T[], cell: string): T | null {
  return allowed.find((candidate) => candidate === cell) ?? null;
}
