// src/core/normalizer/TicketMapper.ts

import type { RawRecord } from '../fetcher/types';
import type { NormalizedRow, TicketPriority, TicketStatus } from './types';
import { TICKET_PRIORITIES, TICKET_STATUSES } from './types';
import { readCustomFields } from './customFields';
import { MalformedRecordError } from '../../utils/errors';

export const DESCRIPTION_LIMIT = 500;

/**
 * Map one upstream ticket to a flat row. Missing optional fields become null
 * (or [] / ''), as do unknown status and priority values; only a missing
 * id is an error.
 */
export function mapTicket(raw: RawRecord): NormalizedRow {
  const id = raw.id;
  if (typeof id !== 'number' || !Number.isInteger(id) || id <= 0) {
    throw new MalformedRecordError('Ticket record has no valid id', { id: describe(id) });
  }

  return {
    id,
    subject: optionalString(raw.subject),
    status: readStatus(raw.status),
    priority: readPriority(raw.priority),
    requester_id: optionalInteger(raw.requester_id),
    assignee_id: optionalInteger(raw.assignee_id),
    created_at: toIsoTimestamp(raw.created_at),
    updated_at: toIsoTimestamp(raw.updated_at),
    tags: readTags(raw.tags),
    type: optionalString(raw.type),
    channel: readChannel(raw.via),
    url: optionalString(raw.url),
    description: truncate(typeof raw.description === 'string' ? raw.description : '', DESCRIPTION_LIMIT),
    custom_fields: readCustomFields(raw.custom_fields),
  };
}

/**
 * First `limit` code points, so surrogate pairs are never split.
 */
export function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(0, limit).join('');
}

export function toIsoTimestamp(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function readStatus(value: unknown): TicketStatus | null {
  return TICKET_STATUSES.find((candidate) => candidate === value) ?? null;
}

function readPriority(value: unknown): TicketPriority | null {
  return TICKET_PRIORITIES.find((candidate) => candidate === value) ?? null;
}

function readTags(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const items: unknown[] = value;
  return items.filter((tag): tag is string => typeof tag === 'string');
}

function readChannel(via: unknown): string | null {
  if (!via || typeof via !== 'object') return null;
  return optionalString(Reflect.get(via, 'channel'));
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function optionalInteger(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function describe(value: unknown): string {
  return value === undefined ? 'undefined' : JSON.stringify(value) ?? String(value);
}
