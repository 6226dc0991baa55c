// src/core/normalizer/customFields.ts

import type { CustomField, CustomFieldValue } from './types';

type EncodedPair = [number, CustomFieldValue];

/**
 * Extract `{ id, value }` entries from the upstream bag, dropping entries
 * without a numeric id or without a usable value. Upstream order is kept.
 */
export function readCustomFields(raw: unknown): CustomField[] {
  if (!Array.isArray(raw)) return [];

  const entries: unknown[] = raw;
  const fields: CustomField[] = [];
  for (const entry of entries) {
    if (!entry || typeof entry !== 'object') continue;
    const id: unknown = Reflect.get(entry, 'id');
    const value = toCustomFieldValue(Reflect.get(entry, 'value'));
    if (typeof id !== 'number' || !Number.isInteger(id) || value === undefined) continue;
    fields.push({ id, value });
  }
  return fields;
}

function toCustomFieldValue(value: unknown): CustomFieldValue | undefined {
  if (typeof value === 'string') return value === '' ? undefined : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value;
  if (Array.isArray(value)) {
    const items = value.filter((item): item is string => typeof item === 'string');
    return items.length > 0 ? items : undefined;
  }
  return undefined;
}

/**
 * Compact JSON array of `[id, value]` pairs; '' when there are none.
 */
export function encodeCustomFields(fields: CustomField[]): string {
  if (fields.length === 0) return '';
  const pairs: EncodedPair[] = fields.map((field) => [field.id, field.value]);
  return JSON.stringify(pairs);
}

export function decodeCustomFields(cell: string): CustomField[] {
  if (cell.trim() === '') return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(cell);
  } catch {
    throw new Error(`Invalid custom field encoding: ${cell.slice(0, 40)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new Error('Invalid custom field encoding: expected an array');
  }

  const pairs: unknown[] = parsed;
  return readCustomFields(
    pairs.map((pair) => (Array.isArray(pair) ? { id: pair[0], value: pair[1] } : null))
  );
}
