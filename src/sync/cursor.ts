// src/sync/cursor.ts

import { ConfigError } from '../utils/errors';

export type SyncCursor =
  | { kind: 'all' }
  | { kind: 'since'; since: Date }
  | { kind: 'lookback'; durationMs: number };

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_MS: Record<string, number> = { m: MINUTE, h: HOUR, d: DAY, w: 7 * DAY };

// Named sync frequencies offered to operators
const FREQUENCIES: Record<string, number> = {
  daily: DAY,
  weekly: 7 * DAY,
  monthly: 30 * DAY,
};

/**
 * Accepts `all`, a duration (`90m`, `24h`, `7d`, `2w`), a named frequency
 * (`daily`, `weekly`, `monthly`) or an ISO-8601 timestamp.
 */
export function parseCursor(input: string): SyncCursor {
  const value = input.trim().toLowerCase();

  if (value === 'all') {
    return { kind: 'all' };
  }

  const frequency = FREQUENCIES[value];
  if (frequency !== undefined) {
    return { kind: 'lookback', durationMs: frequency };
  }

  const duration = /^(\d+)\s*([mhdw])$/.exec(value);
  if (duration) {
    const amount = Number(duration[1]);
    const unit = UNIT_MS[duration[2] ?? ''];
    if (amount > 0 && unit !== undefined) {
      return { kind: 'lookback', durationMs: amount * unit };
    }
  }

  // Only full dates, so bare numbers are not read as years
  if (/^\d{4}-\d{2}-\d{2}/.test(value)) {
    const since = new Date(input.trim());
    if (!Number.isNaN(since.getTime())) {
      return { kind: 'since', since };
    }
  }

  throw new ConfigError(`Invalid sync cursor: ${input}`, { input });
}

/**
 * Lower bound of `updated_at` for a run started at `now`; undefined for all.
 */
export function resolveSince(cursor: SyncCursor, now: Date): Date | undefined {
  switch (cursor.kind) {
    case 'all':
      return undefined;
    case 'since':
      return cursor.since;
    case 'lookback':
      return new Date(now.getTime() - cursor.durationMs);
  }
}
