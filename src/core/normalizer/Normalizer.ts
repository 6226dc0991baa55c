// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { RawRecord } from '../fetcher/types';
import type { NormalizedRow } from './types';
import { TICKET_PRIORITIES, TICKET_STATUSES } from './types';
import { mapTicket, DESCRIPTION_LIMIT } from './TicketMapper';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { MalformedRecordError } from '../../utils/errors';

// Output contract of the mapper
export const NormalizedRowSchema = z.object({
  id: z.number().int().positive(),
  subject: z.string().nullable(),
  status: z.enum(TICKET_STATUSES).nullable(),
  priority: z.enum(TICKET_PRIORITIES).nullable(),
  requester_id: z.number().int().nullable(),
  assignee_id: z.number().int().nullable(),
  created_at: z.string().datetime().nullable(),
  updated_at: z.string().datetime().nullable(),
  tags: z.array(z.string()),
  type: z.string().nullable(),
  channel: z.string().nullable(),
  url: z.string().nullable(),
  description: z.string().refine((text) => Array.from(text).length <= DESCRIPTION_LIMIT, {
    message: `description longer than ${DESCRIPTION_LIMIT} characters`,
  }),
  custom_fields: z.array(
    z.object({
      id: z.number().int(),
      value: z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]),
    })
  ),
});

export class Normalizer {
  constructor(
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * Throws MalformedRecordError for a record that cannot become a row.
   */
  normalize(raw: RawRecord): NormalizedRow {
    const row = mapTicket(raw);

    const result = NormalizedRowSchema.safeParse(row);
    if (!result.success) {
      throw new MalformedRecordError(`Ticket ${row.id} failed row validation`, {
        id: row.id,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return row;
  }

  /**
   * Null (after a warning and a `records_skipped` count) for a malformed record.
   */
  tryNormalize(raw: RawRecord): NormalizedRow | null {
    try {
      return this.normalize(raw);
    } catch (error: unknown) {
      if (!(error instanceof MalformedRecordError)) throw error;

      this.logger.warn('Skipping malformed ticket record', {
        error: error.message,
        ...error.details,
      });
      this.metrics.incrementCounter('records_skipped', { reason: 'malformed' });
      return null;
    }
  }
}
