// src/core/normalizer/types.ts

export const TICKET_STATUSES = ['new', 'open', 'pending', 'hold', 'solved', 'closed'] as const;
export const TICKET_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

/**
 * Custom field values are whatever the upstream put there: scalars for text,
 * numeric, checkbox and dropdown fields, string lists for multi-selects.
 */
export type CustomFieldValue = string | number | boolean | string[];

export interface CustomField {
  id: number;
  value: CustomFieldValue;
}

export interface NormalizedRow {
  id: number; // merge key
  subject: string | null;
  status: TicketStatus | null;
  priority: TicketPriority | null;
  requester_id: number | null;
  assignee_id: number | null;
  created_at: string | null; // ISO 8601, UTC
  updated_at: string | null;
  tags: string[];
  type: string | null;
  channel: string | null; // via.channel
  url: string | null;
  description: string;
  custom_fields: CustomField[];
}
