// src/core/fetcher/types.ts

export type RawRecord = Record<string, unknown>;

export type TicketApiAuth =
  | { kind: 'token'; email: string; apiToken: string }
  | { kind: 'bearer'; accessToken: string };

export interface TicketFetcherOptions {
  baseUrl: string; // e.g. https://acme.zendesk.com
  auth: TicketApiAuth;
  pageSize?: number; // capped at 100
}

export interface FetchQuery {
  updatedSince?: Date;
}

/**
 * Lazy, finite record source. Both the HTTP fetcher and test doubles satisfy it.
 */
export interface RecordSource {
  fetchTickets(query?: FetchQuery): AsyncGenerator<RawRecord>;
  getTicketById(id: number): Promise<RawRecord | null>;
}
