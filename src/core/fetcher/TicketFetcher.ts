// src/core/fetcher/TicketFetcher.ts

import { z } from 'zod';
import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { FetchQuery, RawRecord, RecordSource, TicketApiAuth, TicketFetcherOptions } from './types';
import { FatalFetchError, errorMessage } from '../../utils/errors';

export const MAX_PAGE_SIZE = 100;

const RawRecordSchema = z.record(z.unknown());

// Cursor pages carry links.next; the older offset payload only next_page
const TicketPageSchema = z.object({
  tickets: z.array(RawRecordSchema),
  links: z.object({ next: z.string().nullish() }).partial().nullish(),
  meta: z.object({ has_more: z.boolean().optional() }).partial().nullish(),
  next_page: z.string().nullish(),
});

const SingleTicketSchema = z.object({ ticket: RawRecordSchema });

type TicketPage = z.infer<typeof TicketPageSchema>;

export function buildAuthHeader(auth: TicketApiAuth): string {
  if (auth.kind === 'bearer') {
    return `Bearer ${auth.accessToken}`;
  }
  const encoded = Buffer.from(`${auth.email}/token:${auth.apiToken}`, 'utf8').toString('base64');
  return `Basic ${encoded}`;
}

export class TicketFetcher implements RecordSource {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly authHeader: string;

  constructor(
    options: TicketFetcherOptions,
    private http: HttpCore,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pageSize = Math.min(Math.max(1, options.pageSize ?? MAX_PAGE_SIZE), MAX_PAGE_SIZE);
    this.authHeader = buildAuthHeader(options.auth);
  }

  /**
   * Walk the ticket list page by page. Rate-limited and transient failures are
   * retried inside HttpCore, so the consumer only sees a slower sequence; a
   * FatalFetchError ends it after whatever was already yielded.
   */
  async *fetchTickets(query: FetchQuery = {}): AsyncGenerator<RawRecord> {
    const watermark = query.updatedSince?.getTime();
    const params: Record<string, string | number> = { 'page[size]': this.pageSize };
    if (query.updatedSince) {
      params.start_time = Math.floor(query.updatedSince.getTime() / 1000);
    }

    let url: string | undefined = `${this.baseUrl}/api/v2/tickets.json`;
    let pageQuery: Record<string, string | number> | undefined = params;
    let pageNumber = 0;

    while (url) {
      pageNumber++;
      const page = await this.fetchPage(url, pageQuery);
      this.metrics.incrementCounter('fetch_pages');
      this.metrics.incrementCounter('records_fetched', {}, page.tickets.length);

      this.logger.debug('Fetched ticket page', {
        page: pageNumber,
        records: page.tickets.length,
      });

      for (const record of page.tickets) {
        if (watermark !== undefined && isOlderThan(record, watermark)) {
          continue;
        }
        yield record;
      }

      const next = this.nextPageUrl(page);
      // A server that echoes the current cursor would loop forever
      url = next && next !== url ? next : undefined;
      pageQuery = undefined;
    }

    this.logger.info('Ticket fetch complete', { pages: pageNumber });
  }

  async getTicketById(id: number): Promise<RawRecord | null> {
    try {
      const response = await this.http.get(`${this.baseUrl}/api/v2/tickets/${id}.json`, {
        headers: { Authorization: this.authHeader },
      });
      return this.parse(SingleTicketSchema, response.data, 'ticket').ticket;
    } catch (error: unknown) {
      if (error instanceof FatalFetchError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Cheap authenticated call used to validate credentials before a run.
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.http.get(`${this.baseUrl}/api/v2/users/me.json`, {
        headers: { Authorization: this.authHeader },
      });
      return true;
    } catch (error: unknown) {
      this.logger.warn('Ticket API connection test failed', { error: errorMessage(error) });
      return false;
    }
  }

  private async fetchPage(
    url: string,
    query: Record<string, string | number> | undefined
  ): Promise<TicketPage> {
    const response = await this.http.get(url, {
      headers: { Authorization: this.authHeader },
      query,
    });
    return this.parse(TicketPageSchema, response.data, 'ticket page');
  }

  private nextPageUrl(page: TicketPage): string | undefined {
    if (page.meta?.has_more === false) {
      return undefined;
    }
    return page.links?.next ?? page.next_page ?? undefined;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new FatalFetchError(`Unexpected ${what} payload`, undefined, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }
}

function isOlderThan(record: RawRecord, watermark: number): boolean {
  const updatedAt = record.updated_at;
  if (typeof updatedAt !== 'string') return false;
  const time = new Date(updatedAt).getTime();
  // Unparsable timestamps are kept
  return !Number.isNaN(time) && time < watermark;
}
