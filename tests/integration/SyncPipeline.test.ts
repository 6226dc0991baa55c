/**
 * SyncPipeline Integration Tests
 *
 * Real fetcher, normalizer, merge engine and sinks. The ticket API is served
 * by nock, local files go to a temp directory and the spreadsheet is the
 * in-memory fake.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import { TicketFetcher } from '../../src/core/fetcher/TicketFetcher';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { MergeEngine } from '../../src/core/merge/MergeEngine';
import { DestinationLock } from '../../src/core/lock/DestinationLock';
import { HEADER, encodeRow, type PersistentDataset } from '../../src/core/dataset/RowCodec';
import { CsvFileSink } from '../../src/sinks/CsvFileSink';
import { GoogleSheetsSink } from '../../src/sinks/GoogleSheetsSink';
import { SyncPipeline } from '../../src/sync/SyncPipeline';
import { parseCursor } from '../../src/sync/cursor';
import type { SyncProgress, SyncReport } from '../../src/sync/types';
import { FakeSpreadsheetApi } from '../helpers/FakeSpreadsheetApi';
import { createTestLogger, createTestMetrics } from '../helpers/mocks';
import { API_BASE, makeTicket, range, ticketPage } from '../helpers/tickets';

const LIST = '/api/v2/tickets.json';
const NOW = new Date('2024-03-10T12:00:00Z');

describe('SyncPipeline', () => {
  let dir: string;
  let logger: ReturnType<typeof createTestLogger>;
  let metrics: ReturnType<typeof createTestMetrics>;
  let normalizer: Normalizer;
  let api: FakeSpreadsheetApi;
  let progress: SyncProgress[];

  function pipeline(mergeBatchSize = 500): SyncPipeline {
    const http = new HttpCore(
      undefined,
      { maxRetries: 1, baseDelay: 1, maxDelay: 5, rateLimitDelay: 10, retryableStatusCodes: [429, 500, 502, 503, 504] },
      metrics,
      logger,
      { sleep: () => Promise.resolve() }
    );
    const source = new TicketFetcher(
      { baseUrl: API_BASE, auth: { kind: 'token', email: 'agent@example.com', apiToken: 'test-token' } },
      http,
      logger,
      metrics
    );
    const syncPipeline = new SyncPipeline(
      {
        source,
        normalizer,
        mergeEngine: new MergeEngine(logger, metrics),
        lock: new DestinationLock(logger, metrics),
        logger,
        metrics,
      },
      { mergeBatchSize, now: () => NOW }
    );
    syncPipeline.on('progress', (event: SyncProgress) => progress.push(event));
    return syncPipeline;
  }

  function csvSink(batchSize = 100): CsvFileSink {
    return new CsvFileSink({ logger, metrics }, { directory: dir, batchSize, now: () => NOW });
  }

  function sheetsSink(batchSize = 100): GoogleSheetsSink {
    return new GoogleSheetsSink({ logger, metrics }, api, { spreadsheetId: 'sheet-1', batchSize, now: () => NOW });
  }

  function datasetOf(ids: number[]): PersistentDataset {
    return { header: [...HEADER], rows: ids.map((id) => encodeRow(normalizer.normalize(makeTicket(id)))) };
  }

  function storedIds(dataset: PersistentDataset | null): string[] {
    return dataset ? dataset.rows.map((row) => row[0]) : [];
  }

  beforeEach(async () => {
    nock.disableNetConnect();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sync-pipeline-'));
    logger = createTestLogger();
    metrics = createTestMetrics();
    normalizer = new Normalizer(logger, metrics);
    api = new FakeSpreadsheetApi();
    progress = [];
  });

  afterEach(async () => {
    nock.cleanAll();
    nock.enableNetConnect();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function threePages(): void {
    nock(API_BASE)
      .get(LIST)
      .query({ 'page[size]': '100' })
      .reply(200, ticketPage(range(1, 100), `${API_BASE}${LIST}?page[after]=p2`))
      .get(LIST)
      .query({ 'page[after]': 'p2' })
      .reply(200, ticketPage(range(101, 200), `${API_BASE}${LIST}?page[after]=p3`))
      .get(LIST)
      .query({ 'page[after]': 'p3' })
      .reply(200, ticketPage(range(201, 250), null));
  }

  describe('full sync', () => {
    it('should write every ticket to a new artifact', async () => {
      threePages();
      const syncPipeline = pipeline();
      const completed = vi.fn();
      syncPipeline.on('completed', completed);

      const report = await syncPipeline.runFullSync({ sink: csvSink() });

      expect(report).toMatchObject({
        trigger: 'full',
        status: 'success',
        fetched: 250,
        normalized: 250,
        skipped: 0,
        written: 250,
        batches: 3,
        batchErrors: [],
        location: path.join(path.resolve(dir), 'tickets_20240310_120000.csv'),
        startedAt: '2024-03-10T12:00:00.000Z',
        durationMs: 0,
      });
      expect(report.terminalError).toBeUndefined();

      const content = await fs.readFile(path.join(dir, 'tickets_20240310_120000.csv'), 'utf8');
      const lines = content.split('\n').filter((line) => line !== '');
      expect(lines).toHaveLength(251);
      expect(lines[0]).toBe(HEADER.join(','));

      expect(progress.map((event) => event.written)).toEqual([100, 200, 250]);
      expect(progress.every((event) => event.runId === report.runId)).toBe(true);
      expect(completed).toHaveBeenCalledWith(report);
      expect(syncPipeline.getLastReport()).toBe(report);
      expect(metrics.incrementCounter).toHaveBeenCalledWith('sync_runs', { trigger: 'full', status: 'success' });
      expect(metrics.recordGauge).toHaveBeenCalledWith('last_run_rows', 250, { trigger: 'full' });
    });

    it('should count malformed records as skipped', async () => {
      nock(API_BASE)
        .get(LIST)
        .query(true)
        .reply(200, {
          tickets: [makeTicket(1), makeTicket(2, { id: 'not-a-number' }), makeTicket(3)],
          meta: { has_more: false },
          links: { next: null },
        });

      const report = await pipeline().runFullSync({ sink: csvSink() });

      expect(report).toMatchObject({ status: 'success', fetched: 3, normalized: 2, skipped: 1, written: 2 });
    });

    it('should report a partial run when the destination fails mid-way', async () => {
      threePages();
      let appends = 0;
      api.beforeCall = (method) => {
        if (method === 'appendValues' && ++appends === 2) throw new Error('Quota exceeded');
      };

      const report = await pipeline().runFullSync({ sink: sheetsSink(), mode: 'append-existing' });

      expect(report).toMatchObject({
        status: 'partial',
        written: 100,
        batches: 1,
        batchErrors: [
          {
            batch: 2,
            code: 'SINK_WRITE_FAILED',
            message: 'Failed to write to sheet-1/Tickets',
            rowsPersisted: 100,
          },
        ],
        terminalError: { code: 'SINK_WRITE_FAILED', message: 'Failed to write to sheet-1/Tickets' },
      });
      expect(api.rows('Tickets')).toHaveLength(101);
      expect(logger.error).toHaveBeenCalledWith('Sync run ended early', expect.objectContaining({ status: 'partial' }));
    });

    it('should fail without rejecting when the first page is refused', async () => {
      nock(API_BASE).get(LIST).query(true).reply(401, { error: "Couldn't authenticate you" });

      const report = await pipeline().runFullSync({ sink: csvSink() });

      expect(report).toMatchObject({
        status: 'failed',
        fetched: 0,
        written: 0,
        terminalError: { code: 'FATAL_FETCH_ERROR' },
      });
      const content = await fs.readFile(path.join(dir, 'tickets_20240310_120000.csv'), 'utf8');
      expect(content).toBe(`${HEADER.join(',')}\n`);
    });
  });

  describe('incremental sync', () => {
    it('should update changed tickets in place and append new ones', async () => {
      const sink = csvSink();
      await sink.replaceDataset(datasetOf([1, 2, 3]));
      nock(API_BASE)
        .get(LIST)
        .query({ 'page[size]': '100', start_time: '1709467200' })
        .reply(200, {
          tickets: [
            makeTicket(2, { subject: 'Ticket 2 (edited)', updated_at: '2024-03-09T10:00:00Z' }),
            makeTicket(4, { updated_at: '2024-03-09T11:00:00Z' }),
          ],
          meta: { has_more: false },
          links: { next: null },
        });

      const report = await pipeline().runIncrementalSync({ sink, cursor: parseCursor('7d') });

      expect(report).toMatchObject({
        trigger: 'incremental',
        status: 'success',
        fetched: 2,
        inserted: 1,
        updated: 1,
        written: 2,
        batches: 1,
        location: sink.describe(),
      });
      const stored = await sink.readDataset();
      expect(storedIds(stored)).toEqual(['1', '2', '3', '4']);
      expect(stored?.rows[1][1]).toBe('Ticket 2 (edited)');
      expect(stored?.rows[0]).toEqual(datasetOf([1]).rows[0]);
    });

    it('should create the dataset on the first run', async () => {
      const sink = csvSink();
      nock(API_BASE).get(LIST).query(true).reply(200, ticketPage([5, 6], null));

      const report = await pipeline().runIncrementalSync({ sink, cursor: parseCursor('all') });

      expect(report).toMatchObject({ status: 'success', inserted: 2, updated: 0 });
      expect(storedIds(await sink.readDataset())).toEqual(['5', '6']);
    });

    it('should persist what was fetched before the upstream failed', async () => {
      const sink = csvSink();
      nock(API_BASE)
        .get(LIST)
        .query(true)
        .reply(200, ticketPage(range(1, 100), `${API_BASE}${LIST}?page[after]=p2`))
        .get(LIST)
        .query({ 'page[after]': 'p2' })
        .reply(401, { error: "Couldn't authenticate you" });

      const report = await pipeline(60).runIncrementalSync({ sink, cursor: parseCursor('all') });

      expect(report).toMatchObject({
        status: 'partial',
        fetched: 100,
        inserted: 100,
        written: 100,
        batches: 2,
        terminalError: { code: 'FATAL_FETCH_ERROR' },
      });
      expect(storedIds(await sink.readDataset())).toEqual(range(1, 100).map(String));
      expect(logger.warn).toHaveBeenCalledWith(
        'Fetch aborted, persisting partial batch',
        expect.objectContaining({ pending: 40 })
      );
    });

    it('should be idempotent for a repeated window', async () => {
      const sink = csvSink();
      nock(API_BASE).get(LIST).query(true).times(2).reply(200, ticketPage([1, 2], null));

      await pipeline().runIncrementalSync({ sink, cursor: parseCursor('all') });
      const first = await sink.readDataset();
      const report = await pipeline().runIncrementalSync({ sink, cursor: parseCursor('all') });

      expect(report).toMatchObject({ inserted: 0, updated: 2 });
      expect(await sink.readDataset()).toEqual(first);
    });

    it('should serialize overlapping runs into one dataset', async () => {
      nock(API_BASE)
        .get(LIST)
        .query(true)
        .reply(200, ticketPage([1, 2, 3], null))
        .get(LIST)
        .query(true)
        .reply(200, ticketPage([2, 3, 4], null));
      const syncPipeline = pipeline();

      const reports = await Promise.all([
        syncPipeline.runIncrementalSync({ sink: csvSink(), cursor: parseCursor('all') }),
        syncPipeline.runIncrementalSync({ sink: csvSink(), cursor: parseCursor('all') }),
      ]);

      expect(reports.map((report) => report.status)).toEqual(['success', 'success']);
      expect(reports.reduce((sum, report) => sum + report.inserted, 0)).toBe(4);
      expect(reports.reduce((sum, report) => sum + report.updated, 0)).toBe(2);
      const ids = storedIds(await csvSink().readDataset());
      expect(ids).toHaveLength(4);
      expect([...ids].sort()).toEqual(['1', '2', '3', '4']);
    });

    it('should append to the daily artifact with the append strategy', async () => {
      nock(API_BASE).get(LIST).query(true).reply(200, ticketPage([7, 8], null));

      const report = await pipeline().runIncrementalSync({
        sink: csvSink(),
        cursor: parseCursor('all'),
        strategy: 'append',
      });

      expect(report).toMatchObject({
        status: 'success',
        written: 2,
        location: path.join(path.resolve(dir), 'tickets_20240310.csv'),
      });
    });
  });

  describe('merge to destination', () => {
    it('should make the target equal to the source dataset', async () => {
      const source = csvSink();
      await source.replaceDataset(datasetOf([1, 2, 3]));
      api.seed('Tickets', [[...HEADER], ...datasetOf([10, 11, 12, 13, 14]).rows]);

      const report = await pipeline().runMergeToDestination({ source, target: sheetsSink() });

      expect(report).toMatchObject({
        trigger: 'merge-to-destination',
        status: 'success',
        fetched: 3,
        written: 3,
        batches: 1,
        location: 'sheet-1/Tickets',
      });
      expect(api.rows('Tickets').map((row) => row[0])).toEqual(['id', '1', '2', '3']);
      expect(progress).toHaveLength(1);
    });

    it('should fail when the source has no dataset', async () => {
      const report = await pipeline().runMergeToDestination({ source: csvSink(), target: sheetsSink() });

      expect(report).toMatchObject({
        status: 'failed',
        written: 0,
        terminalError: { code: 'SINK_WRITE_FAILED', message: 'Source dataset not found' },
      });
      expect(api.tabs.has('Tickets')).toBe(false);
    });
  });

  describe('gap fill', () => {
    it('should merge tickets missing from the dataset that still exist', async () => {
      const sink = csvSink();
      await sink.replaceDataset(datasetOf([1, 2, 5]));
      nock(API_BASE)
        .get('/api/v2/tickets/3.json')
        .reply(200, { ticket: makeTicket(3) })
        .get('/api/v2/tickets/4.json')
        .reply(404, { error: 'RecordNotFound' });

      const report = await pipeline().runGapFill({ sink });

      expect(report).toMatchObject({ trigger: 'gap-fill', status: 'success', fetched: 1, inserted: 1, written: 1 });
      expect(storedIds(await sink.readDataset())).toEqual(['1', '2', '5', '3']);
    });

    it('should look up no more ids than the limit', async () => {
      const sink = csvSink();
      await sink.replaceDataset(datasetOf([1, 4]));
      const scope = nock(API_BASE).get('/api/v2/tickets/2.json').reply(200, { ticket: makeTicket(2) });

      const report = await pipeline().runGapFill({ sink, maxIds: 1 });

      expect(report).toMatchObject({ status: 'success', inserted: 1 });
      expect(scope.isDone()).toBe(true);
      expect(storedIds(await sink.readDataset())).toEqual(['1', '4', '2']);
    });

    it('should do nothing without a dataset', async () => {
      const report: SyncReport = await pipeline().runGapFill({ sink: csvSink() });

      expect(report).toMatchObject({ status: 'success', fetched: 0, written: 0, batches: 0 });
    });
  });
});
