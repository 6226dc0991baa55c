// src/sdk.ts

import type { CredentialSet, CredentialState, AuthorizationRequest, TokenExchanger } from './core/credentials/types';
import type { Sink, LocalSinkOptions } from './sinks/types';
import type {
  FullSyncRequest,
  GapFillRequest,
  IncrementalSyncRequest,
  MergeToDestinationRequest,
  SyncProgress,
  SyncReport,
} from './sync/types';
import { HttpCore } from './core/http/HttpCore';
import { TicketFetcher } from './core/fetcher/TicketFetcher';
import { Normalizer } from './core/normalizer/Normalizer';
import { MergeEngine } from './core/merge/MergeEngine';
import { DatasetCompare, CompareOperation } from './core/merge/DatasetCompare';
import { PersistentDataset, emptyDataset } from './core/dataset/RowCodec';
import { DistributedLock } from './core/lock/DistributedLock';
import { DestinationLock } from './core/lock/DestinationLock';
import { CredentialStore } from './core/credentials/CredentialStore';
import { CredentialManager } from './core/credentials/CredentialManager';
import { AuthCore } from './core/credentials/AuthCore';
import { CsvFileSink } from './sinks/CsvFileSink';
import { XlsxFileSink } from './sinks/XlsxFileSink';
import { GoogleSheetsSink, DestinationCheck } from './sinks/GoogleSheetsSink';
import { GoogleSpreadsheetApi, SpreadsheetApi } from './sinks/SpreadsheetApi';
import { SyncPipeline } from './sync/SyncPipeline';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, InitConfig, ValidatedConfig } from './config/ConfigValidator';
import { OAuthConfigError } from './utils/errors';

/**
 * Collaborators that replace the network-backed defaults, mainly for tests
 * and embedding.
 */
export interface SDKOverrides {
  spreadsheetApi?: SpreadsheetApi;
  exchanger?: TokenExchanger;
  now?: () => Date;
}

interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
  fetcher: TicketFetcher;
  locks: DistributedLock;
  pipeline: SyncPipeline;
  compare: DatasetCompare;
  credentials?: CredentialManager;
}

export class TicketSyncSDK {
  private core: CoreDeps;
  private spreadsheetApi?: SpreadsheetApi;
  private now: () => Date;

  /**
   * Dependencies are built in order and assigned to this.core last.
   */
  private constructor(
    private config: ValidatedConfig,
    overrides: SDKOverrides
  ) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(config.http.rateLimit, config.http.retry, metrics, logger, {
      timeout: config.http.timeout,
      keepAlive: config.http.keepAlive,
    });
    const fetcher = new TicketFetcher(config.ticketApi, http, logger, metrics);
    const locks = new DistributedLock(config.lock?.redisUrl, logger);
    const destinationLock = new DestinationLock(logger, metrics, locks, {
      acquireTimeoutMs: config.lock?.acquireTimeoutMs,
      leaseMs: config.lock?.leaseMs,
    });

    this.now = overrides.now ?? (() => new Date());
    const pipeline = new SyncPipeline(
      {
        source: fetcher,
        normalizer: new Normalizer(logger, metrics),
        mergeEngine: new MergeEngine(logger, metrics),
        lock: destinationLock,
        logger,
        metrics,
      },
      { mergeBatchSize: config.sync?.mergeBatchSize, now: this.now }
    );

    let credentials: CredentialManager | undefined;
    if (config.credentials) {
      const google = config.credentials.google;
      const exchanger = overrides.exchanger ?? (google ? new AuthCore(google, logger) : undefined);
      if (exchanger) {
        const margin = config.credentials.preRefreshMarginMinutes;
        credentials = new CredentialManager(
          config.credentials.identity,
          new CredentialStore(config.credentials.store, logger),
          exchanger,
          logger,
          metrics,
          locks,
          { preRefreshMarginMs: margin !== undefined ? margin * 60 * 1000 : undefined }
        );
      }
    }

    this.core = { logger, metrics, http, fetcher, locks, pipeline, compare: new DatasetCompare(logger), credentials };
    this.spreadsheetApi = overrides.spreadsheetApi;
  }

  /**
   * Validate the configuration, build every component and wait for the
   * Redis connection when one is configured.
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const sdk = await TicketSyncSDK.init({
   *   ticketApi: {
   *     baseUrl: 'https://example.zendesk.com',
   *     auth: { kind: 'token', email: 'agent@example.com', apiToken: process.env.ZENDESK_API_TOKEN },
   *   },
   *   sinks: { local: { directory: 'exports' } },
   * });
   * const report = await sdk.runIncrementalSync({
   *   sink: sdk.createCsvSink(),
   *   cursor: parseCursor('24h'),
   * });
   * ```
   */
  static async init(config: InitConfig, overrides: SDKOverrides = {}): Promise<TicketSyncSDK> {
    const validatedConfig = validateConfig(config);
    const sdk = new TicketSyncSDK(validatedConfig, overrides);

    await sdk.core.locks.initialize();

    sdk.core.logger.info('SDK initialized', {
      ticketApi: validatedConfig.ticketApi.baseUrl,
      localSink: validatedConfig.sinks.local !== undefined,
      sheetsSink: validatedConfig.sinks.sheets !== undefined,
      credentials: sdk.core.credentials !== undefined,
    });

    return sdk;
  }

  // Sinks

  createCsvSink(options: Partial<LocalSinkOptions> = {}): CsvFileSink {
    return new CsvFileSink(this.sinkDeps(), this.localOptions(options));
  }

  createXlsxSink(options: Partial<LocalSinkOptions> = {}): XlsxFileSink {
    return new XlsxFileSink(this.sinkDeps(), this.localOptions(options));
  }

  /**
   * The configured spreadsheet tab, accessed with the service account key
   * or with the connected identity's access token.
   *
   * @throws {OAuthConfigError} If no spreadsheet is configured
   */
  createSheetsSink(options: { tab?: string } = {}): GoogleSheetsSink {
    const sheets = this.config.sinks.sheets;
    if (!sheets) {
      throw new OAuthConfigError('No spreadsheet configured (sinks.sheets)');
    }

    return new GoogleSheetsSink(this.sinkDeps(), this.getSpreadsheetApi(), {
      spreadsheetId: sheets.spreadsheetId,
      tab: options.tab ?? sheets.tab,
      batchSize: sheets.batchSize,
      now: this.now,
    });
  }

  // Triggers

  async runFullSync(request: FullSyncRequest): Promise<SyncReport> {
    return this.core.pipeline.runFullSync(request);
  }

  async runIncrementalSync(request: IncrementalSyncRequest): Promise<SyncReport> {
    return this.core.pipeline.runIncrementalSync(request);
  }

  async runMergeToDestination(request: MergeToDestinationRequest): Promise<SyncReport> {
    return this.core.pipeline.runMergeToDestination(request);
  }

  async runGapFill(request: GapFillRequest): Promise<SyncReport> {
    return this.core.pipeline.runGapFill({
      ...request,
      maxIds: request.maxIds ?? this.config.sync?.gapFillMaxIds,
    });
  }

  /**
   * Keyed comparison of two stored datasets, e.g. a spreadsheet tab against a
   * local export. A sink with no stored dataset compares as empty.
   */
  async compareDatasets(request: {
    left: Sink;
    right: Sink;
    operation: CompareOperation;
    keyColumn?: number;
  }): Promise<PersistentDataset> {
    const [left, right] = await Promise.all([request.left.readDataset(), request.right.readDataset()]);
    return this.core.compare.compare(request.operation, left ?? emptyDataset(), right ?? emptyDataset(), {
      keyColumn: request.keyColumn,
    });
  }

  getLastReport(): SyncReport | undefined {
    return this.core.pipeline.getLastReport();
  }

  onProgress(listener: (progress: SyncProgress) => void): () => void {
    this.core.pipeline.on('progress', listener);
    return () => {
      this.core.pipeline.off('progress', listener);
    };
  }

  // Delegated identity

  createAuthorizationUrl(opts?: { loginHint?: string }): AuthorizationRequest {
    return this.requireCredentials().createAuthorizationUrl(opts);
  }

  async completeAuthorization(code: string, state: string): Promise<CredentialSet> {
    return this.requireCredentials().completeAuthorization(code, state);
  }

  async getCredentialState(): Promise<CredentialState> {
    return this.core.credentials ? this.core.credentials.getState() : 'unauthenticated';
  }

  async getAccessToken(): Promise<string> {
    return this.requireCredentials().getAccessToken();
  }

  async disconnect(): Promise<void> {
    await this.requireCredentials().disconnect();
  }

  // Health

  /**
   * Checks the ticket API credentials and, when one is configured, access to
   * the spreadsheet.
   */
  async testConnection(): Promise<{ ticketApi: boolean; spreadsheet?: DestinationCheck }> {
    const ticketApi = await this.core.fetcher.testConnection();
    if (!this.config.sinks.sheets) {
      return { ticketApi };
    }
    return { ticketApi, spreadsheet: await this.createSheetsSink().verify() };
  }

  getHealth(): {
    distributedLocks: {
      connected: boolean;
      mode: 'distributed' | 'local-only';
      healthy: boolean;
    };
  } {
    return {
      distributedLocks: this.core.locks.getConnectionStatus(),
    };
  }

  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async shutdown(): Promise<void> {
    await this.core.locks.disconnect();
    await this.core.metrics.close();
    this.core.logger.info('SDK shut down');
  }

  private getSpreadsheetApi(): SpreadsheetApi {
    if (this.spreadsheetApi) return this.spreadsheetApi;

    const sheets = this.config.sinks.sheets;
    let api: SpreadsheetApi;
    if (sheets?.auth === 'serviceAccount' && sheets.keyFile) {
      api = new GoogleSpreadsheetApi({ kind: 'serviceAccount', keyFile: sheets.keyFile });
    } else {
      const credentials = this.requireCredentials();
      api = new GoogleSpreadsheetApi({ kind: 'delegated', getAccessToken: () => credentials.getAccessToken() });
    }
    this.spreadsheetApi = api;
    return api;
  }

  private requireCredentials(): CredentialManager {
    if (!this.core.credentials) {
      throw new OAuthConfigError('Delegated identity is not configured (credentials.google)');
    }
    return this.core.credentials;
  }

  private localOptions(options: Partial<LocalSinkOptions>): LocalSinkOptions {
    const local = this.config.sinks.local;
    return {
      directory: options.directory ?? local?.directory ?? 'exports',
      prefix: options.prefix ?? local?.prefix,
      batchSize: options.batchSize ?? local?.batchSize,
      now: options.now ?? this.now,
    };
  }

  private sinkDeps(): { logger: Logger; metrics: MetricsCollector } {
    return { logger: this.core.logger, metrics: this.core.metrics };
  }
}
