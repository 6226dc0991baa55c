// src/index.ts

export { TicketSyncSDK } from './sdk';
export type { SDKOverrides } from './sdk';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { InitConfig, ValidatedConfig } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

// Pipeline
export { SyncPipeline } from './sync/SyncPipeline';
export { parseCursor, resolveSince } from './sync/cursor';
export type { SyncCursor } from './sync/cursor';
export type {
  SyncTrigger,
  SyncStatus,
  SyncReport,
  SyncProgress,
  BatchError,
  FullSyncRequest,
  IncrementalSyncRequest,
  MergeToDestinationRequest,
  GapFillRequest,
} from './sync/types';

// Records and datasets
export type { RawRecord, FetchQuery, RecordSource, TicketApiAuth } from './core/fetcher/types';
export type { NormalizedRow, CustomField, CustomFieldValue, TicketStatus, TicketPriority } from './core/normalizer/types';
export { HEADER, encodeRow, decodeRow } from './core/dataset/RowCodec';
export type { PersistentDataset } from './core/dataset/RowCodec';
export { MergeEngine } from './core/merge/MergeEngine';
export { DatasetCompare, COMPARE_OPERATIONS } from './core/merge/DatasetCompare';
export type { CompareOperation, CompareOptions } from './core/merge/DatasetCompare';

// Destinations
export { CsvFileSink } from './sinks/CsvFileSink';
export { XlsxFileSink } from './sinks/XlsxFileSink';
export { GoogleSheetsSink } from './sinks/GoogleSheetsSink';
export type { SpreadsheetApi, SpreadsheetInfo } from './sinks/SpreadsheetApi';
export type { Sink, RowWriter, WriteMode, WriteSummary } from './sinks/types';

// Credentials
export type { CredentialSet, CredentialState, TokenExchanger } from './core/credentials/types';

// Export error classes for error handling
export {
  SyncError,
  ConfigError,
  TransientFetchError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  FatalFetchError,
  RetriesExhaustedError,
  CircuitBreakerOpenError,
  MalformedRecordError,
  SinkWriteError,
  LockTimeoutError,
  CredentialError,
  CredentialNotFoundError,
  CredentialRefreshError,
  RefreshTokenRejectedError,
  OAuthError,
  OAuthConfigError,
} from './utils/errors';
