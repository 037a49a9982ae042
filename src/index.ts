/**
 * SQLBatcher — Public API Entry Point
 *
 * Size-bounded batching of SQL statements for PostgreSQL, MySQL
 * or any database reachable through an execute function.
 */

// Main class
export { SQLBatcher } from './batcher.js';

// Dry-run collector
export { ListQueryCollector } from './query-collector.js';

// Adapters
export { GenericAdapter, GENERIC_MAX_QUERY_SIZE } from './adapters/generic-adapter.js';
export { SqlAdapter, DEFAULT_MAX_QUERY_SIZE, detectDialect } from './adapters/sql-adapter.js';
export { withTransaction } from './transactions.js';

// Events, errors, config
export { BatcherEventEmitter } from './events.js';
export { BatcherError, ERROR_RETRYABLE, mapSqlError } from './errors.js';
export { resolveBatcherConfig, utf8ByteLength, DEFAULT_MAX_BYTES, DEFAULT_DELIMITER } from './config.js';

// Types
export type { SqlBatchAdapter } from './adapters/adapter.js';
export type { BatcherEventName, BatcherListener } from './events.js';
export type { GenericAdapterOptions, TransactionStatements } from './adapters/generic-adapter.js';
export type {
  AdapterStatus,
  BatcherConfig,
  BatcherConfigInput,
  BatcherErrorCode,
  BatcherEvents,
  CollectedQuery,
  CollectorStats,
  ExecuteFn,
  FlushReceipt,
  QueryCollector,
  QueryMetadata,
  QueryResult,
  SizeFunction,
  SqlAdapterConfig,
  SqlDialect,
} from './types.js';
