/**
 * SQLBatcher — All shared types and interfaces
 *
 * Every module imports its shapes from here; this file imports only types.
 */

import type { BatcherEventEmitter } from './events.js';

// ─── Dialects ────────────────────────────────────────────────────────────────

export type SqlDialect = 'pg' | 'mysql2' | 'generic';

// ─── Execution Contract ──────────────────────────────────────────────────────

/**
 * Runs one joined batch. Failure is signalled by throwing or rejecting;
 * the batcher never catches it.
 */
export type ExecuteFn = (sql: string) => unknown;

/** Measures a statement. Must return a non-negative integer. */
export type SizeFunction = (statement: string) => number;

export type QueryMetadata = Record<string, unknown> & {
  tableName?: string;
  queryType?: string;
};

// ─── Configuration ───────────────────────────────────────────────────────────

export interface BatcherConfigInput {
  maxBytes?: number;
  delimiter?: string;
  dryRun?: boolean;
  sizeFunc?: SizeFunction;
  logging?: boolean | 'verbose';
  slowFlushMs?: number;
  emitter?: BatcherEventEmitter;
}

export interface BatcherConfig {
  readonly maxBytes: number;
  readonly delimiter: string;
  readonly dryRun: boolean;
  readonly sizeFunc: SizeFunction;
  readonly logging: boolean | 'verbose';
  readonly slowFlushMs: number;
}

// ─── Query Collector ─────────────────────────────────────────────────────────

export interface CollectedQuery {
  sql: string;
  metadata: QueryMetadata | undefined;
}

export interface QueryCollector {
  addQuery(sql: string, metadata?: QueryMetadata): void;
  getQueries(): readonly CollectedQuery[];
}

export interface CollectorStats {
  totalQueries: number;
  totalBytes: number;
  byTable: Record<string, number>;
  byType: Record<string, number>;
}

// ─── Flush Receipt ───────────────────────────────────────────────────────────

export interface FlushReceipt {
  statementCount: number;
  /** Sum of measured statement sizes; delimiters excluded. */
  batchBytes: number;
  /** UTF-8 byte length of the joined SQL. */
  sqlBytes: number;
  durationMs: number;
  dryRun: boolean;
  oversized: boolean;
}

// ─── Adapter Types ───────────────────────────────────────────────────────────

export interface QueryResult {
  rows: unknown[];
  rowCount: number;
}

export interface AdapterStatus {
  state: 'connected' | 'disconnected' | 'closed';
  dialect: SqlDialect;
  uri: string;
  uptimeMs: number;
  executedBatches: number;
  inTransaction: boolean;
}

export interface SqlAdapterConfig {
  uri: string;
  maxQuerySize?: number;
  label?: string;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type BatcherErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_SIZE'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'DUPLICATE_KEY'
  | 'TABLE_NOT_FOUND'
  | 'QUERY_ERROR'
  | 'TRANSACTION_ERROR'
  | 'UNSUPPORTED_OPERATION'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface BatcherEvents {
  flush: FlushReceipt & { sql?: string };
  'slow-flush': { statementCount: number; durationMs: number; threshold: number };
  'oversized-statement': { size: number; maxBytes: number; preview: string };
  processed: { statementCount: number; flushCount: number; durationMs: number };
  connected: { dialect: SqlDialect; dbName: string; label: string };
  closed: { dialect: SqlDialect; executedBatches: number };
  transaction: { dialect: SqlDialect; action: 'begin' | 'commit' | 'rollback' };
  error: { code: BatcherErrorCode; message: string; fix: string; dialect?: SqlDialect };
}
