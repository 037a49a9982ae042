/**
 * SQLBatcher SQL Adapter
 *
 * Connects to PostgreSQL or MySQL from a URI and executes joined
 * batches through core/sql-client.ts. Driver errors are normalized with
 * mapSqlError().
 */

import type { SqlBatchAdapter } from './adapter.js';
import type { AdapterStatus, QueryResult, SqlAdapterConfig, SqlDialect } from '../types.js';
import { BatcherError, mapSqlError } from '../errors.js';
import { BatcherEventEmitter } from '../events.js';
import { resolveSqlAdapterConfig } from '../config.js';
import { connectClient } from '../core/sql-client.js';
import type { ClientFactory, SqlClient } from '../core/sql-client.js';
import type { TransactionStatements } from './generic-adapter.js';

type UriDialect = Exclude<SqlDialect, 'generic'>;

/** Practical per-dialect ceilings on one query string, in bytes. */
export const DEFAULT_MAX_QUERY_SIZE: Record<UriDialect, number> = {
  pg: 500_000_000,
  mysql2: 67_108_864, // default max_allowed_packet
};

export const TRANSACTION_STATEMENTS: Record<UriDialect, TransactionStatements> = {
  pg: { begin: 'BEGIN', commit: 'COMMIT', rollback: 'ROLLBACK' },
  mysql2: { begin: 'START TRANSACTION', commit: 'COMMIT', rollback: 'ROLLBACK' },
};

export const URI_SCHEMES: Record<UriDialect, string[]> = {
  pg: ['postgres://', 'postgresql://'],
  mysql2: ['mysql://'],
};

export class SqlAdapter implements SqlBatchAdapter {
  readonly dialect: UriDialect;

  private config: SqlAdapterConfig;
  private emitter: BatcherEventEmitter;
  private clientFactory: ClientFactory;
  private client: SqlClient | null = null;
  private connectedAt: Date | null = null;
  private closed = false;
  private inTransaction = false;
  private executedBatches = 0;

  constructor(
    config: SqlAdapterConfig,
    emitter: BatcherEventEmitter = new BatcherEventEmitter(),
    clientFactory: ClientFactory = connectClient,
  ) {
    this.config = resolveSqlAdapterConfig(config);
    this.dialect = detectDialect(this.config.uri);
    this.emitter = emitter;
    this.clientFactory = clientFactory;
  }

  /**
   * Connect and return a ready adapter.
   */
  static async create(config: SqlAdapterConfig, emitter?: BatcherEventEmitter): Promise<SqlAdapter> {
    const adapter = new SqlAdapter(config, emitter);
    await adapter.connect();
    return adapter;
  }

  async connect(): Promise<void> {
    if (this.client) return;
    try {
      this.client = await this.clientFactory(this.dialect, this.config.uri);
    } catch (err) {
      throw this.report(mapSqlError(err, this.dialect));
    }
    this.connectedAt = new Date();
    this.closed = false;
    this.emitter.emit('connected', {
      dialect: this.dialect,
      dbName: extractDbName(this.config.uri),
      label: this.config.label ?? this.dialect,
    });
  }

  async execute(sql: string): Promise<QueryResult> {
    const client = this.requireClient('execute');
    try {
      const result = await client.query(sql);
      this.executedBatches++;
      return result;
    } catch (err) {
      throw this.report(mapSqlError(err, this.dialect, sql));
    }
  }

  getMaxQuerySize(): number {
    return this.config.maxQuerySize ?? DEFAULT_MAX_QUERY_SIZE[this.dialect];
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    this.connectedAt = null;
    this.closed = true;
    this.inTransaction = false;
    await client.end();
    this.emitter.emit('closed', { dialect: this.dialect, executedBatches: this.executedBatches });
  }

  status(): AdapterStatus {
    return {
      state: this.connectedAt ? 'connected' : this.closed ? 'closed' : 'disconnected',
      dialect: this.dialect,
      uri: redactUri(this.config.uri),
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
      executedBatches: this.executedBatches,
      inTransaction: this.inTransaction,
    };
  }

  // ─── Transactions ──────────────────────────────────────────────────────────

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) {
      throw this.report(new BatcherError({
        code: 'TRANSACTION_ERROR',
        message: 'A transaction is already open on this adapter.',
        fix: 'Commit or roll back the open transaction before beginning another.',
        dialect: this.dialect,
      }));
    }
    await this.runTransactionStatement('begin');
    this.inTransaction = true;
  }

  /** The transaction stays open on the adapter until COMMIT succeeds. */
  async commitTransaction(): Promise<void> {
    this.requireTransaction('commit');
    await this.runTransactionStatement('commit');
    this.inTransaction = false;
  }

  async rollbackTransaction(): Promise<void> {
    this.requireTransaction('rollback');
    await this.runTransactionStatement('rollback');
    this.inTransaction = false;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async runTransactionStatement(action: keyof TransactionStatements): Promise<void> {
    const client = this.requireClient(action);
    const sql = TRANSACTION_STATEMENTS[this.dialect][action];
    try {
      await client.query(sql);
    } catch (err) {
      const mapped = mapSqlError(err, this.dialect, sql);
      throw this.report(new BatcherError({
        code: 'TRANSACTION_ERROR',
        message: `Transaction ${action} failed: ${mapped.message}`,
        fix: mapped.fix,
        dialect: this.dialect,
        originalError: err,
      }));
    }
    this.emitter.emit('transaction', { dialect: this.dialect, action });
  }

  private requireClient(operation: string): SqlClient {
    if (this.client) return this.client;
    throw this.report(new BatcherError({
      code: 'CONNECTION_FAILED',
      message: `Cannot ${operation}: the ${this.dialect} adapter is not connected.`,
      fix: 'Call adapter.connect() or use SqlAdapter.create() before executing batches.',
      dialect: this.dialect,
    }));
  }

  private requireTransaction(action: 'commit' | 'rollback'): void {
    if (this.inTransaction) return;
    throw this.report(new BatcherError({
      code: 'TRANSACTION_ERROR',
      message: `Cannot ${action}: no transaction is open.`,
      fix: 'Call beginTransaction() first, or use withTransaction().',
      dialect: this.dialect,
    }));
  }

  private report(err: BatcherError): BatcherError {
    this.emitter.emit('error', { code: err.code, message: err.message, fix: err.fix, dialect: this.dialect });
    return err;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function detectDialect(uri: string): UriDialect {
  for (const [dialect, schemes] of Object.entries(URI_SCHEMES)) {
    if (schemes.some(scheme => uri.startsWith(scheme)) && isUriDialect(dialect)) return dialect;
  }

  throw new BatcherError({
    code: 'INVALID_CONFIG',
    message: `Unsupported URI scheme in "${uri.substring(0, 20)}..."`,
    fix: 'Use postgresql:// or mysql:// URIs, or wrap your own client in a GenericAdapter.',
  });
}

function isUriDialect(value: string): value is UriDialect {
  return value in URI_SCHEMES;
}

function extractDbName(uri: string): string {
  try {
    const url = new URL(uri);
    return url.pathname.replace(/^\//, '') || 'default';
  } catch {
    return 'default';
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
