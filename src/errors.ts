/**
 * SQLBatcher Error System — Normalized errors with fix instructions
 *
 * The batcher core never wraps errors raised by the execution callback or
 * the query collector. Configuration problems and adapter driver errors are
 * normalized into BatcherError instances.
 */

import type { BatcherErrorCode, SqlDialect } from './types.js';

// ─── BatcherError ────────────────────────────────────────────────────────────

export class BatcherError extends Error {
  readonly code: BatcherErrorCode;
  readonly dialect?: SqlDialect;
  readonly originalError: unknown;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: BatcherErrorCode;
    message: string;
    fix: string;
    dialect?: SqlDialect;
    originalError?: unknown;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'BatcherError';
    this.code = opts.code;
    this.dialect = opts.dialect;
    this.originalError = opts.originalError;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<BatcherErrorCode, boolean> = {
  INVALID_CONFIG: false,
  INVALID_SIZE: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  DUPLICATE_KEY: false,
  TABLE_NOT_FOUND: false,
  QUERY_ERROR: false,
  TRANSACTION_ERROR: false,
  UNSUPPORTED_OPERATION: false,
  INTERNAL_ERROR: false,
};

// ─── SQL Error Mapping ───────────────────────────────────────────────────────

/**
 * Normalize a driver error from pg or mysql2.
 * `sql` is only used to name the failing batch in the message.
 */
export function mapSqlError(err: unknown, dialect: SqlDialect, sql?: string): BatcherError {
  if (err instanceof BatcherError) return err;

  const code = readProp(err, 'code');
  const message = readProp(err, 'message') ?? String(err);
  const where = sql ? ` while executing "${preview(sql)}"` : '';

  // PostgreSQL 23505, MySQL ER_DUP_ENTRY
  if (code === '23505' || code === 'ER_DUP_ENTRY') {
    return new BatcherError({
      code: 'DUPLICATE_KEY',
      message: `Duplicate key violation${where}.`,
      fix: 'A row with this key already exists. Remove the duplicate from the batch or switch the statement to an upsert.',
      dialect,
      originalError: err,
    });
  }

  if (code === 'ECONNREFUSED' || message.includes('ECONNREFUSED') || message.includes('connect ENOTFOUND')) {
    return new BatcherError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to the ${dialect} database.`,
      fix: 'Verify the connection URI and that the database server is running.',
      dialect,
      originalError: err,
    });
  }

  // PostgreSQL 57014 query_canceled, MySQL ER_QUERY_TIMEOUT / ER_LOCK_WAIT_TIMEOUT
  if (code === '57014' || code === 'ER_QUERY_TIMEOUT' || code === 'ER_LOCK_WAIT_TIMEOUT' || message.includes('statement timeout')) {
    return new BatcherError({
      code: 'TIMEOUT',
      message: `Batch timed out${where}.`,
      fix: 'Lower maxBytes so each batch does less work, or raise the statement timeout on the server.',
      dialect,
      originalError: err,
    });
  }

  if (code === '28P01' || code === '28000' || code === 'ER_ACCESS_DENIED_ERROR' || message.includes('password authentication failed')) {
    return new BatcherError({
      code: 'AUTHENTICATION_FAILED',
      message: `Authentication to the ${dialect} database failed.`,
      fix: 'Check the username and password in the connection URI.',
      dialect,
      originalError: err,
    });
  }

  if (code === '42P01' || code === 'ER_NO_SUCH_TABLE') {
    return new BatcherError({
      code: 'TABLE_NOT_FOUND',
      message: `Table not found${where}.`,
      fix: 'Create the table before the batch runs, or put its CREATE TABLE statement first in the input.',
      dialect,
      originalError: err,
    });
  }

  // MySQL rejects multi-statement batches and oversized packets with these
  if (code === 'ER_PARSE_ERROR' || code === 'ER_NET_PACKET_TOO_LARGE' || code === '42601') {
    return new BatcherError({
      code: 'QUERY_ERROR',
      message: `SQL error${where}: ${message}`,
      fix: code === 'ER_NET_PACKET_TOO_LARGE'
        ? 'The joined batch exceeds max_allowed_packet. Lower maxBytes or the adapter maxQuerySize.'
        : 'Check the statement syntax for the target dialect.',
      dialect,
      originalError: err,
    });
  }

  return new BatcherError({
    code: 'INTERNAL_ERROR',
    message: `${dialect} error${where}: ${message}`,
    fix: 'Check the original error for details.',
    dialect,
    originalError: err,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function readProp(err: unknown, key: string): string | undefined {
  if (typeof err !== 'object' || err === null || !(key in err)) return undefined;
  const value: unknown = Reflect.get(err, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function preview(sql: string): string {
  return sql.length > 60 ? `${sql.substring(0, 60)}...` : sql;
}
