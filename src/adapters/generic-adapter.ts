/**
 * SQLBatcher Generic Adapter
 *
 * Wraps any execute function, e.g. a pool's query method or a warehouse
 * client, so it can be paired with a batcher. Transaction hooks are no-ops
 * unless transaction statements are given.
 */

import type { SqlBatchAdapter } from './adapter.js';
import type { QueryResult, SqlDialect } from '../types.js';
import { BatcherError } from '../errors.js';

export const GENERIC_MAX_QUERY_SIZE = 500_000;

export interface TransactionStatements {
  begin: string;
  commit: string;
  rollback: string;
}

export interface GenericAdapterOptions {
  execute: (sql: string) => unknown;
  maxQuerySize?: number;
  transactionStatements?: TransactionStatements;
  close?: () => void | Promise<void>;
}

export class GenericAdapter implements SqlBatchAdapter {
  readonly dialect: SqlDialect = 'generic';

  private options: GenericAdapterOptions;
  private maxQuerySize: number;

  constructor(options: GenericAdapterOptions) {
    const maxQuerySize = options.maxQuerySize ?? GENERIC_MAX_QUERY_SIZE;
    if (!Number.isInteger(maxQuerySize) || maxQuerySize <= 0) {
      throw new BatcherError({
        code: 'INVALID_CONFIG',
        message: `Invalid maxQuerySize ${maxQuerySize}.`,
        fix: 'maxQuerySize must be a positive integer number of bytes.',
        dialect: 'generic',
      });
    }
    this.options = options;
    this.maxQuerySize = maxQuerySize;
  }

  async execute(sql: string): Promise<QueryResult> {
    const result: unknown = await this.options.execute(sql);
    return toQueryResult(result);
  }

  getMaxQuerySize(): number {
    return this.maxQuerySize;
  }

  async close(): Promise<void> {
    await this.options.close?.();
  }

  async beginTransaction(): Promise<void> {
    if (this.options.transactionStatements) {
      await this.options.execute(this.options.transactionStatements.begin);
    }
  }

  async commitTransaction(): Promise<void> {
    if (this.options.transactionStatements) {
      await this.options.execute(this.options.transactionStatements.commit);
    }
  }

  async rollbackTransaction(): Promise<void> {
    if (this.options.transactionStatements) {
      await this.options.execute(this.options.transactionStatements.rollback);
    }
  }
}

/** Accepts a `{ rows, rowCount }` result, a bare row array, or nothing. */
export function toQueryResult(result: unknown): QueryResult {
  if (Array.isArray(result)) {
    const rows: unknown[] = result;
    return { rows, rowCount: rows.length };
  }
  if (typeof result === 'object' && result !== null && 'rows' in result && Array.isArray(result.rows)) {
    const rows: unknown[] = result.rows;
    const rowCount = 'rowCount' in result && typeof result.rowCount === 'number' ? result.rowCount : rows.length;
    return { rows, rowCount };
  }
  return { rows: [], rowCount: 0 };
}
