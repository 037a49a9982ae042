/**
 * SQLBatcher Adapter Interface
 *
 * An adapter is what a batcher is paired with: its execute() is the flush
 * callback and its getMaxQuerySize() is the usual source of maxBytes.
 * The batcher never calls the transaction hooks; callers scope transactions
 * around one or more processStatements() calls.
 */

import type { QueryResult, SqlDialect } from '../types.js';

export interface SqlBatchAdapter {
  readonly dialect: SqlDialect;

  // ─── Execution ────────────────────────────────────────────────────
  execute(sql: string): Promise<QueryResult>;
  getMaxQuerySize(): number;

  // ─── Lifecycle ────────────────────────────────────────────────────
  close(): Promise<void>;

  // ─── Transactions ────────────────────────────────────────────────
  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}
