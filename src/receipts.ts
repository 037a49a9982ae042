/**
 * SQLBatcher Flush Receipts — Structured flush results
 *
 * Every non-empty flush produces a FlushReceipt for the event stream.
 */

import type { FlushReceipt } from './types.js';

export function createFlushReceipt(opts: {
  statementCount: number;
  batchBytes: number;
  sql: string;
  startTime: number;
  dryRun: boolean;
  oversized?: boolean;
}): FlushReceipt {
  return {
    statementCount: opts.statementCount,
    batchBytes: opts.batchBytes,
    sqlBytes: Buffer.byteLength(opts.sql, 'utf8'),
    durationMs: Date.now() - opts.startTime,
    dryRun: opts.dryRun,
    oversized: opts.oversized ?? false,
  };
}
