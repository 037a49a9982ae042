/**
 * SQLBatcher Logger — Structured flush logging
 *
 * Emits flush events with timing, receipt, and optionally the joined SQL.
 */

import type { FlushReceipt } from './types.js';
import type { BatcherEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowFlushMs: number;
}

const PREVIEW_LENGTH = 80;

export class BatcherLogger {
  private config: LoggerConfig;
  private emitter: BatcherEventEmitter;

  constructor(config: LoggerConfig, emitter: BatcherEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a completed flush.
   */
  logFlush(receipt: FlushReceipt, sql: string): void {
    if (!this.config.enabled) return;

    this.emitter.emit('flush', this.config.verbose ? { ...receipt, sql } : receipt);

    // Dry-run flushes never reach the database
    if (!receipt.dryRun && receipt.durationMs >= this.config.slowFlushMs) {
      this.emitter.emit('slow-flush', {
        statementCount: receipt.statementCount,
        durationMs: receipt.durationMs,
        threshold: this.config.slowFlushMs,
      });
    }
  }

  logProcessed(statementCount: number, flushCount: number, durationMs: number): void {
    if (!this.config.enabled) return;
    this.emitter.emit('processed', { statementCount, flushCount, durationMs });
  }

  /**
   * Warning for a statement larger than maxBytes. Emitted even when logging is off.
   */
  warnOversized(statement: string, size: number, maxBytes: number): void {
    this.emitter.emit('oversized-statement', {
      size,
      maxBytes,
      preview: statement.substring(0, PREVIEW_LENGTH),
    });
  }
}
