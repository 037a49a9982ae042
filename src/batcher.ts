/**
 * SQLBatcher — Size-bounded SQL statement batching
 *
 * Groups statements into batches under a byte ceiling and runs each batch
 * through a caller-supplied execute function:
 *
 *   statement → measure (sizeFunc)
 *     → oversized? flush pending, then flush it alone (warning event)
 *     → otherwise append; flush once the running size reaches maxBytes
 *   end of input → trailing flush
 *
 * Size accounting: the running size is the sum of measured statement sizes.
 * Delimiters are not counted, so a joined batch can be larger than maxBytes
 * by the delimiters between its statements plus the statement whose append
 * crossed the threshold.
 *
 * A batcher owns mutable state and is not safe for overlapping flush or
 * processStatements calls. Use one batcher per statement stream.
 */

import type {
  BatcherConfig,
  BatcherConfigInput,
  ExecuteFn,
  QueryCollector,
  QueryMetadata,
} from './types.js';
import type { SqlBatchAdapter } from './adapters/adapter.js';
import { BatcherError } from './errors.js';
import { BatcherEventEmitter } from './events.js';
import type { BatcherEventName, BatcherListener } from './events.js';
import { BatcherLogger } from './logger.js';
import { resolveBatcherConfig } from './config.js';
import { createFlushReceipt } from './receipts.js';

export class SQLBatcher {
  readonly config: BatcherConfig;

  private emitter: BatcherEventEmitter;
  private logger: BatcherLogger;
  private batch: string[] = [];
  private size = 0;

  constructor(config: BatcherConfigInput = {}) {
    this.config = resolveBatcherConfig(config);
    this.emitter = config.emitter ?? new BatcherEventEmitter();
    this.logger = new BatcherLogger(
      {
        enabled: this.config.logging !== false,
        verbose: this.config.logging === 'verbose',
        slowFlushMs: this.config.slowFlushMs,
      },
      this.emitter,
    );
  }

  /**
   * A batcher sized for `adapter`: maxBytes defaults to its getMaxQuerySize().
   * Pass `(sql) => adapter.execute(sql)` as the execute function.
   */
  static forAdapter(adapter: SqlBatchAdapter, config: BatcherConfigInput = {}): SQLBatcher {
    return new SQLBatcher({ ...config, maxBytes: config.maxBytes ?? adapter.getMaxQuerySize() });
  }

  // ─── Buffer State ──────────────────────────────────────────────────────────

  /** Pending statements, in insertion order. */
  get currentBatch(): readonly string[] {
    return [...this.batch];
  }

  /** Sum of measured sizes of the pending statements. */
  get currentSize(): number {
    return this.size;
  }

  get isEmpty(): boolean {
    return this.batch.length === 0;
  }

  // ─── Accumulation ──────────────────────────────────────────────────────────

  /**
   * Append a statement unconditionally. Returns true when the running size
   * has reached maxBytes and the caller should flush.
   */
  addStatement(statement: string): boolean {
    return this.append(statement, this.measure(statement));
  }

  reset(): void {
    this.batch = [];
    this.size = 0;
  }

  // ─── Flush ─────────────────────────────────────────────────────────────────

  /**
   * Join the pending statements and execute them (or record them in dry-run).
   * Returns the number of statements flushed; 0 for an empty batch.
   *
   * Errors from `execute` or the collector propagate unchanged and leave the
   * batch in place.
   */
  async flush(execute: ExecuteFn, collector?: QueryCollector, metadata?: QueryMetadata): Promise<number> {
    return this.flushPending(execute, collector, metadata, false);
  }

  /**
   * Batch and execute every statement of `statements`, in order.
   * Returns the total number of statements flushed.
   */
  async processStatements(
    statements: Iterable<string> | AsyncIterable<string>,
    execute: ExecuteFn,
    collector?: QueryCollector,
    metadata?: QueryMetadata,
  ): Promise<number> {
    const startTime = Date.now();
    let total = 0;
    let flushCount = 0;

    const track = (count: number): void => {
      total += count;
      if (count > 0) flushCount++;
    };

    for await (const statement of statements) {
      const size = this.measure(statement);

      if (size > this.config.maxBytes) {
        track(await this.flushPending(execute, collector, metadata, false));

        this.logger.warnOversized(statement, size, this.config.maxBytes);
        this.append(statement, size);
        track(await this.flushPending(execute, collector, metadata, true));
        continue;
      }

      if (this.append(statement, size)) {
        track(await this.flushPending(execute, collector, metadata, false));
      }
    }

    track(await this.flushPending(execute, collector, metadata, false));

    this.logger.logProcessed(total, flushCount, Date.now() - startTime);
    return total;
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async flushPending(
    execute: ExecuteFn,
    collector: QueryCollector | undefined,
    metadata: QueryMetadata | undefined,
    oversized: boolean,
  ): Promise<number> {
    const count = this.batch.length;
    if (count === 0) return 0;

    const startTime = Date.now();
    const sql = this.batch.join(this.config.delimiter);

    if (this.config.dryRun) {
      collector?.addQuery(sql, metadata);
    } else {
      await execute(sql);
    }

    const receipt = createFlushReceipt({
      statementCount: count,
      batchBytes: this.size,
      sql,
      startTime,
      dryRun: this.config.dryRun,
      oversized,
    });

    this.reset();
    this.logger.logFlush(receipt, sql);
    return count;
  }

  private append(statement: string, size: number): boolean {
    this.batch.push(statement);
    this.size += size;
    return this.size >= this.config.maxBytes;
  }

  private measure(statement: string): number {
    const size = this.config.sizeFunc(statement);
    if (!Number.isInteger(size) || size < 0) {
      throw new BatcherError({
        code: 'INVALID_SIZE',
        message: `sizeFunc returned ${String(size)} for a statement.`,
        fix: 'The size function must return a non-negative integer for every statement.',
      });
    }
    return size;
  }
}
