/**
 * SQLBatcher Transactions — caller-side scoping
 *
 * The batcher never opens or closes transactions. Wrap one or more
 * processStatements() calls in withTransaction() to make them atomic.
 */

import type { SqlBatchAdapter } from './adapters/adapter.js';
import { BatcherError } from './errors.js';

/**
 * Begin, run `fn`, commit. If `fn` or the commit fails, roll back and rethrow
 * that error. Adapters without transaction hooks run `fn` directly.
 */
export async function withTransaction<T>(
  adapter: SqlBatchAdapter,
  fn: (adapter: SqlBatchAdapter) => Promise<T>,
): Promise<T> {
  if (!adapter.beginTransaction || !adapter.commitTransaction || !adapter.rollbackTransaction) {
    return fn(adapter);
  }

  await adapter.beginTransaction();

  try {
    const result = await fn(adapter);
    await adapter.commitTransaction();
    return result;
  } catch (err) {
    try {
      await adapter.rollbackTransaction();
    } catch (rollbackErr) {
      throw new BatcherError({
        code: 'TRANSACTION_ERROR',
        message: `Rollback failed: ${describe(rollbackErr)}. Original error: ${describe(err)}.`,
        fix: 'The transaction state on the server is unknown. Check the connection before retrying.',
        dialect: adapter.dialect,
        originalError: err,
      });
    }
    throw err;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
