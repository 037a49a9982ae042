/**
 * SQLBatcher Configuration — zod-validated, frozen at construction
 */

import { z } from 'zod';
import { BatcherError } from './errors.js';
import type { BatcherConfig, BatcherConfigInput, SizeFunction, SqlAdapterConfig } from './types.js';

export const DEFAULT_MAX_BYTES = 1_000_000;
export const DEFAULT_DELIMITER = ';';
export const DEFAULT_SLOW_FLUSH_MS = 1000;

/** Default size function: UTF-8 byte length. */
export function utf8ByteLength(statement: string): number {
  return Buffer.byteLength(statement, 'utf8');
}

const sizeFuncSchema = z.custom<SizeFunction>(
  (value) => typeof value === 'function',
  { message: 'Expected a function (statement: string) => number' },
);

export const batcherConfigSchema = z.object({
  maxBytes: z.number().int().positive().default(DEFAULT_MAX_BYTES),
  delimiter: z.string().min(1).default(DEFAULT_DELIMITER),
  dryRun: z.boolean().default(false),
  sizeFunc: sizeFuncSchema.default(() => utf8ByteLength),
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  slowFlushMs: z.number().int().nonnegative().default(DEFAULT_SLOW_FLUSH_MS),
});

/**
 * Apply defaults and validate. Throws INVALID_CONFIG listing every issue.
 */
export function resolveBatcherConfig(input: BatcherConfigInput = {}): BatcherConfig {
  const { emitter: _emitter, ...rest } = input;
  const parsed = batcherConfigSchema.safeParse(rest);

  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new BatcherError({
      code: 'INVALID_CONFIG',
      message: `Invalid batcher configuration: ${issues}.`,
      fix: 'maxBytes must be a positive integer, delimiter a non-empty string, slowFlushMs a non-negative integer and sizeFunc a function.',
    });
  }

  return Object.freeze({ ...parsed.data });
}

// ─── Adapter Configuration ───────────────────────────────────────────────────

export const sqlAdapterConfigSchema = z.object({
  uri: z.string().min(1),
  maxQuerySize: z.number().int().positive().optional(),
  label: z.string().optional(),
});

export function resolveSqlAdapterConfig(input: SqlAdapterConfig): SqlAdapterConfig {
  const parsed = sqlAdapterConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new BatcherError({
      code: 'INVALID_CONFIG',
      message: `Invalid adapter configuration: ${issues}.`,
      fix: 'Pass a non-empty uri and, if set, a positive integer maxQuerySize.',
    });
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || 'config'}: ${i.message}`)
    .join(', ');
}
