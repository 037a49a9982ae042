/**
 * SQLBatcher CLI Option Definitions
 *
 * Every command's options are a zod schema with descriptions; the usage text
 * is generated from them.
 */

import { z } from 'zod';

export const processOptionsSchema = z.object({
  file: z.string().min(1).describe('SQL file to process (one statement per delimiter-terminated line)'),
  maxBytes: z.coerce.number().int().positive().optional().describe('Maximum batch size in bytes'),
  delimiter: z.string().min(1).default(';').describe('SQL statement delimiter'),
  dryRun: z.boolean().default(false).describe("Don't execute, just print batches"),
  output: z.string().min(1).optional().describe('Output file for batched SQL (dry-run mode)'),
  uri: z.string().min(1).optional().describe('Database URI (defaults to $SQLBATCHER_URI)'),
  transaction: z.boolean().default(false).describe('Run all batches in one transaction'),
  verbose: z.boolean().default(false).describe('Log every flush to stderr'),
});

export type ProcessOptions = z.infer<typeof processOptionsSchema>;

export const commandDefinitions = {
  process: {
    description: 'Process SQL statements from a file',
    usage: 'sqlbatcher process <file> [--max-bytes N] [--delimiter D] [--dry-run] [--output F] [--uri URI] [--transaction] [--verbose]',
  },
  adapters: {
    description: 'List supported database adapters',
    usage: 'sqlbatcher adapters',
  },
  version: {
    description: 'Show version information',
    usage: 'sqlbatcher version',
  },
} as const;

export type CommandName = keyof typeof commandDefinitions;

export function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(commandDefinitions, value);
}

export function usage(): string {
  const lines = ['Usage: sqlbatcher <command> [options]', '', 'Commands:'];
  for (const [name, def] of Object.entries(commandDefinitions)) {
    lines.push(`  ${name.padEnd(10)}${def.description}`);
  }
  lines.push('', 'Process options:');
  for (const [key, schema] of Object.entries(processOptionsSchema.shape)) {
    if (key === 'file') continue;
    lines.push(`  --${toFlag(key).padEnd(14)}${schema.description ?? ''}`);
  }
  return lines.join('\n');
}

/** maxBytes → max-bytes */
export function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}
