/**
 * SQLBatcher CLI Commands
 *
 * Parses argv, validates options against cli/options.ts, and runs a command.
 * Returns the process exit code; main.ts does the exiting.
 */

import { createReadStream, readFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { createInterface } from 'readline';
import { parseArgs } from 'util';
import { SQLBatcher } from '../src/batcher.js';
import { ListQueryCollector } from '../src/query-collector.js';
import { SqlAdapter, DEFAULT_MAX_QUERY_SIZE, URI_SCHEMES } from '../src/adapters/sql-adapter.js';
import { GENERIC_MAX_QUERY_SIZE } from '../src/adapters/generic-adapter.js';
import type { SqlBatchAdapter } from '../src/adapters/adapter.js';
import { withTransaction } from '../src/transactions.js';
import { BatcherError } from '../src/errors.js';
import type { SqlAdapterConfig } from '../src/types.js';
import { isCommandName, processOptionsSchema, usage } from './options.js';
import type { ProcessOptions } from './options.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io: CliIO;
  env: Record<string, string | undefined>;
  createAdapter: (config: SqlAdapterConfig) => Promise<SqlBatchAdapter>;
}

const defaultDeps: CliDeps = {
  io: {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
  },
  env: process.env,
  createAdapter: config => SqlAdapter.create(config),
};

/**
 * Run the CLI. Errors are reported on stderr and turned into exit code 1.
 */
export async function runCli(argv: string[], deps: Partial<CliDeps> = {}): Promise<number> {
  const resolved: CliDeps = { ...defaultDeps, ...deps };
  const { io } = resolved;

  try {
    return await dispatch(argv, resolved);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  const [command, ...rest] = argv;
  const { io } = deps;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    io.out(usage());
    return 0;
  }

  if (!isCommandName(command)) {
    io.err(`Unknown command "${command}".`);
    io.err(usage());
    return 1;
  }

  switch (command) {
    case 'process':
      return processCommand(parseProcessOptions(rest), deps);
    case 'adapters':
      for (const line of describeAdapters()) io.out(line);
      return 0;
    case 'version':
      io.out(`sqlbatcher ${readVersion()}`);
      return 0;
  }
}

// ─── process ─────────────────────────────────────────────────────────────────

export function parseProcessOptions(args: string[]): ProcessOptions {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      'max-bytes': { type: 'string' },
      delimiter: { type: 'string' },
      'dry-run': { type: 'boolean' },
      output: { type: 'string' },
      uri: { type: 'string' },
      transaction: { type: 'boolean' },
      verbose: { type: 'boolean' },
    },
  });

  const parsed = processOptionsSchema.safeParse({
    file: positionals[0],
    maxBytes: values['max-bytes'],
    delimiter: values.delimiter,
    dryRun: values['dry-run'],
    output: values.output,
    uri: values.uri,
    transaction: values.transaction,
    verbose: values.verbose,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new BatcherError({
      code: 'INVALID_CONFIG',
      message: `Invalid options for "process": ${issues}.`,
      fix: 'Run "sqlbatcher help" for the list of options.',
    });
  }
  return parsed.data;
}

async function processCommand(opts: ProcessOptions, deps: CliDeps): Promise<number> {
  const { io } = deps;
  const statements = readSqlStatements(opts.file, opts.delimiter);
  let flushCount = 0;

  const watch = (batcher: SQLBatcher): SQLBatcher => {
    batcher.on('processed', e => { flushCount = e.flushCount; });
    batcher.on('oversized-statement', e => {
      io.err(`Warning: statement of ${e.size} bytes exceeds max ${e.maxBytes} bytes and was sent alone: ${e.preview}`);
    });
    if (opts.verbose) {
      batcher.on('flush', r => {
        io.err(`Flushed ${r.statementCount} statements (${r.sqlBytes} bytes) in ${r.durationMs}ms`);
      });
    }
    return batcher;
  };

  if (opts.dryRun) {
    const collector = new ListQueryCollector();
    const batcher = watch(new SQLBatcher({ maxBytes: opts.maxBytes, delimiter: opts.delimiter, dryRun: true }));
    const count = await batcher.processStatements(statements, () => undefined, collector, { source: opts.file });

    const text = collector.getQueries().map(q => q.sql).join('\n\n');
    if (opts.output) {
      await writeFile(opts.output, `${text}\n`, 'utf8');
    } else if (text.length > 0) {
      io.out(text);
    }
    io.out(`Processed ${count} statements in ${flushCount} batches`);
    return 0;
  }

  const uri = opts.uri ?? deps.env['SQLBATCHER_URI'];
  if (!uri) {
    throw new BatcherError({
      code: 'INVALID_CONFIG',
      message: 'No database URI given.',
      fix: 'Pass --uri, set SQLBATCHER_URI, or use --dry-run.',
    });
  }

  const adapter = await deps.createAdapter({ uri, label: 'CLI' });
  try {
    const batcher = watch(SQLBatcher.forAdapter(adapter, { maxBytes: opts.maxBytes, delimiter: opts.delimiter }));
    const run = (target: SqlBatchAdapter): Promise<number> =>
      batcher.processStatements(statements, sql => target.execute(sql));
    const count = opts.transaction ? await withTransaction(adapter, run) : await run(adapter);
    io.out(`Processed ${count} statements in ${flushCount} batches`);
    return 0;
  } finally {
    await adapter.close();
  }
}

/**
 * Stream statements from a SQL file. Blank lines and `--` comment lines are
 * skipped; a statement ends on a line ending with the delimiter, which is
 * stripped. A trailing statement without delimiter is kept. The file is
 * closed when the consumer stops early, e.g. after a failed flush.
 */
export async function* readSqlStatements(path: string, delimiter = ';'): AsyncGenerator<string> {
  const input = createReadStream(path, 'utf8');
  const lines = createInterface({ input, crlfDelay: Infinity });
  let parts: string[] = [];

  try {
    for await (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0 || line.startsWith('--')) continue;

      parts.push(line);
      if (line.endsWith(delimiter)) {
        const statement = parts.join(' ');
        parts = [];
        const body = statement.slice(0, -delimiter.length).trimEnd();
        if (body.length > 0) yield body;
      }
    }

    const remainder = parts.join(' ');
    if (remainder.length > 0) yield remainder;
  } finally {
    lines.close();
    input.destroy();
  }
}

// ─── adapters / version ──────────────────────────────────────────────────────

export function describeAdapters(): string[] {
  const dialects = ['pg', 'mysql2'] as const;
  const lines = dialects.map(dialect =>
    `${dialect}: ${URI_SCHEMES[dialect].join(', ')} (default max ${DEFAULT_MAX_QUERY_SIZE[dialect]} bytes)`);
  lines.push(`generic: GenericAdapter({ execute }) (default max ${GENERIC_MAX_QUERY_SIZE} bytes)`);
  return lines;
}

/** Walks up from this file to the package's own package.json (works from dist/ too). */
export function readVersion(): string {
  let dir = new URL('.', import.meta.url);
  for (let depth = 0; depth < 4; depth++) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL('package.json', dir), 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && pkg.name === 'sqlbatcher'
        && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
    dir = new URL('..', dir);
  }
  return 'unknown';
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
