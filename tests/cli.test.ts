/**
 * CLI Tests — statement file reader and commands
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { ReadStream, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { Readable } from 'stream';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli, readSqlStatements, describeAdapters, readVersion } from '../cli/commands.js';
import type { CliIO } from '../cli/commands.js';
import { toFlag, usage } from '../cli/options.js';
import { GenericAdapter } from '../src/adapters/generic-adapter.js';
import type { SqlAdapterConfig } from '../src/types.js';

const ALICE = "INSERT INTO users VALUES (1, 'Alice')"; // 37 bytes
const BOB = "INSERT INTO users VALUES (2, 'Bob')"; // 35 bytes
const CAROL = "INSERT INTO users VALUES (3, 'Carol')"; // 37 bytes

const SEED = [
  '-- seed users',
  `${ALICE};`,
  `${BOB};`,
  '',
  'INSERT INTO users',
  "  VALUES (3, 'Carol');",
  'SELECT 1',
].join('\n');

let dir: string;
let seedFile: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'sqlbatcher-cli-'));
  seedFile = join(dir, 'seed.sql');
  writeFileSync(seedFile, SEED);
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = { out: line => { out.push(line); }, err: line => { err.push(line); } };
  return { io, out, err };
}

function fakeDatabase(withTransactions = false) {
  const executed: string[] = [];
  const close = vi.fn();
  const adapter = new GenericAdapter({
    execute: (sql: string) => { executed.push(sql); },
    maxQuerySize: 1000,
    close,
    transactionStatements: withTransactions ? { begin: 'BEGIN', commit: 'COMMIT', rollback: 'ROLLBACK' } : undefined,
  });
  const configs: SqlAdapterConfig[] = [];
  const createAdapter = async (config: SqlAdapterConfig) => {
    configs.push(config);
    return adapter;
  };
  return { executed, close, configs, createAdapter };
}

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of source) items.push(item);
  return items;
}

// ─── readSqlStatements ───────────────────────────────────────────────────────

describe('readSqlStatements', () => {
  it('splits on the delimiter, skipping comments and blank lines', async () => {
    expect(await collect(readSqlStatements(seedFile))).toEqual([ALICE, BOB, CAROL, 'SELECT 1']);
  });

  it('honors a custom delimiter', async () => {
    const file = join(dir, 'go.sql');
    writeFileSync(file, 'SELECT 1 GO\nSELECT 2;\nSELECT 3 GO\n');
    expect(await collect(readSqlStatements(file, 'GO'))).toEqual(['SELECT 1', 'SELECT 2; SELECT 3']);
  });

  it('closes the file when the consumer stops early', async () => {
    const file = join(dir, 'large.sql');
    writeFileSync(file, Array.from({ length: 20_000 }, (_, i) => `INSERT INTO t VALUES (${i});`).join('\n'));
    const destroy = vi.spyOn(Readable.prototype, 'destroy');

    try {
      const statements = readSqlStatements(file);
      expect((await statements.next()).value).toBe('INSERT INTO t VALUES (0)');
      await statements.return(undefined);

      const closed = destroy.mock.contexts.some(ctx => ctx instanceof ReadStream && ctx.path === file);
      expect(closed).toBe(true);
    } finally {
      destroy.mockRestore();
    }
  });

  it('drops lines holding only a delimiter', async () => {
    const file = join(dir, 'empty.sql');
    writeFileSync(file, ';\n\n-- nothing\n');
    expect(await collect(readSqlStatements(file))).toEqual([]);
  });
});

// ─── process ─────────────────────────────────────────────────────────────────

describe('sqlbatcher process', () => {
  it('prints batches in dry-run mode', async () => {
    const { io, out, err } = captureIO();
    const code = await runCli(['process', seedFile, '--dry-run', '--max-bytes', '80'], { io });

    expect(code).toBe(0);
    expect(out).toEqual([
      `${ALICE};${BOB};${CAROL}\n\nSELECT 1`,
      'Processed 4 statements in 2 batches',
    ]);
    expect(err).toEqual([]);
  });

  it('writes dry-run batches to --output', async () => {
    const { io, out } = captureIO();
    const output = join(dir, 'batches.sql');
    const code = await runCli(['process', seedFile, '--dry-run', '--output', output], { io });

    expect(code).toBe(0);
    expect(readFileSync(output, 'utf8')).toBe(`${ALICE};${BOB};${CAROL};SELECT 1\n`);
    expect(out).toEqual(['Processed 4 statements in 1 batches']);
  });

  it('warns about oversized statements on stderr', async () => {
    const { io, out, err } = captureIO();
    await runCli(['process', seedFile, '--dry-run', '--max-bytes', '36'], { io });

    expect(err).toEqual([
      `Warning: statement of 37 bytes exceeds max 36 bytes and was sent alone: ${ALICE}`,
      `Warning: statement of 37 bytes exceeds max 36 bytes and was sent alone: ${CAROL}`,
    ]);
    expect(out).toEqual([`${ALICE}\n\n${BOB}\n\n${CAROL}\n\nSELECT 1`, 'Processed 4 statements in 4 batches']);
  });

  it('logs each flush with --verbose', async () => {
    const { io, err } = captureIO();
    await runCli(['process', seedFile, '--dry-run', '--max-bytes', '80', '--verbose'], { io });

    expect(err).toHaveLength(2);
    expect(err[0]).toMatch(/^Flushed 3 statements \(111 bytes\) in \d+ms$/);
    expect(err[1]).toMatch(/^Flushed 1 statements \(8 bytes\) in \d+ms$/);
  });

  it('executes batches through the adapter and closes it', async () => {
    const { io, out } = captureIO();
    const db = fakeDatabase();
    const code = await runCli(
      ['process', seedFile, '--uri', 'postgresql://localhost/app'],
      { io, env: {}, createAdapter: db.createAdapter },
    );

    expect(code).toBe(0);
    expect(db.configs).toEqual([{ uri: 'postgresql://localhost/app', label: 'CLI' }]);
    expect(db.executed).toEqual([`${ALICE};${BOB};${CAROL};SELECT 1`]);
    expect(db.close).toHaveBeenCalledTimes(1);
    expect(out).toEqual(['Processed 4 statements in 1 batches']);
  });

  it('reads the URI from SQLBATCHER_URI', async () => {
    const { io } = captureIO();
    const db = fakeDatabase();
    await runCli(['process', seedFile], { io, env: { SQLBATCHER_URI: 'mysql://localhost/app' }, createAdapter: db.createAdapter });
    expect(db.configs[0]?.uri).toBe('mysql://localhost/app');
  });

  it('wraps all batches in one transaction with --transaction', async () => {
    const { io } = captureIO();
    const db = fakeDatabase(true);
    await runCli(
      ['process', seedFile, '--uri', 'mysql://localhost/app', '--max-bytes', '80', '--transaction'],
      { io, env: {}, createAdapter: db.createAdapter },
    );
    expect(db.executed).toEqual(['BEGIN', `${ALICE};${BOB};${CAROL}`, 'SELECT 1', 'COMMIT']);
  });

  it('fails without a URI outside dry-run', async () => {
    const { io, err } = captureIO();
    const db = fakeDatabase();
    const code = await runCli(['process', seedFile], { io, env: {}, createAdapter: db.createAdapter });

    expect(code).toBe(1);
    expect(err).toEqual(['No database URI given. Fix: Pass --uri, set SQLBATCHER_URI, or use --dry-run.']);
    expect(db.configs).toEqual([]);
  });

  it('rejects a non-numeric --max-bytes', async () => {
    const { io, err } = captureIO();
    expect(await runCli(['process', seedFile, '--dry-run', '--max-bytes', 'lots'], { io })).toBe(1);
    expect(err[0]).toMatch(/^Invalid options for "process": maxBytes: /);
  });

  it('requires a file', async () => {
    const { io, err } = captureIO();
    expect(await runCli(['process', '--dry-run'], { io })).toBe(1);
    expect(err[0]).toContain('file: Required');
  });

  it('rejects unknown options', async () => {
    const { io, err } = captureIO();
    expect(await runCli(['process', seedFile, '--fast'], { io })).toBe(1);
    expect(err).toHaveLength(1);
  });
});

// ─── Other commands ──────────────────────────────────────────────────────────

describe('sqlbatcher commands', () => {
  it('prints usage for help and no command', async () => {
    for (const argv of [[], ['help'], ['--help']]) {
      const { io, out } = captureIO();
      expect(await runCli(argv, { io })).toBe(0);
      expect(out).toEqual([usage()]);
    }
  });

  it('usage lists every process option as a flag', () => {
    const text = usage();
    for (const flag of ['--max-bytes', '--delimiter', '--dry-run', '--output', '--uri', '--transaction', '--verbose']) {
      expect(text).toContain(flag);
    }
    expect(toFlag('dryRun')).toBe('dry-run');
  });

  it('rejects unknown commands', async () => {
    const { io, err } = captureIO();
    expect(await runCli(['frobnicate'], { io })).toBe(1);
    expect(err[0]).toBe('Unknown command "frobnicate".');
  });

  it('lists adapters', async () => {
    const { io, out } = captureIO();
    expect(await runCli(['adapters'], { io })).toBe(0);
    expect(out).toEqual(describeAdapters());
    expect(out).toEqual([
      'pg: postgres://, postgresql:// (default max 500000000 bytes)',
      'mysql2: mysql:// (default max 67108864 bytes)',
      'generic: GenericAdapter({ execute }) (default max 500000 bytes)',
    ]);
  });

  it('prints the package version', async () => {
    const { io, out } = captureIO();
    expect(await runCli(['version'], { io })).toBe(0);
    expect(out).toEqual([`sqlbatcher ${readVersion()}`]);
    expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
