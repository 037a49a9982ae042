/**
 * Driver connections behind one small interface.
 *
 * pg accepts several `;`-separated statements in one call;
 * mysql2 needs multipleStatements enabled on the connection.
 */

import pg from 'pg';
import type { QueryResult as PgQueryResult } from 'pg';
import mysql from 'mysql2/promise';
import type { QueryResult, SqlDialect } from '../types.js';

export interface SqlClient {
  query(sql: string): Promise<QueryResult>;
  end(): Promise<void>;
}

export type ClientFactory = (dialect: Exclude<SqlDialect, 'generic'>, uri: string) => Promise<SqlClient>;

export const connectClient: ClientFactory = async (dialect, uri) => {
  switch (dialect) {
    case 'pg':
      return connectPg(uri);
    case 'mysql2':
      return connectMysql(uri);
  }
};

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

async function connectPg(uri: string): Promise<SqlClient> {
  const client = new pg.Client({ connectionString: uri });
  await client.connect();

  return {
    async query(sql) {
      // Multi-statement text comes back as one result per statement
      const raw: PgQueryResult | PgQueryResult[] = await client.query(sql);
      const results = Array.isArray(raw) ? raw : [raw];
      const rows: unknown[] = [];
      let rowCount = 0;
      for (const result of results) {
        rows.push(...result.rows);
        rowCount += result.rowCount ?? 0;
      }
      return { rows, rowCount };
    },
    async end() {
      await client.end();
    },
  };
}

// ─── MySQL ───────────────────────────────────────────────────────────────────

async function connectMysql(uri: string): Promise<SqlClient> {
  const connection = await mysql.createConnection({ uri, multipleStatements: true });

  return {
    async query(sql) {
      const [result] = await connection.query(sql);
      return fromMysqlResult(result);
    },
    async end() {
      await connection.end();
    },
  };
}

export function fromMysqlResult(result: unknown): QueryResult {
  if (!Array.isArray(result)) {
    return { rows: [], rowCount: affectedRows(result) };
  }

  const items: unknown[] = result;
  const isMultiStatement = items.length > 0 && items.every(item => Array.isArray(item) || isResultHeader(item));
  if (!isMultiStatement) {
    return { rows: items, rowCount: items.length };
  }

  const rows: unknown[] = [];
  let rowCount = 0;
  for (const item of items) {
    if (Array.isArray(item)) {
      const itemRows: unknown[] = item;
      rows.push(...itemRows);
      rowCount += itemRows.length;
    } else {
      rowCount += affectedRows(item);
    }
  }
  return { rows, rowCount };
}

function isResultHeader(value: unknown): value is { affectedRows: unknown } {
  return typeof value === 'object' && value !== null && 'affectedRows' in value;
}

function affectedRows(value: unknown): number {
  if (!isResultHeader(value)) return 0;
  return typeof value.affectedRows === 'number' ? value.affectedRows : 0;
}
