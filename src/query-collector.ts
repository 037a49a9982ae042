/**
 * SQLBatcher Query Collector — dry-run sink
 *
 * In dry-run mode the batcher records each joined batch here instead of
 * executing it. The batcher only ever appends; callers read the log afterwards.
 */

import type { CollectedQuery, CollectorStats, QueryCollector, QueryMetadata } from './types.js';

export class ListQueryCollector implements QueryCollector {
  private queries: CollectedQuery[] = [];

  addQuery(sql: string, metadata?: QueryMetadata): void {
    this.queries.push({ sql, metadata });
  }

  getQueries(): readonly CollectedQuery[] {
    return this.queries;
  }

  get size(): number {
    return this.queries.length;
  }

  clear(): void {
    this.queries = [];
  }

  /**
   * Counts per metadata.tableName / metadata.queryType ("unknown" when absent).
   */
  getStats(): CollectorStats {
    const stats: CollectorStats = {
      totalQueries: this.queries.length,
      totalBytes: 0,
      byTable: {},
      byType: {},
    };

    for (const query of this.queries) {
      stats.totalBytes += Buffer.byteLength(query.sql, 'utf8');

      const table = query.metadata?.tableName ?? 'unknown';
      stats.byTable[table] = (stats.byTable[table] ?? 0) + 1;

      const type = query.metadata?.queryType ?? 'unknown';
      stats.byType[type] = (stats.byType[type] ?? 0) + 1;
    }

    return stats;
  }
}
