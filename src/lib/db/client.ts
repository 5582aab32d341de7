import type BetterSqlite3 from 'better-sqlite3';
import { getLogger } from '@/lib/log/logger';

type QueryParam = unknown;
type QueryParams = QueryParam[] | readonly QueryParam[];

const log = getLogger({ module: 'DBClient' });
const shouldLogQueries = process.env.DB_LOG_QUERIES === '1';

function logQuery(kind: 'select' | 'get' | 'run' | 'tx', sql: string, params: QueryParams): void {
  if (!shouldLogQueries) return;
  log.debug({ kind, sql, params }, 'db query');
}

/**
 * Query helpers bound to one connection. Row types are asserted at the call
 * site, the same way better-sqlite3's own `all()`/`get()` leave them.
 */
export class DbClient {
  constructor(readonly db: BetterSqlite3.Database) {}

  /**
   * Run a SELECT returning multiple rows
   */
  select<T = Record<string, unknown>>(sql: string, params: QueryParams = []): T[] {
    logQuery('select', sql, params);
    return this.db.prepare(sql).all(...params) as T[];
  }

  /**
   * Run a SELECT returning a single row (or null)
   */
  selectOne<T = Record<string, unknown>>(sql: string, params: QueryParams = []): T | null {
    logQuery('get', sql, params);
    const row = this.db.prepare(sql).get(...params) as T | undefined;
    return row ?? null;
  }

  /**
   * Run INSERT/UPDATE/DELETE
   */
  run(sql: string, params: QueryParams = []): BetterSqlite3.RunResult {
    logQuery('run', sql, params);
    return this.db.prepare(sql).run(...params);
  }

  /**
   * Execute a function inside a SQLite transaction. Nested calls become savepoints.
   * `immediate` takes the write lock up front, so no other connection can
   * interleave between the reads and writes of `fn`.
   */
  transaction<T>(fn: () => T, options: { immediate?: boolean } = {}): T {
    logQuery('tx', options.immediate ? 'BEGIN IMMEDIATE' : 'BEGIN', []);
    const tx = this.db.transaction(fn);
    return options.immediate ? tx.immediate() : tx();
  }
}
