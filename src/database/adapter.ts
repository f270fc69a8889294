import { QueryResult, QueryResultRow } from 'pg';

export interface QueryExecutor {
  query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter extends QueryExecutor {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  /**
   * Run `work` inside a single transaction. Commits when `work` resolves and the
   * signal is not aborted; rolls back otherwise and rethrows.
   */
  transaction<T>(work: (tx: QueryExecutor) => Promise<T>, signal?: AbortSignal): Promise<T>;
}
