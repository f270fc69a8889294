import { Pool, QueryResult, QueryResultRow } from 'pg';
import { DatabaseAdapter, QueryExecutor } from './adapter';
import { Logger } from '../utils/logger';

export interface PostgreSQLConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private pool: Pool | null = null;

  constructor(private config: PostgreSQLConfig) {}

  async connect(): Promise<void> {
    try {
      this.pool = new Pool({
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        user: this.config.user,
        password: this.config.password,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test connection
      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      Logger.info('PostgreSQL connected successfully', { host: this.config.host, database: this.config.database });
    } catch (error) {
      Logger.error('PostgreSQL connection error', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      Logger.info('PostgreSQL disconnected');
    }
  }

  async query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>> {
    return this.requirePool().query<R>(sql, params);
  }

  async transaction<T>(work: (tx: QueryExecutor) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    const client = await this.requirePool().connect();
    const tx: QueryExecutor = {
      query: <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => client.query<R>(sql, params),
    };

    try {
      await client.query('BEGIN');
      const result = await work(tx);
      // Last chance to cancel; after COMMIT the transition stands
      signal?.throwIfAborted();
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        Logger.error('PostgreSQL rollback failed', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not connected');
    }
    return this.pool;
  }
}
