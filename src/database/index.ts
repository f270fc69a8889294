import { DatabaseAdapter } from './adapter';
import { PostgreSQLAdapter } from './postgresql';
import { Env } from '../config/env';
import { Logger } from '../utils/logger';

let dbAdapter: DatabaseAdapter | null = null;

/**
 * Connect to PostgreSQL and create the schema when DB_TYPE=postgres.
 * With DB_TYPE=memory the repositories keep their own state and no adapter is created.
 */
export async function initializeDatabase(env: Env): Promise<void> {
  if (env.DB_TYPE !== 'postgres') {
    Logger.info('Using in-memory storage');
    return;
  }

  Logger.info('Initializing PostgreSQL database...');
  dbAdapter = new PostgreSQLAdapter({
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
  });

  await dbAdapter.connect();
  await createUsersTable(dbAdapter);
  await createRefreshTokensTable(dbAdapter);
}

export function getDatabase(): DatabaseAdapter {
  if (!dbAdapter) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return dbAdapter;
}

export function hasDatabase(): boolean {
  return dbAdapter !== null;
}

export async function closeDatabase(): Promise<void> {
  if (dbAdapter) {
    await dbAdapter.disconnect();
    dbAdapter = null;
  }
}

async function createUsersTable(db: DatabaseAdapter): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id UUID PRIMARY KEY,
      username VARCHAR(64) NOT NULL UNIQUE,
      email VARCHAR(255) NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      first_name VARCHAR(255),
      last_name VARCHAR(255),
      client_id UUID NOT NULL,
      roles TEXT[] NOT NULL DEFAULT '{}',
      is_active BOOLEAN NOT NULL DEFAULT true,
      failed_login_attempts INTEGER NOT NULL DEFAULT 0,
      last_failed_login_at TIMESTAMPTZ,
      last_login_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
  Logger.info('Users table ready');
}

async function createRefreshTokensTable(db: DatabaseAdapter): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS refresh_tokens (
      token TEXT PRIMARY KEY,
      jwt_id VARCHAR(64) NOT NULL,
      user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      expiry_date TIMESTAMPTZ NOT NULL,
      is_revoked BOOLEAN NOT NULL DEFAULT false,
      revoked_at TIMESTAMPTZ,
      revocation_reason TEXT,
      created_by_ip VARCHAR(64),
      revoked_by_ip VARCHAR(64),
      replaced_by_token TEXT,
      device_info TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      version INTEGER NOT NULL DEFAULT 1,
      seq BIGSERIAL NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_user_revoked ON refresh_tokens(user_id, is_revoked);
    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_jwt_id ON refresh_tokens(jwt_id);
    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_expiry_date ON refresh_tokens(expiry_date);
    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_revoked_at ON refresh_tokens(revoked_at);
  `);
  Logger.info('Refresh tokens table ready');
}
