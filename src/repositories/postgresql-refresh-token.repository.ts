import { DatabaseAdapter, QueryExecutor } from '../database/adapter';
import { RefreshToken, RevocationDetails } from '../models/refresh-token';
import { RefreshTokenRepository, RefreshTokenStore } from './refresh-token.repository';

const COLUMNS = `
  token, jwt_id, user_id, expiry_date, is_revoked, revoked_at, revocation_reason,
  created_by_ip, revoked_by_ip, replaced_by_token, device_info, created_at, updated_at, version
`;

class PostgreSQLRefreshTokenStore implements RefreshTokenStore {
  constructor(protected db: QueryExecutor) {}

  async findByToken(token: string): Promise<RefreshToken | null> {
    const query = `SELECT ${COLUMNS} FROM refresh_tokens WHERE token = $1`;
    const result = await this.db.query<RefreshToken>(query, [token]);
    return result.rows[0] || null;
  }

  async findActiveByUserId(userId: string, now: Date): Promise<RefreshToken[]> {
    const query = `
      SELECT ${COLUMNS} FROM refresh_tokens
      WHERE user_id = $1 AND is_revoked = false AND expiry_date > $2
      ORDER BY created_at ASC, seq ASC
    `;
    const result = await this.db.query<RefreshToken>(query, [userId, now]);
    return result.rows;
  }

  async insert(token: RefreshToken): Promise<void> {
    const query = `
      INSERT INTO refresh_tokens (
        token, jwt_id, user_id, expiry_date, is_revoked, revoked_at, revocation_reason,
        created_by_ip, revoked_by_ip, replaced_by_token, device_info, created_at, updated_at, version
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
    `;
    await this.db.query(query, [
      token.token,
      token.jwt_id,
      token.user_id,
      token.expiry_date,
      token.is_revoked,
      token.revoked_at,
      token.revocation_reason,
      token.created_by_ip,
      token.revoked_by_ip,
      token.replaced_by_token,
      token.device_info,
      token.created_at,
      token.updated_at,
      token.version,
    ]);
  }

  async markRevoked(token: string, expectedVersion: number, details: RevocationDetails): Promise<RefreshToken | null> {
    const query = `
      UPDATE refresh_tokens
      SET is_revoked = true,
          revoked_at = $3,
          revoked_by_ip = $4,
          revocation_reason = $5,
          replaced_by_token = COALESCE($6, replaced_by_token),
          updated_at = $3,
          version = version + 1
      WHERE token = $1 AND version = $2 AND is_revoked = false
      RETURNING ${COLUMNS}
    `;
    const result = await this.db.query<RefreshToken>(query, [
      token,
      expectedVersion,
      details.revokedAt,
      details.ip,
      details.reason,
      details.replacedByToken ?? null,
    ]);
    return result.rows[0] || null;
  }

  async revokeActiveByUserId(userId: string, details: RevocationDetails): Promise<RefreshToken[]> {
    const query = `
      UPDATE refresh_tokens
      SET is_revoked = true,
          revoked_at = $2,
          revoked_by_ip = $3,
          revocation_reason = $4,
          updated_at = $2,
          version = version + 1
      WHERE user_id = $1 AND is_revoked = false AND expiry_date > $2
      RETURNING ${COLUMNS}
    `;
    const result = await this.db.query<RefreshToken>(query, [userId, details.revokedAt, details.ip, details.reason]);
    return result.rows;
  }
}

export class PostgreSQLRefreshTokenRepository extends PostgreSQLRefreshTokenStore implements RefreshTokenRepository {
  constructor(private database: DatabaseAdapter) {
    super(database);
  }

  async withUserLock<T>(userId: string, work: (store: RefreshTokenStore) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.database.transaction(async (tx) => {
      // Held until COMMIT or ROLLBACK
      await tx.query('SELECT pg_advisory_xact_lock(hashtext($1))', [userId]);
      return work(new PostgreSQLRefreshTokenStore(tx));
    }, signal);
  }

  async findByJwtId(jwtId: string): Promise<RefreshToken | null> {
    const query = `SELECT ${COLUMNS} FROM refresh_tokens WHERE jwt_id = $1 LIMIT 1`;
    const result = await this.db.query<RefreshToken>(query, [jwtId]);
    return result.rows[0] || null;
  }

  async findRevokedSince(since: Date): Promise<RefreshToken[]> {
    const query = `SELECT ${COLUMNS} FROM refresh_tokens WHERE is_revoked = true AND revoked_at >= $1`;
    const result = await this.db.query<RefreshToken>(query, [since]);
    return result.rows;
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    const query = 'DELETE FROM refresh_tokens WHERE expiry_date < $1';
    const result = await this.db.query(query, [cutoff]);
    return result.rowCount || 0;
  }
}
