import { RefreshToken, RevocationDetails, applyRevocation, isRefreshTokenActive } from '../models/refresh-token';
import { RefreshTokenRepository, RefreshTokenStore } from './refresh-token.repository';
import { KeyedMutex } from '../utils/keyed-mutex';
import { ConcurrencyConflictError } from '../utils/errors';

interface StagedWrite {
  row: RefreshToken;
  // Version of the committed row the write was based on; null for inserts
  baseVersion: number | null;
}

function copy(row: RefreshToken): RefreshToken {
  return { ...row };
}

/**
 * Write set layered over the committed rows. Nothing reaches `base` until commit().
 */
class StagedRefreshTokenStore implements RefreshTokenStore {
  private writes = new Map<string, StagedWrite>();

  constructor(private base: Map<string, RefreshToken>) {}

  async findByToken(token: string): Promise<RefreshToken | null> {
    const row = this.read(token);
    return row ? copy(row) : null;
  }

  async findActiveByUserId(userId: string, now: Date): Promise<RefreshToken[]> {
    const rows: RefreshToken[] = [];
    for (const token of this.base.keys()) {
      const row = this.read(token);
      if (row && row.user_id === userId && isRefreshTokenActive(row, now)) {
        rows.push(copy(row));
      }
    }
    for (const [token, write] of this.writes) {
      if (!this.base.has(token) && write.row.user_id === userId && isRefreshTokenActive(write.row, now)) {
        rows.push(copy(write.row));
      }
    }
    return rows.sort((a, b) => a.created_at.getTime() - b.created_at.getTime());
  }

  async insert(token: RefreshToken): Promise<void> {
    if (this.read(token.token)) {
      throw new Error('Duplicate refresh token value');
    }
    this.writes.set(token.token, { row: copy(token), baseVersion: null });
  }

  async markRevoked(token: string, expectedVersion: number, details: RevocationDetails): Promise<RefreshToken | null> {
    const current = this.read(token);
    if (!current || current.is_revoked || current.version !== expectedVersion) {
      return null;
    }

    const updated = applyRevocation(current, details);
    const previous = this.writes.get(token);
    this.writes.set(token, {
      row: updated,
      baseVersion: previous ? previous.baseVersion : current.version,
    });
    return copy(updated);
  }

  async revokeActiveByUserId(userId: string, details: RevocationDetails): Promise<RefreshToken[]> {
    const active = await this.findActiveByUserId(userId, details.revokedAt);
    const revoked: RefreshToken[] = [];
    for (const row of active) {
      const updated = await this.markRevoked(row.token, row.version, details);
      if (updated) {
        revoked.push(updated);
      }
    }
    return revoked;
  }

  /**
   * Apply every staged write, or none of them if a committed row moved underneath.
   */
  commit(): void {
    for (const [token, write] of this.writes) {
      const committed = this.base.get(token);
      const committedVersion = committed ? committed.version : null;
      if (committedVersion !== write.baseVersion) {
        throw new ConcurrencyConflictError('Refresh token was modified concurrently');
      }
    }
    for (const [token, write] of this.writes) {
      this.base.set(token, write.row);
    }
    this.writes.clear();
  }

  private read(token: string): RefreshToken | undefined {
    return this.writes.get(token)?.row ?? this.base.get(token);
  }
}

export class InMemoryRefreshTokenRepository implements RefreshTokenRepository {
  private tokens = new Map<string, RefreshToken>();
  private locks = new KeyedMutex();

  async withUserLock<T>(userId: string, work: (store: RefreshTokenStore) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    return this.locks.runExclusive(userId, async () => {
      const store = new StagedRefreshTokenStore(this.tokens);
      const result = await work(store);
      signal?.throwIfAborted();
      store.commit();
      return result;
    });
  }

  async findByToken(token: string): Promise<RefreshToken | null> {
    const row = this.tokens.get(token);
    return row ? copy(row) : null;
  }

  async findActiveByUserId(userId: string, now: Date): Promise<RefreshToken[]> {
    return new StagedRefreshTokenStore(this.tokens).findActiveByUserId(userId, now);
  }

  async insert(token: RefreshToken): Promise<void> {
    return this.autoCommit((store) => store.insert(token));
  }

  async markRevoked(token: string, expectedVersion: number, details: RevocationDetails): Promise<RefreshToken | null> {
    return this.autoCommit((store) => store.markRevoked(token, expectedVersion, details));
  }

  async revokeActiveByUserId(userId: string, details: RevocationDetails): Promise<RefreshToken[]> {
    return this.autoCommit((store) => store.revokeActiveByUserId(userId, details));
  }

  async findByJwtId(jwtId: string): Promise<RefreshToken | null> {
    for (const row of this.tokens.values()) {
      if (row.jwt_id === jwtId) {
        return copy(row);
      }
    }
    return null;
  }

  async findRevokedSince(since: Date): Promise<RefreshToken[]> {
    return Array.from(this.tokens.values())
      .filter((row) => row.is_revoked && row.revoked_at !== null && row.revoked_at.getTime() >= since.getTime())
      .map(copy);
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    let deleted = 0;
    for (const [token, row] of this.tokens) {
      if (row.expiry_date.getTime() < cutoff.getTime()) {
        this.tokens.delete(token);
        deleted++;
      }
    }
    return deleted;
  }

  count(): number {
    return this.tokens.size;
  }

  private async autoCommit<T>(work: (store: StagedRefreshTokenStore) => Promise<T>): Promise<T> {
    const store = new StagedRefreshTokenStore(this.tokens);
    const result = await work(store);
    store.commit();
    return result;
  }
}
