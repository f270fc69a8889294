import { LRUCache } from 'lru-cache';
import { RevocationReason } from '../models/refresh-token';
import { RefreshTokenRepository } from '../repositories/refresh-token.repository';
import { Clock, systemClock } from '../utils/clock';
import { Logger } from '../utils/logger';

/**
 * Process-local set of revoked access-token ids (jti).
 *
 * Entries expire on their own after their TTL; there is no size bound, so a jti is
 * never dropped while its access token could still be presented.
 */
export class TokenRevocationService {
  // jti -> revocation time (epoch ms)
  private revoked: LRUCache<string, number>;

  constructor(private defaultTtlMs: number, private clock: Clock = systemClock) {
    this.revoked = new LRUCache<string, number>({
      ttl: defaultTtlMs,
      ttlAutopurge: true,
    });
  }

  revoke(jti: string, ttlMs?: number): void {
    const ttl = ttlMs ?? this.defaultTtlMs;
    if (ttl <= 0) return;
    this.revoked.set(jti, this.clock().getTime(), { ttl });
  }

  isRevoked(jti: string): boolean {
    return this.revoked.has(jti);
  }

  /**
   * Drop stale entries; returns how many were removed
   */
  purgeExpired(): number {
    const before = this.revoked.size;
    this.revoked.purgeStale();
    const purged = before - this.revoked.size;
    if (purged > 0) {
      Logger.debug('Revocation cache purged', { purged, remaining: this.revoked.size });
    }
    return purged;
  }

  get size(): number {
    return this.revoked.size;
  }

  /**
   * Rebuild entries lost on restart: every refresh token revoked within the last
   * access-token lifetime blocks its paired access token for the rest of that lifetime.
   * Rotated tokens are skipped; their access tokens were not revoked.
   */
  async warmUp(repository: RefreshTokenRepository, accessTokenTtlMs: number): Promise<number> {
    const now = this.clock().getTime();
    const rows = await repository.findRevokedSince(new Date(now - accessTokenTtlMs));

    let loaded = 0;
    for (const row of rows) {
      if (!row.revoked_at || row.revocation_reason === RevocationReason.ROTATED) continue;

      const remaining = row.revoked_at.getTime() + accessTokenTtlMs - now;
      if (remaining > 0) {
        this.revoke(row.jwt_id, remaining);
        loaded++;
      }
    }

    Logger.info('Revocation cache warmed up', { loaded });
    return loaded;
  }
}
