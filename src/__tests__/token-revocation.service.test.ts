import { describe, it, expect, beforeEach } from 'vitest';
import { TokenRevocationService } from '../services/token-revocation.service';
import { InMemoryRefreshTokenRepository } from '../repositories/in-memory-refresh-token.repository';
import { TestClock, buildRefreshToken } from './helpers';

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('TokenRevocationService', () => {
  let clock: TestClock;
  let cache: TokenRevocationService;

  beforeEach(() => {
    clock = new TestClock();
    cache = new TokenRevocationService(DAY, clock.now);
  });

  it('should report a revoked jti as revoked', () => {
    cache.revoke('jti-1');

    expect(cache.isRevoked('jti-1')).toBe(true);
    expect(cache.isRevoked('jti-2')).toBe(false);
  });

  it('should forget an entry once its ttl has passed', async () => {
    cache.revoke('jti-1', 100);
    expect(cache.isRevoked('jti-1')).toBe(true);

    await delay(150);

    expect(cache.isRevoked('jti-1')).toBe(false);
  });

  it('should overwrite the ttl of an existing entry', async () => {
    cache.revoke('jti-1', 100);
    cache.revoke('jti-1', DAY);

    await delay(150);

    expect(cache.isRevoked('jti-1')).toBe(true);
  });

  it('should ignore a non-positive ttl', () => {
    cache.revoke('jti-1', 0);

    expect(cache.isRevoked('jti-1')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should keep live entries when purging', async () => {
    cache.revoke('short', 50);
    cache.revoke('long');

    await delay(100);
    cache.purgeExpired();

    expect(cache.size).toBe(1);
    expect(cache.isRevoked('long')).toBe(true);
  });

  describe('warmUp', () => {
    it('should load access tokens revoked within the last access-token lifetime', async () => {
      const repository = new InMemoryRefreshTokenRepository();
      const now = clock.now().getTime();
      await repository.insert(
        buildRefreshToken({
          token: 'recent',
          jwt_id: 'jti-recent',
          is_revoked: true,
          revoked_at: new Date(now - 5 * MINUTE),
          revocation_reason: 'User logout',
        })
      );
      await repository.insert(
        buildRefreshToken({
          token: 'old',
          jwt_id: 'jti-old',
          is_revoked: true,
          revoked_at: new Date(now - 20 * MINUTE),
          revocation_reason: 'User logout',
        })
      );
      await repository.insert(
        buildRefreshToken({
          token: 'rotated',
          jwt_id: 'jti-rotated',
          is_revoked: true,
          revoked_at: new Date(now - MINUTE),
          revocation_reason: 'Token rotated',
          replaced_by_token: 'recent',
        })
      );
      await repository.insert(buildRefreshToken({ token: 'active', jwt_id: 'jti-active' }));

      const loaded = await cache.warmUp(repository, 15 * MINUTE);

      expect(loaded).toBe(1);
      expect(cache.isRevoked('jti-recent')).toBe(true);
      expect(cache.isRevoked('jti-old')).toBe(false);
      expect(cache.isRevoked('jti-rotated')).toBe(false);
      expect(cache.isRevoked('jti-active')).toBe(false);
    });
  });
});
