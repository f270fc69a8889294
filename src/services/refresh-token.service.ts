import {
  RefreshToken,
  RevocationReason,
  isRefreshTokenActive,
  isRefreshTokenExpired,
} from '../models/refresh-token';
import { RefreshTokenRepository, RefreshTokenStore } from '../repositories/refresh-token.repository';
import { SecurityAuditSink, recordAuditEvent } from './security-audit.service';
import { Result, ok, fail } from '../utils/result';
import { ConcurrencyConflictError, isAbortError } from '../utils/errors';
import { generateToken } from '../utils/crypto';
import { Clock, systemClock } from '../utils/clock';
import { Logger } from '../utils/logger';

export interface RefreshTokenOptions {
  /** Lifetime of a refresh token, in seconds */
  ttlSeconds: number;
  /** Active tokens allowed per user; 0 disables the limit */
  maxConcurrentSessions: number;
  reuseDetection: boolean;
  /** How long expired rows are kept before the sweep deletes them, in seconds */
  expiredTokenGracePeriodSeconds: number;
}

interface CreatedToken {
  token: RefreshToken;
  evicted: RefreshToken[];
}

/**
 * Issues, validates, rotates and revokes refresh tokens.
 *
 * Every write for a user happens inside `withUserLock`, so concurrent creates,
 * rotations and revocations for one user apply one at a time and each either
 * commits whole or leaves no trace.
 */
export class RefreshTokenService {
  constructor(
    private repository: RefreshTokenRepository,
    private audit: SecurityAuditSink,
    private options: RefreshTokenOptions,
    private clock: Clock = systemClock
  ) {}

  async create(
    userId: string,
    jwtId: string,
    ip: string | null = null,
    deviceInfo: string | null = null,
    signal?: AbortSignal
  ): Promise<RefreshToken | null> {
    try {
      const created = await this.repository.withUserLock(
        userId,
        async (store): Promise<CreatedToken> => {
          const now = this.clock();
          const evicted = await this.enforceSessionLimit(store, userId, ip, null, now);
          const token = await this.insertToken(store, userId, jwtId, ip, deviceInfo, now);
          return { token, evicted };
        },
        signal
      );

      await this.reportEvictions(userId, created.evicted, ip);
      Logger.info('Refresh token created', { userId, jwtId });
      return created.token;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Failed to create refresh token', error, { userId });
      return null;
    }
  }

  async find(tokenValue: string): Promise<RefreshToken | null> {
    return this.repository.findByToken(tokenValue);
  }

  /**
   * The stored token when it is active and paired with `expectedJwtId` and
   * `expectedUserId`; null otherwise. Presenting a token that was already rotated
   * revokes whatever is still active further down its chain.
   */
  async validate(
    tokenValue: string,
    expectedJwtId: string,
    expectedUserId: string,
    signal?: AbortSignal
  ): Promise<RefreshToken | null> {
    try {
      signal?.throwIfAborted();
      const token = await this.repository.findByToken(tokenValue);
      if (!token) {
        Logger.debug('Refresh token not found');
        return null;
      }

      if (token.user_id !== expectedUserId) {
        Logger.warn('Refresh token presented for another user', { userId: expectedUserId });
        return null;
      }

      if (token.is_revoked) {
        if (token.replaced_by_token && this.options.reuseDetection) {
          await this.revokeDescendants(token, signal);
        }
        Logger.debug('Refresh token already revoked', { userId: token.user_id, jwtId: token.jwt_id });
        return null;
      }

      if (isRefreshTokenExpired(token, this.clock())) {
        Logger.debug('Refresh token expired', { userId: token.user_id, jwtId: token.jwt_id });
        return null;
      }

      if (token.jwt_id !== expectedJwtId) {
        Logger.warn('Refresh token not paired with the presented access token', { userId: token.user_id });
        return null;
      }

      return token;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Failed to validate refresh token', error, { userId: expectedUserId });
      return null;
    }
  }

  /**
   * Replace `oldToken` with a fresh token paired with `newJwtId`. The successor is
   * created and the old token marked rotated in one unit of work; if the old token
   * is no longer active at the version the caller read, nothing changes.
   */
  async rotate(
    oldToken: RefreshToken,
    newJwtId: string,
    ip: string | null = null,
    deviceInfo: string | null = null,
    signal?: AbortSignal
  ): Promise<RefreshToken | null> {
    const userId = oldToken.user_id;

    try {
      const created = await this.repository.withUserLock(
        userId,
        async (store): Promise<CreatedToken> => {
          const now = this.clock();
          const current = await store.findByToken(oldToken.token);
          if (!current || !isRefreshTokenActive(current, now) || current.version !== oldToken.version) {
            throw new ConcurrencyConflictError('Refresh token is no longer active');
          }

          const evicted = await this.enforceSessionLimit(store, userId, ip, current.token, now);
          const replacement = await this.insertToken(
            store,
            userId,
            newJwtId,
            ip,
            deviceInfo ?? current.device_info,
            now
          );

          const rotated = await store.markRevoked(current.token, current.version, {
            ip,
            reason: RevocationReason.ROTATED,
            replacedByToken: replacement.token,
            revokedAt: now,
          });
          if (!rotated) {
            throw new ConcurrencyConflictError('Refresh token was modified concurrently');
          }

          return { token: replacement, evicted };
        },
        signal
      );

      await this.reportEvictions(userId, created.evicted, ip);
      Logger.info('Refresh token rotated', { userId, oldJwtId: oldToken.jwt_id, newJwtId });
      return created.token;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      if (error instanceof ConcurrencyConflictError) {
        Logger.warn('Refresh token rotation rejected', { userId, reason: error.message });
      } else {
        Logger.error('Failed to rotate refresh token', error, { userId });
      }
      return null;
    }
  }

  /**
   * Revoke a single token. Revoking an already revoked token succeeds without
   * changing it. The value is the token in its final state, so callers can block
   * the paired access token by its `jwt_id`.
   */
  async revoke(
    tokenValue: string,
    ip: string | null = null,
    reason?: string,
    signal?: AbortSignal
  ): Promise<Result<RefreshToken>> {
    try {
      signal?.throwIfAborted();
      const existing = await this.repository.findByToken(tokenValue);
      if (!existing) {
        return fail('Token not found');
      }

      const result = await this.repository.withUserLock(
        existing.user_id,
        async (store): Promise<Result<RefreshToken>> => {
          const current = await store.findByToken(tokenValue);
          if (!current) {
            return fail('Token not found');
          }
          if (current.is_revoked) {
            return ok(current);
          }

          const revoked = await store.markRevoked(current.token, current.version, {
            ip,
            reason: reason ?? RevocationReason.MANUAL,
            revokedAt: this.clock(),
          });
          if (!revoked) {
            throw new ConcurrencyConflictError('Refresh token was modified concurrently');
          }
          return ok(revoked);
        },
        signal
      );

      if (result.success) {
        Logger.info('Refresh token revoked', { userId: existing.user_id, jwtId: existing.jwt_id });
      }
      return result;
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Failed to revoke refresh token', error);
      return fail('Failed to revoke token');
    }
  }

  async revokeAllForUser(
    userId: string,
    ip: string | null = null,
    reason?: string,
    signal?: AbortSignal
  ): Promise<Result<RefreshToken[]>> {
    try {
      const revoked = await this.repository.withUserLock(
        userId,
        (store) =>
          store.revokeActiveByUserId(userId, {
            ip,
            reason: reason ?? RevocationReason.ALL_USER_TOKENS,
            revokedAt: this.clock(),
          }),
        signal
      );

      Logger.info('Refresh tokens revoked for user', { userId, count: revoked.length });
      return ok(revoked);
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Failed to revoke refresh tokens for user', error, { userId });
      return fail('Failed to revoke tokens');
    }
  }

  /**
   * Delete tokens that expired more than the grace period ago. Storage errors
   * propagate to the caller, normally the background task.
   */
  async sweepExpired(signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const cutoff = new Date(this.clock().getTime() - this.options.expiredTokenGracePeriodSeconds * 1000);
    const deleted = await this.repository.deleteExpiredBefore(cutoff);
    if (deleted > 0) {
      Logger.info('Expired refresh tokens removed', { deleted, cutoff: cutoff.toISOString() });
    }
    return deleted;
  }

  /**
   * Revoke the oldest active tokens until one more fits under the limit.
   * `excludeToken` is left out of the count: it is about to be replaced.
   */
  private async enforceSessionLimit(
    store: RefreshTokenStore,
    userId: string,
    ip: string | null,
    excludeToken: string | null,
    now: Date
  ): Promise<RefreshToken[]> {
    const limit = this.options.maxConcurrentSessions;
    if (limit <= 0) {
      return [];
    }

    const active = (await store.findActiveByUserId(userId, now)).filter((t) => t.token !== excludeToken);
    const evicted: RefreshToken[] = [];
    let remaining = active.length;

    for (const oldest of active) {
      if (remaining < limit) break;

      const revoked = await store.markRevoked(oldest.token, oldest.version, {
        ip,
        reason: RevocationReason.SESSION_LIMIT,
        revokedAt: now,
      });
      if (!revoked) {
        throw new ConcurrencyConflictError('Refresh token was modified concurrently');
      }
      evicted.push(revoked);
      remaining--;
    }

    return evicted;
  }

  private async insertToken(
    store: RefreshTokenStore,
    userId: string,
    jwtId: string,
    ip: string | null,
    deviceInfo: string | null,
    now: Date
  ): Promise<RefreshToken> {
    const token: RefreshToken = {
      token: generateToken(64),
      jwt_id: jwtId,
      user_id: userId,
      expiry_date: new Date(now.getTime() + this.options.ttlSeconds * 1000),
      is_revoked: false,
      revoked_at: null,
      revocation_reason: null,
      created_by_ip: ip,
      revoked_by_ip: null,
      replaced_by_token: null,
      device_info: deviceInfo,
      created_at: now,
      updated_at: now,
      version: 1,
    };
    await store.insert(token);
    return token;
  }

  /**
   * Walk the rotation chain forward from a reused token and revoke every
   * descendant that is still active
   */
  private async revokeDescendants(reused: RefreshToken, signal?: AbortSignal): Promise<void> {
    const userId = reused.user_id;

    const revoked = await this.repository.withUserLock(
      userId,
      async (store) => {
        const now = this.clock();
        const seen = new Set<string>([reused.token]);
        const result: RefreshToken[] = [];
        let next = reused.replaced_by_token;

        while (next && !seen.has(next)) {
          seen.add(next);
          const descendant = await store.findByToken(next);
          if (!descendant) break;

          if (isRefreshTokenActive(descendant, now)) {
            const updated = await store.markRevoked(descendant.token, descendant.version, {
              ip: null,
              reason: RevocationReason.REUSE_DETECTED,
              revokedAt: now,
            });
            if (updated) result.push(updated);
          }
          next = descendant.replaced_by_token;
        }
        return result;
      },
      signal
    );

    Logger.warn('Refresh token reuse detected', {
      userId,
      jwtId: reused.jwt_id,
      revokedDescendants: revoked.length,
    });
    await recordAuditEvent(this.audit, (sink) =>
      sink.securityViolation(
        userId,
        `Rotated refresh token presented again; ${revoked.length} descendant token(s) revoked`,
        null
      )
    );
  }

  private async reportEvictions(userId: string, evicted: RefreshToken[], ip: string | null): Promise<void> {
    for (const token of evicted) {
      Logger.info('Session limit reached, oldest session revoked', { userId, jwtId: token.jwt_id });
      await recordAuditEvent(this.audit, (sink) => sink.sessionEvicted(userId, token.jwt_id, ip));
    }
  }
}
