import { describe, it, expect, beforeEach } from 'vitest';
import { authenticateBearer } from '../middleware/auth';
import { AccessTokenService } from '../services/access-token.service';
import { TokenRevocationService } from '../services/token-revocation.service';
import { TEST_SIGNING_KEY, TestClock } from './helpers';

describe('authenticateBearer', () => {
  let clock: TestClock;
  let accessTokens: AccessTokenService;
  let revocations: TokenRevocationService;

  beforeEach(() => {
    clock = new TestClock();
    accessTokens = new AccessTokenService(
      { signingKey: TEST_SIGNING_KEY, issuer: 'test-issuer', audience: 'test-audience', ttlSeconds: 900 },
      clock.now
    );
    revocations = new TokenRevocationService(60 * 60 * 1000, clock.now);
  });

  function issue() {
    return accessTokens.issue('user-1', {
      username: 'alice',
      email: 'alice@example.com',
      roles: ['user'],
      client_id: 'client-1',
    });
  }

  it('should accept a valid bearer token', () => {
    const issued = issue();

    const result = authenticateBearer(`Bearer ${issued.token}`, accessTokens, revocations);

    expect(result.authenticated).toBe(true);
    if (result.authenticated) {
      expect(result.claims.sub).toBe('user-1');
      expect(result.claims.jti).toBe(issued.jti);
    }
  });

  it('should require the Bearer scheme', () => {
    expect(authenticateBearer(undefined, accessTokens, revocations)).toEqual({
      authenticated: false,
      error: 'Authentication required',
    });
    expect(authenticateBearer(`Basic ${issue().token}`, accessTokens, revocations)).toEqual({
      authenticated: false,
      error: 'Authentication required',
    });
  });

  it('should reject an empty token', () => {
    expect(authenticateBearer('Bearer   ', accessTokens, revocations)).toEqual({
      authenticated: false,
      error: 'Invalid token format',
    });
  });

  it('should reject an expired token', () => {
    const issued = issue();
    clock.advance(900 * 1000);

    expect(authenticateBearer(`Bearer ${issued.token}`, accessTokens, revocations)).toEqual({
      authenticated: false,
      error: 'Invalid or expired token',
    });
  });

  it('should reject a revoked token', () => {
    const issued = issue();
    revocations.revoke(issued.jti);

    expect(authenticateBearer(`Bearer ${issued.token}`, accessTokens, revocations)).toEqual({
      authenticated: false,
      error: 'Token has been revoked',
    });
  });
});
