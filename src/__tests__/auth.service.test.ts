import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthService,
  EMAIL_TAKEN,
  INVALID_CREDENTIALS,
  INVALID_REFRESH_TOKEN,
  INVALID_TOKEN,
  LoginResult,
  TOKEN_NOT_FOUND,
  USERNAME_TAKEN,
} from '../services/auth.service';
import { AccessTokenService } from '../services/access-token.service';
import { RefreshTokenService } from '../services/refresh-token.service';
import { TokenRevocationService } from '../services/token-revocation.service';
import { InMemoryUserRepository } from '../repositories/in-memory-user.repository';
import { InMemoryRefreshTokenRepository } from '../repositories/in-memory-refresh-token.repository';
import { ClientContext, RegisterDTO } from '../models/auth';
import { RecordingAuditSink, TEST_SIGNING_KEY, TestClock } from './helpers';

const PASSWORD = 'Str0ng!Passw0rd';
const context: ClientContext = { ip: '10.0.0.1', deviceInfo: 'test-agent' };

function registration(overrides: Partial<RegisterDTO> = {}): RegisterDTO {
  return {
    username: 'alice',
    email: 'alice@example.com',
    password: PASSWORD,
    confirmPassword: PASSWORD,
    firstName: 'Alice',
    lastName: null,
    ...overrides,
  };
}

describe('AuthService', () => {
  let clock: TestClock;
  let users: InMemoryUserRepository;
  let tokens: InMemoryRefreshTokenRepository;
  let audit: RecordingAuditSink;
  let accessTokens: AccessTokenService;
  let revocations: TokenRevocationService;
  let service: AuthService;

  beforeEach(() => {
    clock = new TestClock();
    users = new InMemoryUserRepository();
    tokens = new InMemoryRefreshTokenRepository();
    audit = new RecordingAuditSink();
    accessTokens = new AccessTokenService(
      { signingKey: TEST_SIGNING_KEY, issuer: 'test-issuer', audience: 'test-audience', ttlSeconds: 900 },
      clock.now
    );
    const refreshTokens = new RefreshTokenService(
      tokens,
      audit,
      {
        ttlSeconds: 7 * 24 * 3600,
        maxConcurrentSessions: 5,
        reuseDetection: true,
        expiredTokenGracePeriodSeconds: 24 * 3600,
      },
      clock.now
    );
    revocations = new TokenRevocationService(24 * 3600 * 1000, clock.now);
    service = new AuthService(
      users,
      accessTokens,
      refreshTokens,
      revocations,
      audit,
      { maxFailedLoginAttempts: 5, lockoutDurationSeconds: 15 * 60 },
      clock.now
    );
  });

  async function registerAndLogin(): Promise<LoginResult> {
    const registered = await service.register(registration(), context.ip);
    if (!registered.success) throw new Error(registered.error);
    const login = await service.login({ username: 'alice', password: PASSWORD }, context);
    if (!login.success) throw new Error(login.error);
    return login.value;
  }

  describe('register', () => {
    it('should create the user and hide the password hash', async () => {
      const result = await service.register(registration(), context.ip);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.username).toBe('alice');
      expect(result.value.email).toBe('alice@example.com');
      expect(result.value.first_name).toBe('Alice');
      expect(result.value.roles).toEqual(['user']);
      expect(result.value).not.toHaveProperty('password_hash');
      expect(audit.ofType('registration')).toEqual([
        { type: 'registration', userOrName: result.value.id, detail: 'alice' },
      ]);
    });

    it('should reject mismatched passwords', async () => {
      const result = await service.register(registration({ confirmPassword: 'Different!1' }));

      expect(result).toEqual({ success: false, error: 'Passwords do not match' });
    });

    it('should reject a weak password with every broken rule', async () => {
      const result = await service.register(registration({ password: 'weak', confirmPassword: 'weak' }));

      expect(result).toEqual({
        success: false,
        error:
          'Password must be at least 8 characters; Password must contain an uppercase letter; ' +
          'Password must contain a number; Password must contain a special character',
      });
    });

    it('should reject a taken username regardless of case', async () => {
      await service.register(registration());

      const result = await service.register(registration({ username: 'ALICE', email: 'other@example.com' }));

      expect(result).toEqual({ success: false, error: USERNAME_TAKEN });
    });

    it('should reject a taken email', async () => {
      await service.register(registration());

      const result = await service.register(registration({ username: 'alice2' }));

      expect(result).toEqual({ success: false, error: EMAIL_TAKEN });
    });
  });

  describe('login', () => {
    it('should issue a token pair bound to the user', async () => {
      const { user, tokens: pair } = await registerAndLogin();

      const claims = accessTokens.verify(pair.accessToken);
      expect(claims?.sub).toBe(user.id);
      expect(claims?.username).toBe('alice');
      expect(claims?.client_id).toBe(user.client_id);
      expect(pair.accessTokenExpiresAt).toEqual(new Date(clock.now().getTime() + 900 * 1000));

      const stored = await tokens.findByToken(pair.refreshToken);
      expect(stored?.jwt_id).toBe(claims?.jti);
      expect(stored?.created_by_ip).toBe('10.0.0.1');
      expect(stored?.device_info).toBe('test-agent');
      expect(audit.ofType('authSuccess')).toHaveLength(1);
    });

    it('should give the same answer for an unknown user and a wrong password', async () => {
      await service.register(registration());

      const unknown = await service.login({ username: 'bob', password: PASSWORD }, context);
      const wrong = await service.login({ username: 'alice', password: 'Wrong!Pass1' }, context);

      expect(unknown).toEqual({ success: false, error: INVALID_CREDENTIALS });
      expect(wrong).toEqual({ success: false, error: INVALID_CREDENTIALS });
      expect(audit.ofType('authFailure').map((e) => e.detail)).toEqual(['Unknown user', 'Invalid password']);
    });

    it('should lock the account after repeated failures until the lockout passes', async () => {
      await service.register(registration());
      for (let i = 0; i < 5; i++) {
        await service.login({ username: 'alice', password: 'Wrong!Pass1' }, context);
      }

      const locked = await service.login({ username: 'alice', password: PASSWORD }, context);
      expect(locked).toEqual({ success: false, error: INVALID_CREDENTIALS });
      expect(audit.ofType('authFailure').at(-1)?.detail).toBe('Account locked');

      clock.advance(15 * 60 * 1000 + 1);
      const unlocked = await service.login({ username: 'alice', password: PASSWORD }, context);
      expect(unlocked.success).toBe(true);
    });

    it('should reset the failure count after a successful login', async () => {
      await service.register(registration());
      await service.login({ username: 'alice', password: 'Wrong!Pass1' }, context);
      await service.login({ username: 'alice', password: PASSWORD }, context);

      const user = await users.findByName('alice');
      expect(user?.failed_login_attempts).toBe(0);
      expect(user?.last_login_at).toEqual(clock.now());
    });

    it('should reject a deactivated account', async () => {
      await service.register(registration());
      const user = await users.findByName('alice');
      if (!user) throw new Error('expected a user');
      await users.update(user.id, { is_active: false });

      const result = await service.login({ username: 'alice', password: PASSWORD }, context);

      expect(result).toEqual({ success: false, error: INVALID_CREDENTIALS });
    });
  });

  describe('refresh', () => {
    it('should rotate the refresh token and issue a new pair', async () => {
      const { tokens: pair } = await registerAndLogin();
      clock.advance(16 * 60 * 1000);

      const result = await service.refresh(pair, context);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.refreshToken).not.toBe(pair.refreshToken);
      expect(accessTokens.verify(result.value.accessToken)).not.toBeNull();
      expect((await tokens.findByToken(pair.refreshToken))?.replaced_by_token).toBe(result.value.refreshToken);
      expect(audit.ofType('tokenRefresh')).toHaveLength(1);
    });

    it('should not accept the same refresh token twice', async () => {
      const { tokens: pair } = await registerAndLogin();
      await service.refresh(pair, context);

      expect(await service.refresh(pair, context)).toEqual({ success: false, error: INVALID_REFRESH_TOKEN });
    });

    it('should reject a tampered access token', async () => {
      const { tokens: pair } = await registerAndLogin();

      const result = await service.refresh({ ...pair, accessToken: `${pair.accessToken}x` }, context);

      expect(result).toEqual({ success: false, error: INVALID_TOKEN });
    });

    it('should reject a refresh token paired with another access token', async () => {
      const first = await registerAndLogin();
      const second = await service.login({ username: 'alice', password: PASSWORD }, context);
      if (!second.success) throw new Error(second.error);

      const result = await service.refresh(
        { accessToken: first.tokens.accessToken, refreshToken: second.value.tokens.refreshToken },
        context
      );

      expect(result).toEqual({ success: false, error: INVALID_REFRESH_TOKEN });
    });
  });

  describe('logout', () => {
    it('should revoke every session and block the current access token', async () => {
      const { user, tokens: pair } = await registerAndLogin();
      const claims = accessTokens.verify(pair.accessToken);
      if (!claims) throw new Error('expected claims');

      const result = await service.logout(user.id, claims.jti, new Date(claims.exp * 1000), context);

      expect(result.success).toBe(true);
      expect(revocations.isRevoked(claims.jti)).toBe(true);
      expect(await tokens.findActiveByUserId(user.id, clock.now())).toHaveLength(0);
      expect(await service.refresh(pair, context)).toEqual({ success: false, error: INVALID_REFRESH_TOKEN });
      expect(audit.ofType('logout')).toHaveLength(1);
    });
  });

  describe('revokeToken', () => {
    it('should revoke one session and block its access token', async () => {
      const first = await registerAndLogin();
      const second = await service.login({ username: 'alice', password: PASSWORD }, context);
      if (!second.success) throw new Error(second.error);
      const secondClaims = accessTokens.verify(second.value.tokens.accessToken);

      const result = await service.revokeToken(first.user.id, second.value.tokens.refreshToken, context);

      expect(result).toEqual({ success: true, value: undefined });
      expect(revocations.isRevoked(secondClaims?.jti ?? '')).toBe(true);
      expect((await tokens.findByToken(first.tokens.refreshToken))?.is_revoked).toBe(false);
      expect(audit.ofType('tokenRevocation').map((e) => e.detail)).toEqual([secondClaims?.jti]);
    });

    it('should not revoke another user\'s token', async () => {
      const { tokens: pair } = await registerAndLogin();

      const result = await service.revokeToken('someone-else', pair.refreshToken, context);

      expect(result).toEqual({ success: false, error: TOKEN_NOT_FOUND });
      expect((await tokens.findByToken(pair.refreshToken))?.is_revoked).toBe(false);
    });
  });
});
