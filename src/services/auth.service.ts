import { ClientContext, LoginDTO, RefreshDTO, RegisterDTO, TokenPair } from '../models/auth';
import { PublicUser, User, isLockedOut, toPublicUser } from '../models/user';
import { RevocationReason } from '../models/refresh-token';
import { UserRepository } from '../repositories/user.repository';
import { AccessTokenService } from './access-token.service';
import { RefreshTokenService } from './refresh-token.service';
import { TokenRevocationService } from './token-revocation.service';
import { SecurityAuditSink, recordAuditEvent } from './security-audit.service';
import { validatePasswordStrength } from '../utils/validation';
import { Result, ok, fail } from '../utils/result';
import { Clock, systemClock } from '../utils/clock';
import { isAbortError } from '../utils/errors';
import { Logger } from '../utils/logger';

export const INVALID_CREDENTIALS = 'Invalid username or password';
export const INVALID_TOKEN = 'Invalid token';
export const INVALID_REFRESH_TOKEN = 'Invalid refresh token';
export const USERNAME_TAKEN = 'Username is already taken';
export const EMAIL_TAKEN = 'Email is already registered';
export const TOKEN_NOT_FOUND = 'Token not found';

export interface AuthServiceOptions {
  maxFailedLoginAttempts: number;
  lockoutDurationSeconds: number;
}

export interface LoginResult {
  user: PublicUser;
  tokens: TokenPair;
}

export class AuthService {
  constructor(
    private users: UserRepository,
    private accessTokens: AccessTokenService,
    private refreshTokens: RefreshTokenService,
    private revocations: TokenRevocationService,
    private audit: SecurityAuditSink,
    private options: AuthServiceOptions,
    private clock: Clock = systemClock
  ) {}

  async register(dto: RegisterDTO, ip: string | null = null): Promise<Result<PublicUser>> {
    if (dto.password !== dto.confirmPassword) {
      return fail('Passwords do not match');
    }

    const policyErrors = validatePasswordStrength(dto.password);
    if (policyErrors.length > 0) {
      return fail(policyErrors.join('; '));
    }

    try {
      if (await this.users.findByName(dto.username)) {
        return fail(USERNAME_TAKEN);
      }
      if (await this.users.findByEmail(dto.email)) {
        return fail(EMAIL_TAKEN);
      }

      const user = await this.users.create({
        username: dto.username,
        email: dto.email,
        password: dto.password,
        first_name: dto.firstName,
        last_name: dto.lastName,
      });

      Logger.info('User registered', { userId: user.id, username: user.username });
      await recordAuditEvent(this.audit, (sink) => sink.registration(user.id, user.username, ip));
      return ok(toPublicUser(user));
    } catch (error) {
      Logger.error('Registration failed', error, { username: dto.username });
      return fail('Registration failed');
    }
  }

  async login(dto: LoginDTO, context: ClientContext, signal?: AbortSignal): Promise<Result<LoginResult>> {
    try {
      const user = await this.users.findByName(dto.username);
      if (!user) {
        return this.rejectLogin(dto.username, context.ip, 'Unknown user');
      }
      if (!user.is_active) {
        return this.rejectLogin(dto.username, context.ip, 'Account disabled');
      }

      const now = this.clock();
      if (isLockedOut(user, this.options.maxFailedLoginAttempts, this.options.lockoutDurationSeconds * 1000, now)) {
        return this.rejectLogin(dto.username, context.ip, 'Account locked');
      }

      if (!(await this.users.checkPassword(user, dto.password))) {
        await this.recordFailedAttempt(user, now);
        return this.rejectLogin(dto.username, context.ip, 'Invalid password');
      }

      await this.users.update(user.id, {
        failed_login_attempts: 0,
        last_failed_login_at: null,
        last_login_at: now,
      });

      const tokens = await this.issueTokens(user, context, signal);
      if (!tokens) {
        return fail('Login failed');
      }

      Logger.info('User logged in', { userId: user.id, ip: context.ip });
      await recordAuditEvent(this.audit, (sink) => sink.authSuccess(user.id, user.username, context.ip));
      return ok({ user: toPublicUser(user), tokens });
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Login failed', error, { username: dto.username });
      return fail('Login failed');
    }
  }

  /**
   * Exchange an (expired) access token and its paired refresh token for a new pair.
   * The presented refresh token is rotated and cannot be used again.
   */
  async refresh(dto: RefreshDTO, context: ClientContext, signal?: AbortSignal): Promise<Result<TokenPair>> {
    try {
      const claims = this.accessTokens.parseExpired(dto.accessToken);
      if (!claims) {
        return fail(INVALID_TOKEN);
      }

      const stored = await this.refreshTokens.validate(dto.refreshToken, claims.jti, claims.sub, signal);
      if (!stored) {
        return fail(INVALID_REFRESH_TOKEN);
      }

      const user = await this.users.findById(claims.sub);
      if (!user || !user.is_active) {
        return fail(INVALID_REFRESH_TOKEN);
      }

      const access = this.accessTokens.issue(user.id, {
        username: user.username,
        email: user.email,
        roles: await this.users.getRoles(user),
        client_id: user.client_id,
      });

      const next = await this.refreshTokens.rotate(stored, access.jti, context.ip, context.deviceInfo, signal);
      if (!next) {
        return fail(INVALID_REFRESH_TOKEN);
      }

      await recordAuditEvent(this.audit, (sink) => sink.tokenRefresh(user.id, context.ip));
      return ok({
        accessToken: access.token,
        refreshToken: next.token,
        accessTokenExpiresAt: access.expiresAt,
        refreshTokenExpiresAt: next.expiry_date,
      });
    } catch (error) {
      if (isAbortError(error, signal)) throw error;
      Logger.error('Token refresh failed', error);
      return fail(INVALID_REFRESH_TOKEN);
    }
  }

  /**
   * Revoke one of the caller's refresh tokens and block the access token paired with it
   */
  async revokeToken(
    userId: string,
    token: string,
    context: ClientContext,
    reason: string = RevocationReason.MANUAL,
    signal?: AbortSignal
  ): Promise<Result> {
    const stored = await this.refreshTokens.find(token);
    if (!stored || stored.user_id !== userId) {
      return fail(TOKEN_NOT_FOUND);
    }

    const result = await this.refreshTokens.revoke(token, context.ip, reason, signal);
    if (!result.success) {
      return result;
    }

    const jwtId = result.value.jwt_id;
    this.revocations.revoke(jwtId, this.accessTokens.ttlSeconds * 1000);
    await recordAuditEvent(this.audit, (sink) => sink.tokenRevocation(userId, jwtId, context.ip, reason));
    return ok();
  }

  /**
   * End every session of the user. The current access token and the access tokens
   * paired with the revoked refresh tokens stop working immediately.
   */
  async logout(
    userId: string,
    jti: string,
    accessTokenExpiresAt: Date,
    context: ClientContext,
    signal?: AbortSignal
  ): Promise<Result> {
    const result = await this.refreshTokens.revokeAllForUser(userId, context.ip, RevocationReason.LOGOUT, signal);
    if (!result.success) {
      return result;
    }

    const accessTtlMs = this.accessTokens.ttlSeconds * 1000;
    this.revocations.revoke(jti, accessTokenExpiresAt.getTime() - this.clock().getTime());
    for (const token of result.value) {
      if (token.jwt_id !== jti) {
        this.revocations.revoke(token.jwt_id, accessTtlMs);
      }
    }

    Logger.info('User logged out', { userId, revokedSessions: result.value.length });
    await recordAuditEvent(this.audit, (sink) => sink.logout(userId, context.ip));
    return ok();
  }

  private async issueTokens(user: User, context: ClientContext, signal?: AbortSignal): Promise<TokenPair | null> {
    const access = this.accessTokens.issue(user.id, {
      username: user.username,
      email: user.email,
      roles: await this.users.getRoles(user),
      client_id: user.client_id,
    });

    const refresh = await this.refreshTokens.create(user.id, access.jti, context.ip, context.deviceInfo, signal);
    if (!refresh) {
      return null;
    }

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshTokenExpiresAt: refresh.expiry_date,
    };
  }

  /**
   * Count a failed password. Attempts older than the lockout window start a new count.
   */
  private async recordFailedAttempt(user: User, now: Date): Promise<void> {
    const windowMs = this.options.lockoutDurationSeconds * 1000;
    const withinWindow =
      user.last_failed_login_at !== null && user.last_failed_login_at.getTime() + windowMs > now.getTime();

    await this.users.update(user.id, {
      failed_login_attempts: withinWindow ? user.failed_login_attempts + 1 : 1,
      last_failed_login_at: now,
    });
  }

  private async rejectLogin(username: string, ip: string | null, reason: string): Promise<Result<LoginResult>> {
    Logger.warn('Login rejected', { username, ip, reason });
    await recordAuditEvent(this.audit, (sink) => sink.authFailure(username, ip, reason));
    return fail(INVALID_CREDENTIALS);
  }
}
