import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { Express } from 'express';
import { createApp, createServices, Services } from '../app';
import { Env } from '../config/env';
import { AccessTokenClaims } from '../models/auth';
import { AccessTokenService } from '../services/access-token.service';
import { InMemoryUserRepository } from '../repositories/in-memory-user.repository';
import { InMemoryRefreshTokenRepository } from '../repositories/in-memory-refresh-token.repository';
import { Logger } from '../utils/logger';
import { testEnv } from './helpers';

const PASSWORD = 'Str0ng!Passw0rd';

class UnavailableAccessTokenService extends AccessTokenService {
  constructor(private failure: Error, env: Env) {
    super({
      signingKey: env.JWT_SIGNING_KEY,
      issuer: env.JWT_ISSUER,
      audience: env.JWT_AUDIENCE,
      ttlSeconds: env.ACCESS_TOKEN_TTL,
    });
  }

  verify(): AccessTokenClaims | null {
    throw this.failure;
  }
}

describe('createApp', () => {
  let tokens = new InMemoryRefreshTokenRepository();

  function build(overrides: Record<string, string> = {}, adjust?: (services: Services, env: Env) => Services): Express {
    const env = testEnv(overrides);
    tokens = new InMemoryRefreshTokenRepository();
    const services = createServices(env, new InMemoryUserRepository(), tokens);
    return createApp(adjust ? adjust(services, env) : services, env);
  }

  async function registerAndLogin(app: Express, forwardedFor?: string): Promise<string> {
    await request(app).post('/auth/register').send({
      username: 'alice',
      email: 'alice@example.com',
      password: PASSWORD,
      confirmPassword: PASSWORD,
    });

    const login = request(app).post('/auth/login');
    if (forwardedFor) {
      login.set('X-Forwarded-For', forwardedFor);
    }
    const res = await login.send({ username: 'alice', password: PASSWORD });
    expect(res.status).toBe(200);

    const refreshToken: unknown = res.body.refreshToken;
    if (typeof refreshToken !== 'string') throw new Error('expected a refresh token');
    return refreshToken;
  }

  it('should set security headers on every response', async () => {
    const res = await request(build()).get('/');

    expect(res.status).toBe(200);
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['referrer-policy']).toBe('no-referrer');
    expect(res.headers['content-security-policy']).toMatch(/^default-src 'self'/);
  });

  it('should log request bodies with credentials masked', async () => {
    const info = vi.spyOn(Logger, 'info');

    await request(build()).post('/auth/login').send({ username: 'alice', password: 'Wrong!Pass1' });

    expect(info).toHaveBeenCalledWith(
      '📥 Incoming Request',
      expect.objectContaining({ body: { username: 'alice', password: '[REDACTED]' } })
    );
  });

  it('should answer a malformed JSON body with 400 and a single warning', async () => {
    const warn = vi.spyOn(Logger, 'warn');
    const error = vi.spyOn(Logger, 'error');

    const res = await request(build())
      .post('/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"username":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid request body' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('⚠️  400 Rejected Request');
    expect(error).not.toHaveBeenCalled();
  });

  it('should log an unhandled error once', async () => {
    const error = vi.spyOn(Logger, 'error');
    const failure = new Error('signing key unavailable');
    const app = build({}, (services, env) => ({
      ...services,
      accessTokens: new UnavailableAccessTokenService(failure, env),
    }));

    const res = await request(app).get('/auth/me').set('Authorization', 'Bearer some-token');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'signing key unavailable' });
    expect(error.mock.calls.filter((call) => call[1] === failure)).toHaveLength(1);
  });

  it('should record the forwarded client address when proxies are trusted', async () => {
    const refreshToken = await registerAndLogin(build({ TRUST_PROXY: 'true' }), '203.0.113.7');

    expect((await tokens.findByToken(refreshToken))?.created_by_ip).toBe('203.0.113.7');
  });

  it('should ignore X-Forwarded-For when proxies are not trusted', async () => {
    const refreshToken = await registerAndLogin(build(), '203.0.113.7');

    const stored = await tokens.findByToken(refreshToken);
    expect(stored?.created_by_ip).not.toBeNull();
    expect(stored?.created_by_ip).not.toBe('203.0.113.7');
  });
});
