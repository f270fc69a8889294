import { Env, loadEnv } from '../config/env';
import { RefreshToken } from '../models/refresh-token';
import { SecurityAuditSink } from '../services/security-audit.service';
import { Clock } from '../utils/clock';

export const TEST_SIGNING_KEY = 'test-secret-signing-key-0123456789abcdef';

export class TestClock {
  private current: number;

  constructor(start: string = '2025-01-01T00:00:00.000Z') {
    this.current = Date.parse(start);
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface AuditEvent {
  type: keyof SecurityAuditSink;
  userOrName: string;
  detail: string | null;
}

export class RecordingAuditSink implements SecurityAuditSink {
  events: AuditEvent[] = [];

  ofType(type: keyof SecurityAuditSink): AuditEvent[] {
    return this.events.filter((e) => e.type === type);
  }

  async authSuccess(userId: string): Promise<void> {
    this.events.push({ type: 'authSuccess', userOrName: userId, detail: null });
  }

  async authFailure(username: string, ip: string | null, reason: string): Promise<void> {
    this.events.push({ type: 'authFailure', userOrName: username, detail: reason });
  }

  async tokenRefresh(userId: string): Promise<void> {
    this.events.push({ type: 'tokenRefresh', userOrName: userId, detail: null });
  }

  async tokenRevocation(userId: string, jwtId: string): Promise<void> {
    this.events.push({ type: 'tokenRevocation', userOrName: userId, detail: jwtId });
  }

  async logout(userId: string): Promise<void> {
    this.events.push({ type: 'logout', userOrName: userId, detail: null });
  }

  async registration(userId: string, username: string): Promise<void> {
    this.events.push({ type: 'registration', userOrName: userId, detail: username });
  }

  async sessionEvicted(userId: string, jwtId: string): Promise<void> {
    this.events.push({ type: 'sessionEvicted', userOrName: userId, detail: jwtId });
  }

  async securityViolation(userId: string, description: string): Promise<void> {
    this.events.push({ type: 'securityViolation', userOrName: userId, detail: description });
  }
}

export function testEnv(overrides: Record<string, string> = {}): Env {
  return loadEnv({
    NODE_ENV: 'test',
    JWT_SIGNING_KEY: TEST_SIGNING_KEY,
    ...overrides,
  });
}

export function buildRefreshToken(overrides: Partial<RefreshToken> = {}): RefreshToken {
  const createdAt = new Date('2025-01-01T00:00:00.000Z');
  return {
    token: 'token-value',
    jwt_id: 'jwt-id',
    user_id: 'user-1',
    expiry_date: new Date(createdAt.getTime() + 7 * 24 * 3600 * 1000),
    is_revoked: false,
    revoked_at: null,
    revocation_reason: null,
    created_by_ip: '127.0.0.1',
    revoked_by_ip: null,
    replaced_by_token: null,
    device_info: null,
    created_at: createdAt,
    updated_at: createdAt,
    version: 1,
    ...overrides,
  };
}
