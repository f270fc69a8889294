import { Logger, LogData } from '../utils/logger';

/**
 * Receiver for security-relevant events. Implementations must not assume they run
 * inside the operation that raised the event; a failing sink never fails the operation.
 */
export interface SecurityAuditSink {
  authSuccess(userId: string, username: string, ip: string | null): Promise<void>;
  authFailure(username: string, ip: string | null, reason: string): Promise<void>;
  tokenRefresh(userId: string, ip: string | null): Promise<void>;
  tokenRevocation(userId: string, jwtId: string, ip: string | null, reason: string): Promise<void>;
  logout(userId: string, ip: string | null): Promise<void>;
  registration(userId: string, username: string, ip: string | null): Promise<void>;
  sessionEvicted(userId: string, jwtId: string, ip: string | null): Promise<void>;
  securityViolation(userId: string, description: string, ip: string | null): Promise<void>;
}

/**
 * Writes audit events through the application logger
 */
export class SecurityAuditService implements SecurityAuditSink {
  constructor(private enabled: boolean = true) {}

  async authSuccess(userId: string, username: string, ip: string | null): Promise<void> {
    this.write('auth_success', { userId, username, ip });
  }

  async authFailure(username: string, ip: string | null, reason: string): Promise<void> {
    this.write('auth_failure', { username, ip, reason }, true);
  }

  async tokenRefresh(userId: string, ip: string | null): Promise<void> {
    this.write('token_refresh', { userId, ip });
  }

  async tokenRevocation(userId: string, jwtId: string, ip: string | null, reason: string): Promise<void> {
    this.write('token_revocation', { userId, jwtId, ip, reason });
  }

  async logout(userId: string, ip: string | null): Promise<void> {
    this.write('logout', { userId, ip });
  }

  async registration(userId: string, username: string, ip: string | null): Promise<void> {
    this.write('registration', { userId, username, ip });
  }

  async sessionEvicted(userId: string, jwtId: string, ip: string | null): Promise<void> {
    this.write('session_evicted', { userId, jwtId, ip });
  }

  async securityViolation(userId: string, description: string, ip: string | null): Promise<void> {
    this.write('security_violation', { userId, description, ip }, true);
  }

  private write(event: string, data: LogData, warning: boolean = false): void {
    if (!this.enabled) return;

    const entry: LogData = { audit: true, event, ...data };
    if (warning) {
      Logger.warn(`Security audit: ${event}`, entry);
    } else {
      Logger.info(`Security audit: ${event}`, entry);
    }
  }
}

/**
 * Record an audit event without letting a sink failure reach the caller
 */
export async function recordAuditEvent(
  sink: SecurityAuditSink,
  record: (sink: SecurityAuditSink) => Promise<void>
): Promise<void> {
  try {
    await record(sink);
  } catch (error) {
    Logger.error('Failed to record security audit event', error);
  }
}
