import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { Env } from './config/env';
import { setupSwagger } from './config/swagger';
import { requestLogger, errorLogger, clientErrorStatus } from './middleware/logger.middleware';
import { createRequireAuth } from './middleware/auth';
import { createAuthRouter } from './routes/auth';
import { healthRouter } from './routes/health';
import { UserRepository } from './repositories/user.repository';
import { RefreshTokenRepository } from './repositories/refresh-token.repository';
import { AccessTokenService } from './services/access-token.service';
import { RefreshTokenService } from './services/refresh-token.service';
import { TokenRevocationService } from './services/token-revocation.service';
import { SecurityAuditService, SecurityAuditSink } from './services/security-audit.service';
import { AuthService } from './services/auth.service';

export interface Services {
  accessTokens: AccessTokenService;
  refreshTokens: RefreshTokenService;
  revocations: TokenRevocationService;
  audit: SecurityAuditSink;
  auth: AuthService;
}

export function createServices(
  env: Env,
  users: UserRepository,
  refreshTokenRepository: RefreshTokenRepository
): Services {
  const audit = new SecurityAuditService(env.AUDIT_LOGGING);
  const accessTokens = new AccessTokenService({
    signingKey: env.JWT_SIGNING_KEY,
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
    ttlSeconds: env.ACCESS_TOKEN_TTL,
  });
  const refreshTokens = new RefreshTokenService(refreshTokenRepository, audit, {
    ttlSeconds: env.REFRESH_TOKEN_TTL,
    maxConcurrentSessions: env.MAX_CONCURRENT_SESSIONS,
    reuseDetection: env.REFRESH_TOKEN_REUSE_DETECTION,
    expiredTokenGracePeriodSeconds: env.EXPIRED_TOKEN_GRACE_PERIOD,
  });
  const revocations = new TokenRevocationService(env.REVOCATION_CACHE_TTL * 1000);
  const auth = new AuthService(users, accessTokens, refreshTokens, revocations, audit, {
    maxFailedLoginAttempts: env.MAX_FAILED_LOGIN_ATTEMPTS,
    lockoutDurationSeconds: env.LOCKOUT_DURATION,
  });

  return { accessTokens, refreshTokens, revocations, audit, auth };
}

export function createApp(services: Services, env: Env): Express {
  const app: Express = express();

  // req.ip honours X-Forwarded-For only from trusted proxies
  app.set('trust proxy', env.TRUST_PROXY);

  app.use(helmet({ frameguard: { action: 'deny' } }));
  app.use(env.CORS_ORIGIN ? cors({ origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()) }) : cors());
  app.use(express.json());

  // Request logging needs the parsed body, so it follows express.json()
  app.use(requestLogger);

  // Swagger Documentation
  const swaggerSpec = setupSwagger(env.PORT);
  app.get('/api-docs/swagger.json', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  // Routes
  const requireAuth = createRequireAuth(services.accessTokens, services.revocations);
  app.use('/health', healthRouter);
  app.use('/auth', createAuthRouter(services.auth, requireAuth));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'Token Lifecycle API',
      documentation: '/api-docs',
      health: '/health',
      auth: '/auth',
    });
  });

  // Error handling middleware (must be after all routes)
  app.use(errorLogger);

  // Global error handler; errorLogger has already logged the error
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: 'Invalid request body' });
      return;
    }

    res.status(500).json({
      error: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  return app;
}
