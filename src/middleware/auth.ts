import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AccessTokenClaims } from '../models/auth';
import { AccessTokenService } from '../services/access-token.service';
import { TokenRevocationService } from '../services/token-revocation.service';
import { Logger } from '../utils/logger';

// Extend Express Request to include the verified access-token claims
declare global {
  namespace Express {
    interface Request {
      auth?: AccessTokenClaims;
    }
  }
}

export type AuthenticationResult =
  | { authenticated: true; claims: AccessTokenClaims }
  | { authenticated: false; error: string };

/**
 * Check an Authorization header value: Bearer scheme, valid signature and expiry,
 * and a jti that has not been revoked
 */
export function authenticateBearer(
  header: string | undefined,
  accessTokens: AccessTokenService,
  revocations: TokenRevocationService
): AuthenticationResult {
  if (!header || !header.startsWith('Bearer ')) {
    return { authenticated: false, error: 'Authentication required' };
  }

  const token = header.substring(7).trim();
  if (!token) {
    return { authenticated: false, error: 'Invalid token format' };
  }

  const claims = accessTokens.verify(token);
  if (!claims) {
    return { authenticated: false, error: 'Invalid or expired token' };
  }

  if (revocations.isRevoked(claims.jti)) {
    Logger.warn('Revoked access token presented', { userId: claims.sub, jti: claims.jti });
    return { authenticated: false, error: 'Token has been revoked' };
  }

  return { authenticated: true, claims };
}

/**
 * Middleware to require a valid, unrevoked access token.
 * Attaches the token claims to req.auth
 */
export function createRequireAuth(
  accessTokens: AccessTokenService,
  revocations: TokenRevocationService
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = authenticateBearer(req.headers.authorization, accessTokens, revocations);
    if (!result.authenticated) {
      res.status(401).json({ error: result.error });
      return;
    }

    req.auth = result.claims;
    next();
  };
}
