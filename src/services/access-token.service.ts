import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AccessTokenClaims, IssuedAccessToken, UserClaims } from '../models/auth';
import { generateJwtId } from '../utils/crypto';
import { Clock, systemClock } from '../utils/clock';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export const SIGNING_ALGORITHM = 'HS256';

export interface AccessTokenOptions {
  signingKey: string;
  issuer: string;
  audience: string;
  /** Lifetime of issued tokens, in seconds */
  ttlSeconds: number;
}

const claimsSchema: z.ZodType<AccessTokenClaims> = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  username: z.string(),
  email: z.string(),
  roles: z.array(z.string()),
  client_id: z.string(),
  iat: z.number(),
  exp: z.number(),
  iss: z.string(),
  aud: z.string(),
});

/**
 * Builds, signs and checks short-lived bearer tokens
 */
export class AccessTokenService {
  constructor(private options: AccessTokenOptions, private clock: Clock = systemClock) {}

  get ttlSeconds(): number {
    return this.options.ttlSeconds;
  }

  issue(userId: string, claims: UserClaims): IssuedAccessToken {
    const iat = Math.floor(this.clock().getTime() / 1000);
    const exp = iat + this.options.ttlSeconds;
    const jti = generateJwtId();

    const token = jwt.sign(
      {
        username: claims.username,
        email: claims.email,
        roles: claims.roles,
        client_id: claims.client_id,
        jti,
        iat,
        exp,
      },
      this.options.signingKey,
      {
        algorithm: SIGNING_ALGORITHM,
        subject: userId,
        issuer: this.options.issuer,
        audience: this.options.audience,
      }
    );

    return { token, jti, expiresAt: new Date(exp * 1000) };
  }

  /**
   * Claims of a correctly signed token, ignoring its expiry. Used by the refresh flow,
   * where the presented access token has usually expired already.
   */
  parseExpired(token: string): AccessTokenClaims | null {
    return this.decode(token, true);
  }

  /**
   * Claims of a correctly signed, unexpired token
   */
  verify(token: string): AccessTokenClaims | null {
    return this.decode(token, false);
  }

  hasValidSigningAlgorithm(token: string): boolean {
    try {
      const decoded = jwt.decode(token, { complete: true });
      if (!decoded || typeof decoded.header.alg !== 'string') {
        return false;
      }
      return decoded.header.alg.toUpperCase() === SIGNING_ALGORITHM;
    } catch {
      return false;
    }
  }

  private decode(token: string, ignoreExpiration: boolean): AccessTokenClaims | null {
    if (!this.hasValidSigningAlgorithm(token)) {
      Logger.warn('Access token rejected: unexpected signing algorithm');
      return null;
    }

    try {
      const payload = jwt.verify(token, this.options.signingKey, {
        algorithms: [SIGNING_ALGORITHM],
        issuer: this.options.issuer,
        audience: this.options.audience,
        ignoreExpiration,
        clockTimestamp: Math.floor(this.clock().getTime() / 1000),
      });

      const parsed = claimsSchema.safeParse(payload);
      if (!parsed.success) {
        Logger.warn('Access token rejected: malformed claims');
        return null;
      }
      return parsed.data;
    } catch (error) {
      Logger.debug('Access token rejected', { reason: errorMessage(error) });
      return null;
    }
  }
}
