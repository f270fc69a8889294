export interface RefreshToken {
  token: string;
  jwt_id: string;
  user_id: string;
  expiry_date: Date;
  is_revoked: boolean;
  revoked_at: Date | null;
  revocation_reason: string | null;
  created_by_ip: string | null;
  revoked_by_ip: string | null;
  replaced_by_token: string | null;
  device_info: string | null;
  created_at: Date;
  updated_at: Date;
  version: number;
}

export interface RevocationDetails {
  ip: string | null;
  reason: string;
  replacedByToken?: string | null;
  revokedAt: Date;
}

export const RevocationReason = {
  ROTATED: 'Token rotated',
  MANUAL: 'Manual revocation',
  ALL_USER_TOKENS: 'All user tokens revoked',
  LOGOUT: 'User logout',
  SESSION_LIMIT: 'Session limit exceeded',
  REUSE_DETECTED: 'Refresh token reuse detected',
} as const;

export function isRefreshTokenExpired(token: RefreshToken, now: Date = new Date()): boolean {
  return now.getTime() >= token.expiry_date.getTime();
}

export function isRefreshTokenActive(token: RefreshToken, now: Date = new Date()): boolean {
  return !token.is_revoked && !isRefreshTokenExpired(token, now);
}

/**
 * Apply a revocation to a token, returning the mutated copy
 */
export function applyRevocation(token: RefreshToken, details: RevocationDetails): RefreshToken {
  return {
    ...token,
    is_revoked: true,
    revoked_at: details.revokedAt,
    revoked_by_ip: details.ip,
    revocation_reason: details.reason,
    replaced_by_token: details.replacedByToken ?? token.replaced_by_token,
    updated_at: details.revokedAt,
    version: token.version + 1,
  };
}
