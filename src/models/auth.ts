export interface UserClaims {
  username: string;
  email: string;
  roles: string[];
  client_id: string;
}

export interface AccessTokenClaims extends UserClaims {
  sub: string;
  jti: string;
  iat: number;
  exp: number;
  iss: string;
  aud: string;
}

export interface IssuedAccessToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
}

export interface RegisterDTO {
  username: string;
  email: string;
  password: string;
  confirmPassword: string;
  firstName: string | null;
  lastName: string | null;
}

export interface LoginDTO {
  username: string;
  password: string;
}

export interface RefreshDTO {
  accessToken: string;
  refreshToken: string;
}

export interface RevokeDTO {
  token: string;
}

/**
 * Where a request came from, recorded on the tokens it creates or revokes
 */
export interface ClientContext {
  ip: string | null;
  deviceInfo: string | null;
}
