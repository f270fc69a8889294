import { RefreshToken, RevocationDetails } from '../models/refresh-token';

/**
 * Reads and writes available inside a per-user unit of work.
 * Writes become visible to other callers only when the unit commits.
 */
export interface RefreshTokenStore {
  findByToken(token: string): Promise<RefreshToken | null>;
  /** Active tokens for a user, oldest first */
  findActiveByUserId(userId: string, now: Date): Promise<RefreshToken[]>;
  insert(token: RefreshToken): Promise<void>;
  /**
   * Revoke one token if it is still unrevoked and at `expectedVersion`.
   * Returns the updated row, or null when the condition did not hold.
   */
  markRevoked(token: string, expectedVersion: number, details: RevocationDetails): Promise<RefreshToken | null>;
  /** Revoke every active token of a user and return the revoked rows */
  revokeActiveByUserId(userId: string, details: RevocationDetails): Promise<RefreshToken[]>;
}

export interface RefreshTokenRepository extends RefreshTokenStore {
  /**
   * Run `work` while holding the user's serialization point. Everything `work`
   * writes through `store` commits together or not at all. An aborted signal
   * before commit rolls back and rethrows the abort reason.
   */
  withUserLock<T>(userId: string, work: (store: RefreshTokenStore) => Promise<T>, signal?: AbortSignal): Promise<T>;
  findByJwtId(jwtId: string): Promise<RefreshToken | null>;
  /** Tokens revoked at or after `since`, used to rebuild the revocation cache */
  findRevokedSince(since: Date): Promise<RefreshToken[]>;
  /** Delete tokens whose expiry_date is before `cutoff`; returns the number deleted */
  deleteExpiredBefore(cutoff: Date): Promise<number>;
}
