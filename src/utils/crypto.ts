import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a cryptographically secure opaque token (base64url, no padding)
 */
export function generateToken(byteLength: number = 64): string {
  return crypto.randomBytes(byteLength).toString('base64url');
}

/**
 * Generate a unique access token identifier (jti)
 */
export function generateJwtId(): string {
  return uuidv4();
}
