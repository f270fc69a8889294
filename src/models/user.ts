export interface User {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  client_id: string;
  roles: string[];
  is_active: boolean;
  failed_login_attempts: number;
  last_failed_login_at: Date | null;
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateUserDTO {
  username: string;
  email: string;
  password: string;
  first_name?: string | null;
  last_name?: string | null;
  roles?: string[];
}

export interface UpdateUserDTO {
  email?: string;
  first_name?: string | null;
  last_name?: string | null;
  is_active?: boolean;
  roles?: string[];
  failed_login_attempts?: number;
  last_failed_login_at?: Date | null;
  last_login_at?: Date | null;
}

export type PublicUser = Omit<User, 'password_hash' | 'failed_login_attempts' | 'last_failed_login_at'>;

export function toPublicUser(user: User): PublicUser {
  const { password_hash, failed_login_attempts, last_failed_login_at, ...rest } = user;
  return rest;
}

export function isLockedOut(user: User, maxFailedAttempts: number, lockoutDurationMs: number, now: Date = new Date()): boolean {
  if (maxFailedAttempts <= 0 || user.failed_login_attempts < maxFailedAttempts || !user.last_failed_login_at) {
    return false;
  }
  return user.last_failed_login_at.getTime() + lockoutDurationMs > now.getTime();
}
