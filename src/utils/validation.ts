import { LoginDTO, RefreshDTO, RegisterDTO, RevokeDTO } from '../models/auth';

export interface ValidationResult<T> {
  valid: boolean;
  errors: string[];
  data?: T;
}

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(body: Body, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' ? value : undefined;
}

function requireString(body: Body, field: string, errors: string[]): string {
  const value = readString(body, field);
  if (!value || value.trim().length === 0) {
    errors.push(`${field} is required`);
    return '';
  }
  return value;
}

export function validateEmail(email: string): boolean {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return emailRegex.test(email);
}

export function validateUsername(username: string): boolean {
  return /^[A-Za-z0-9._-]{3,64}$/.test(username);
}

/**
 * Password policy: at least 8 characters with upper, lower, digit and special character
 */
export function validatePasswordStrength(password: string): string[] {
  const errors: string[] = [];
  if (password.length < 8) {
    errors.push('Password must be at least 8 characters');
  }
  if (!/[A-Z]/.test(password)) {
    errors.push('Password must contain an uppercase letter');
  }
  if (!/[a-z]/.test(password)) {
    errors.push('Password must contain a lowercase letter');
  }
  if (!/[0-9]/.test(password)) {
    errors.push('Password must contain a number');
  }
  if (!/[^A-Za-z0-9]/.test(password)) {
    errors.push('Password must contain a special character');
  }
  return errors;
}

export function validateRegisterRequest(body: unknown): ValidationResult<RegisterDTO> {
  if (!isBody(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const errors: string[] = [];
  const username = requireString(body, 'username', errors).trim();
  const email = requireString(body, 'email', errors).trim().toLowerCase();
  const password = requireString(body, 'password', errors);
  const confirmPassword = requireString(body, 'confirmPassword', errors);

  if (username && !validateUsername(username)) {
    errors.push('username must be 3-64 characters of letters, digits, ".", "_" or "-"');
  }
  if (email && !validateEmail(email)) {
    errors.push('email must be a valid email address');
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors,
    data: {
      username,
      email,
      password,
      confirmPassword,
      firstName: readString(body, 'firstName')?.trim() || null,
      lastName: readString(body, 'lastName')?.trim() || null,
    },
  };
}

export function validateLoginRequest(body: unknown): ValidationResult<LoginDTO> {
  if (!isBody(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const errors: string[] = [];
  const username = requireString(body, 'username', errors).trim();
  const password = requireString(body, 'password', errors);

  return errors.length > 0 ? { valid: false, errors } : { valid: true, errors, data: { username, password } };
}

export function validateRefreshRequest(body: unknown): ValidationResult<RefreshDTO> {
  if (!isBody(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const errors: string[] = [];
  const accessToken = requireString(body, 'accessToken', errors).trim();
  const refreshToken = requireString(body, 'refreshToken', errors).trim();

  return errors.length > 0 ? { valid: false, errors } : { valid: true, errors, data: { accessToken, refreshToken } };
}

export function validateRevokeRequest(body: unknown): ValidationResult<RevokeDTO> {
  if (!isBody(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const errors: string[] = [];
  const token = requireString(body, 'token', errors).trim();

  return errors.length > 0 ? { valid: false, errors } : { valid: true, errors, data: { token } };
}
