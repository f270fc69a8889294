import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

/**
 * Parse time string with optional unit suffix to seconds
 * Examples: "15m" -> 900, "1h" -> 3600, "900" -> 900, "7d" -> 604800
 * Returns null when the value is not a recognised duration.
 */
export function parseTimeToSeconds(value: string): number | null {
  const trimmed = value.trim().toLowerCase();

  const numMatch = trimmed.match(/^(\d+)$/);
  if (numMatch) {
    return parseInt(numMatch[1], 10);
  }

  const unitMatch = trimmed.match(/^(\d+)([smhd])$/);
  if (unitMatch) {
    const num = parseInt(unitMatch[1], 10);
    const multipliers: Record<string, number> = {
      s: 1,
      m: 60,
      h: 3600,
      d: 86400,
    };
    return num * multipliers[unitMatch[2]];
  }

  return null;
}

// Intervals and lifetimes must be positive; pass allowZero for values where 0 switches a delay off
const duration = (defaultValue: string, allowZero: boolean = false) =>
  z
    .string()
    .default(defaultValue)
    .transform((value, ctx) => {
      const seconds = parseTimeToSeconds(value);
      if (seconds === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a duration (e.g. 900, 15m, 1h, 7d)` });
        return z.NEVER;
      }
      if (seconds === 0 && !allowZero) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" must be greater than zero` });
        return z.NEVER;
      }
      return seconds;
    });

/**
 * Express "trust proxy" setting: true/false, a hop count, or addresses/subnets
 * such as "loopback" or "10.0.0.0/8, 127.0.0.1"
 */
const trustProxy = z
  .string()
  .optional()
  .transform((value): boolean | number | string => {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '' || trimmed === 'false') return false;
    if (trimmed === 'true') return true;
    if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);
    return trimmed;
  });

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Signing
  JWT_SIGNING_KEY: z
    .string({ required_error: 'JWT_SIGNING_KEY is required' })
    .min(32, 'JWT_SIGNING_KEY must be at least 32 characters'),
  JWT_ISSUER: z.string().min(1).default('token-lifecycle-service'),
  JWT_AUDIENCE: z.string().min(1).default('token-lifecycle-clients'),

  // Token TTLs (in seconds)
  ACCESS_TOKEN_TTL: duration('15m'),
  REFRESH_TOKEN_TTL: duration('7d'),

  // Session policy
  MAX_CONCURRENT_SESSIONS: z.coerce.number().int().min(0).default(5),
  REFRESH_TOKEN_REUSE_DETECTION: booleanFlag(true),
  EXPIRED_TOKEN_GRACE_PERIOD: duration('24h', true),
  TOKEN_CLEANUP_INTERVAL: duration('6h'),
  TOKEN_CLEANUP_RETRY_DELAY: duration('30m'),

  // Revocation cache
  REVOCATION_CACHE_TTL: duration('24h'),
  REVOCATION_CACHE_PURGE_INTERVAL: duration('1h'),

  // Login lockout
  MAX_FAILED_LOGIN_ATTEMPTS: z.coerce.number().int().min(0).default(5),
  LOCKOUT_DURATION: duration('15m'),

  AUDIT_LOGGING: booleanFlag(true),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LOG_FORMAT: z.enum(['pretty', 'json']).optional(),

  // Database
  DB_TYPE: z.enum(['memory', 'postgres']).default('memory'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('token_lifecycle'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),

  CORS_ORIGIN: z.string().optional(),
  TRUST_PROXY: trustProxy,
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate a raw environment. Throws ConfigurationError listing every invalid variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid environment configuration', issues);
  }
  return parsed.data;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (!cachedEnv) {
    dotenv.config();
    cachedEnv = loadEnv(process.env);
  }
  return cachedEnv;
}
