import { Request, Response, NextFunction } from 'express';
import { Logger, LogData } from '../utils/logger';

const SENSITIVE_FIELDS = ['password', 'confirmPassword', 'accessToken', 'refreshToken', 'token'];

/**
 * Copy of a request body with credentials masked
 */
export function redactBody(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return body;
  }
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    copy[key] = SENSITIVE_FIELDS.includes(key) ? '[REDACTED]' : value;
  }
  return copy;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const { method, originalUrl } = req;
  const ip = req.ip || req.socket.remoteAddress || null;

  const requestData: LogData = { method, url: originalUrl, ip };
  if (Object.keys(req.query).length > 0) {
    requestData.query = req.query;
  }
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && Object.keys(body).length > 0) {
    requestData.body = redactBody(body);
  }

  Logger.info('📥 Incoming Request', requestData);

  res.on('finish', () => {
    const { statusCode } = res;
    const responseData: LogData = {
      method,
      url: originalUrl,
      statusCode,
      duration: `${Date.now() - startTime}ms`,
      ip,
    };

    if (statusCode >= 500) {
      Logger.error(`❌ ${statusCode} Server Error`, undefined, responseData);
    } else if (statusCode >= 400) {
      Logger.warn(`⚠️  ${statusCode} Client Error`, responseData);
    } else {
      Logger.info(`✅ ${statusCode} Success`, responseData);
    }
  });

  next();
}

/**
 * Status of an error that the client caused, such as a malformed JSON body; null otherwise
 */
export function clientErrorStatus(error: Error): number | null {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return null;
}

export function errorLogger(error: Error, req: Request, res: Response, next: NextFunction): void {
  const data: LogData = {
    method: req.method,
    url: req.originalUrl,
    ip: req.ip || req.socket.remoteAddress || null,
  };

  const status = clientErrorStatus(error);
  if (status !== null) {
    Logger.warn(`⚠️  ${status} Rejected Request`, { ...data, statusCode: status, reason: error.message });
  } else {
    Logger.error('💥 Unhandled Error in Request', error, data);
  }

  next(error);
}
