import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger, { LogMetadata, logHttp, logPerformance } from '../utils/logger';
import { config } from '../config';

// Extend Express Request to include custom properties
declare global {
  namespace Express {
    interface Request {
      requestId: string;
      startTime: number;
    }
  }
}

// Query keys that must never reach the logs
const SENSITIVE_FIELDS = [
  'token',
  'authorization',
  'apikey',
  'webkey',
  'secret',
];

/**
 * Redact sensitive data from plain objects
 */
export const redactSensitive = (value: unknown): unknown => {
  if (!value || typeof value !== 'object') return value;

  if (Array.isArray(value)) {
    return value.map(redactSensitive);
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_FIELDS.some(field => lowerKey.includes(field))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactSensitive(entry);
    }
  }
  return redacted;
};

/**
 * Get client IP address
 */
const getClientIp = (req: Request): string => {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ip = typeof forwarded === 'string' ? forwarded : forwarded[0];
    return ip.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
};

const assignRequestId = (req: Request, res: Response): void => {
  const supplied = req.headers['x-request-id'];
  req.requestId = typeof supplied === 'string' && supplied ? supplied : uuidv4();
  req.startTime = Date.now();
  res.setHeader('X-Request-ID', req.requestId);
};

/**
 * Request logging middleware
 * Logs all incoming requests and their responses
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  assignRequestId(req, res);

  if (config.isDevelopment) {
    logger.debug('Incoming request', {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      query: Object.keys(req.query).length > 0 ? redactSensitive(req.query) : undefined,
      ip: getClientIp(req),
      userAgent: req.headers['user-agent'],
    });
  }

  // Keep the JSON body so error responses can be logged with it
  let responseBody: unknown;
  const originalJson = res.json.bind(res);
  res.json = (body?: unknown) => {
    responseBody = body;
    return originalJson(body);
  };

  res.on('finish', () => {
    const duration = Date.now() - req.startTime;
    const statusCode = res.statusCode;

    const isError = statusCode >= 400;
    const isServerError = statusCode >= 500;

    const logData: LogMetadata = {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      statusCode,
      duration: `${duration}ms`,
      ip: getClientIp(req),
    };

    if (Object.keys(req.query).length > 0) {
      logData.query = redactSensitive(req.query);
    }

    if (isError && responseBody !== undefined) {
      logData.responseBody = redactSensitive(responseBody);
      logData.userAgent = req.headers['user-agent'];
    }

    if (isServerError) {
      logger.error(`${req.method} ${req.path} ${statusCode}`, logData);
    } else if (isError) {
      logger.warn(`${req.method} ${req.path} ${statusCode}`, logData);
    } else {
      logHttp(`${req.method} ${req.path} ${statusCode}`, logData);
    }

    // Registry calls are bounded by the FMCSA timeout, anything slower is worth a look
    if (duration > 1000) {
      logPerformance(`Slow request: ${req.method} ${req.path}`, duration, {
        requestId: req.requestId,
        statusCode,
      });
    }
  });

  next();
};

/**
 * Error logging middleware
 * Should be placed after routes but before error handler
 */
export const errorLogger = (err: Error, req: Request, _res: Response, next: NextFunction): void => {
  const duration = req.startTime ? Date.now() - req.startTime : 0;

  logger.error(`Request error: ${err.message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    duration: `${duration}ms`,
    ip: getClientIp(req),
    error: {
      name: err.name,
      message: err.message,
      stack: config.isDevelopment ? err.stack : undefined,
    },
  });

  next(err);
};

/**
 * Skip logging for certain paths
 */
export const skipPaths = [
  '/health',
  '/favicon.ico',
];

/**
 * Conditional request logger that skips certain paths
 */
export const conditionalRequestLogger = (req: Request, res: Response, next: NextFunction): void => {
  if (skipPaths.some(path => req.path.startsWith(path))) {
    // Still assign request ID even when skipping logs
    assignRequestId(req, res);
    next();
    return;
  }

  requestLogger(req, res, next);
};

export default requestLogger;
