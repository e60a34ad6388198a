import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export type LogMetadata = Record<string, unknown>;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, requestId, ...metadata }) => {
  let msg = `${timestamp} [${level}]`;

  if (requestId) {
    msg += ` [${requestId}]`;
  }

  msg += `: ${message}`;

  // Add metadata if present
  const metaKeys = Object.keys(metadata).filter(key => key !== 'stack' && key !== 'service');
  if (metaKeys.length > 0) {
    const metaStr = metaKeys.map(key => `${key}=${JSON.stringify(metadata[key])}`).join(' ');
    msg += ` ${metaStr}`;
  }

  // Add stack trace for errors
  if (metadata.stack) {
    msg += `\n${metadata.stack}`;
  }

  return msg;
});

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Determine log level based on environment
const level = () => {
  if (config.isTest) return 'warn';
  return config.isDevelopment ? 'debug' : 'info';
};

// Create transports array
const transports: winston.transport[] = [
  // Console transport - always enabled
  new winston.transports.Console({
    format: combine(
      colorize({ all: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      errors({ stack: true }),
      consoleFormat
    ),
  }),
];

// JSON file sinks under ./logs, production only
const fileTransport = (filename: string, fileLevel?: string) =>
  new winston.transports.File({
    filename: path.join(process.cwd(), 'logs', filename),
    level: fileLevel,
    format: combine(timestamp(), errors({ stack: true }), json()),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  });

if (config.isProduction) {
  transports.push(fileTransport('error.log', 'error'), fileTransport('combined.log'));
}

// Create the logger instance
const logger = winston.createLogger({
  level: level(),
  levels,
  defaultMeta: { service: 'freight-lookup-api' },
  transports,
  // Don't exit on handled exceptions
  exitOnError: false,
});

export const logError = (message: string, error?: Error, metadata?: LogMetadata) => {
  logger.error(message, {
    ...metadata,
    ...(error && {
      errorMessage: error.message,
      errorName: error.name,
      stack: error.stack
    }),
  });
};

export const logHttp = (message: string, metadata?: LogMetadata) => {
  logger.http(message, metadata);
};

// Outbound registry calls
export const logRegistry = (
  operation: string,
  duration: number,
  metadata?: LogMetadata
) => {
  logger.info(`REGISTRY: ${operation}`, {
    registry: true,
    duration: `${duration}ms`,
    ...metadata,
  });
};

// Security event logger
export const logSecurity = (
  event: string,
  severity: 'low' | 'medium' | 'high' | 'critical',
  metadata?: LogMetadata
) => {
  const logLevel = severity === 'critical' || severity === 'high' ? 'error' : 'warn';
  logger.log(logLevel, `SECURITY: ${event}`, {
    security: true,
    severity,
    ...metadata,
  });
};

// Performance logger
export const logPerformance = (
  operation: string,
  duration: number,
  metadata?: LogMetadata
) => {
  const level = duration > 1000 ? 'warn' : 'debug';
  logger.log(level, `PERFORMANCE: ${operation}`, {
    performance: true,
    duration: `${duration}ms`,
    slow: duration > 1000,
    ...metadata,
  });
};

export default logger;
