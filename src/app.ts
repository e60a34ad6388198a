import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { createRoutes, AppDependencies } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { conditionalRequestLogger, errorLogger } from './middleware/requestLogger';
import { globalLimiter } from './middleware/rateLimiter';
import logger from './utils/logger';

/**
 * Build the Express application around an already-loaded dataset and a
 * carrier validator. Nothing here touches the network or the filesystem.
 */
export const createApp = (deps: AppDependencies): Express => {
  const app = express();

  // ============================================
  // Trust Proxy (for correct IP detection behind reverse proxy)
  // ============================================
  if (config.isProduction) {
    app.set('trust proxy', 1);
  }

  // ============================================
  // Security Middleware
  // ============================================
  app.use(
    helmet({
      contentSecurityPolicy: config.isProduction ? undefined : false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );

  // ============================================
  // CORS Configuration
  // ============================================
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like curl or server-to-server calls)
        if (!origin) return callback(null, true);

        if (config.cors.origins.includes(origin)) {
          callback(null, true);
        } else {
          logger.warn('CORS blocked request from origin', { origin });
          callback(null, false);
        }
      },
      credentials: config.cors.credentials,
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID', 'RateLimit-Limit', 'RateLimit-Remaining'],
      maxAge: 86400, // 24 hours
    })
  );

  // ============================================
  // Request Logging
  // ============================================
  app.use(conditionalRequestLogger);

  // ============================================
  // Rate Limiting (Global)
  // ============================================
  app.use(globalLimiter);

  // ============================================
  // Body Parsing
  // ============================================
  app.use(express.json({ limit: '100kb' }));

  // ============================================
  // API Routes
  // ============================================
  app.use('/', createRoutes(deps));

  // ============================================
  // Error Logging, 404 and Error Handler
  // ============================================
  app.use(errorLogger);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
