import http from 'http';
import { config, validateConfig } from './config';
import { createApp } from './app';
import { LoadRepository, DataLoadError } from './services/loadRepository';
import { carrierValidator } from './services/carrierValidator';
import { setupGlobalErrorHandlers } from './middleware/errorHandler';
import logger, { logError } from './utils/logger';

// ============================================
// Setup Global Error Handlers
// ============================================
setupGlobalErrorHandlers();

// ============================================
// Start Server
// ============================================
const startServer = (): http.Server => {
  logger.info('Starting freight lookup API...');

  validateConfig();

  // Dataset is loaded before the port is bound; a bad dataset never serves a request
  logger.info('Loading load dataset...', { path: config.dataset.path });
  const loadRepository = LoadRepository.fromFile(config.dataset.path);
  logger.info('Load dataset ready', { loads: loadRepository.size });

  const app = createApp({ loadRepository, carrierValidator });
  const httpServer = http.createServer(app);

  httpServer.listen(config.port, () => {
    logger.info('Server started successfully', {
      port: config.port,
      environment: config.nodeEnv,
      registryConfigured: carrierValidator.isConfigured,
      registryTimeoutMs: config.fmcsa.timeoutMs,
    });
  });

  return httpServer;
};

// ============================================
// Graceful Shutdown
// ============================================
const shutdown = (httpServer: http.Server, signal: string) => {
  logger.info(`${signal} received - initiating graceful shutdown...`);

  // Set a timeout for forceful shutdown
  const forceTimeout = setTimeout(() => {
    logger.error('Forceful shutdown due to timeout');
    process.exit(1);
  }, 10000);

  httpServer.close((error) => {
    clearTimeout(forceTimeout);
    if (error) {
      logError('Error during shutdown', error);
      process.exit(1);
    }
    logger.info('Graceful shutdown completed');
    process.exit(0);
  });
};

try {
  const httpServer = startServer();
  process.on('SIGINT', () => shutdown(httpServer, 'SIGINT'));
  process.on('SIGTERM', () => shutdown(httpServer, 'SIGTERM'));
} catch (error) {
  if (error instanceof DataLoadError) {
    logError('Failed to load dataset - refusing to start', error, { source: error.source, line: error.line });
  } else {
    logError('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  }
  process.exit(1);
}
