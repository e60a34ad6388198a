import { Router, Request, Response } from 'express';
import { createLoadRoutes } from './loadRoutes';
import { createCarrierRoutes } from './carrierRoutes';
import { LoadRepository } from '../services/loadRepository';
import { CarrierValidator } from '../services/carrierValidator';
import { config, getPublicConfig } from '../config';

export interface AppDependencies {
  loadRepository: LoadRepository;
  carrierValidator: CarrierValidator;
}

export const createRoutes = ({ loadRepository, carrierValidator }: AppDependencies): Router => {
  const router = Router();

  // ============================================
  // Health Check Endpoints
  // ============================================

  /**
   * Basic liveness check
   * Returns 200 if the server is running
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      status: 'healthy',
      message: 'Freight lookup API is running',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  /**
   * Readiness check
   * The dataset is required; the registry is reported but optional
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const isReady = loadRepository.size > 0;

    res.status(isReady ? 200 : 503).json({
      success: isReady,
      status: isReady ? 'ready' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        dataset: {
          status: isReady ? 'healthy' : 'empty',
          loads: loadRepository.size,
        },
        registry: {
          configured: carrierValidator.isConfigured,
          required: false,
        },
      },
      environment: config.nodeEnv,
    });
  });

  /**
   * Kubernetes-style liveness probe
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Get public configuration
   */
  router.get('/config', (_req: Request, res: Response) => {
    res.json({
      success: true,
      config: getPublicConfig(),
    });
  });

  // ============================================
  // Mount API Routes
  // ============================================

  router.use('/items', createLoadRoutes(loadRepository));
  router.use('/carriers', createCarrierRoutes(carrierValidator));

  return router;
};

export default createRoutes;
