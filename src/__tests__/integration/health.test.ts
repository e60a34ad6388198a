/**
 * Health Check API Integration Tests
 */

import request from 'supertest';
import { createApp } from '../../app';
import { LoadRepository } from '../../services/loadRepository';
import { CarrierValidator } from '../../services/carrierValidator';
import { FIXTURE_CSV } from '../helpers';

describe('Health Check API', () => {
  const carrierValidator = new CarrierValidator({ fetch: jest.fn() });
  const app = createApp({ loadRepository: LoadRepository.fromFile(FIXTURE_CSV), carrierValidator });

  describe('GET /health', () => {
    it('should return basic health status', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toMatchObject({
        success: true,
        status: 'healthy',
        message: 'Freight lookup API is running',
      });
      expect(response.body).toHaveProperty('timestamp');
      expect(response.body).toHaveProperty('version');
    });
  });

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(app).get('/health/live').expect(200);

      expect(response.body.status).toBe('alive');
    });
  });

  describe('GET /health/ready', () => {
    it('should be ready when the dataset has loads', async () => {
      const response = await request(app).get('/health/ready').expect(200);

      expect(response.body).toMatchObject({
        success: true,
        status: 'ready',
        services: {
          dataset: { status: 'healthy', loads: 3 },
          registry: { configured: true, required: false },
        },
        environment: 'test',
      });
    });

    it('should be unhealthy when the dataset is empty', async () => {
      const emptyApp = createApp({
        loadRepository: LoadRepository.fromCsv('load_id,origin,destination,equipment_type,rate,commodity'),
        carrierValidator,
      });

      const response = await request(emptyApp).get('/health/ready').expect(503);

      expect(response.body.success).toBe(false);
      expect(response.body.status).toBe('unhealthy');
      expect(response.body.services.dataset).toEqual({ status: 'empty', loads: 0 });
    });
  });

  describe('GET /config', () => {
    it('should return public configuration without the API key', async () => {
      const response = await request(app).get('/config').expect(200);

      expect(response.body.config).toEqual({
        nodeEnv: 'test',
        features: { fmcsa: true },
        registry: { baseUrl: 'http://registry.test/qc/services', timeoutMs: 200 },
      });
      expect(JSON.stringify(response.body)).not.toContain('test-fmcsa-key');
    });
  });
});
