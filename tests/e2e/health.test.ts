import request from 'supertest';

import {
  createInMemoryCatalogCollections,
  createInMemoryTransactionsCollections,
  FakeCatalogClient,
  getCatalogTestApp,
  getTransactionsTestApp,
} from '../helpers';

describe('Health Endpoints', () => {
  const app = getCatalogTestApp(createInMemoryCatalogCollections());

  describe('GET /health', () => {
    it('should report every dependency', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.services).toEqual({ database: { connected: true, readyState: 1 } });
      expect(response.body).toHaveProperty('timestamp');
    });

    it('should answer 503 when a dependency is down', async () => {
      const degraded = getTransactionsTestApp(createInMemoryTransactionsCollections(), new FakeCatalogClient(), {
        database: () => ({ connected: true, readyState: 1 }),
        redis: () => ({ connected: false }),
      });

      const response = await request(degraded).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('unhealthy');
      expect(response.body.services.redis).toEqual({ connected: false });
    });
  });

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(app).get('/health/live');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('alive');
    });
  });

  describe('GET /health/ready', () => {
    it('should return ready when dependencies are connected', async () => {
      const response = await request(app).get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ready');
    });

    it('should return not ready when the database is disconnected', async () => {
      const offline = getCatalogTestApp(createInMemoryCatalogCollections(), {
        database: () => ({ connected: false, readyState: 0 }),
      });

      const response = await request(offline).get('/health/ready');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('not ready');
    });
  });

  describe('Environment', () => {
    it('should describe the running service', async () => {
      const response = await request(app).get('/api/v1/environment/info');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        environment: 'test',
        runtime: `Node.js ${process.version}`,
        osPlatform: process.platform,
        processArchitecture: process.arch,
      });
    });

    it('should answer the environment health probe', async () => {
      const response = await request(app).get('/api/v1/environment/health');

      expect(response.body.data.status).toBe('Healthy');
    });
  });

  describe('GET /', () => {
    it('should return the service name', async () => {
      const response = await request(app).get('/');

      expect(response.body.name).toBe('Finance Manager Catalog API');
    });
  });

  describe('GET /metrics', () => {
    it('should expose Prometheus metrics', async () => {
      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.text).toContain('http_requests_total');
    });
  });
});
