/**
 * App Integration Tests
 *
 * Health check, fallbacks and rate limiting.
 */

import request from 'supertest';
import { createApp } from '../../../src/api';
import { createTestServices } from '../../helpers/services';
import { useTempDir } from '../../helpers/temp-dir';

describe('App', () => {
  const tempDir = useTempDir();

  describe('GET /health', () => {
    it('should report the service as up', async () => {
      const app = createApp(createTestServices(tempDir()));

      const response = await request(app).get('/health').expect(200);

      expect(response.body).toMatchObject({ status: 'ok', version: '1.0.0' });
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  describe('unknown routes', () => {
    it('should return 404 in the API envelope', async () => {
      const app = createApp(createTestServices(tempDir()));

      const response = await request(app).get('/api/v1/nope').expect(404);

      expect(response.body).toMatchObject({
        success: false,
        data: null,
        error: { code: 'NOT_FOUND', message: 'Route not found: GET /api/v1/nope' },
      });
    });
  });

  describe('rate limiting', () => {
    it('should reject requests over the configured limit', async () => {
      // Arrange
      const app = createApp(createTestServices(tempDir(), { security: { max_requests_per_minute: 2 } }));

      // Act
      await request(app).get('/api/v1/session').expect(200);
      await request(app).get('/api/v1/session').expect(200);
      const response = await request(app).get('/api/v1/session').expect(429);

      // Assert
      expect(response.body.error).toEqual({
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests. Please try again later.',
        details: { limit: 2, window: '1 minute' },
      });
    });

    it('should leave the health check unlimited', async () => {
      const app = createApp(createTestServices(tempDir(), { security: { max_requests_per_minute: 1 } }));

      await request(app).get('/health').expect(200);
      await request(app).get('/health').expect(200);
    });

    it('should not limit when rate limiting is off', async () => {
      const app = createApp(
        createTestServices(tempDir(), { security: { rate_limiting: false, max_requests_per_minute: 1 } })
      );

      await request(app).get('/api/v1/session').expect(200);
      await request(app).get('/api/v1/session').expect(200);
    });
  });

  describe('GET /api/v1/session', () => {
    it('should report session statistics', async () => {
      const services = createTestServices(tempDir());
      const app = createApp(services);

      const response = await request(app).get('/api/v1/session').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data).toEqual({
        sessionId: services.responder.sessionId,
        personality: 'curious_researcher',
        interactionsCount: 0,
        knowledgeEntries: 0,
        currentEmotion: 'CONTENTMENT',
        capabilities: {
          vision_processing: true,
          multi_step_reasoning: true,
          knowledge_management: true,
          emotional_intelligence: true,
          code_generation: true,
          adaptive_learning: true,
        },
        traits: {
          coreTraits: ['curious', 'analytical', 'methodical', 'truth-seeking'],
          responseStyle: 'detailed_explanatory',
          emotionalTendency: 'intellectual_excitement',
        },
        activeEmotions: [{ emotionId: 'CONTENTMENT', intensity: 0.5 }],
      });
    });
  });
});
