/**
 * Emotion API Integration Tests
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/api';
import { ServiceContainer } from '../../../src/services';
import { createTestServices } from '../../helpers/services';
import { useTempDir } from '../../helpers/temp-dir';

describe('Emotion API', () => {
  const tempDir = useTempDir();
  let services: ServiceContainer;
  let app: Express;

  beforeEach(() => {
    services = createTestServices(tempDir());
    app = createApp(services);
  });

  describe('POST /api/v1/emotion/classify', () => {
    it('should classify text', async () => {
      const response = await request(app)
        .post('/api/v1/emotion/classify')
        .send({ text: 'I am so confused, please help' })
        .expect(200);

      expect(response.body.data).toEqual({
        primaryEmotion: 'CONCERN',
        confidence: 0.7,
        matchedKeywords: ['confused', 'help'],
      });
    });

    it('should leave the emotional state untouched', async () => {
      await request(app).post('/api/v1/emotion/classify').send({ text: 'amazing' }).expect(200);

      expect(services.tracker.getHistory()).toHaveLength(0);
    });

    it('should reject a missing text field', async () => {
      const response = await request(app).post('/api/v1/emotion/classify').send({}).expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/v1/emotion/state', () => {
    it('should return the baseline state before any message', async () => {
      const response = await request(app).get('/api/v1/emotion/state').expect(200);

      expect(response.body.data).toEqual({
        dominant: 'CONTENTMENT',
        active: { CONTENTMENT: 0.5 },
        recentHistory: [],
        modifier: 'interesting',
      });
    });

    it('should reflect chat messages', async () => {
      await request(app).post('/api/v1/chat').send({ prompt: 'This is amazing' }).expect(200);

      const response = await request(app).get('/api/v1/emotion/state').expect(200);

      expect(response.body.data.dominant).toBe('EXCITEMENT');
      expect(response.body.data.modifier).toBe('thrilling');
      expect(response.body.data.recentHistory).toHaveLength(1);
    });
  });

  describe('GET /api/v1/emotion/definitions', () => {
    it('should list every emotion', async () => {
      const response = await request(app).get('/api/v1/emotion/definitions').expect(200);

      expect(response.body.data.count).toBe(21);
      expect(response.body.data.definitions[0]).toMatchObject({
        id: 'JOY',
        intensityBounds: { min: 0, max: 1 },
        decayWindowSeconds: 300,
      });
    });
  });
});
