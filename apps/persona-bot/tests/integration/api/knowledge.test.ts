/**
 * Knowledge API Integration Tests
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/api';
import { createTestServices } from '../../helpers/services';
import { useTempDir } from '../../helpers/temp-dir';

describe('Knowledge API', () => {
  const tempDir = useTempDir();
  let app: Express;

  beforeEach(() => {
    app = createApp(createTestServices(tempDir()));
  });

  it('should return 404 for a missing key', async () => {
    const response = await request(app).get('/api/v1/knowledge/missing').expect(404);

    expect(response.body.error).toEqual({
      code: 'NOT_FOUND',
      message: "Knowledge entry with identifier 'missing' not found",
    });
  });

  it('should store and read back a value', async () => {
    // Act
    const put = await request(app)
      .put('/api/v1/knowledge/topic')
      .send({ value: { name: 'graphs', tags: ['bfs', 'dfs'] } })
      .expect(200);
    const get = await request(app).get('/api/v1/knowledge/topic').expect(200);

    // Assert
    expect(put.body.data).toMatchObject({ key: 'topic', type: 'object' });
    expect(get.body.data).toEqual({
      key: 'topic',
      value: { name: 'graphs', tags: ['bfs', 'dfs'] },
      type: 'object',
      timestamp: put.body.data.timestamp,
    });
  });

  it('should accept null values', async () => {
    const response = await request(app).put('/api/v1/knowledge/empty').send({ value: null }).expect(200);

    expect(response.body.data).toMatchObject({ key: 'empty', value: null, type: 'null' });
  });

  it('should reject a __proto__ key', async () => {
    const response = await request(app).put('/api/v1/knowledge/__proto__').send({ value: [1, 2, 3] }).expect(400);

    expect(response.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid knowledge key',
      details: { key: '__proto__' },
    });
  });

  it('should reject a value with a nested __proto__ key', async () => {
    const response = await request(app)
      .put('/api/v1/knowledge/topic')
      .set('Content-Type', 'application/json')
      .send('{"value": {"__proto__": 1, "a": 2}}')
      .expect(400);

    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details[0]).toMatchObject({
      message: 'Value contains a reserved key',
      path: ['value'],
    });
    await request(app).get('/api/v1/knowledge/topic').expect(404);
  });

  it('should reject a body without a value', async () => {
    const response = await request(app).put('/api/v1/knowledge/topic').send({}).expect(400);

    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });
});
