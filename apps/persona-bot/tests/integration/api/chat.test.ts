/**
 * Chat API Integration Tests
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/api';
import { ServiceContainer } from '../../../src/services';
import { createTestServices } from '../../helpers/services';
import { useTempDir } from '../../helpers/temp-dir';

describe('Chat API', () => {
  const tempDir = useTempDir();
  let services: ServiceContainer;
  let app: Express;

  beforeEach(() => {
    services = createTestServices(tempDir());
    app = createApp(services);
  });

  describe('POST /api/v1/chat', () => {
    it('should respond to a prompt', async () => {
      const response = await request(app)
        .post('/api/v1/chat')
        .send({ prompt: 'What is recursion?' })
        .expect(200);

      expect(response.body.data).toEqual({
        response:
          'What a intriguing question! Let me break this down systematically for you.' +
          '\n\nFrom my knowledge base, I can tell you that this involves multiple interconnected concepts that work together in fascinating ways.',
        emotion: 'CURIOSITY',
        dominantEmotion: 'CURIOSITY',
        sessionId: services.responder.sessionId,
      });
      expect(services.knowledge.getInteractionCount()).toBe(1);
    });

    it('should reject an empty prompt', async () => {
      const response = await request(app).post('/api/v1/chat').send({ prompt: '' }).expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Invalid request data');
      expect(response.body.error.details[0].path).toEqual(['prompt']);
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/chat')
        .set('Content-Type', 'application/json')
        .send('{"prompt":')
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('BAD_REQUEST');
    });
  });

  describe('POST /api/v1/rooms/:roomId/messages', () => {
    const path = `/api/v1/rooms/${encodeURIComponent('!lab:localhost')}/messages`;

    it('should answer messages addressed to the bot', async () => {
      const response = await request(app)
        .post(path)
        .send({ senderId: '@alice:localhost', text: 'persona good morning' })
        .expect(200);

      const reply =
        "That's a interesting point you've raised! I appreciate the opportunity to explore this with you.";
      expect(response.body.data).toEqual({
        roomId: '!lab:localhost',
        reply,
        context: ['User: good morning', `persona: ${reply}`],
      });
    });

    it('should return a null reply when the bot stays silent', async () => {
      const response = await request(app)
        .post(path)
        .send({ senderId: '@alice:localhost', text: 'hello everyone' })
        .expect(200);

      expect(response.body.data).toEqual({ roomId: '!lab:localhost', reply: null, context: [] });
    });

    it('should run commands', async () => {
      const response = await request(app)
        .post(path)
        .send({ senderId: '@alice:localhost', text: '?sys' })
        .expect(200);

      expect(response.body.data.reply).toBe(
        "I can't do this silly thing! Only authorized users can execute system commands."
      );
    });

    it('should require a sender', async () => {
      const response = await request(app).post(path).send({ text: 'persona hi' }).expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });
});
