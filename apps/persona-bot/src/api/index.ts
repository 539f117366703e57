import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { ServiceContainer, getServices } from '../services';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createRateLimiter } from './middleware/rate-limiter';
import { API_VERSION } from './middleware/response';
import { createChatRouter, createRoomsRouter } from './routes/chat';
import { createCodeRouter } from './routes/code';
import { createEmotionRouter } from './routes/emotion';
import { createKnowledgeRouter } from './routes/knowledge';
import { createSessionRouter } from './routes/session';

/**
 * Create and configure Express application
 */
export function createApp(services: ServiceContainer = getServices()): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000'],
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Compression
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // Rate limiting (applied to API routes)
  const rateLimiter = createRateLimiter(services.settings.getSecurityConfig());
  if (rateLimiter) {
    app.use('/api', rateLimiter);
  }

  // Health check (before routes for fast response)
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  // API routes
  app.use('/api/v1/chat', createChatRouter(services));
  app.use('/api/v1/rooms', createRoomsRouter(services));
  app.use('/api/v1/emotion', createEmotionRouter(services));
  app.use('/api/v1/knowledge', createKnowledgeRouter(services));
  app.use('/api/v1/session', createSessionRouter(services));
  app.use('/api/v1/code', createCodeRouter(services));

  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
