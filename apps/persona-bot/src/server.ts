// Load environment variables before config is read
import 'dotenv/config';
import { createApp } from './api';
import { getServices } from './services';
import { getConfig } from './utils/config';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

const HOST = process.env.HOST || '0.0.0.0';

/**
 * Start the persona bot API server
 */
function start(): void {
  try {
    logger.info('Persona Bot API Server Starting...');
    const { api } = getConfig();
    const services = getServices();
    const app = createApp(services);

    const server = app.listen(api.port, HOST, () => {
      logger.info('Persona Bot API Server Ready', {
        host: HOST,
        port: api.port,
        healthCheck: `http://${HOST}:${api.port}/health`,
        apiBase: `http://${HOST}:${api.port}/api/v1`,
        personality: services.responder.getPersonalityInfo().personality,
      });
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}. Starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed. Goodbye!');
        process.exit(0);
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

start();
