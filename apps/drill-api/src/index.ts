import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { loadConfig, type DrillApiConfig } from './config.js';
import { logger } from './logger.js';
import { registerRoutes } from './routes.js';
import { ScenarioCache } from './scenario-cache.js';

export { registerRoutes, type DrillRouteDeps } from './routes.js';
export { ScenarioCache } from './scenario-cache.js';
export { logger, createLogger } from './logger.js';
export { loadConfig, resolveCorsOrigins, type DrillApiConfig } from './config.js';

/** Fully wired app (plugins, error handler, routes) without a listening socket. */
export async function buildDrillApi(config: DrillApiConfig, cache?: ScenarioCache): Promise<FastifyInstance> {
  logger.level = config.logLevel;
  const app = Fastify({ logger: false });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // JSON API, no HTML
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    allowList: ['127.0.0.1', '::1'], // health checks
  });

  await app.register(cors, { origin: config.corsOrigins });

  // Structured errors, never a stack trace
  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    logger.error({ err: error, statusCode }, 'Request error');

    if (statusCode >= 500) {
      return reply.status(statusCode).send({
        error: 'Internal Server Error',
        message: config.production ? 'An unexpected error occurred' : error.message,
        statusCode,
      });
    }

    return reply.status(statusCode).send({
      error: error.name,
      message: error.message,
      statusCode,
    });
  });

  registerRoutes(app, {
    cache: cache ?? new ScenarioCache(config.cacheCapacity),
    heroPlayerId: config.heroPlayerId,
  });

  return app;
}

export async function startDrillApi(config: DrillApiConfig = loadConfig()): Promise<FastifyInstance> {
  const app = await buildDrillApi(config);
  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, 'Drill API started');
  return app;
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1])) {
  (async () => {
    const app = await startDrillApi();

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Received signal, shutting down');
      await app.close();
      logger.info('Fastify server closed');
      process.exit(0);
    };
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  })().catch((err: unknown) => {
    logger.error({ err }, 'Failed to start drill API');
    process.exit(1);
  });
}
