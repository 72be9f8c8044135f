import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { getConfig } from './config/index.js';
import { createChildLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { authMiddleware, shouldSkipAuth } from './middleware/auth.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { sopRoutes } from './routes/sop.routes.js';
import { setupDefaultProviders } from './providers/index.js';

const logger = createChildLogger({ service: 'http' });

const API_PREFIX = '/api/v1';
const LOCALHOST_ORIGIN = /^https?:\/\/localhost(:\d+)?$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether a browser origin may call the API: a configured domain or one of
 * its subdomains, plus localhost outside production
 */
export function isAllowedOrigin(origin: string, allowedDomains: readonly string[], env: string): boolean {
  const matchesDomain = allowedDomains.some((domain) =>
    new RegExp(`^https?://([a-z0-9-]+\\.)*${escapeRegExp(domain)}(:\\d+)?$`, 'i').test(origin)
  );
  return matchesDomain || (env !== 'production' && LOCALHOST_ORIGIN.test(origin));
}

/**
 * Build the SOP generation API: security plugins, OpenAPI docs at /docs,
 * API key auth, health probes and the /api/v1 SOP routes
 */
export async function buildApp(): Promise<FastifyInstance> {
  const config = getConfig();

  setupDefaultProviders();

  // pino is wired through createChildLogger, not Fastify's logger
  const app = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: (origin, callback) => {
      // CLI and curl send no Origin header
      if (!origin || isAllowedOrigin(origin, config.cors.allowedDomains, config.server.env)) {
        callback(null, true);
        return;
      }
      logger.warn({ origin }, 'Rejected cross-origin request');
      callback(new Error('Not allowed by CORS'), false);
    },
    credentials: true,
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Maintenance SOP Generator API',
        description:
          'Turns a maintenance video and technician observations into a Standard Operating Procedure (Markdown and PDF)',
        version: '1.0.0',
      },
      servers: [{ url: `http://localhost:${config.server.port}`, description: 'Local server' }],
      tags: [
        { name: 'SOP', description: 'SOP generation and model listing' },
        { name: 'Health', description: 'Liveness and readiness' },
      ],
      components: {
        securitySchemes: {
          apiKey: { type: 'apiKey', name: 'x-api-key', in: 'header' },
        },
      },
      security: [{ apiKey: [] }],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: { docExpansion: 'list', deepLinking: false },
  });

  app.addHook('onResponse', async (request, reply) => {
    const entry = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: Math.round(reply.elapsedTime),
    };
    // Health probes log at debug
    if (request.url.startsWith(API_PREFIX)) {
      logger.info(entry, 'Request completed');
    } else {
      logger.debug(entry, 'Request completed');
    }
  });

  app.addHook('preHandler', async (request, reply) => {
    if (!shouldSkipAuth(request.url)) {
      await authMiddleware(request, reply);
    }
  });

  app.setErrorHandler(errorHandler);

  await app.register(healthRoutes);
  await app.register(sopRoutes, { prefix: API_PREFIX });

  return app;
}
