import type { FastifyInstance } from 'fastify';
import { videoService } from '../services/video.service.js';
import { providerRegistry } from '../providers/provider-registry.js';

type CheckStatus = 'ok' | 'error';

interface HealthResponse {
  status: CheckStatus;
  timestamp: string;
}

interface ReadinessResponse extends HealthResponse {
  checks: {
    ffmpeg: CheckStatus;
    generation: CheckStatus;
  };
}

const readinessSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    timestamp: { type: 'string' },
    checks: {
      type: 'object',
      properties: {
        ffmpeg: { type: 'string' },
        generation: { type: 'string' },
      },
    },
  },
} as const;

/**
 * Health check routes (no auth required)
 */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * Liveness probe - is the service running?
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        description: 'Liveness probe',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
      });
    }
  );

  /**
   * Readiness probe - can the service generate SOPs?
   */
  fastify.get<{ Reply: ReadinessResponse }>(
    '/ready',
    {
      schema: {
        description: 'Readiness probe - checks ffmpeg and a configured generation provider',
        tags: ['Health'],
        response: {
          200: readinessSchema,
          503: readinessSchema,
        },
      },
    },
    async (_request, reply) => {
      const ffmpeg = await videoService.checkFfmpegInstalled();
      const generationAvailable = providerRegistry.getAvailable('sopGeneration').length > 0;

      const checks: ReadinessResponse['checks'] = {
        ffmpeg: ffmpeg.available ? 'ok' : 'error',
        generation: generationAvailable ? 'ok' : 'error',
      };

      const allOk = checks.ffmpeg === 'ok' && checks.generation === 'ok';

      return reply.status(allOk ? 200 : 503).send({
        status: allOk ? 'ok' : 'error',
        timestamp: new Date().toISOString(),
        checks,
      });
    }
  );
}
