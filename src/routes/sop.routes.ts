import path from 'path';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { getConfig } from '../config/index.js';
import { generateSopSchema } from '../types/sop.types.js';
import { generateSop } from '../services/sop-pipeline.service.js';
import { providerRegistry } from '../providers/provider-registry.js';
import { ValidationError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'sop-routes' });

/**
 * Resolve a client-supplied path inside the input directory.
 * Absolute paths and `..` segments that leave the directory are rejected.
 */
export function resolveInputPath(inputDir: string, requested: string): string {
  const root = path.resolve(inputDir);
  const resolved = path.resolve(root, requested);
  const relative = path.relative(root, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ValidationError(`Path is outside the input directory: ${requested}`);
  }
  return resolved;
}

/**
 * SOP generation routes
 */
export async function sopRoutes(fastify: FastifyInstance): Promise<void> {
  const config = getConfig();

  await fastify.register(rateLimit, {
    global: false,
    max: config.sop.generateRateLimitMax,
    timeWindow: '1 minute',
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: 'RATE_LIMIT_EXCEEDED',
      error: 'RATE_LIMIT_EXCEEDED',
      message: `Too many requests. Please try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
    }),
  });

  /**
   * Generate an SOP from a video in the input directory
   */
  fastify.post(
    '/sops',
    {
      config: {
        rateLimit: {
          max: config.sop.generateRateLimitMax,
          timeWindow: '1 minute',
        },
      },
      schema: {
        description: 'Generate a Standard Operating Procedure from a maintenance video',
        tags: ['SOP'],
        body: {
          type: 'object',
          required: ['videoPath'],
          properties: {
            videoPath: { type: 'string', description: 'Path relative to the input directory' },
            observations: { type: 'string' },
            observationImagePath: { type: 'string' },
            model: { type: 'string' },
            frameCount: { type: 'integer', minimum: 1 },
            timeoutMs: { type: 'integer' },
          },
        },
        response: {
          200: {
            type: 'object',
            properties: {
              runId: { type: 'string' },
              model: { type: 'string' },
              frameCount: { type: 'number' },
              pageCount: { type: 'number' },
              markdown: { type: 'string' },
              pdfBase64: { type: 'string' },
              document: { type: 'object', additionalProperties: true },
              omittedDiagrams: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    message: { type: 'string' },
                    stepIndex: { type: 'number' },
                  },
                },
              },
              timing: { type: 'object', additionalProperties: true },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = generateSopSchema.parse(request.body);
      const { inputDir } = config.sop;

      const videoPath = resolveInputPath(inputDir, body.videoPath);
      const observationImagePath = body.observationImagePath
        ? resolveInputPath(inputDir, body.observationImagePath)
        : undefined;

      // Client went away before the SOP was sent
      const controller = new AbortController();
      reply.raw.on('close', () => {
        if (!reply.raw.writableFinished) {
          logger.info({ requestId: request.id }, 'Client disconnected, cancelling generation');
          controller.abort();
        }
      });

      const result = await generateSop({
        videoPath,
        observations: body.observations,
        observationImagePath,
        model: body.model,
        frameCount: body.frameCount,
        timeoutMs: body.timeoutMs,
        signal: controller.signal,
      });

      return reply.send({
        runId: result.runId,
        model: result.model,
        frameCount: result.frameCount,
        pageCount: result.pageCount,
        markdown: result.markdown,
        pdfBase64: result.pdf.toString('base64'),
        document: result.document,
        omittedDiagrams: result.omittedDiagrams.map((e) => ({
          message: e.message,
          stepIndex: e.stepIndex,
        })),
        timing: result.timing,
      });
    }
  );

  /**
   * List models usable for generation
   */
  fastify.get(
    '/models',
    {
      schema: {
        description: 'List models that support SOP generation',
        tags: ['SOP'],
        response: {
          200: {
            type: 'object',
            properties: {
              models: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    name: { type: 'string' },
                    displayName: { type: 'string' },
                    description: { type: 'string' },
                    inputTokenLimit: { type: 'number' },
                    outputTokenLimit: { type: 'number' },
                  },
                },
              },
              defaultModel: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { provider } = providerRegistry.get('sopGeneration');
      const models = await provider.listModels();
      return reply.send({ models, defaultModel: config.apis.geminiModel });
    }
  );
}
