import { timingSafeEqual } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { getConfig } from '../config/index.js';
import { UnauthorizedError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'auth-middleware' });

/**
 * Constant-time string comparison.
 * Lengths that differ still run a comparison so timing does not leak the length.
 */
function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    const dummy = Buffer.from(a);
    timingSafeEqual(dummy, dummy);
    return false;
  }
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function reject(reply: FastifyReply, message: string): void {
  const error = new UnauthorizedError(message);
  reply.status(401).send({
    error: error.code,
    message: error.message,
  });
}

/**
 * API key authentication via the x-api-key header.
 * With no keys configured the service is open.
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const { apiKeys } = getConfig().auth;
  if (apiKeys.length === 0) {
    return;
  }

  const apiKeyHeader = request.headers['x-api-key'];
  if (!apiKeyHeader) {
    reject(reply, 'Missing API key');
    return;
  }

  if (typeof apiKeyHeader !== 'string' || !apiKeys.some((key) => safeCompare(apiKeyHeader, key))) {
    logger.debug({ requestId: request.id }, 'Rejected API key');
    reject(reply, 'Invalid API key');
    return;
  }
}

/**
 * Skip auth for certain paths (health checks, docs)
 */
export function shouldSkipAuth(path: string): boolean {
  const config = getConfig();
  return config.auth.skipPaths.some((p) => path.startsWith(p));
}
