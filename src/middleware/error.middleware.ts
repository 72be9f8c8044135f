import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { AppError, RequestError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { ZodError } from 'zod';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const logger = getLogger();

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const validationError = new ValidationError('Validation failed', error.format());
    reply.status(validationError.statusCode).send({
      error: validationError.code,
      message: validationError.message,
      statusCode: validationError.statusCode,
      details: validationError.details,
    } satisfies ErrorResponse);
    return;
  }

  // Handle custom application errors
  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, requestId: request.id }, 'Non-operational error occurred');
    } else {
      logger.warn({ err: error, requestId: request.id }, 'Operational error occurred');
    }

    const response: ErrorResponse = {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    };

    if (error instanceof ValidationError && error.details) {
      response.details = error.details;
    }
    if (error instanceof RequestError && error.upstreamStatus !== undefined) {
      response.details = { upstreamStatus: error.upstreamStatus };
    }

    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle Fastify schema validation errors
  if (error.validation) {
    reply.status(422).send({
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      statusCode: 422,
      details: error.validation,
    } satisfies ErrorResponse);
    return;
  }

  // Client errors raised by Fastify or its plugins (rate limit, bad JSON, ...)
  if (error.statusCode !== undefined && error.statusCode < 500) {
    reply.status(error.statusCode).send({
      error: error.code || 'BAD_REQUEST',
      message: error.message,
      statusCode: error.statusCode,
    } satisfies ErrorResponse);
    return;
  }

  // Unknown errors
  logger.error({ err: error, requestId: request.id }, 'Unhandled error occurred');

  reply.status(500).send({
    error: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  } satisfies ErrorResponse);
}
