/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 401 Unauthorized
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', code = 'UNAUTHORIZED') {
    super(message, 401, code);
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * The input video cannot be opened, probed or decoded. Fatal to the request.
 */
export class DecodeError extends AppError {
  public readonly videoPath?: string;

  constructor(message: string, videoPath?: string) {
    super(message, 422, 'DECODE_ERROR');
    this.videoPath = videoPath;
  }
}

/**
 * Network or service hiccup talking to the model. Eligible for retry.
 */
export class TransientError extends AppError {
  public readonly service: string;
  public readonly attempts: number;
  public readonly originalError?: Error;

  constructor(service: string, message: string, options: { attempts?: number; originalError?: Error } = {}) {
    super(`${service}: ${message}`, 503, 'TRANSIENT_ERROR');
    this.service = service;
    this.attempts = options.attempts ?? 1;
    this.originalError = options.originalError;
  }
}

/**
 * Explicit rejection by the model service (invalid key, unknown model,
 * content policy). Never retried.
 */
export class RequestError extends AppError {
  public readonly service: string;
  public readonly upstreamStatus?: number;
  public readonly originalError?: Error;

  constructor(
    service: string,
    message: string,
    options: { upstreamStatus?: number; originalError?: Error; code?: string } = {}
  ) {
    super(`${service}: ${message}`, 502, options.code ?? 'REQUEST_ERROR');
    this.service = service;
    this.upstreamStatus = options.upstreamStatus;
    this.originalError = options.originalError;
  }
}

/**
 * A single diagram could not be rendered. Local to that diagram; the
 * document is still produced.
 */
export class RenderError extends AppError {
  public readonly source: string;
  public readonly stepIndex?: number;

  constructor(message: string, source: string, stepIndex?: number) {
    super(message, 500, 'RENDER_ERROR');
    this.source = source;
    this.stepIndex = stepIndex;
  }
}
