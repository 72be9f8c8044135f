import { describe, it, expect } from 'vitest';
import {
  AppError,
  UnauthorizedError,
  ValidationError,
  DecodeError,
  TransientError,
  RequestError,
  RenderError,
} from './errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('Test message', 400, 'TEST_CODE', true);

      expect(error.message).toBe('Test message');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_CODE');
      expect(error.isOperational).toBe(true);
      expect(error.stack).toBeDefined();
      expect(error).toBeInstanceOf(Error);
    });

    it('should default isOperational to true', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error.isOperational).toBe(true);
    });
  });

  describe('HTTP errors', () => {
    it('should create 401 errors', () => {
      const error = new UnauthorizedError('Invalid API key');
      expect(error.statusCode).toBe(401);
      expect(error.code).toBe('UNAUTHORIZED');
      expect(error.message).toBe('Invalid API key');
    });

    it('should keep validation details', () => {
      const error = new ValidationError('Bad frame count', { field: 'frameCount' });
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual({ field: 'frameCount' });
    });
  });

  describe('DecodeError', () => {
    it('should carry the video path', () => {
      const error = new DecodeError('Video has zero duration', '/videos/pump.mp4');

      expect(error).toBeInstanceOf(AppError);
      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('DECODE_ERROR');
      expect(error.videoPath).toBe('/videos/pump.mp4');
    });
  });

  describe('TransientError', () => {
    it('should prefix the service and record attempts', () => {
      const cause = new Error('fetch failed');
      const error = new TransientError('Gemini', 'Service unavailable', { attempts: 3, originalError: cause });

      expect(error.message).toBe('Gemini: Service unavailable');
      expect(error.statusCode).toBe(503);
      expect(error.code).toBe('TRANSIENT_ERROR');
      expect(error.attempts).toBe(3);
      expect(error.originalError).toBe(cause);
    });

    it('should default attempts to 1', () => {
      expect(new TransientError('Gemini', 'Timeout').attempts).toBe(1);
    });
  });

  describe('RequestError', () => {
    it('should expose upstream status', () => {
      const error = new RequestError('Gemini', 'API key not valid', { upstreamStatus: 400 });

      expect(error.message).toBe('Gemini: API key not valid');
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('REQUEST_ERROR');
      expect(error.upstreamStatus).toBe(400);
    });

    it('should accept a custom code', () => {
      const error = new RequestError('Gemini', 'Cancelled', { code: 'REQUEST_CANCELLED' });
      expect(error.code).toBe('REQUEST_CANCELLED');
    });
  });

  describe('RenderError', () => {
    it('should keep the offending source and step', () => {
      const error = new RenderError('Unbalanced brackets', 'flowchart TD\n  A[Start --> B', 2);

      expect(error.code).toBe('RENDER_ERROR');
      expect(error.source).toBe('flowchart TD\n  A[Start --> B');
      expect(error.stepIndex).toBe(2);
    });
  });
});
