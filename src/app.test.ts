import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';

const mocks = vi.hoisted(() => ({
  logger: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
  setupDefaultProviders: vi.fn(),
}));

vi.mock('./config/index.js', () => ({
  getConfig: vi.fn(() => ({
    server: { port: 3000, host: '127.0.0.1', env: 'test' },
    auth: { apiKeys: ['test-secret'], skipPaths: ['/health', '/ready', '/docs'] },
    cors: { allowedDomains: ['example.com'] },
    apis: { geminiModel: 'models/gemini-1.5-pro' },
    sop: { inputDir: '/data/input', generateRateLimitMax: 100 },
  })),
}));

vi.mock('./utils/logger.js', () => ({
  getLogger: vi.fn(() => mocks.logger),
  createChildLogger: vi.fn(() => mocks.logger),
}));

vi.mock('./providers/index.js', () => ({
  setupDefaultProviders: mocks.setupDefaultProviders,
}));

vi.mock('./services/sop-pipeline.service.js', () => ({
  generateSop: vi.fn(),
}));

vi.mock('./services/video.service.js', () => ({
  videoService: { checkFfmpegInstalled: vi.fn() },
}));

import { buildApp, isAllowedOrigin } from './app.js';

describe('isAllowedOrigin', () => {
  it('should allow a configured domain and its subdomains', () => {
    expect(isAllowedOrigin('https://example.com', ['example.com'], 'production')).toBe(true);
    expect(isAllowedOrigin('https://plant.example.com:8443', ['example.com'], 'production')).toBe(true);
  });

  it('should match the domain literally', () => {
    expect(isAllowedOrigin('https://exampleXcom', ['example.com'], 'production')).toBe(false);
    expect(isAllowedOrigin('https://example.com.other.io', ['example.com'], 'production')).toBe(false);
  });

  it('should allow localhost outside production only', () => {
    expect(isAllowedOrigin('http://localhost:5173', [], 'development')).toBe(true);
    expect(isAllowedOrigin('http://localhost:5173', [], 'production')).toBe(false);
  });
});

describe('buildApp', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    vi.clearAllMocks();
    app = await buildApp();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should set up the generation providers', () => {
    expect(mocks.setupDefaultProviders).toHaveBeenCalledTimes(1);
  });

  it('should serve liveness without an API key', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
  });

  it('should require an API key for the SOP routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/models' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ error: 'UNAUTHORIZED', message: 'Missing API key' });
  });

  it('should describe the API with SOP and Health tags', async () => {
    const response = await app.inject({ method: 'GET', url: '/docs/json' });
    const document = response.json();

    expect(response.statusCode).toBe(200);
    expect(document.info.title).toBe('Maintenance SOP Generator API');
    expect(document.tags.map((t: { name: string }) => t.name)).toEqual(['SOP', 'Health']);
  });
});
