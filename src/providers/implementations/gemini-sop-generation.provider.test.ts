import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  generateContent: vi.fn(),
  getGenerativeModel: vi.fn(),
  uploadFile: vi.fn(),
  getFile: vi.fn(),
  deleteFile: vi.fn(),
}));

vi.mock('@google/generative-ai', () => {
  class GoogleGenerativeAIFetchError extends Error {
    status?: number;
    constructor(message: string, status?: number) {
      super(message);
      this.name = 'GoogleGenerativeAIFetchError';
      this.status = status;
    }
  }
  class GoogleGenerativeAIResponseError extends Error {
    constructor(message: string) {
      super(message);
      this.name = 'GoogleGenerativeAIResponseError';
    }
  }
  return {
    GoogleGenerativeAI: class MockGoogleGenerativeAI {
      getGenerativeModel = mocks.getGenerativeModel;
    },
    GoogleGenerativeAIFetchError,
    GoogleGenerativeAIResponseError,
  };
});

vi.mock('@google/generative-ai/server', () => ({
  GoogleAIFileManager: class MockGoogleAIFileManager {
    uploadFile = mocks.uploadFile;
    getFile = mocks.getFile;
    deleteFile = mocks.deleteFile;
  },
  FileState: {
    PROCESSING: 'PROCESSING',
    ACTIVE: 'ACTIVE',
    FAILED: 'FAILED',
  },
}));

vi.mock('../../config/index.js', () => ({
  getConfig: vi.fn(() => ({
    apis: {
      googleAi: 'test-google-key',
      geminiModel: 'models/gemini-1.5-pro',
      geminiApiBase: 'https://generativelanguage.googleapis.com',
      temperature: 0.2,
      maxOutputTokens: 8192,
      fileProcessingTimeoutMs: 1000,
      filePollingIntervalMs: 10,
    },
    sop: {
      requestTimeoutMs: 5000,
      maxRetries: 2,
    },
    worker: {
      apiRetryDelayMs: 0,
    },
  })),
}));

vi.mock('../../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { GoogleGenerativeAIFetchError, GoogleGenerativeAIResponseError } from '@google/generative-ai';
import {
  GeminiSopGenerationProvider,
  classifyGeminiError,
  sortModels,
} from './gemini-sop-generation.provider.js';
import { RequestError, TransientError } from '../../utils/errors.js';
import type { SopRequest } from '../../types/sop.types.js';

const REQUEST: SopRequest = {
  prompt: 'PROMPT',
  framePlan: [{ timestamp: 1.5, image: Buffer.from('jpg'), mimeType: 'image/jpeg' }],
};

const VIDEO_REQUEST: SopRequest = {
  ...REQUEST,
  video: { path: '/videos/pump.mp4', mimeType: 'video/mp4' },
};

function textResponse(text: string) {
  return { response: { text: () => text } };
}

describe('GeminiSopGenerationProvider', () => {
  let provider: GeminiSopGenerationProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getGenerativeModel.mockReturnValue({ generateContent: mocks.generateContent });
    mocks.deleteFile.mockResolvedValue(undefined);
    provider = new GeminiSopGenerationProvider();
  });

  describe('generate', () => {
    it('should return the model text unmodified', async () => {
      mocks.generateContent.mockResolvedValue(textResponse('Steps:\nA\n'));

      const result = await provider.generate(REQUEST);

      expect(result).toBe('Steps:\nA\n');
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
      expect(mocks.generateContent).toHaveBeenCalledWith(
        {
          contents: [
            {
              role: 'user',
              parts: [
                { text: 'Frame at 00:01' },
                { inlineData: { mimeType: 'image/jpeg', data: 'anBn' } },
                { text: 'PROMPT' },
              ],
            },
          ],
        },
        { timeout: 5000, signal: undefined }
      );
    });

    it('should configure the requested model and timeout', async () => {
      mocks.generateContent.mockResolvedValue(textResponse('ok'));

      await provider.generate(REQUEST, { model: 'models/gemini-1.5-flash', timeoutMs: 2000 });

      expect(mocks.getGenerativeModel).toHaveBeenCalledWith(
        {
          model: 'models/gemini-1.5-flash',
          generationConfig: { temperature: 0.2, maxOutputTokens: 8192 },
        },
        { timeout: 2000 }
      );
    });

    it('should make exactly three attempts on repeated transient failures', async () => {
      mocks.generateContent.mockRejectedValue(new GoogleGenerativeAIFetchError('[503 Service Unavailable]', 503));

      const error = await provider.generate(REQUEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect((error as TransientError).attempts).toBe(3);
      expect(mocks.generateContent).toHaveBeenCalledTimes(3);
    });

    it('should recover when a retry succeeds', async () => {
      mocks.generateContent
        .mockRejectedValueOnce(new Error('fetch failed'))
        .mockResolvedValueOnce(textResponse('Steps:\nA'));

      await expect(provider.generate(REQUEST)).resolves.toBe('Steps:\nA');
      expect(mocks.generateContent).toHaveBeenCalledTimes(2);
    });

    it('should make one attempt when the API rejects the request', async () => {
      mocks.generateContent.mockRejectedValue(new GoogleGenerativeAIFetchError('[400 Bad Request]', 400));

      const error = await provider.generate(REQUEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestError);
      expect((error as RequestError).upstreamStatus).toBe(400);
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should treat a blocked response as a rejection', async () => {
      mocks.generateContent.mockResolvedValue({
        response: {
          text: () => {
            throw new GoogleGenerativeAIResponseError('Candidate was blocked due to SAFETY');
          },
        },
      });

      await expect(provider.generate(REQUEST)).rejects.toMatchObject({ code: 'RESPONSE_BLOCKED' });
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should reject an empty response without retrying', async () => {
      mocks.generateContent.mockResolvedValue(textResponse('   '));

      await expect(provider.generate(REQUEST)).rejects.toMatchObject({ code: 'EMPTY_RESPONSE' });
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should honor maxRetries from the options', async () => {
      mocks.generateContent.mockRejectedValue(new Error('ECONNRESET'));

      await expect(provider.generate(REQUEST, { maxRetries: 0 })).rejects.toBeInstanceOf(TransientError);
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should not call the model once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(provider.generate(REQUEST, { signal: controller.signal })).rejects.toMatchObject({
        code: 'REQUEST_CANCELLED',
      });
      expect(mocks.generateContent).not.toHaveBeenCalled();
    });

    it('should report a cancellation during the call without retrying', async () => {
      const controller = new AbortController();
      mocks.generateContent.mockImplementation(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });

      await expect(provider.generate(REQUEST, { signal: controller.signal })).rejects.toMatchObject({
        code: 'REQUEST_CANCELLED',
      });
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should upload the video, reference it and delete it afterwards', async () => {
      mocks.uploadFile.mockResolvedValue({
        file: { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'PROCESSING' },
      });
      mocks.getFile.mockResolvedValue({ uri: 'https://files.example/files/abc', name: 'files/abc', state: 'ACTIVE' });
      mocks.generateContent.mockResolvedValue(textResponse('Steps:\nA'));

      await provider.generate(VIDEO_REQUEST);

      expect(mocks.uploadFile).toHaveBeenCalledWith('/videos/pump.mp4', {
        mimeType: 'video/mp4',
        displayName: 'pump.mp4',
      });
      const [[request]] = mocks.generateContent.mock.calls;
      expect(request.contents[0].parts[0]).toEqual({
        fileData: { mimeType: 'video/mp4', fileUri: 'https://files.example/files/abc' },
      });
      expect(mocks.deleteFile).toHaveBeenCalledWith('files/abc');
    });

    it('should delete the uploaded video when generation fails', async () => {
      mocks.uploadFile.mockResolvedValue({
        file: { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'ACTIVE' },
      });
      mocks.generateContent.mockRejectedValue(new GoogleGenerativeAIFetchError('[404 Not Found]', 404));

      await expect(provider.generate(VIDEO_REQUEST)).rejects.toBeInstanceOf(RequestError);
      expect(mocks.deleteFile).toHaveBeenCalledWith('files/abc');
    });

    it('should fail when Gemini cannot process the video', async () => {
      mocks.uploadFile.mockResolvedValue({
        file: { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'FAILED' },
      });

      await expect(provider.generate(VIDEO_REQUEST)).rejects.toMatchObject({ code: 'VIDEO_PROCESSING_FAILED' });
      expect(mocks.generateContent).not.toHaveBeenCalled();
      expect(mocks.deleteFile).toHaveBeenCalledWith('files/abc');
    });

    it('should stop polling and remove the upload when cancelled during processing', async () => {
      const controller = new AbortController();
      mocks.uploadFile.mockResolvedValueOnce({
        file: { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'PROCESSING' },
      });
      mocks.getFile.mockImplementationOnce(async () => {
        controller.abort();
        return { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'PROCESSING' };
      });

      await expect(provider.generate(VIDEO_REQUEST, { signal: controller.signal })).rejects.toMatchObject({
        code: 'REQUEST_CANCELLED',
      });
      expect(mocks.getFile).toHaveBeenCalledTimes(1);
      expect(mocks.getFile).toHaveBeenCalledWith('files/abc', { signal: controller.signal });
      expect(mocks.uploadFile).toHaveBeenCalledTimes(1);
      expect(mocks.deleteFile).toHaveBeenCalledWith('files/abc');
      expect(mocks.generateContent).not.toHaveBeenCalled();
    });

    it('should stop waiting between attempts when cancelled', async () => {
      const controller = new AbortController();
      mocks.generateContent.mockRejectedValueOnce(new Error('fetch failed'));
      setTimeout(() => controller.abort(), 5);

      await expect(
        provider.generate(REQUEST, { signal: controller.signal, retryDelayMs: 60_000 })
      ).rejects.toMatchObject({ code: 'REQUEST_CANCELLED' });
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
    });

    it('should retry the upload after a transient failure', async () => {
      mocks.uploadFile
        .mockRejectedValueOnce(new Error('fetch failed'))
        .mockResolvedValueOnce({
          file: { uri: 'https://files.example/files/abc', name: 'files/abc', state: 'ACTIVE' },
        });
      mocks.generateContent.mockResolvedValue(textResponse('Steps:\nA'));

      await expect(provider.generate(VIDEO_REQUEST)).resolves.toBe('Steps:\nA');
      expect(mocks.uploadFile).toHaveBeenCalledTimes(2);
      expect(mocks.generateContent).toHaveBeenCalledTimes(1);
      expect(mocks.deleteFile).toHaveBeenCalledWith('files/abc');
    });

    it('should give up on the upload after the configured attempts', async () => {
      mocks.uploadFile.mockRejectedValue(new Error('fetch failed'));

      const error = await provider.generate(VIDEO_REQUEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect((error as TransientError).attempts).toBe(3);
      expect((error as TransientError).message).toContain('Video upload failed after 3 attempts');
      expect(mocks.uploadFile).toHaveBeenCalledTimes(3);
      expect(mocks.generateContent).not.toHaveBeenCalled();
    });
  });

  describe('listModels', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should return generation models with 1.5 Pro and Flash first', async () => {
      const fetchMock = vi.fn().mockResolvedValue({
        ok: true,
        json: async () => ({
          models: [
            { name: 'models/gemini-1.0-pro', supportedGenerationMethods: ['generateContent'] },
            { name: 'models/embedding-001', supportedGenerationMethods: ['embedContent'] },
            {
              name: 'models/gemini-1.5-flash',
              displayName: 'Gemini 1.5 Flash',
              supportedGenerationMethods: ['generateContent'],
            },
            {
              name: 'models/gemini-1.5-pro',
              displayName: 'Gemini 1.5 Pro',
              supportedGenerationMethods: ['generateContent', 'countTokens'],
            },
          ],
        }),
      });
      vi.stubGlobal('fetch', fetchMock);

      const models = await provider.listModels();

      expect(models).toEqual([
        { name: 'models/gemini-1.5-pro', displayName: 'Gemini 1.5 Pro' },
        { name: 'models/gemini-1.5-flash', displayName: 'Gemini 1.5 Flash' },
        { name: 'models/gemini-1.0-pro', displayName: 'models/gemini-1.0-pro' },
      ]);
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('https://generativelanguage.googleapis.com/v1beta/models?pageSize=100');
      expect(init).toEqual({ headers: { 'x-goog-api-key': 'test-google-key' } });
    });

    it('should return an empty list when the request fails', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('fetch failed')));

      await expect(provider.listModels()).resolves.toEqual([]);
    });

    it('should return an empty list on an error status', async () => {
      vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 403, json: async () => ({}) }));

      await expect(provider.listModels()).resolves.toEqual([]);
    });
  });
});

describe('classifyGeminiError', () => {
  it('should treat 408, 429 and 5xx as transient', () => {
    expect(classifyGeminiError(new GoogleGenerativeAIFetchError('timeout', 408))).toBeInstanceOf(TransientError);
    expect(classifyGeminiError(new GoogleGenerativeAIFetchError('quota', 429))).toBeInstanceOf(TransientError);
    expect(classifyGeminiError(new GoogleGenerativeAIFetchError('oops', 500))).toBeInstanceOf(TransientError);
  });

  it('should treat other statuses as rejections', () => {
    const error = classifyGeminiError(new GoogleGenerativeAIFetchError('[403 Forbidden] API key not valid', 403));

    expect(error).toBeInstanceOf(RequestError);
    expect(error.message).toBe('Gemini: [403 Forbidden] API key not valid');
  });

  it('should treat network failures and timeouts as transient', () => {
    expect(classifyGeminiError(new Error('read ECONNRESET'))).toBeInstanceOf(TransientError);

    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(classifyGeminiError(abort)).toBeInstanceOf(TransientError);
  });

  it('should treat unknown failures as rejections', () => {
    expect(classifyGeminiError(new Error('Invalid argument'))).toBeInstanceOf(RequestError);
    expect(classifyGeminiError('boom')).toBeInstanceOf(RequestError);
  });

  it('should return classified errors unchanged', () => {
    const transient = new TransientError('Gemini', 'busy');
    expect(classifyGeminiError(transient)).toBe(transient);
  });

  it('should report a cancellation even for an already classified error', () => {
    const controller = new AbortController();
    controller.abort();

    const error = classifyGeminiError(new TransientError('Gemini', 'Video processing timeout'), controller.signal);

    expect(error).toBeInstanceOf(RequestError);
    expect(error.code).toBe('REQUEST_CANCELLED');
  });
});

describe('sortModels', () => {
  it('should keep the relative order of unranked models', () => {
    const sorted = sortModels([
      { name: 'models/b', displayName: 'b' },
      { name: 'models/gemini-1.5-flash-8b', displayName: 'f' },
      { name: 'models/a', displayName: 'a' },
    ]);

    expect(sorted.map((m) => m.name)).toEqual(['models/gemini-1.5-flash-8b', 'models/b', 'models/a']);
  });
});
