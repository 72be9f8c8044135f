/**
 * Gemini SOP Generation Provider
 *
 * Uploads the maintenance video to the Gemini Files API, sends it together
 * with the sampled frames and the instruction prompt, and returns the
 * model's answer as-is.
 */

import path from 'path';
import { z } from 'zod';
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type GenerativeModel,
  type Part,
} from '@google/generative-ai';
import { GoogleAIFileManager, FileState } from '@google/generative-ai/server';
import { createChildLogger } from '../../utils/logger.js';
import { RequestError, TransientError } from '../../utils/errors.js';
import { formatTimestamp } from '../../utils/duration.js';
import { getConfig } from '../../config/index.js';
import type { SopRequest, SopResponse } from '../../types/sop.types.js';
import type {
  ModelInfo,
  SopGenerationOptions,
  SopGenerationProvider,
} from '../interfaces/sop-generation.provider.js';

const logger = createChildLogger({ service: 'gemini-sop' });

const SERVICE = 'Gemini';

/** HTTP statuses worth another attempt */
const TRANSIENT_STATUSES = new Set([408, 429]);

const NETWORK_ERROR_PATTERN =
  /fetch failed|ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|EPIPE|socket hang up|network|timed? ?out|aborted/i;

const ABORT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError', 'GoogleGenerativeAIAbortError']);

const MODEL_PRIORITY = ['gemini-1.5-pro', 'gemini-1.5-flash'];

const modelsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        displayName: z.string().optional(),
        description: z.string().optional(),
        inputTokenLimit: z.number().optional(),
        outputTokenLimit: z.number().optional(),
        supportedGenerationMethods: z.array(z.string()).optional(),
      })
    )
    .optional(),
});

interface RetryPolicy {
  maxAttempts: number;
  retryDelayMs: number;
  signal?: AbortSignal;
}

function cancelledError(originalError?: Error): RequestError {
  return new RequestError(SERVICE, 'Request cancelled', { code: 'REQUEST_CANCELLED', originalError });
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledError();
  }
}

/**
 * Wait `ms`, rejecting with a cancelled RequestError as soon as `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Map an SDK or network failure onto the retry policy: TransientError is
 * retried, RequestError is not. An abort requested through `signal` is
 * always a cancelled RequestError.
 */
export function classifyGeminiError(error: unknown, signal?: AbortSignal): TransientError | RequestError {
  const err = error instanceof Error ? error : new Error(String(error));

  if (signal?.aborted) {
    return error instanceof RequestError && error.code === 'REQUEST_CANCELLED' ? error : cancelledError(err);
  }

  if (error instanceof TransientError || error instanceof RequestError) {
    return error;
  }

  if (err instanceof GoogleGenerativeAIFetchError && err.status !== undefined) {
    if (isTransientStatus(err.status)) {
      return new TransientError(SERVICE, err.message, { originalError: err });
    }
    return new RequestError(SERVICE, err.message, { upstreamStatus: err.status, originalError: err });
  }

  if (err instanceof GoogleGenerativeAIResponseError) {
    return new RequestError(SERVICE, err.message, { code: 'RESPONSE_BLOCKED', originalError: err });
  }

  if (ABORT_ERROR_NAMES.has(err.name) || NETWORK_ERROR_PATTERN.test(err.message)) {
    return new TransientError(SERVICE, err.message, { originalError: err });
  }

  return new RequestError(SERVICE, err.message, { originalError: err });
}

/**
 * Order models for display: 1.5 Pro, then 1.5 Flash, then the rest
 */
export function sortModels(models: ModelInfo[]): ModelInfo[] {
  const rank = (name: string) => {
    const index = MODEL_PRIORITY.findIndex((prefix) => name.includes(prefix));
    return index === -1 ? MODEL_PRIORITY.length : index;
  };
  return [...models].sort((a, b) => rank(a.name) - rank(b.name));
}

export class GeminiSopGenerationProvider implements SopGenerationProvider {
  readonly providerId = 'gemini';

  private client: GoogleGenerativeAI | null = null;
  private fileManager: GoogleAIFileManager | null = null;

  /**
   * Initialize Gemini clients
   */
  private init(): { client: GoogleGenerativeAI; fileManager: GoogleAIFileManager } {
    if (this.client && this.fileManager) {
      return { client: this.client, fileManager: this.fileManager };
    }

    const config = getConfig();
    this.client = new GoogleGenerativeAI(config.apis.googleAi);
    // Bounds each Files API call; polling has its own overall deadline
    this.fileManager = new GoogleAIFileManager(config.apis.googleAi, { timeout: config.sop.requestTimeoutMs });
    logger.info('Gemini client initialized');

    return { client: this.client, fileManager: this.fileManager };
  }

  private getModel(modelName: string, timeoutMs: number): GenerativeModel {
    const config = getConfig();
    const { client } = this.init();

    return client.getGenerativeModel(
      {
        model: modelName,
        generationConfig: {
          temperature: config.apis.temperature,
          maxOutputTokens: config.apis.maxOutputTokens,
        },
      },
      { timeout: timeoutMs }
    );
  }

  /**
   * Upload a video and wait until Gemini has processed it.
   * An abort through `signal` stops polling and removes the upload.
   *
   * @returns The file's URI and resource name
   */
  async uploadVideo(videoPath: string, mimeType: string, signal?: AbortSignal): Promise<{ uri: string; name: string }> {
    const config = getConfig();
    const { fileManager } = this.init();
    const { fileProcessingTimeoutMs, filePollingIntervalMs } = config.apis;

    logger.info({ videoPath }, 'Uploading video to Gemini Files API');

    const uploadResult = await fileManager.uploadFile(videoPath, {
      mimeType,
      displayName: path.basename(videoPath) || 'video',
    });

    let file = uploadResult.file;
    logger.info({ fileUri: file.uri, state: file.state }, 'Video uploaded');

    let attempts = 0;
    const maxAttempts = Math.ceil(fileProcessingTimeoutMs / filePollingIntervalMs);

    try {
      throwIfCancelled(signal);

      while (file.state === FileState.PROCESSING && attempts < maxAttempts) {
        await sleep(filePollingIntervalMs, signal);
        file = await fileManager.getFile(file.name, { signal });
        attempts++;
        logger.debug({ state: file.state, attempts }, 'Waiting for video processing');
        throwIfCancelled(signal);
      }
    } catch (error) {
      await this.deleteVideo(file.name);
      throw error;
    }

    if (file.state === FileState.FAILED) {
      const details = file.error?.message;
      logger.error({ fileName: file.name, mimeType: file.mimeType, error: file.error }, 'Gemini video processing failed');
      await this.deleteVideo(file.name);
      throw new RequestError(SERVICE, `Video processing failed${details ? `: ${details}` : ''}`, {
        code: 'VIDEO_PROCESSING_FAILED',
      });
    }

    if (file.state !== FileState.ACTIVE) {
      await this.deleteVideo(file.name);
      throw new TransientError(
        SERVICE,
        `Video processing timeout after ${(attempts * filePollingIntervalMs) / 1000} seconds`
      );
    }

    logger.info({ fileUri: file.uri }, 'Video processing complete');
    return { uri: file.uri, name: file.name };
  }

  /**
   * Delete an uploaded video. Failures are logged only.
   */
  async deleteVideo(fileName: string): Promise<void> {
    const { fileManager } = this.init();

    try {
      await fileManager.deleteFile(fileName);
      logger.info({ fileName }, 'Video deleted from Gemini Files API');
    } catch (error) {
      logger.warn({ error, fileName }, 'Failed to delete video from Gemini Files API');
    }
  }

  /**
   * Build the multimodal parts for one request: video, labelled frames,
   * observation image, then the prompt text
   */
  buildParts(request: SopRequest, fileUri?: string): Part[] {
    const parts: Part[] = [];

    if (request.video && fileUri) {
      parts.push({ fileData: { mimeType: request.video.mimeType, fileUri } });
    }

    for (const frame of request.framePlan) {
      parts.push({ text: `Frame at ${formatTimestamp(frame.timestamp)}` });
      parts.push({ inlineData: { mimeType: frame.mimeType, data: frame.image.toString('base64') } });
    }

    if (request.observationImage) {
      parts.push({ text: 'Observation image from the technician:' });
      parts.push({
        inlineData: {
          mimeType: request.observationImage.mimeType,
          data: request.observationImage.data.toString('base64'),
        },
      });
    }

    parts.push({ text: request.prompt });
    return parts;
  }

  async generate(request: SopRequest, options: SopGenerationOptions = {}): Promise<SopResponse> {
    const config = getConfig();
    const {
      model = config.apis.geminiModel,
      timeoutMs = config.sop.requestTimeoutMs,
      signal,
      maxRetries = config.sop.maxRetries,
      retryDelayMs = config.worker.apiRetryDelayMs,
    } = options;
    const maxAttempts = maxRetries + 1;

    logger.info(
      { model, frames: request.framePlan.length, hasVideo: !!request.video, timeoutMs, maxAttempts },
      'Generating SOP with Gemini'
    );

    const policy: RetryPolicy = { maxAttempts, retryDelayMs, signal };
    const { video } = request;

    const uploaded = video
      ? await this.withRetry('Video upload', () => this.uploadVideo(video.path, video.mimeType, signal), policy)
      : null;

    try {
      const geminiModel = this.getModel(model, timeoutMs);
      const parts = this.buildParts(request, uploaded?.uri);

      return await this.withRetry(
        'SOP generation',
        async (attempt) => {
          const result = await geminiModel.generateContent(
            { contents: [{ role: 'user', parts }] },
            { timeout: timeoutMs, signal }
          );
          const text = result.response.text();

          if (!text.trim()) {
            throw new RequestError(SERVICE, 'Model returned an empty response', { code: 'EMPTY_RESPONSE' });
          }

          logger.info({ attempt, length: text.length }, 'Gemini SOP generation succeeded');
          return text;
        },
        policy
      );
    } finally {
      if (uploaded) {
        await this.deleteVideo(uploaded.name);
      }
    }
  }

  /**
   * Run `operation` until it succeeds, fails with a RequestError, or runs out
   * of attempts. Cancellation is checked before each attempt and during the delay.
   */
  private async withRetry<T>(
    label: string,
    operation: (attempt: number) => Promise<T>,
    { maxAttempts, retryDelayMs, signal }: RetryPolicy
  ): Promise<T> {
    let lastError: TransientError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(signal);

      try {
        logger.info({ attempt, maxAttempts }, `${label} attempt`);
        return await operation(attempt);
      } catch (error) {
        const classified = classifyGeminiError(error, signal);
        if (classified instanceof RequestError) {
          logger.error({ attempt, code: classified.code, error: classified.message }, `${label} rejected`);
          throw classified;
        }

        lastError = classified;
        logger.warn({ attempt, maxAttempts, error: classified.message }, `${label} attempt failed`);

        if (attempt < maxAttempts) {
          logger.info({ delay: retryDelayMs }, `Retrying ${label.toLowerCase()}`);
          await sleep(retryDelayMs, signal);
        }
      }
    }

    throw new TransientError(
      SERVICE,
      `${label} failed after ${maxAttempts} attempts: ${lastError?.originalError?.message ?? lastError?.message}`,
      { attempts: maxAttempts, originalError: lastError?.originalError }
    );
  }

  async listModels(): Promise<ModelInfo[]> {
    const config = getConfig();
    const url = new URL('/v1beta/models', config.apis.geminiApiBase);
    url.searchParams.set('pageSize', '100');

    try {
      const response = await fetch(url, { headers: { 'x-goog-api-key': config.apis.googleAi } });
      if (!response.ok) {
        logger.warn({ status: response.status }, 'Failed to list Gemini models');
        return [];
      }

      const parsed = modelsResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues }, 'Unexpected model list response');
        return [];
      }

      const models: ModelInfo[] = (parsed.data.models ?? [])
        .filter((m) => m.supportedGenerationMethods?.includes('generateContent'))
        .map((m) => ({
          name: m.name,
          displayName: m.displayName ?? m.name,
          ...(m.description !== undefined ? { description: m.description } : {}),
          ...(m.inputTokenLimit !== undefined ? { inputTokenLimit: m.inputTokenLimit } : {}),
          ...(m.outputTokenLimit !== undefined ? { outputTokenLimit: m.outputTokenLimit } : {}),
        }));

      return sortModels(models);
    } catch (error) {
      logger.warn({ error: (error as Error).message }, 'Failed to list Gemini models');
      return [];
    }
  }

  isAvailable(): boolean {
    return !!getConfig().apis.googleAi;
  }
}

export const geminiSopGenerationProvider = new GeminiSopGenerationProvider();
