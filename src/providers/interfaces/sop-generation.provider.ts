import type { SopRequest, SopResponse } from '../../types/sop.types.js';

/**
 * Per-call generation options
 */
export interface SopGenerationOptions {
  /** Model name; falls back to the configured default */
  model?: string;
  /** Timeout for a single attempt, in ms */
  timeoutMs?: number;
  /** Cancels the call; a cancelled call is never retried */
  signal?: AbortSignal;
  /** Retries after the first attempt on transient failures */
  maxRetries?: number;
  /** Delay between attempts, in ms */
  retryDelayMs?: number;
}

/**
 * A model usable for SOP generation
 */
export interface ModelInfo {
  /** Full resource name, e.g. "models/gemini-1.5-pro" */
  name: string;
  displayName: string;
  description?: string;
  inputTokenLimit?: number;
  outputTokenLimit?: number;
}

/**
 * SopGenerationProvider Interface
 *
 * Implementations: GeminiSopGenerationProvider
 *
 * Sends one SopRequest to a multimodal model and returns its raw text.
 * Failures surface as TransientError (retries exhausted) or RequestError
 * (rejected by the service, or cancelled).
 */
export interface SopGenerationProvider {
  /** Provider identifier for logging */
  readonly providerId: string;

  generate(request: SopRequest, options?: SopGenerationOptions): Promise<SopResponse>;

  /**
   * Models that support content generation. Never rejects; an unreachable
   * service yields an empty list.
   */
  listModels(): Promise<ModelInfo[]>;

  /**
   * Check if provider is available/configured
   */
  isAvailable(): boolean;
}
