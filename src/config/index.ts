import { getEnv, parseEnv, type Env, type SectionHeadersOverride } from './env.js';

export { getEnv, parseEnv, type Env, type SectionHeadersOverride };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
  };
  auth: {
    apiKeys: string[];
    skipPaths: string[];
  };
  cors: {
    allowedDomains: string[];
  };
  apis: {
    googleAi: string;
    geminiModel: string;
    geminiApiBase: string;
    temperature: number;
    maxOutputTokens: number;
    fileProcessingTimeoutMs: number;
    filePollingIntervalMs: number;
  };
  sop: {
    maxFrames: number;
    defaultFrameCount: number;
    frameMaxWidth: number;
    promptMaxLength: number;
    requestTimeoutMs: number;
    maxRetries: number;
    inputDir: string;
    sectionHeaders?: SectionHeadersOverride;
    generateRateLimitMax: number;
  };
  worker: {
    tempDirName: string;
    apiRetryDelayMs: number;
  };
  logging: {
    level: string;
  };
  ffmpeg: {
    ffmpegPath: string;
    ffprobePath: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
    },
    auth: {
      apiKeys: env.API_KEYS,
      skipPaths: env.AUTH_SKIP_PATHS,
    },
    cors: {
      allowedDomains: env.CORS_ALLOWED_DOMAINS,
    },
    apis: {
      googleAi: env.GOOGLE_AI_API_KEY,
      geminiModel: env.GEMINI_MODEL,
      geminiApiBase: env.GEMINI_API_BASE,
      temperature: env.GEMINI_TEMPERATURE,
      maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
      fileProcessingTimeoutMs: env.GEMINI_FILE_PROCESSING_TIMEOUT_MS,
      filePollingIntervalMs: env.GEMINI_FILE_POLLING_INTERVAL_MS,
    },
    sop: {
      maxFrames: env.SOP_MAX_FRAMES,
      defaultFrameCount: Math.min(env.SOP_DEFAULT_FRAME_COUNT, env.SOP_MAX_FRAMES),
      frameMaxWidth: env.SOP_FRAME_MAX_WIDTH,
      promptMaxLength: env.SOP_PROMPT_MAX_LENGTH,
      requestTimeoutMs: env.SOP_REQUEST_TIMEOUT_MS,
      maxRetries: env.SOP_MAX_RETRIES,
      inputDir: env.SOP_INPUT_DIR,
      sectionHeaders: env.SOP_SECTION_HEADERS,
      generateRateLimitMax: env.GENERATE_RATE_LIMIT_MAX,
    },
    worker: {
      tempDirName: env.TEMP_DIR_NAME,
      apiRetryDelayMs: env.API_RETRY_DELAY_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    ffmpeg: {
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
