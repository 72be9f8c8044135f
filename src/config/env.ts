import { z } from 'zod';

/** Recommended minimum length for API keys (warning only, not enforced) */
const RECOMMENDED_API_KEY_LENGTH = 16;

/**
 * Warn about short API keys during env parsing.
 * Note: Uses console.warn because the logger is not yet available during env validation
 * (logger depends on config, which depends on env parsing completing first).
 */
const warnAboutShortKeys = (keys: string[], keyType: string): void => {
  const shortKeys = keys.filter((k) => k.length < RECOMMENDED_API_KEY_LENGTH);
  if (shortKeys.length > 0) {
    console.warn(
      `[Security Warning] ${shortKeys.length} ${keyType} key(s) are shorter than ${RECOMMENDED_API_KEY_LENGTH} characters. ` +
        'Consider using longer keys for better security.'
    );
  }
};

/**
 * Header vocabulary override, e.g. `{"warnings":["hazards","safety"]}`.
 * Kinds that are left out keep their default headers.
 */
export const sectionHeadersSchema = z
  .object({
    steps: z.array(z.string().min(1)).optional(),
    warnings: z.array(z.string().min(1)).optional(),
    tools: z.array(z.string().min(1)).optional(),
    troubleshooting: z.array(z.string().min(1)).optional(),
    tips: z.array(z.string().min(1)).optional(),
    flow: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type SectionHeadersOverride = z.infer<typeof sectionHeadersSchema>;

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Auth (empty = open API, intended for local use)
  API_KEYS: z
    .string()
    .default('')
    .transform((val) => {
      const keys = val.split(',').map((k) => k.trim()).filter(Boolean);
      warnAboutShortKeys(keys, 'API');
      return keys;
    }),
  AUTH_SKIP_PATHS: z
    .string()
    .default('/health,/ready,/docs')
    .transform((val) => val.split(',').map((p) => p.trim()).filter(Boolean)),

  // CORS
  CORS_ALLOWED_DOMAINS: z
    .string()
    .default('localhost')
    .transform((val) => val.split(',').map((d) => d.trim()).filter(Boolean)),

  // Gemini
  GOOGLE_AI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().default('models/gemini-1.5-pro'),
  GEMINI_API_BASE: z.string().url().default('https://generativelanguage.googleapis.com'),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(8192),
  GEMINI_FILE_PROCESSING_TIMEOUT_MS: z.coerce.number().default(300000), // 5 minutes
  GEMINI_FILE_POLLING_INTERVAL_MS: z.coerce.number().default(2000),

  // SOP generation
  SOP_MAX_FRAMES: z.coerce.number().int().min(1).default(16),
  SOP_DEFAULT_FRAME_COUNT: z.coerce.number().int().min(1).default(8),
  SOP_FRAME_MAX_WIDTH: z.coerce.number().int().min(64).default(400),
  SOP_PROMPT_MAX_LENGTH: z.coerce.number().int().min(256).default(12000),
  SOP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(180000), // 3 minutes
  SOP_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  SOP_INPUT_DIR: z.string().default('.'),
  SOP_SECTION_HEADERS: z
    .string()
    .optional()
    .transform((val, ctx): SectionHeadersOverride | undefined => {
      if (!val) return undefined;
      let raw: unknown;
      try {
        raw = JSON.parse(val);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'SOP_SECTION_HEADERS must be valid JSON' });
        return z.NEVER;
      }
      const parsed = sectionHeadersSchema.safeParse(raw);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.issues[0]?.message ?? 'Invalid headers' });
        return z.NEVER;
      }
      return parsed.data;
    }),

  // Worker
  TEMP_DIR_NAME: z.string().default('sop-generator'),
  API_RETRY_DELAY_MS: z.coerce.number().default(2000),

  // Rate limiting on the generation endpoint
  GENERATE_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // FFmpeg
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
