/**
 * Typed pipeline settings parsed from the environment
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

// Empty strings count as unset so a blank line in .env falls back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const SettingsSchema = z.object({
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  LLM_MODEL: z.string().default('llama-3.3-70b-versatile'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  MAX_TOKENS: positiveInt(1024),

  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_BATCH_SIZE: positiveInt(100),

  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),

  MAX_BATCH_CHARS: positiveInt(30000),
  REQUESTS_PER_MINUTE: positiveInt(30),
  TOKENS_PER_MINUTE: positiveInt(12000),
  REQUESTS_PER_DAY: positiveInt(1000),
  TOKENS_PER_DAY: positiveInt(100000),
  RATE_LIMIT_COOLDOWN_MS: nonNegativeInt(60000),
  CALL_DELAY_MS: nonNegativeInt(22000),
  RATE_LIMIT_MAX_ATTEMPTS: positiveInt(4),
  MALFORMED_MAX_ATTEMPTS: positiveInt(3),
  REQUEST_TIMEOUT_MS: positiveInt(120000),

  CHUNK_SIZE: positiveInt(800),
  CHUNK_OVERLAP: nonNegativeInt(150),
  FETCH_TIMEOUT_MS: positiveInt(15000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface DigestSettings {
  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  embedding: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    batchSize: number;
  };
  similarityThreshold: number;
  maxBatchChars: number;
  limits: {
    requestsPerMinute: number;
    tokensPerMinute: number;
    requestsPerDay: number;
    tokensPerDay: number;
  };
  retry: {
    cooldownMs: number;
    callDelayMs: number;
    rateLimitMaxAttempts: number;
    transientMaxAttempts: number;
    callTimeoutMs: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  fetchTimeoutMs: number;
  logLevel: string;
}

/**
 * Parse settings from an environment map (defaults to process.env)
 *
 * @throws Error listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): DigestSettings {
  const input = Object.fromEntries(
    Object.keys(SettingsSchema.shape).map((key) => [key, blankToUndefined(env[key])])
  );
  const parsed = SettingsSchema.safeParse(input);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const s = parsed.data;
  if (s.CHUNK_OVERLAP >= s.CHUNK_SIZE) {
    throw new Error(`Invalid configuration:\n  - CHUNK_OVERLAP (${s.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${s.CHUNK_SIZE})`);
  }

  return {
    llm: {
      apiKey: s.LLM_API_KEY?.trim(),
      baseUrl: s.LLM_BASE_URL,
      model: s.LLM_MODEL,
      temperature: s.LLM_TEMPERATURE,
      maxTokens: s.MAX_TOKENS,
    },
    embedding: {
      apiKey: s.EMBEDDING_API_KEY?.trim(),
      baseUrl: s.EMBEDDING_BASE_URL,
      model: s.EMBEDDING_MODEL,
      batchSize: s.EMBEDDING_BATCH_SIZE,
    },
    similarityThreshold: s.SIMILARITY_THRESHOLD,
    maxBatchChars: s.MAX_BATCH_CHARS,
    limits: {
      requestsPerMinute: s.REQUESTS_PER_MINUTE,
      tokensPerMinute: s.TOKENS_PER_MINUTE,
      requestsPerDay: s.REQUESTS_PER_DAY,
      tokensPerDay: s.TOKENS_PER_DAY,
    },
    retry: {
      cooldownMs: s.RATE_LIMIT_COOLDOWN_MS,
      callDelayMs: s.CALL_DELAY_MS,
      rateLimitMaxAttempts: s.RATE_LIMIT_MAX_ATTEMPTS,
      transientMaxAttempts: s.MALFORMED_MAX_ATTEMPTS,
      callTimeoutMs: s.REQUEST_TIMEOUT_MS,
    },
    chunking: {
      chunkSize: s.CHUNK_SIZE,
      chunkOverlap: s.CHUNK_OVERLAP,
    },
    fetchTimeoutMs: s.FETCH_TIMEOUT_MS,
    logLevel: s.LOG_LEVEL,
  };
}
