import 'dotenv/config';
import { z } from 'zod';

const flag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue)
    .transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  PORT: z.coerce.number().default(8001),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1).optional(),

  SEARCH_SERVICE_URL: z.string().url('SEARCH_SERVICE_URL must be a URL').default('http://localhost:8000'),
  SEARCH_SERVICE_API_KEY: z.string().optional(),
  SEARCH_MODE: z.enum(['chunks', 'summaries', 'both']).default('chunks'),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  GENERATIVE_API_KEY: z.string().optional(),
  GENERATIVE_BASE_URL: z.string().url().optional(),
  GENERATIVE_MODEL: z.string().min(1).default('gpt-4o-mini'),

  AGENT_MAX_CHUNKS: z.coerce.number().int().positive().default(20),
  AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  FILTER_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
  REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(10_000),

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
  BREAKER_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().positive().default(30_000),

  CACHE_ENABLED: flag('true'),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1_000),
  CACHE_TTL_SEARCH_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
  CACHE_TTL_FILTER_MS: z.coerce.number().int().min(0).default(6 * 60 * 60 * 1000),
  CACHE_TTL_RANK_MS: z.coerce.number().int().min(0).default(6 * 60 * 60 * 1000),
  CACHE_TTL_FORMAT_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
  CACHE_TTL_RESPONSE_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),

  DEFAULT_MIN_RELEVANCE: z.coerce.number().min(0).max(1).default(0.7),
  DEFAULT_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(10),

  API_KEY: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().default(60_000),
  CORS_ORIGINS: z.string().default('https://script.google.com,https://docs.google.com')
});

export type Env = z.infer<typeof envSchema>;

export function buildConfig(env: Env) {
  const corsOrigins = env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
  return { ...env, corsOrigins };
}

export type AppConfig = ReturnType<typeof buildConfig>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('❌ Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config: AppConfig = buildConfig(parsed.data);
