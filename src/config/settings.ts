import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { RetryPolicy } from '../utils/retry';

const SettingsSchema = z.object({
  RECEIPTS_DB_PATH: z.string().min(1).default('data/receipts.db'),
  RAW_RECEIPTS_DIR: z.string().min(1).default('data/raw_nfce'),
  MODELS_CONFIG_PATH: z.string().min(1).default('config/models.json'),
  MODELS_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CLASSIFY_CONCURRENCY: z.coerce.number().int().positive().default(1),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_API_KEY_ENV: z.string().min(1).default('OPENAI_API_KEY'),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Settings {
  databasePath: string;
  rawReceiptsDir: string;
  modelsConfigPath: string;
  modelsLoadTimeoutMs: number;
  concurrency: number;
  retry: RetryPolicy;
  embedding: {
    model: string;
    apiKeyEnv: string;
    baseUrl?: string | undefined;
    timeoutMs: number;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

let dotenvLoaded = false;

function ensureDotenv(): void {
  if (dotenvLoaded) return;
  loadDotenv({ path: path.join(process.cwd(), '.env'), override: false });
  dotenvLoaded = true;
}

/**
 * Reads settings from the process environment (after `.env`).
 * Throws a ZodError listing every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  if (env === process.env) ensureDotenv();
  const parsed = SettingsSchema.parse(env);

  return {
    databasePath: parsed.RECEIPTS_DB_PATH,
    rawReceiptsDir: parsed.RAW_RECEIPTS_DIR,
    modelsConfigPath: parsed.MODELS_CONFIG_PATH,
    modelsLoadTimeoutMs: parsed.MODELS_LOAD_TIMEOUT_MS,
    concurrency: parsed.CLASSIFY_CONCURRENCY,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: 8000,
    },
    embedding: {
      model: parsed.EMBEDDING_MODEL,
      apiKeyEnv: parsed.EMBEDDING_API_KEY_ENV,
      ...(parsed.EMBEDDING_BASE_URL !== undefined ? { baseUrl: parsed.EMBEDDING_BASE_URL } : {}),
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
