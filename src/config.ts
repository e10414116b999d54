import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';
import { parseIsoDate } from './utils/dates.js';
import { ConfigurationError } from './utils/errors.js';

// Load environment variables from .env.local first, then .env
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  guru: z.object({
    apiKey: z.string().min(1, 'GURU_API_KEY is required'),
    baseUrl: z.string().url().default('https://digitalmanager.guru/api/v2'),
    maxConcurrency: z.coerce.number().int().min(1).default(4),
    qps: z.coerce.number().positive().default(3),
    pageRetries: z.coerce.number().int().min(0).default(2),
    fetchAttempts: z.coerce.number().int().min(1).default(3),
    timeoutMs: z.coerce.number().int().positive().default(15000),
    backoffBaseMs: z.coerce.number().int().min(0).default(1000),
    collectionFloor: z
      .string()
      .default('2024-10-01')
      .refine((value) => parseIsoDate(value) !== null, 'GURU_COLLECTION_FLOOR must be YYYY-MM-DD'),
  }),
  data: z.object({
    catalogPath: z.string().min(1).default('data/catalog.json'),
    rulesPath: z.string().min(1).default('data/rules.json'),
  }),
  planilhas: z.object({
    dir: z.string().min(1).default('var/planilhas'),
    timeZone: z.string().min(1).default('America/Sao_Paulo'),
  }),
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
  }),
});

/**
 * Typed configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from an environment map
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    guru: {
      apiKey: env.GURU_API_KEY ?? '',
      baseUrl: env.GURU_BASE_URL || undefined,
      maxConcurrency: env.GURU_MAX_CONCURRENCY || undefined,
      qps: env.GURU_QPS || undefined,
      pageRetries: env.GURU_PAGE_RETRIES || undefined,
      fetchAttempts: env.GURU_FETCH_ATTEMPTS || undefined,
      timeoutMs: env.GURU_TIMEOUT_MS || undefined,
      backoffBaseMs: env.GURU_BACKOFF_BASE_MS || undefined,
      collectionFloor: env.GURU_COLLECTION_FLOOR || undefined,
    },
    data: {
      catalogPath: env.CATALOG_PATH || undefined,
      rulesPath: env.RULES_PATH || undefined,
    },
    planilhas: {
      dir: env.PLANILHAS_DIR || undefined,
      timeZone: env.PLANILHAS_TIMEZONE || undefined,
    },
    api: {
      port: env.API_PORT || undefined,
      host: env.API_HOST || undefined,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}
