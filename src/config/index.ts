import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8080),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),
  database: z.object({
    url: z.string().min(1),
    poolSize: z.number().int().positive().default(10),
  }),
  catalog: z.object({
    baseUrl: z.string().url().optional(),
    token: z.string().optional(),
    timeoutMs: z.number().int().positive().default(15000),
    maxRetries: z.number().int().min(0).max(10).default(3),
  }),
  sync: z.object({
    mirrorEnabled: z.boolean().default(true),
    fetchConcurrency: z.number().int().positive().default(4),
    mirrorBatchSize: z.number().int().positive().max(500).default(50),
  }),
  log: z.object({
    level: z.enum(logLevels).default('info'),
  }),
});

type Config = z.infer<typeof configSchema>;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined, fallback: number): number {
  return parseInt(value || String(fallback), 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = env.DATABASE_URL ||
    `postgresql://${env.DB_USER || 'ytmb'}:${env.DB_PASSWORD || 'password'}@${env.DB_HOST || 'localhost'}:${env.DB_PORT || '5432'}/${env.DB_NAME || 'ytmb'}`;

  const rawConfig = {
    server: {
      port: parseNumber(env.PORT, 8080),
      host: env.HOST || '0.0.0.0',
      nodeEnv: env.NODE_ENV || 'development',
    },
    database: {
      url: databaseUrl,
      poolSize: parseNumber(env.DB_POOL_SIZE, 10),
    },
    catalog: {
      baseUrl: env.CATALOG_BASE_URL || undefined,
      token: env.CATALOG_TOKEN || undefined,
      timeoutMs: parseNumber(env.CATALOG_TIMEOUT_MS, 15000),
      maxRetries: parseNumber(env.CATALOG_MAX_RETRIES, 3),
    },
    sync: {
      mirrorEnabled: parseBoolean(env.SYNC_MIRROR_ENABLED, true),
      fetchConcurrency: parseNumber(env.SYNC_FETCH_CONCURRENCY, 4),
      mirrorBatchSize: parseNumber(env.SYNC_MIRROR_BATCH_SIZE, 50),
    },
    log: {
      level: env.LOG_LEVEL || 'info',
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
export type { Config };
