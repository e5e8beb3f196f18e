/**
 * Runtime configuration, read from the environment.
 * Select the record store via STORE_DRIVER: memory (default) | postgres
 */

import { z } from 'zod';

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
    STORE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    EXECUTION_DELAY_MS: z.coerce.number().int().min(0).default(100),
    CORS_ORIGIN: z.string().default('*'),
    HTTP_LOG_FORMAT: z.string().default('combined'),
  })
  .refine((env) => env.STORE_DRIVER !== 'postgres' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    path: ['DATABASE_URL'],
  });

export type StoreConfig =
  | { driver: 'memory' }
  | { driver: 'postgres'; databaseUrl: string };

export interface RuntimeConfig {
  port: number;
  store: StoreConfig;
  executionDelayMs: number;
  corsOrigin: string;
  /** morgan format name or string; null disables access logging. */
  httpLogFormat: string | null;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    store:
      parsed.STORE_DRIVER === 'postgres' && parsed.DATABASE_URL
        ? { driver: 'postgres', databaseUrl: parsed.DATABASE_URL }
        : { driver: 'memory' },
    executionDelayMs: parsed.EXECUTION_DELAY_MS,
    corsOrigin: parsed.CORS_ORIGIN,
    httpLogFormat: parsed.HTTP_LOG_FORMAT === 'off' ? null : parsed.HTTP_LOG_FORMAT,
  };
}
