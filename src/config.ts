import path from 'path';
import { z } from 'zod';
import { StoreError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

// Default location of the cache, next to the working directory
export const DATA_DIR = path.join(process.cwd(), '.calcstore');
export const DEFAULT_DB_PATH = path.join(DATA_DIR, 'calcstore.db');

export interface Config {
  dbPath: string;
  logLevel: LogLevel;
  busyTimeoutMs: number;
}

const envSchema = z.object({
  CALCSTORE_DB: z.string().min(1).default(DEFAULT_DB_PATH),
  CALCSTORE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  CALCSTORE_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
});

/** Values given on the command line or in code; they win over the environment. */
export interface ConfigOverrides {
  dbPath?: string;
  logLevel?: string;
  busyTimeoutMs?: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): Config {
  const parsed = envSchema.safeParse({
    ...env,
    CALCSTORE_DB: overrides.dbPath ?? env.CALCSTORE_DB,
    CALCSTORE_LOG_LEVEL: overrides.logLevel ?? env.CALCSTORE_LOG_LEVEL,
    CALCSTORE_BUSY_TIMEOUT_MS: overrides.busyTimeoutMs?.toString() ?? env.CALCSTORE_BUSY_TIMEOUT_MS,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : 'environment';
    throw new StoreError('INVALID_CONFIG', `Invalid ${key}: ${issue?.message ?? 'unknown error'}`);
  }

  return {
    dbPath: parsed.data.CALCSTORE_DB,
    logLevel: parsed.data.CALCSTORE_LOG_LEVEL,
    busyTimeoutMs: parsed.data.CALCSTORE_BUSY_TIMEOUT_MS,
  };
}
