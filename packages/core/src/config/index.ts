/**
 * Application configuration
 * Loaded from environment variables with sensible defaults
 */

import { z } from 'zod';

const PositiveIntSchema = z.coerce.number().int().positive();

/**
 * Positive integer from an environment value; malformed or missing values
 * fall back to the default
 */
export function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = PositiveIntSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

// Development mode (pretty logs through pino-pretty) is opt-in
const env = process.env.NODE_ENV || 'production';
const isDev = env === 'development';

export const config = {
  // Environment
  env,
  isDev,
  isProd: env === 'production',
  isTest: env === 'test',

  // Logging
  log: {
    level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
  },

  // Tool invocation
  tools: {
    timeoutMs: intFromEnv(process.env.TOOL_TIMEOUT_MS, 30000),
  },

  // $vectorSearch tuning
  vectorSearch: {
    numCandidates: intFromEnv(process.env.VECTOR_SEARCH_NUM_CANDIDATES, 10),
    limit: intFromEnv(process.env.VECTOR_SEARCH_LIMIT, 10),
  },

  // MongoDB client
  mongodb: {
    connectTimeoutMs: intFromEnv(process.env.MONGODB_CONNECT_TIMEOUT_MS, 5000),
    appName: process.env.MONGODB_APP_NAME || 'doc-query-tools',
  },
} as const;

export type Config = typeof config;
