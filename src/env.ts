import { config } from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
config();

/**
 * Schema for all environment variables consumed by the finder.
 * Every variable has a default, so an empty environment is valid.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // ---------- Transport ----------
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  /** Attempts per request, including the first one */
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(2),

  // ---------- Pipeline ----------
  /** Pause between two giveaway page fetches of the same batch */
  FETCH_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(5_000),
  /** Number of search result pages to scan per run */
  SEARCH_PAGES: z.coerce.number().int().positive().default(4),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates a raw environment record, throwing with every issue listed.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${formatted}`);
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module will eagerly parse process.env and throw
 * at startup if variables are malformed.
 */
export const env: Env = parseEnv(process.env);
