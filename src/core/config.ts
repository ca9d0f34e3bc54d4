import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Runtime configuration, read from environment variables.
 * FRED_API_KEY is optional: without it the tail falls back to avg_med_yield.
 */

export const APP_NAME = 'auction-demand';
export const APP_VERSION = '0.1.0';

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

const ConfigSchema = z.object({
  FRED_API_KEY: optionalKey,
  TREASURY_API_BASE: z.string().url().default('https://api.fiscaldata.treasury.gov'),
  FRED_API_BASE: z.string().url().default('https://api.stlouisfed.org'),
  TREASURY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FRED_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TREASURY_RATE_LIMIT: z.coerce.number().positive().default(5),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  AUCTION_USER_AGENT: z.string().min(1).default(`${APP_NAME}/${APP_VERSION}`),
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
});

export interface AppConfig {
  fredApiKey?: string;
  treasuryApiBase: string;
  fredApiBase: string;
  treasuryTimeoutMs: number;
  fredTimeoutMs: number;
  treasuryRateLimit: number;
  cacheMaxEntries: number;
  userAgent: string;
  port: number;
}

/** Parse and validate configuration. Throws ConfigError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so "FOO=" falls back to the default
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const c = parsed.data;
  return {
    fredApiKey: c.FRED_API_KEY,
    treasuryApiBase: c.TREASURY_API_BASE,
    fredApiBase: c.FRED_API_BASE,
    treasuryTimeoutMs: c.TREASURY_TIMEOUT_MS,
    fredTimeoutMs: c.FRED_TIMEOUT_MS,
    treasuryRateLimit: c.TREASURY_RATE_LIMIT,
    cacheMaxEntries: c.CACHE_MAX_ENTRIES,
    userAgent: c.AUCTION_USER_AGENT,
    port: c.PORT,
  };
}
