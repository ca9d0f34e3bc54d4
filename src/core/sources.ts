import { ResponseCache } from './cache.js';
import { RateLimiter } from './rate-limiter.js';
import { JsonHttpClient, type FetchFn } from './http-client.js';
import { TreasuryClient } from './treasury-client.js';
import { CmtYieldClient } from './fred-client.js';
import type { AppConfig } from './config.js';
import type { AuctionSources } from './types.js';

/**
 * Wires the Treasury and FRED clients for one process.
 * Both share a single response cache owned by the returned object.
 */

export interface LiveSources extends AuctionSources {
  cache: ResponseCache;
}

export function createSources(config: AppConfig, fetchFn?: FetchFn): LiveSources {
  const cache = new ResponseCache({ maxEntries: config.cacheMaxEntries });

  const treasuryHttp = new JsonHttpClient({
    baseUrl: config.treasuryApiBase,
    cache,
    rateLimiter: new RateLimiter(config.treasuryRateLimit),
    fetchFn,
    timeoutMs: config.treasuryTimeoutMs,
    userAgent: config.userAgent,
    label: 'Treasury API',
  });

  // FRED is best-effort: one attempt, then fall back to avg_med_yield
  const fredHttp = new JsonHttpClient({
    baseUrl: config.fredApiBase,
    cache,
    fetchFn,
    timeoutMs: config.fredTimeoutMs,
    maxRetries: 1,
    userAgent: config.userAgent,
    label: 'FRED API',
  });

  return {
    cache,
    auctions: new TreasuryClient({ http: treasuryHttp }),
    yields: new CmtYieldClient({ http: fredHttp, apiKey: config.fredApiKey }),
  };
}
