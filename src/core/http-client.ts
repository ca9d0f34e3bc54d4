import { ResponseCache, type QueryParams } from './cache.js';
import type { RateLimiter } from './rate-limiter.js';
import { UpstreamApiError, NotFoundError, RateLimitError, DataParseError, describeError } from './errors.js';

/**
 * JSON-over-HTTP client shared by the Treasury and FRED clients.
 *
 * - Response cache keyed by (path, sorted params), owned by the caller
 * - Optional rate limiter acquired before every network attempt
 * - Per-request timeout via AbortSignal
 * - Exponential backoff for network errors, 429 and 5xx; 4xx fail fast
 */

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface JsonHttpClientOptions {
  baseUrl: string;
  cache: ResponseCache;
  rateLimiter?: RateLimiter;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  maxRetries?: number;
  /** First backoff delay; doubles per attempt */
  retryBaseMs?: number;
  userAgent?: string;
  /** Name used in error messages and logs (e.g. "Treasury API") */
  label?: string;
}

export class JsonHttpClient {
  private readonly baseUrl: string;
  private readonly cache: ResponseCache;
  private readonly rateLimiter?: RateLimiter;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly userAgent?: string;
  private readonly label: string;

  constructor(options: JsonHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.cache = options.cache;
    this.rateLimiter = options.rateLimiter;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.userAgent = options.userAgent;
    this.label = options.label ?? 'API';
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const search = new URLSearchParams(params).toString();
    return `${this.baseUrl}${path}${search ? `?${search}` : ''}`;
  }

  /**
   * GET a JSON document. Cached for `cacheTtlSeconds` (0 disables caching),
   * and only when `shouldCache` accepts the parsed body.
   * Throws UpstreamApiError / DataParseError on failure.
   */
  async getJson(
    path: string,
    params: QueryParams = {},
    cacheTtlSeconds: number = 300,
    shouldCache?: (data: unknown) => boolean
  ): Promise<unknown> {
    const key = ResponseCache.keyFor(path, params);
    if (cacheTtlSeconds > 0) {
      const cached = this.cache.get(key);
      if (cached !== undefined) return cached;
    }

    const url = this.buildUrl(path, params);
    const body = await this.fetchWithRetry(url);

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new DataParseError(
        `${this.label} returned invalid JSON for ${path}: ${body.slice(0, 120)}`,
        url
      );
    }

    if (!shouldCache || shouldCache(data)) this.cache.set(key, data, cacheTtlSeconds);
    return data;
  }

  /** Like getJson() but resolves to `fallback` instead of throwing */
  async getSafe(
    path: string,
    params: QueryParams,
    cacheTtlSeconds: number,
    fallback: unknown = null,
    shouldCache?: (data: unknown) => boolean
  ): Promise<unknown> {
    try {
      return await this.getJson(path, params, cacheTtlSeconds, shouldCache);
    } catch (err) {
      console.error(`${this.label} request failed for ${path}: ${describeError(err)}`);
      return fallback;
    }
  }

  private async fetchWithRetry(url: string): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) await sleep(this.backoffMs(attempt - 1));
      await this.rateLimiter?.acquire();

      const headers: Record<string, string> = { 'Accept': 'application/json' };
      if (this.userAgent) headers['User-Agent'] = this.userAgent;

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          headers,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        // Network error or timeout: retry with backoff
        lastError = new UpstreamApiError(
          `Network error fetching ${redact(url)}: ${describeError(err)}`,
          0,
          redact(url)
        );
        continue;
      }

      if (response.ok) {
        try {
          return await response.text();
        } catch (err) {
          // Body read aborted or timed out: retry like a network error
          lastError = new UpstreamApiError(
            `Error reading response from ${redact(url)}: ${describeError(err)}`,
            0,
            redact(url)
          );
          continue;
        }
      }

      if (response.status === 404) {
        throw new NotFoundError(this.label, redact(url));
      }

      if (response.status === 429) {
        lastError = new RateLimitError(this.label, redact(url), attempt + 1);
        continue;
      }

      if (response.status >= 500) {
        lastError = new UpstreamApiError(
          `${this.label} server error: ${response.status}`,
          response.status,
          redact(url)
        );
        continue;
      }

      throw new UpstreamApiError(
        `${this.label} error: ${response.status} ${response.statusText}`,
        response.status,
        redact(url)
      );
    }

    throw lastError ?? new UpstreamApiError(`Failed after ${this.maxRetries} attempts`, 0, redact(url));
  }

  /** Exponential backoff with jitter: base, 2x base, 4x base */
  private backoffMs(attempt: number): number {
    if (this.retryBaseMs <= 0) return 0;
    const base = this.retryBaseMs * Math.pow(2, attempt);
    const jitter = Math.random() * (this.retryBaseMs / 2);
    return base + jitter;
  }
}

/** Strip credentials from a URL before it lands in an error message */
export function redact(url: string): string {
  return url.replace(/([?&]api_key=)[^&]*/i, '$1***');
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
