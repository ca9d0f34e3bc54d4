/**
 * Errors raised by the Treasury and FRED clients. The auction engine turns
 * any of them into a warning on an otherwise empty result.
 */

export class UpstreamApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'UpstreamApiError';
  }
}

export class NotFoundError extends UpstreamApiError {
  constructor(label: string, url: string) {
    super(`${label} has no resource at ${url}`, 404, url);
    this.name = 'NotFoundError';
  }
}

/** Still throttled (429) after every retry */
export class RateLimitError extends UpstreamApiError {
  constructor(label: string, url: string, attempts: number) {
    super(`${label} kept answering 429 after ${attempts} attempts`, 429, url);
    this.name = 'RateLimitError';
  }
}

/** Upstream answered, but not with the JSON shape the client reads */
export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/** One-line description of any thrown value, for warnings and logs */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
