import { z } from 'zod';
import type { JsonHttpClient } from './http-client.js';
import type { YieldProxySource } from './types.js';
import { parseNumeric } from '../processing/normalizer.js';
import { TTL_DAILY } from './treasury-client.js';

/**
 * FRED Constant Maturity Treasury yields (api.stlouisfed.org), used as the
 * when-issued yield proxy for auction tails. Requires FRED_API_KEY.
 *
 * Every failure resolves to null: the caller falls back to avg_med_yield.
 */

export const OBSERVATIONS_PATH = '/fred/series/observations';

/** Look back this many calendar days for the latest observation (weekends, holidays) */
export const LOOKBACK_DAYS = 7;

/** security_term keyword → FRED CMT series, matched by substring in this order */
export const CMT_SERIES: ReadonlyArray<readonly [string, string]> = [
  ['2-Year', 'DGS2'],
  ['3-Year', 'DGS3'],
  ['5-Year', 'DGS5'],
  ['7-Year', 'DGS7'],
  ['10-Year', 'DGS10'],
  ['20-Year', 'DGS20'],
  ['30-Year', 'DGS30'],
];

const ObservationsSchema = z.object({
  observations: z
    .array(z.object({ date: z.string().optional(), value: z.string().optional() }).passthrough())
    .default([]),
});

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function cmtSeriesFor(securityTerm: string): string | null {
  for (const [keyword, series] of CMT_SERIES) {
    if (securityTerm.includes(keyword)) return series;
  }
  return null;
}

export interface CmtYieldClientOptions {
  http: JsonHttpClient;
  apiKey?: string;
}

export class CmtYieldClient implements YieldProxySource {
  private readonly http: JsonHttpClient;
  private readonly apiKey?: string;

  constructor(options: CmtYieldClientOptions) {
    this.http = options.http;
    this.apiKey = options.apiKey;
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Most recent CMT yield on or before `date` (YYYY-MM-DD) for the series
   * matching `securityTerm`. Null when unconfigured, unmapped or unavailable.
   */
  async fetchProxyYield(securityTerm: string, date: string): Promise<number | null> {
    if (!this.apiKey) return null;

    const seriesId = cmtSeriesFor(securityTerm);
    if (!seriesId) return null;

    if (!ISO_DATE_RE.test(date)) return null;
    const endMs = Date.parse(`${date}T00:00:00Z`);
    if (Number.isNaN(endMs)) return null;
    const start = new Date(endMs - LOOKBACK_DAYS * 86_400_000).toISOString().slice(0, 10);

    const body = await this.http.getSafe(
      OBSERVATIONS_PATH,
      {
        series_id: seriesId,
        api_key: this.apiKey,
        file_type: 'json',
        observation_start: start,
        observation_end: date,
        sort_order: 'desc',
        limit: '5',
      },
      TTL_DAILY,
      null,
      // A window with no published value yet is retried on the next lookup
      data => latestObservation(data) !== null
    );

    return latestObservation(body);
  }
}

/** First usable value in a desc-sorted observations payload */
export function latestObservation(body: unknown): number | null {
  const parsed = ObservationsSchema.safeParse(body);
  if (!parsed.success) return null;

  // FRED marks missing observations with "."
  for (const obs of parsed.data.observations) {
    const raw = (obs.value ?? '').trim();
    if (!raw || raw === '.') continue;
    const value = parseNumeric(raw);
    if (value !== null) return value;
  }
  return null;
}
