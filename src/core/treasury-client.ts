import { z } from 'zod';
import type { JsonHttpClient } from './http-client.js';
import { DataParseError } from './errors.js';
import {
  RAW_AUCTION_FIELDS,
  type AuctionQuery,
  type AuctionRecordSource,
  type RawAuctionRecord,
} from './types.js';

/**
 * US Treasury Fiscal Data API client (api.fiscaldata.treasury.gov).
 *
 * Free, no API key. Auction results come back newest first; values are
 * strings or null. Pagination is capped at MAX_PAGES regardless of
 * what the response metadata claims.
 */

export const AUCTIONS_PATH = '/services/api/fiscal_service/v1/accounting/od/auctions_query';
export const MAX_PAGES = 10;
export const DEFAULT_PAGE_SIZE = 100;

/** Cache TTLs in seconds */
export const TTL_HOURLY = 3600;
export const TTL_DAILY = 86_400;

// Numbers are kept as their string form; any other JSON type degrades to null
const text = z
  .union([z.string(), z.number().transform(String)])
  .nullable()
  .optional()
  .catch(null);

const RawAuctionRecordSchema = z.object({
  cusip: text,
  security_type: text,
  security_term: text,
  auction_date: text,
  issue_date: text,
  high_yield: text,
  avg_med_yield: text,
  high_discnt_rate: text,
  high_investment_rate: text,
  bid_to_cover_ratio: text,
  offering_amt: text,
  total_tendered: text,
  total_accepted: text,
  comp_accepted: text,
  noncomp_accepted: text,
  direct_bidder_accepted: text,
  indirect_bidder_accepted: text,
  primary_dealer_accepted: text,
  soma_accepted: text,
  soma_holdings: text,
  cash_management_bill_cmb: text,
});

const AuctionsPageSchema = z.object({
  data: z.array(RawAuctionRecordSchema).default([]),
  meta: z
    .object({ 'total-pages': z.coerce.number().int().nonnegative().optional() })
    .passthrough()
    .optional(),
});

export interface TreasuryClientOptions {
  http: JsonHttpClient;
  pageSize?: number;
  clock?: () => number;
}

export class TreasuryClient implements AuctionRecordSource {
  private readonly http: JsonHttpClient;
  private readonly pageSize: number;
  private readonly clock: () => number;

  constructor(options: TreasuryClientOptions) {
    this.http = options.http;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Fetch auction results since `daysBack` days ago, optionally filtered by
   * security type and term. Throws on upstream failure.
   */
  async fetchAuctions(query: AuctionQuery): Promise<RawAuctionRecord[]> {
    const since = isoDateDaysAgo(this.clock(), query.daysBack);

    const filters = [`auction_date:gte:${since}`];
    if (query.securityType) filters.push(`security_type:eq:${query.securityType}`);
    if (query.securityTerm) filters.push(`security_term:eq:${query.securityTerm}`);

    const records: RawAuctionRecord[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const body = await this.http.getJson(
        AUCTIONS_PATH,
        {
          fields: RAW_AUCTION_FIELDS.join(','),
          filter: filters.join(','),
          sort: '-auction_date',
          'page[size]': String(this.pageSize),
          'page[number]': String(page),
          format: 'json',
        },
        TTL_HOURLY
      );

      const parsed = AuctionsPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new DataParseError(
          `Unexpected auctions response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
          AUCTIONS_PATH
        );
      }

      records.push(...parsed.data.data);

      const totalPages = parsed.data.meta?.['total-pages'] ?? 1;
      if (page >= totalPages) break;
    }

    return records;
  }
}

/** UTC calendar date `days` days before `nowMs`, as YYYY-MM-DD */
export function isoDateDaysAgo(nowMs: number, days: number): string {
  return new Date(nowMs - days * 86_400_000).toISOString().slice(0, 10);
}
