import type { RawAuctionRecord, NormalizedAuction } from '../core/types.js';

/**
 * Parsing boundary between upstream auction rows and the grading pipeline.
 * Fiscal Data sends every numeric field as a string, "null", "" or null;
 * nothing past this module ever sees those raw strings.
 */

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse an upstream value to a number.
 * Returns null for null, "", "null" (any case) and anything non-numeric.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const s = value.trim();
  if (!s || s.toLowerCase() === 'null' || !DECIMAL_RE.test(s)) return null;

  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function parseText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const s = value.trim();
  return s && s.toLowerCase() !== 'null' ? s : null;
}

export function normalizeAuctionRecord(raw: RawAuctionRecord): NormalizedAuction {
  return {
    cusip: parseText(raw.cusip),
    security_type: parseText(raw.security_type) ?? '',
    security_term: parseText(raw.security_term),
    auction_date: parseText(raw.auction_date),
    issue_date: parseText(raw.issue_date),
    high_yield: parseNumeric(raw.high_yield),
    avg_med_yield: parseNumeric(raw.avg_med_yield),
    high_discnt_rate: parseNumeric(raw.high_discnt_rate),
    high_investment_rate: parseNumeric(raw.high_investment_rate),
    bid_to_cover_ratio: parseNumeric(raw.bid_to_cover_ratio),
    offering_amt: parseNumeric(raw.offering_amt),
    total_tendered: parseNumeric(raw.total_tendered),
    total_accepted: parseNumeric(raw.total_accepted),
    comp_accepted: parseNumeric(raw.comp_accepted),
    noncomp_accepted: parseNumeric(raw.noncomp_accepted),
    direct_bidder_accepted: parseNumeric(raw.direct_bidder_accepted),
    indirect_bidder_accepted: parseNumeric(raw.indirect_bidder_accepted),
    primary_dealer_accepted: parseNumeric(raw.primary_dealer_accepted),
    soma_accepted: parseNumeric(raw.soma_accepted),
    is_cmb: (raw.cash_management_bill_cmb ?? '').trim().toLowerCase() === 'yes',
  };
}

/** Settled auctions have results; upcoming ones carry only the announcement fields. */
export function isSettled(auction: NormalizedAuction): boolean {
  return auction.bid_to_cover_ratio !== null
    || auction.high_yield !== null
    || auction.high_discnt_rate !== null;
}
