import { vi } from 'vitest';
import type { AuctionRecordSource, RawAuctionRecord, YieldProxySource } from '../src/core/types.js';

/**
 * Raw auction rows shaped like Fiscal Data responses (every value a string).
 * Values are made up for tests.
 */

export const NOTE_10Y: RawAuctionRecord = {
  cusip: 'TEST10Y01',
  security_type: 'Note',
  security_term: '10-Year',
  auction_date: '2025-05-07',
  issue_date: '2025-05-15',
  high_yield: '4.320',
  avg_med_yield: '4.310',
  high_discnt_rate: 'null',
  high_investment_rate: '',
  bid_to_cover_ratio: '2.58',
  offering_amt: '42000000000',
  total_tendered: '108360000000',
  total_accepted: '42000000000',
  comp_accepted: '38500000000',
  noncomp_accepted: '300000000',
  direct_bidder_accepted: '7700000000',
  indirect_bidder_accepted: '27720000000',
  primary_dealer_accepted: '3080000000',
  soma_accepted: '5200000000',
  soma_holdings: null,
  cash_management_bill_cmb: '',
};

export const BILL_4W: RawAuctionRecord = {
  cusip: 'TEST4W001',
  security_type: 'Bill',
  security_term: '4-Week',
  auction_date: '2025-05-06',
  issue_date: '2025-05-08',
  high_yield: null,
  avg_med_yield: null,
  high_discnt_rate: '4.250',
  high_investment_rate: '4.330',
  bid_to_cover_ratio: '3.10',
  offering_amt: '60000000000',
  comp_accepted: null,
  soma_accepted: 'null',
  cash_management_bill_cmb: 'No',
};

export const CMB_BILL: RawAuctionRecord = {
  ...BILL_4W,
  cusip: 'TESTCMB01',
  security_term: '6-Week',
  bid_to_cover_ratio: '2.90',
  cash_management_bill_cmb: ' yes ',
};

/** Announced but not yet held: no results fields */
export const UPCOMING_NOTE: RawAuctionRecord = {
  cusip: 'TESTFUT01',
  security_type: 'Note',
  security_term: '2-Year',
  auction_date: '2025-05-27',
  high_yield: '',
  avg_med_yield: null,
  high_discnt_rate: 'null',
  bid_to_cover_ratio: '',
  offering_amt: '69000000000',
};

/**
 * Graded coupon row with competitive awards of $100B, so bidder amounts
 * given in billions read directly as percentages.
 */
export function couponRow(opts: {
  cusip: string;
  term: string;
  date: string;
  highYield: string;
  avgMedYield: string;
  btc: string;
  dealerBn: number;
  indirectBn: number;
  type?: string;
}): RawAuctionRecord {
  const directBn = 100 - opts.dealerBn - opts.indirectBn;
  return {
    cusip: opts.cusip,
    security_type: opts.type ?? 'Note',
    security_term: opts.term,
    auction_date: opts.date,
    high_yield: opts.highYield,
    avg_med_yield: opts.avgMedYield,
    bid_to_cover_ratio: opts.btc,
    offering_amt: '100000000000',
    comp_accepted: '100000000000',
    primary_dealer_accepted: String(opts.dealerBn * 1e9),
    indirect_bidder_accepted: String(opts.indirectBn * 1e9),
    direct_bidder_accepted: String(directBn * 1e9),
  };
}

export function fakeAuctions(records: RawAuctionRecord[]) {
  return {
    fetchAuctions: vi.fn<AuctionRecordSource['fetchAuctions']>(async () => records),
  };
}

export function fakeYields(configured: boolean, value: number | null = null) {
  return {
    configured,
    fetchProxyYield: vi.fn<YieldProxySource['fetchProxyYield']>(async () => value),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
