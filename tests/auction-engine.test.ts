import { describe, it, expect, vi } from 'vitest';
import {
  executeAuctionListCore,
  executeAuctionAnalysisCore,
  resolveWiYields,
  clampInt,
  WARN_NO_FRED_KEY,
  WARN_ONLY_BILLS,
  WARN_NO_GRADED_IN_PERIOD,
} from '../src/core/auction-engine.js';
import { UpstreamApiError } from '../src/core/errors.js';
import { normalizeAuctionRecord } from '../src/processing/normalizer.js';
import type { AuctionSources, RawAuctionRecord } from '../src/core/types.js';
import {
  NOTE_10Y,
  BILL_4W,
  CMB_BILL,
  UPCOMING_NOTE,
  couponRow,
  fakeAuctions,
  fakeYields,
} from './fixtures.js';

function sources(records: RawAuctionRecord[], configured = false, proxy: number | null = null) {
  return { auctions: fakeAuctions(records), yields: fakeYields(configured, proxy) };
}

function failingSources(): AuctionSources {
  return {
    auctions: {
      fetchAuctions: vi.fn(async () => {
        throw new UpstreamApiError('Treasury API server error: 503', 503, 'https://example.test');
      }),
    },
    yields: fakeYields(false),
  };
}

describe('clampInt', () => {
  it('clamps and truncates', () => {
    expect(clampInt(0, 1, 365, 30)).toBe(1);
    expect(clampInt(1000, 1, 365, 30)).toBe(365);
    expect(clampInt(10.7, 1, 365, 30)).toBe(10);
    expect(clampInt(-5, 1, 100, 20)).toBe(1);
  });

  it('uses the default for missing or non-finite input', () => {
    expect(clampInt(undefined, 1, 365, 30)).toBe(30);
    expect(clampInt(NaN, 1, 365, 30)).toBe(30);
  });
});

describe('resolveWiYields', () => {
  const a = normalizeAuctionRecord(NOTE_10Y);
  const reopening = normalizeAuctionRecord({ ...NOTE_10Y, cusip: 'TEST10Y02' });
  const b = normalizeAuctionRecord(BILL_4W);

  it('skips lookups entirely without a configured source', async () => {
    const yields = fakeYields(false, 4.33);
    expect(await resolveWiYields(yields, [a, b])).toEqual([null, null]);
    expect(yields.fetchProxyYield).not.toHaveBeenCalled();
  });

  it('fetches once per distinct term and date, gradeable types only', async () => {
    const yields = fakeYields(true, 4.33);
    expect(await resolveWiYields(yields, [a, b, reopening])).toEqual([4.33, null, 4.33]);
    expect(yields.fetchProxyYield).toHaveBeenCalledTimes(1);
    expect(yields.fetchProxyYield).toHaveBeenCalledWith('10-Year', '2025-05-07');
  });

  it('treats a rejected lookup as no proxy', async () => {
    const yields = {
      configured: true,
      fetchProxyYield: vi.fn(async (): Promise<number | null> => {
        throw new Error('timeout');
      }),
    };
    expect(await resolveWiYields(yields, [a])).toEqual([null]);
  });
});

describe('executeAuctionListCore', () => {
  it('formats settled auctions and summarizes grades', async () => {
    const src = sources([NOTE_10Y, BILL_4W, UPCOMING_NOTE]);
    const result = await executeAuctionListCore(src);

    expect(result.count).toBe(2);
    expect(result.period).toBe('last 30 days');
    expect(result.auctions.map(a => a.cusip)).toEqual(['TEST10Y01', 'TEST4W001']);
    expect(result.graded_summary).toEqual({ count: 1, grade_distribution: { B: 1 } });
    expect(result.bill_count).toBe(1);
    expect(result.wi_source).toBe('avg_med_yield');
    expect(result._warnings).toEqual([WARN_NO_FRED_KEY]);
  });

  it('passes clamped window and filters to the source', async () => {
    const src = sources([]);
    await executeAuctionListCore(src, { securityType: 'Note', securityTerm: '10-Year', daysBack: 1000 });
    expect(src.auctions.fetchAuctions).toHaveBeenCalledWith({
      daysBack: 365,
      securityType: 'Note',
      securityTerm: '10-Year',
    });
  });

  it('caps results at the limit', async () => {
    const records = Array.from({ length: 5 }, (_, i) => ({ ...BILL_4W, cusip: `TESTBILL${i}` }));
    const result = await executeAuctionListCore(sources(records), { limit: 2 });
    expect(result.count).toBe(2);
    expect(result.auctions.map(a => a.cusip)).toEqual(['TESTBILL0', 'TESTBILL1']);
  });

  it('applies the limit after dropping unsettled auctions', async () => {
    const result = await executeAuctionListCore(sources([UPCOMING_NOTE, BILL_4W]), { limit: 1 });
    expect(result.auctions.map(a => a.cusip)).toEqual(['TEST4W001']);
  });

  it('warns when only bills come back', async () => {
    const result = await executeAuctionListCore(sources([BILL_4W, CMB_BILL]));
    expect(result.graded_summary).toBeUndefined();
    expect(result.wi_source).toBeUndefined();
    expect(result.bill_count).toBe(2);
    expect(result._warnings).toEqual([WARN_ONLY_BILLS]);
  });

  it('uses the CMT proxy when configured', async () => {
    const src = sources([NOTE_10Y], true, 4.33);
    const result = await executeAuctionListCore(src);

    expect(result.wi_source).toBe('fred_cmt');
    expect(result._warnings).toBeUndefined();
    const [a] = result.auctions;
    expect(a.kind === 'graded' && a.tail_bps).toBe(-1);
  });

  it('returns an empty result with a warning when the source fails', async () => {
    const result = await executeAuctionListCore(failingSources());
    expect(result).toEqual({
      count: 0,
      period: 'last 30 days',
      auctions: [],
      _warnings: ['Treasury auction data unavailable: Treasury API server error: 503'],
    });
  });

  it('has no warnings and no summaries for an empty period', async () => {
    const result = await executeAuctionListCore(sources([]));
    expect(result).toEqual({ count: 0, period: 'last 30 days', auctions: [] });
  });
});

describe('executeAuctionAnalysisCore', () => {
  const strong = (cusip: string, date: string) => couponRow({
    cusip, term: '10-Year', date,
    highYield: '4.25', avgMedYield: '4.25', btc: '2.8', dealerBn: 10, indirectBn: 70,
  });
  const records: RawAuctionRecord[] = [
    strong('T10-1', '2025-05-07'),
    couponRow({
      cusip: 'T2-1', term: '2-Year', date: '2025-04-28',
      highYield: '3.80', avgMedYield: '3.80', btc: '2.6', dealerBn: 15, indirectBn: 70,
    }),
    BILL_4W,
    strong('T10-2', '2025-04-08'),
    CMB_BILL,
    strong('T10-3', '2025-03-11'),
    couponRow({
      cusip: 'T10-4', term: '10-Year', date: '2025-02-11',
      highYield: '4.50', avgMedYield: '4.25', btc: '2.2', dealerBn: 25, indirectBn: 58,
    }),
    UPCOMING_NOTE,
  ];

  it('summarizes demand across maturities', async () => {
    const src = sources(records);
    const result = await executeAuctionAnalysisCore(src);

    expect(src.auctions.fetchAuctions).toHaveBeenCalledWith({ daysBack: 90, securityTerm: undefined });
    expect(result.period).toBe('last 90 days');
    expect(result.total_auctions).toBe(7);
    expect(result.demand_signal).toBe('healthy');
    expect(result.notes_bonds?.count).toBe(5);
    expect(result.notes_bonds?.avg_gpa).toBe(2.69);
    expect(result.notes_bonds?.grade_distribution).toEqual({ B: 4, D: 1 });
    expect(result.bills).toEqual({ count: 2, avg_bid_to_cover: 3, cmb_count: 1 });
    expect(result._warnings).toEqual([WARN_NO_FRED_KEY]);
  });

  it('breaks down each maturity with trends', async () => {
    const result = await executeAuctionAnalysisCore(sources(records));
    const byMaturity = result.notes_bonds?.by_maturity ?? [];

    expect(byMaturity.map(m => [m.term, m.auction_count, m.avg_gpa, m.latest_grade, m.latest_date])).toEqual([
      ['10-Year', 4, 2.69, 'B', '2025-05-07'],
      ['2-Year', 1, 2.7, 'B', '2025-04-28'],
    ]);
    expect(byMaturity[0].trends.overall).toBe('improving');
    expect(byMaturity[1].trends).toEqual({ overall: 'insufficient_data' });
  });

  it('lists at most ten recent graded auctions, newest first', async () => {
    const many = Array.from({ length: 12 }, (_, i) => ({ ...NOTE_10Y, cusip: `TESTN${String(i).padStart(2, '0')}` }));
    const result = await executeAuctionAnalysisCore(sources(many));
    expect(result.recent_graded?.length).toBe(10);
    expect(result.recent_graded?.[0].cusip).toBe('TESTN00');
  });

  it('is neutral with a warning when nothing is gradeable', async () => {
    const result = await executeAuctionAnalysisCore(sources([BILL_4W]), { daysBack: 30 });
    expect(result).toEqual({
      period: 'last 30 days',
      total_auctions: 1,
      demand_signal: 'neutral',
      bills: { count: 1, avg_bid_to_cover: 3.1, cmb_count: 0 },
      _warnings: [WARN_NO_GRADED_IN_PERIOD],
    });
  });

  it('omits the FRED warning when the proxy source is configured', async () => {
    const result = await executeAuctionAnalysisCore(sources([NOTE_10Y], true, 4.33));
    expect(result._warnings).toBeUndefined();
    expect(result.recent_graded?.[0].wi_source).toBe('fred_cmt');
  });

  it('returns an empty analysis with warnings when the source fails', async () => {
    const result = await executeAuctionAnalysisCore(failingSources(), { securityTerm: '10-Year' });
    expect(result).toEqual({
      period: 'last 90 days',
      total_auctions: 0,
      demand_signal: 'neutral',
      _warnings: [
        'Treasury auction data unavailable: Treasury API server error: 503',
        WARN_NO_GRADED_IN_PERIOD,
      ],
    });
  });
});
