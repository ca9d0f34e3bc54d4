import type { NormalizedAuction, FormattedAuction, DemandMetrics } from '../core/types.js';
import { computeDemandMetrics } from './demand-metrics.js';
import { gradeAuction, GRADEABLE_TYPES } from './grading.js';
import { percentOf } from './calculations.js';

/**
 * Builds the public auction record.
 * Bills show discount/investment rates and are never graded; notes, bonds,
 * TIPS and FRNs show yields, tail and a grade; anything else shows yields only.
 */
export function formatAuction(auction: NormalizedAuction, wiYield: number | null = null): FormattedAuction {
  const metrics = computeDemandMetrics(auction, wiYield);
  const base = buildBase(auction, metrics);

  if (auction.security_type === 'Bill') {
    return {
      kind: 'bill',
      ...base,
      high_discnt_rate: auction.high_discnt_rate,
      high_investment_rate: auction.high_investment_rate,
      ...(auction.is_cmb ? { is_cmb: true as const } : {}),
    };
  }

  if (GRADEABLE_TYPES.has(auction.security_type)) {
    return {
      kind: 'graded',
      ...base,
      high_yield: auction.high_yield,
      avg_med_yield: auction.avg_med_yield,
      tail_bps: metrics.tail_bps,
      ...(metrics.wi_source !== null ? { wi_source: metrics.wi_source } : {}),
      grade: gradeAuction(metrics),
    };
  }

  return {
    kind: 'coupon',
    ...base,
    high_yield: auction.high_yield,
    avg_med_yield: auction.avg_med_yield,
  };
}

function buildBase(auction: NormalizedAuction, metrics: DemandMetrics) {
  const somaPct = percentOf(auction.soma_accepted, auction.offering_amt);

  return {
    cusip: auction.cusip,
    security_type: auction.security_type,
    security_term: auction.security_term,
    auction_date: auction.auction_date,
    issue_date: auction.issue_date,
    offering_amt: auction.offering_amt,
    bid_to_cover: metrics.bid_to_cover,
    dealer_pct: metrics.dealer_pct,
    indirect_pct: metrics.indirect_pct,
    direct_pct: metrics.direct_pct,
    // SOMA (Fed) participation
    ...(auction.soma_accepted !== null ? { soma_accepted: auction.soma_accepted } : {}),
    ...(somaPct !== null ? { soma_pct: somaPct } : {}),
  };
}
