import type { NormalizedAuction, DemandMetrics, WiSource } from '../core/types.js';
import { roundTo, percentOf } from './calculations.js';

/**
 * Demand metrics for one auction.
 *
 * Tail = high (stop-out) yield minus a when-issued yield proxy, in bps.
 * Proxy priority: FRED constant-maturity yield, else the auction's own
 * median yield. A CMT yield more than 150 bps away from the stop-out is
 * dropped: that is a real (TIPS) yield being compared to a nominal series,
 * or some other unit mismatch.
 */

export const MAX_PROXY_DIVERGENCE = 1.5;

export function computeDemandMetrics(auction: NormalizedAuction, wiYield: number | null = null): DemandMetrics {
  const highYield = auction.high_yield;

  let proxy = wiYield;
  let source: WiSource = 'fred_cmt';

  if (proxy !== null && highYield !== null && Math.abs(highYield - proxy) > MAX_PROXY_DIVERGENCE) {
    proxy = null;
  }

  if (proxy === null) {
    proxy = auction.avg_med_yield;
    source = 'avg_med_yield';
  }

  let tailBps: number | null = null;
  if (highYield !== null && proxy !== null && proxy > 0) {
    tailBps = roundTo((highYield - proxy) * 100, 1);
  }

  const comp = auction.comp_accepted;

  return {
    tail_bps: tailBps,
    wi_source: tailBps !== null ? source : null,
    bid_to_cover: auction.bid_to_cover_ratio,
    dealer_pct: percentOf(auction.primary_dealer_accepted, comp),
    indirect_pct: percentOf(auction.indirect_bidder_accepted, comp),
    direct_pct: percentOf(auction.direct_bidder_accepted, comp),
  };
}
