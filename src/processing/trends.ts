import type { GradedAuction, TrendLabel, TrendReport, OverallTrend } from '../core/types.js';
import { mean } from './calculations.js';

export const DEFAULT_RECENT_WINDOW = 3;

/**
 * Compare the recent average against the prior average.
 * Moves smaller than 5% of the prior average (0.1 when it is zero) are stable.
 */
export function trendDirection(recent: number[], prior: number[], lowerIsBetter: boolean): TrendLabel {
  const recentAvg = mean(recent);
  const priorAvg = mean(prior);
  if (recentAvg === null || priorAvg === null) return 'insufficient_data';

  const threshold = priorAvg !== 0 ? 0.05 * Math.abs(priorAvg) : 0.1;
  const diff = recentAvg - priorAvg;
  if (Math.abs(diff) < threshold) return 'stable';

  if (lowerIsBetter) return diff < 0 ? 'improving' : 'deteriorating';
  return diff > 0 ? 'improving' : 'deteriorating';
}

type TrendMetric = 'tail_bps' | 'bid_to_cover' | 'dealer_pct' | 'indirect_pct';

function values(auctions: GradedAuction[], key: TrendMetric): number[] {
  const out: number[] = [];
  for (const a of auctions) {
    const v = a[key];
    if (v !== null) out.push(v);
  }
  return out;
}

/**
 * Trend of a single maturity's graded auctions (newest first):
 * the most recent `recentN` against everything older.
 */
export function computeTrends(auctions: GradedAuction[], recentN: number = DEFAULT_RECENT_WINDOW): TrendReport {
  if (auctions.length < recentN + 1) {
    return { overall: 'insufficient_data' };
  }

  const recent = auctions.slice(0, recentN);
  const prior = auctions.slice(recentN);

  const tail_bps = trendDirection(values(recent, 'tail_bps'), values(prior, 'tail_bps'), true);
  const bid_to_cover = trendDirection(values(recent, 'bid_to_cover'), values(prior, 'bid_to_cover'), false);
  const dealer_pct = trendDirection(values(recent, 'dealer_pct'), values(prior, 'dealer_pct'), true);
  const indirect_pct = trendDirection(values(recent, 'indirect_pct'), values(prior, 'indirect_pct'), false);

  return {
    tail_bps,
    bid_to_cover,
    dealer_pct,
    indirect_pct,
    overall: overallTrend([tail_bps, bid_to_cover, dealer_pct, indirect_pct]),
  };
}

/** Majority of improving vs deteriorating votes; ties and abstentions are stable */
export function overallTrend(labels: TrendLabel[]): OverallTrend {
  const improving = labels.filter(l => l === 'improving').length;
  const deteriorating = labels.filter(l => l === 'deteriorating').length;
  if (improving > deteriorating) return 'improving';
  if (deteriorating > improving) return 'deteriorating';
  return 'stable';
}
