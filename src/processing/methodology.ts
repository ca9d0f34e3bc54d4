import {
  BTC_THRESHOLDS,
  DEALER_THRESHOLDS,
  GRADEABLE_TYPES,
  GRADE_POINTS,
  GRADE_WEIGHTS,
  INDIRECT_THRESHOLDS,
  TAIL_THRESHOLDS,
} from './grading.js';
import { MAX_PROXY_DIVERGENCE } from './demand-metrics.js';
import { DEFAULT_RECENT_WINDOW } from './trends.js';
import type { GradeThresholds, GradedMetric, LetterGrade, DemandSignal } from '../core/types.js';

export interface MetricMethodology {
  metric: GradedMetric;
  label: string;
  direction: 'lower_is_better' | 'higher_is_better';
  weight: number;
  thresholds: GradeThresholds;
  description: string;
}

export interface Methodology {
  gradeable_types: string[];
  metrics: MetricMethodology[];
  grade_points: Record<LetterGrade, number>;
  composite_bands: Array<{ grade: LetterGrade; min_gpa: number }>;
  demand_signal_bands: Array<{ signal: DemandSignal; min_avg_gpa: number | null }>;
  wi_proxy: {
    preferred: 'fred_cmt';
    fallback: 'avg_med_yield';
    max_divergence_pct: number;
  };
  trend: {
    recent_window: number;
    stable_band: string;
  };
}

export function getMethodology(): Methodology {
  return {
    gradeable_types: [...GRADEABLE_TYPES],
    metrics: [
      {
        metric: 'tail',
        label: 'Tail (bps)',
        direction: 'lower_is_better',
        weight: GRADE_WEIGHTS.tail,
        thresholds: TAIL_THRESHOLDS,
        description: 'High yield minus the when-issued proxy, in basis points. Negative means the auction stopped through.',
      },
      {
        metric: 'bid_to_cover',
        label: 'Bid-to-Cover',
        direction: 'higher_is_better',
        weight: GRADE_WEIGHTS.bid_to_cover,
        thresholds: BTC_THRESHOLDS,
        description: 'Total tendered over total accepted.',
      },
      {
        metric: 'dealer_pct',
        label: 'Dealer Takedown %',
        direction: 'lower_is_better',
        weight: GRADE_WEIGHTS.dealer_pct,
        thresholds: DEALER_THRESHOLDS,
        description: 'Primary dealer share of competitive awards. Dealers absorb what end buyers leave.',
      },
      {
        metric: 'indirect_pct',
        label: 'Indirect Bidders %',
        direction: 'higher_is_better',
        weight: GRADE_WEIGHTS.indirect_pct,
        thresholds: INDIRECT_THRESHOLDS,
        description: 'Indirect share of competitive awards, a proxy for foreign and institutional demand.',
      },
    ],
    grade_points: GRADE_POINTS,
    composite_bands: [
      { grade: 'A', min_gpa: 3.5 },
      { grade: 'B', min_gpa: 2.5 },
      { grade: 'C', min_gpa: 1.5 },
      { grade: 'D', min_gpa: 0.5 },
      { grade: 'F', min_gpa: 0 },
    ],
    demand_signal_bands: [
      { signal: 'strong', min_avg_gpa: 3.0 },
      { signal: 'healthy', min_avg_gpa: 2.5 },
      { signal: 'soft', min_avg_gpa: 1.5 },
      { signal: 'weak', min_avg_gpa: 0 },
      { signal: 'neutral', min_avg_gpa: null },
    ],
    wi_proxy: {
      preferred: 'fred_cmt',
      fallback: 'avg_med_yield',
      max_divergence_pct: MAX_PROXY_DIVERGENCE,
    },
    trend: {
      recent_window: DEFAULT_RECENT_WINDOW,
      stable_band: '5% of the prior average (0.1 when the prior average is zero)',
    },
  };
}
