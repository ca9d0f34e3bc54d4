import type {
  DemandMetrics,
  AuctionGrade,
  GradeThresholds,
  GradedMetric,
  LetterGrade,
  MetricGrade,
} from '../core/types.js';
import { roundTo } from './calculations.js';

/**
 * Auction grading for notes, bonds, TIPS and FRNs.
 *
 * Each metric is graded against a fixed threshold table; the composite
 * letter comes from a weighted GPA over the metrics that could be graded.
 * The composite can disagree with individual metric grades.
 */

export const GRADEABLE_TYPES: ReadonlySet<string> = new Set(['Note', 'Bond', 'TIPS', 'FRN']);

/** Tail (bps): lower is better; negative = stopped through */
export const TAIL_THRESHOLDS: GradeThresholds = { A: -1.0, B: 0.5, C: 2.0, D: 4.0 };

/** Bid-to-cover: higher is better */
export const BTC_THRESHOLDS: GradeThresholds = { A: 2.8, B: 2.5, C: 2.2, D: 2.0 };

/** Primary dealer takedown %: lower is better (dealers are the backstop) */
export const DEALER_THRESHOLDS: GradeThresholds = { A: 8.0, B: 13.0, C: 20.0, D: 30.0 };

/** Indirect bidder %: higher is better (foreign/institutional demand) */
export const INDIRECT_THRESHOLDS: GradeThresholds = { A: 75.0, B: 68.0, C: 60.0, D: 55.0 };

export const GRADE_WEIGHTS: Record<GradedMetric, number> = {
  tail: 0.25,
  bid_to_cover: 0.25,
  dealer_pct: 0.30,
  indirect_pct: 0.20,
};

export const GRADED_METRICS: readonly GradedMetric[] = ['tail', 'bid_to_cover', 'dealer_pct', 'indirect_pct'];

export const GRADE_POINTS: Record<LetterGrade, number> = { A: 4, B: 3, C: 2, D: 1, F: 0 };

/** Exclusive upper bounds: value < A → A, …, otherwise F */
export function gradeLowerIsBetter(value: number | null, thresholds: GradeThresholds): MetricGrade {
  if (value === null) return 'N/A';
  if (value < thresholds.A) return 'A';
  if (value < thresholds.B) return 'B';
  if (value < thresholds.C) return 'C';
  if (value < thresholds.D) return 'D';
  return 'F';
}

/** Inclusive lower bounds: value >= A → A, …, otherwise F */
export function gradeHigherIsBetter(value: number | null, thresholds: GradeThresholds): MetricGrade {
  if (value === null) return 'N/A';
  if (value >= thresholds.A) return 'A';
  if (value >= thresholds.B) return 'B';
  if (value >= thresholds.C) return 'C';
  if (value >= thresholds.D) return 'D';
  return 'F';
}

export function compositeFromGpa(gpa: number): LetterGrade {
  if (gpa >= 3.5) return 'A';
  if (gpa >= 2.5) return 'B';
  if (gpa >= 1.5) return 'C';
  if (gpa >= 0.5) return 'D';
  return 'F';
}

type GradeInputs = Pick<DemandMetrics, 'tail_bps' | 'bid_to_cover' | 'dealer_pct' | 'indirect_pct'>;

export function gradeAuction(metrics: GradeInputs): AuctionGrade {
  const grades: Record<GradedMetric, MetricGrade> = {
    tail: gradeLowerIsBetter(metrics.tail_bps, TAIL_THRESHOLDS),
    bid_to_cover: gradeHigherIsBetter(metrics.bid_to_cover, BTC_THRESHOLDS),
    dealer_pct: gradeLowerIsBetter(metrics.dealer_pct, DEALER_THRESHOLDS),
    indirect_pct: gradeHigherIsBetter(metrics.indirect_pct, INDIRECT_THRESHOLDS),
  };

  // Weights renormalize over graded metrics only
  let weightedSum = 0;
  let totalWeight = 0;
  for (const metric of GRADED_METRICS) {
    const grade = grades[metric];
    if (grade === 'N/A') continue;
    weightedSum += GRADE_POINTS[grade] * GRADE_WEIGHTS[metric];
    totalWeight += GRADE_WEIGHTS[metric];
  }

  let gpa: number;
  if (totalWeight > 0) {
    gpa = weightedSum / totalWeight;
  } else {
    gpa = 0;
  }

  return {
    composite_grade: compositeFromGpa(gpa),
    gpa: roundTo(gpa, 2),
    metric_grades: grades,
  };
}
