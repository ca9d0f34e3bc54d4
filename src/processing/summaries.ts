import type {
  BillAuction,
  BillSummary,
  DemandSignal,
  GradeDistribution,
  GradedAuction,
  MaturityBreakdown,
} from '../core/types.js';
import { mean, roundTo } from './calculations.js';
import { computeTrends } from './trends.js';

/** Cross-sectional summaries over a set of formatted auctions. */

export function gradeDistribution(auctions: GradedAuction[]): GradeDistribution {
  const dist: GradeDistribution = {};
  for (const a of auctions) {
    const g = a.grade.composite_grade;
    dist[g] = (dist[g] ?? 0) + 1;
  }
  return dist;
}

/** Average GPA rounded to two decimals; null for no auctions */
export function averageGpa(auctions: GradedAuction[]): number | null {
  const avg = mean(auctions.map(a => a.grade.gpa));
  return avg === null ? null : roundTo(avg, 2);
}

export function demandSignal(avgGpa: number | null): DemandSignal {
  if (avgGpa === null) return 'neutral';
  if (avgGpa >= 3.0) return 'strong';
  if (avgGpa >= 2.5) return 'healthy';
  if (avgGpa >= 1.5) return 'soft';
  return 'weak';
}

/**
 * Per-maturity breakdown, sorted by term label.
 * Input order (newest first) is kept within each term.
 */
export function maturityBreakdown(auctions: GradedAuction[]): MaturityBreakdown[] {
  const byTerm = new Map<string, GradedAuction[]>();
  for (const a of auctions) {
    const term = a.security_term ?? 'Unknown';
    const group = byTerm.get(term);
    if (group) group.push(a);
    else byTerm.set(term, [a]);
  }

  const terms = [...byTerm.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const breakdown: MaturityBreakdown[] = [];
  for (const term of terms) {
    const group = byTerm.get(term) ?? [];
    const latest = group[0];
    breakdown.push({
      term,
      auction_count: group.length,
      avg_gpa: averageGpa(group) ?? 0,
      latest_grade: latest.grade.composite_grade,
      latest_date: latest.auction_date,
      trends: computeTrends(group),
    });
  }
  return breakdown;
}

export function summarizeBills(bills: BillAuction[]): BillSummary {
  // Zero and missing ratios are left out of the average
  const ratios: number[] = [];
  for (const b of bills) {
    if (b.bid_to_cover) ratios.push(b.bid_to_cover);
  }
  const avg = mean(ratios);

  return {
    count: bills.length,
    avg_bid_to_cover: avg === null ? null : roundTo(avg, 2),
    cmb_count: bills.filter(b => b.is_cmb).length,
  };
}
