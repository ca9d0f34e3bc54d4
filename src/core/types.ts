/**
 * Core data model for auction-demand.
 *
 * Design principles:
 * - Raw upstream records are strings or null; they are normalized exactly once
 * - Derived metrics, grades and formatted auctions are computed fresh per query
 * - Formatted auctions are never mutated after construction
 * - Presence of a grade is a type-level fact (the `kind` discriminant)
 */

// ── Raw upstream shapes ────────────────────────────────────────────────

export const RAW_AUCTION_FIELDS = [
  'cusip',
  'security_type',
  'security_term',
  'auction_date',
  'issue_date',
  'high_yield',
  'avg_med_yield',
  'high_discnt_rate',
  'high_investment_rate',
  'bid_to_cover_ratio',
  'offering_amt',
  'total_tendered',
  'total_accepted',
  'comp_accepted',
  'noncomp_accepted',
  'direct_bidder_accepted',
  'indirect_bidder_accepted',
  'primary_dealer_accepted',
  'soma_accepted',
  'soma_holdings',
  'cash_management_bill_cmb',
] as const;

export type RawAuctionField = typeof RAW_AUCTION_FIELDS[number];

/** One row of the Fiscal Data auctions_query endpoint. Every value arrives as a string or null. */
export type RawAuctionRecord = { [K in RawAuctionField]?: string | null };

export interface AuctionQuery {
  daysBack: number;
  securityType?: string;
  securityTerm?: string;
}

/** Supplies raw auction rows, newest first. */
export interface AuctionRecordSource {
  fetchAuctions(query: AuctionQuery): Promise<RawAuctionRecord[]>;
}

/** Supplies an official constant-maturity yield used as the when-issued proxy. */
export interface YieldProxySource {
  /** False when no credential is configured; lookups then resolve to null without I/O. */
  readonly configured: boolean;
  fetchProxyYield(securityTerm: string, date: string): Promise<number | null>;
}

export interface AuctionSources {
  auctions: AuctionRecordSource;
  yields: YieldProxySource;
}

// ── Normalized boundary ────────────────────────────────────────────────

export interface NormalizedAuction {
  cusip: string | null;
  security_type: string;
  security_term: string | null;
  auction_date: string | null;
  issue_date: string | null;
  high_yield: number | null;
  avg_med_yield: number | null;
  high_discnt_rate: number | null;
  high_investment_rate: number | null;
  bid_to_cover_ratio: number | null;
  offering_amt: number | null;
  total_tendered: number | null;
  total_accepted: number | null;
  comp_accepted: number | null;
  noncomp_accepted: number | null;
  direct_bidder_accepted: number | null;
  indirect_bidder_accepted: number | null;
  primary_dealer_accepted: number | null;
  soma_accepted: number | null;
  is_cmb: boolean;
}

// ── Derived metrics & grades ───────────────────────────────────────────

export type WiSource = 'fred_cmt' | 'avg_med_yield';

export interface DemandMetrics {
  tail_bps: number | null;
  /** Null iff tail_bps is null */
  wi_source: WiSource | null;
  bid_to_cover: number | null;
  dealer_pct: number | null;
  indirect_pct: number | null;
  direct_pct: number | null;
}

export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F';
export type MetricGrade = LetterGrade | 'N/A';
export type GradedMetric = 'tail' | 'bid_to_cover' | 'dealer_pct' | 'indirect_pct';

export interface GradeThresholds {
  A: number;
  B: number;
  C: number;
  D: number;
}

export interface AuctionGrade {
  composite_grade: LetterGrade;
  gpa: number;
  metric_grades: Record<GradedMetric, MetricGrade>;
}

// ── Formatted auctions ─────────────────────────────────────────────────

interface FormattedAuctionBase {
  cusip: string | null;
  security_type: string;
  security_term: string | null;
  auction_date: string | null;
  issue_date: string | null;
  offering_amt: number | null;
  bid_to_cover: number | null;
  dealer_pct: number | null;
  indirect_pct: number | null;
  direct_pct: number | null;
  soma_accepted?: number;
  soma_pct?: number;
}

export interface BillAuction extends FormattedAuctionBase {
  kind: 'bill';
  high_discnt_rate: number | null;
  high_investment_rate: number | null;
  is_cmb?: true;
}

/** Note, Bond, TIPS or FRN auction with a demand grade. */
export interface GradedAuction extends FormattedAuctionBase {
  kind: 'graded';
  high_yield: number | null;
  avg_med_yield: number | null;
  tail_bps: number | null;
  wi_source?: WiSource;
  grade: AuctionGrade;
}

/** Coupon security outside the gradeable set: yields shown, no grade. */
export interface CouponAuction extends FormattedAuctionBase {
  kind: 'coupon';
  high_yield: number | null;
  avg_med_yield: number | null;
}

export type FormattedAuction = BillAuction | GradedAuction | CouponAuction;

// ── Trends ─────────────────────────────────────────────────────────────

export type TrendLabel = 'improving' | 'deteriorating' | 'stable' | 'insufficient_data';
export type OverallTrend = 'improving' | 'deteriorating' | 'stable';

export type TrendReport =
  | { overall: 'insufficient_data' }
  | {
      tail_bps: TrendLabel;
      bid_to_cover: TrendLabel;
      dealer_pct: TrendLabel;
      indirect_pct: TrendLabel;
      overall: OverallTrend;
    };

// ── Query results ──────────────────────────────────────────────────────

export type GradeDistribution = Partial<Record<LetterGrade, number>>;

export type DemandSignal = 'strong' | 'healthy' | 'soft' | 'weak' | 'neutral';

export interface AuctionListParams {
  securityType?: string;
  securityTerm?: string;
  daysBack?: number;
  limit?: number;
}

export interface AuctionListResult {
  count: number;
  period: string;
  auctions: FormattedAuction[];
  graded_summary?: {
    count: number;
    grade_distribution: GradeDistribution;
  };
  bill_count?: number;
  wi_source?: WiSource;
  _warnings?: string[];
}

export interface MaturityBreakdown {
  term: string;
  auction_count: number;
  avg_gpa: number;
  latest_grade: LetterGrade;
  latest_date: string | null;
  trends: TrendReport;
}

export interface BillSummary {
  count: number;
  avg_bid_to_cover: number | null;
  cmb_count: number;
}

export interface AuctionAnalysisParams {
  securityTerm?: string;
  daysBack?: number;
}

export interface AuctionAnalysisResult {
  period: string;
  total_auctions: number;
  demand_signal: DemandSignal;
  notes_bonds?: {
    count: number;
    avg_gpa: number;
    grade_distribution: GradeDistribution;
    by_maturity: MaturityBreakdown[];
  };
  bills?: BillSummary;
  recent_graded?: GradedAuction[];
  _warnings?: string[];
}
