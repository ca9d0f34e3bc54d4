/**
 * Auction query orchestration.
 *
 * Composes fetch, normalization, proxy resolution, grading and summaries into
 * the two public operations. Returns data, never prints, never throws: upstream
 * failures become an empty result plus a warning. Used by the CLI, the MCP
 * server and the web API.
 */

import { normalizeAuctionRecord, isSettled } from '../processing/normalizer.js';
import { formatAuction } from '../processing/auction-formatter.js';
import { GRADEABLE_TYPES } from '../processing/grading.js';
import {
  averageGpa,
  demandSignal,
  gradeDistribution,
  maturityBreakdown,
  summarizeBills,
} from '../processing/summaries.js';
import { describeError } from './errors.js';
import type {
  AuctionAnalysisParams,
  AuctionAnalysisResult,
  AuctionListParams,
  AuctionListResult,
  AuctionQuery,
  AuctionSources,
  BillAuction,
  FormattedAuction,
  GradedAuction,
  NormalizedAuction,
  YieldProxySource,
} from './types.js';

export const LIST_DEFAULT_DAYS = 30;
export const ANALYSIS_DEFAULT_DAYS = 90;
export const MAX_DAYS_BACK = 365;
export const LIST_DEFAULT_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;
export const RECENT_GRADED_COUNT = 10;

export const WARN_NO_FRED_KEY =
  'FRED_API_KEY not configured; tail uses avg_med_yield (less precise). ' +
  'Set FRED_API_KEY for FRED CMT yield WI proxy.';
export const WARN_ONLY_BILLS = 'No graded auctions (notes/bonds) in results; only bills returned.';
export const WARN_NO_GRADED_IN_PERIOD = 'No graded auctions (notes/bonds) found in period';

// ── Helpers ────────────────────────────────────────────────────────────

/** Truncate to an integer and clamp; non-finite input takes the default */
export function clampInt(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(Math.max(Math.trunc(value), min), max);
}

function periodLabel(daysBack: number): string {
  return `last ${daysBack} days`;
}

function isGraded(a: FormattedAuction): a is GradedAuction {
  return a.kind === 'graded';
}

function isBill(a: FormattedAuction): a is BillAuction {
  return a.kind === 'bill';
}

interface FetchOutcome {
  settled: NormalizedAuction[];
  warning?: string;
}

async function fetchSettled(sources: AuctionSources, query: AuctionQuery): Promise<FetchOutcome> {
  try {
    const raw = await sources.auctions.fetchAuctions(query);
    return { settled: raw.map(normalizeAuctionRecord).filter(isSettled) };
  } catch (err) {
    return { settled: [], warning: `Treasury auction data unavailable: ${describeError(err)}` };
  }
}

function proxyKey(term: string, date: string): string {
  return `${term}|${date}`;
}

/**
 * Look up one WI proxy yield per distinct (term, date) among gradeable
 * auctions, concurrently. Returns a per-auction array aligned with the input.
 */
export async function resolveWiYields(
  yields: YieldProxySource,
  auctions: NormalizedAuction[]
): Promise<Array<number | null>> {
  if (!yields.configured) return auctions.map(() => null);

  const pending = new Map<string, { term: string; date: string }>();
  for (const a of auctions) {
    if (!GRADEABLE_TYPES.has(a.security_type)) continue;
    if (!a.security_term || !a.auction_date) continue;
    const key = proxyKey(a.security_term, a.auction_date);
    if (!pending.has(key)) pending.set(key, { term: a.security_term, date: a.auction_date });
  }

  const entries = [...pending.entries()];
  const values = await Promise.all(
    entries.map(([, { term, date }]) =>
      // A rejected lookup degrades to "no proxy" instead of failing the query
      yields.fetchProxyYield(term, date).catch((): number | null => null)
    )
  );

  const resolved = new Map<string, number | null>();
  entries.forEach(([key], i) => resolved.set(key, values[i] ?? null));

  return auctions.map(a => {
    if (!GRADEABLE_TYPES.has(a.security_type) || !a.security_term || !a.auction_date) return null;
    return resolved.get(proxyKey(a.security_term, a.auction_date)) ?? null;
  });
}

async function formatAll(sources: AuctionSources, auctions: NormalizedAuction[]): Promise<FormattedAuction[]> {
  const wiYields = await resolveWiYields(sources.yields, auctions);
  return auctions.map((a, i) => formatAuction(a, wiYields[i] ?? null));
}

// ── List ───────────────────────────────────────────────────────────────

/**
 * Recent auctions with demand metrics. Notes and bonds carry a grade;
 * bills show discount rates and are counted separately.
 */
export async function executeAuctionListCore(
  sources: AuctionSources,
  params: AuctionListParams = {}
): Promise<AuctionListResult> {
  const daysBack = clampInt(params.daysBack, 1, MAX_DAYS_BACK, LIST_DEFAULT_DAYS);
  const limit = clampInt(params.limit, 1, MAX_LIST_LIMIT, LIST_DEFAULT_LIMIT);

  const warnings: string[] = [];
  const fetched = await fetchSettled(sources, {
    daysBack,
    securityType: params.securityType || undefined,
    securityTerm: params.securityTerm || undefined,
  });
  if (fetched.warning) warnings.push(fetched.warning);

  const auctions = await formatAll(sources, fetched.settled.slice(0, limit));
  const graded = auctions.filter(isGraded);
  const bills = auctions.filter(isBill);

  const result: AuctionListResult = {
    count: auctions.length,
    period: periodLabel(daysBack),
    auctions,
  };

  if (graded.length > 0) {
    result.graded_summary = {
      count: graded.length,
      grade_distribution: gradeDistribution(graded),
    };
    result.wi_source = sources.yields.configured ? 'fred_cmt' : 'avg_med_yield';
    if (!sources.yields.configured) warnings.push(WARN_NO_FRED_KEY);
  } else if (auctions.length > 0) {
    warnings.push(WARN_ONLY_BILLS);
  }

  if (bills.length > 0) result.bill_count = bills.length;
  if (warnings.length > 0) result._warnings = warnings;

  return result;
}

// ── Analysis ───────────────────────────────────────────────────────────

/**
 * Demand health over a period: grade distribution, per-maturity trends,
 * bill summary and an overall demand signal.
 */
export async function executeAuctionAnalysisCore(
  sources: AuctionSources,
  params: AuctionAnalysisParams = {}
): Promise<AuctionAnalysisResult> {
  const daysBack = clampInt(params.daysBack, 1, MAX_DAYS_BACK, ANALYSIS_DEFAULT_DAYS);

  const warnings: string[] = [];
  const fetched = await fetchSettled(sources, {
    daysBack,
    securityTerm: params.securityTerm || undefined,
  });
  if (fetched.warning) warnings.push(fetched.warning);

  const auctions = await formatAll(sources, fetched.settled);
  const graded = auctions.filter(isGraded);
  const bills = auctions.filter(isBill);

  const avgGpa = averageGpa(graded);

  const result: AuctionAnalysisResult = {
    period: periodLabel(daysBack),
    total_auctions: auctions.length,
    demand_signal: demandSignal(avgGpa),
  };

  if (graded.length > 0) {
    result.notes_bonds = {
      count: graded.length,
      avg_gpa: avgGpa ?? 0,
      grade_distribution: gradeDistribution(graded),
      by_maturity: maturityBreakdown(graded),
    };
    if (!sources.yields.configured) warnings.push(WARN_NO_FRED_KEY);
  } else {
    warnings.push(WARN_NO_GRADED_IN_PERIOD);
  }

  if (bills.length > 0) result.bills = summarizeBills(bills);
  if (graded.length > 0) result.recent_graded = graded.slice(0, RECENT_GRADED_COUNT);
  if (warnings.length > 0) result._warnings = warnings;

  return result;
}
