/**
 * Query-string parsing for the web API layer.
 * Query values arrive as strings; these schemas coerce and validate them
 * and turn zod issues into the API's validation error body.
 */

import { z } from 'zod';
import type { AuctionAnalysisParams, AuctionListParams } from '../core/types.js';

// ── Schemas ───────────────────────────────────────────────────────────

const optionalText = z.string().trim().min(1).optional();
const optionalInt = z.coerce.number().int().optional();

export const AuctionsQuerySchema = z.object({
  type: optionalText,
  term: optionalText,
  days: optionalInt,
  limit: optionalInt,
});

export const AnalysisQuerySchema = z.object({
  term: optionalText,
  days: optionalInt,
});

// ── Errors ────────────────────────────────────────────────────────────

export interface ValidationErrorBody {
  error: {
    type: 'validation';
    message: string;
    issues: Array<{ field: string; message: string }>;
  };
}

export function validationError(error: z.ZodError): ValidationErrorBody {
  const issues = error.issues.map(i => ({ field: i.path.join('.'), message: i.message }));
  return {
    error: {
      type: 'validation',
      message: issues.map(i => `${i.field}: ${i.message}`).join('; '),
      issues,
    },
  };
}

// ── Parsers ───────────────────────────────────────────────────────────

export type ParseOutcome<T> = { ok: true; params: T } | { ok: false; body: ValidationErrorBody };

export function parseAuctionsQuery(query: unknown): ParseOutcome<AuctionListParams> {
  const parsed = AuctionsQuerySchema.safeParse(query ?? {});
  if (!parsed.success) return { ok: false, body: validationError(parsed.error) };
  const q = parsed.data;
  return {
    ok: true,
    params: { securityType: q.type, securityTerm: q.term, daysBack: q.days, limit: q.limit },
  };
}

export function parseAnalysisQuery(query: unknown): ParseOutcome<AuctionAnalysisParams> {
  const parsed = AnalysisQuerySchema.safeParse(query ?? {});
  if (!parsed.success) return { ok: false, body: validationError(parsed.error) };
  return { ok: true, params: { securityTerm: parsed.data.term, daysBack: parsed.data.days } };
}
