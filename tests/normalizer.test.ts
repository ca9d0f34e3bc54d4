import { describe, it, expect } from 'vitest';
import { parseNumeric, normalizeAuctionRecord, isSettled } from '../src/processing/normalizer.js';
import { NOTE_10Y, BILL_4W, CMB_BILL, UPCOMING_NOTE } from './fixtures.js';

describe('parseNumeric', () => {
  it('parses decimal strings', () => {
    expect(parseNumeric('4.320')).toBe(4.32);
    expect(parseNumeric('2.58')).toBe(2.58);
    expect(parseNumeric('42000000000')).toBe(42000000000);
    expect(parseNumeric('-0.5')).toBe(-0.5);
  });

  it('allows surrounding whitespace', () => {
    expect(parseNumeric('  3.10 ')).toBe(3.1);
  });

  it('returns null for missing markers', () => {
    expect(parseNumeric(null)).toBeNull();
    expect(parseNumeric(undefined)).toBeNull();
    expect(parseNumeric('')).toBeNull();
    expect(parseNumeric('   ')).toBeNull();
    expect(parseNumeric('null')).toBeNull();
    expect(parseNumeric('NULL')).toBeNull();
  });

  it('returns null for non-numeric strings', () => {
    expect(parseNumeric('abc')).toBeNull();
    expect(parseNumeric('4.3.2')).toBeNull();
    expect(parseNumeric('0x10')).toBeNull();
    expect(parseNumeric('Infinity')).toBeNull();
  });

  it('passes finite numbers through', () => {
    expect(parseNumeric(4.5)).toBe(4.5);
    expect(parseNumeric(0)).toBe(0);
  });

  it('rejects NaN and infinities', () => {
    expect(parseNumeric(NaN)).toBeNull();
    expect(parseNumeric(Infinity)).toBeNull();
    expect(parseNumeric(-Infinity)).toBeNull();
  });
});

describe('normalizeAuctionRecord', () => {
  it('types every field of a note', () => {
    const n = normalizeAuctionRecord(NOTE_10Y);
    expect(n.cusip).toBe('TEST10Y01');
    expect(n.security_type).toBe('Note');
    expect(n.security_term).toBe('10-Year');
    expect(n.high_yield).toBe(4.32);
    expect(n.avg_med_yield).toBe(4.31);
    expect(n.high_discnt_rate).toBeNull();
    expect(n.high_investment_rate).toBeNull();
    expect(n.comp_accepted).toBe(38500000000);
    expect(n.soma_accepted).toBe(5200000000);
    expect(n.is_cmb).toBe(false);
  });

  it('maps absent fields to null and a missing type to empty', () => {
    const n = normalizeAuctionRecord({});
    expect(n.security_type).toBe('');
    expect(n.cusip).toBeNull();
    expect(n.bid_to_cover_ratio).toBeNull();
    expect(n.is_cmb).toBe(false);
  });

  it('reads the CMB flag case-insensitively after trimming', () => {
    expect(normalizeAuctionRecord(CMB_BILL).is_cmb).toBe(true);
    expect(normalizeAuctionRecord(BILL_4W).is_cmb).toBe(false);
  });
});

describe('isSettled', () => {
  it('accepts auctions with any result field', () => {
    expect(isSettled(normalizeAuctionRecord(NOTE_10Y))).toBe(true);
    expect(isSettled(normalizeAuctionRecord(BILL_4W))).toBe(true);
    expect(isSettled(normalizeAuctionRecord({ bid_to_cover_ratio: '2.4' }))).toBe(true);
  });

  it('rejects announced auctions without results', () => {
    expect(isSettled(normalizeAuctionRecord(UPCOMING_NOTE))).toBe(false);
  });
});
