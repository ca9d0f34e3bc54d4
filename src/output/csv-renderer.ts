/**
 * Renders auction lists as CSV for spreadsheet import.
 */

import type { AuctionListResult, FormattedAuction } from '../core/types.js';
import { csvEscape } from './format-utils.js';

export const AUCTION_CSV_HEADER = [
  'Auction_Date',
  'Security_Type',
  'Security_Term',
  'CUSIP',
  'High_Yield',
  'High_Discount_Rate',
  'Bid_To_Cover',
  'Tail_Bps',
  'Dealer_Pct',
  'Indirect_Pct',
  'Direct_Pct',
  'Offering_Amt',
  'SOMA_Pct',
  'Grade',
  'GPA',
  'WI_Source',
];

function cell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return csvEscape(String(value));
}

function row(a: FormattedAuction): string[] {
  const highYield = a.kind === 'bill' ? null : a.high_yield;
  const discount = a.kind === 'bill' ? a.high_discnt_rate : null;
  const graded = a.kind === 'graded' ? a : null;

  return [
    cell(a.auction_date),
    cell(a.security_type),
    cell(a.security_term),
    cell(a.cusip),
    cell(highYield),
    cell(discount),
    cell(a.bid_to_cover),
    cell(graded?.tail_bps),
    cell(a.dealer_pct),
    cell(a.indirect_pct),
    cell(a.direct_pct),
    cell(a.offering_amt),
    cell(a.soma_pct),
    cell(graded?.grade.composite_grade),
    cell(graded?.grade.gpa),
    cell(graded?.wi_source),
  ];
}

export function renderAuctionCsv(result: AuctionListResult): string {
  const lines = [AUCTION_CSV_HEADER.join(',')];
  for (const a of result.auctions) {
    lines.push(row(a).join(','));
  }
  return lines.join('\n');
}
